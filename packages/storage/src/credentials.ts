/**
 * Temporary credential issuance and the external grant representation
 */

import { AssumeRoleCommand, type STSClient } from '@aws-sdk/client-sts';
import { z } from 'zod';
import { CredentialIssuanceError } from './errors.js';
import type {
  CredentialGrant,
  CredentialGrantDocument,
  EssentialCredentialGrant,
  PolicyDocument,
} from './types.js';

// Zod schema for the role-assumption response
const AssumeRoleResponseSchema = z.object({
  Credentials: z.object({
    AccessKeyId: z.string(),
    SecretAccessKey: z.string(),
    SessionToken: z.string(),
    Expiration: z.date(),
  }),
  AssumedRoleUser: z
    .object({
      AssumedRoleId: z.string(),
      Arn: z.string(),
    })
    .optional(),
  PackedPolicySize: z.number().optional(),
});

export interface ScopedRoleRequest {
  roleArn: string;
  sessionName: string;
  policy: PolicyDocument;
  durationSeconds: number;
}

export interface GrantContext {
  bucket: string;
  objectName?: string;
  uploadTaskId?: string;
}

/**
 * Assume a role restricted by an inline session policy
 */
export async function assumeScopedRole(sts: STSClient, request: ScopedRoleRequest): Promise<CredentialGrant> {
  const response = await sts.send(
    new AssumeRoleCommand({
      RoleArn: request.roleArn,
      RoleSessionName: request.sessionName,
      Policy: JSON.stringify(request.policy),
      DurationSeconds: request.durationSeconds,
    })
  );

  const parsed = AssumeRoleResponseSchema.safeParse(response);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new CredentialIssuanceError(`Role assumption returned incomplete credentials (${fields})`);
  }
  return parsed.data;
}

export function toGrantDocument(grant: CredentialGrant, context: GrantContext): CredentialGrantDocument {
  const document: CredentialGrantDocument = { ...grant, bucket: context.bucket };
  if (context.objectName) {
    document.objectName = context.objectName;
  }
  if (context.uploadTaskId) {
    document.uploadTaskId = context.uploadTaskId;
  }
  return document;
}

/**
 * Reduced-disclosure view: bucket, the key triple without its expiry, task id
 */
export function toEssentialGrant(document: CredentialGrantDocument): EssentialCredentialGrant {
  const { AccessKeyId, SecretAccessKey, SessionToken } = document.Credentials;
  const essentials: EssentialCredentialGrant = {
    bucket: document.bucket,
    Credentials: { AccessKeyId, SecretAccessKey, SessionToken },
  };
  if (document.uploadTaskId) {
    essentials.uploadTaskId = document.uploadTaskId;
  }
  return essentials;
}

function sortKeys(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[key] = sortKeys(entry);
    }
    return sorted;
  }
  return value;
}

/**
 * JSON with keys sorted at every level and dates as ISO-8601
 */
export function serializeGrant(grant: CredentialGrantDocument | EssentialCredentialGrant): string {
  return JSON.stringify(sortKeys(grant));
}
