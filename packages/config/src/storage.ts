/**
 * Typed storage settings, parsed from the environment with zod.
 *
 * Nothing here is cached: during a migration window the connection target and
 * either backend's settings may change between two requests.
 */

import { z } from 'zod';
import { readEnv } from './env.js';

export const CLOUD_TARGET_MARKER = 'AWS';

export const STORAGE_ENV_KEYS = [
  'S3_TARGET',
  'S3_ENDPOINT_LOCAL',
  'S3_ACCESS_KEY',
  'S3_SECRET_KEY',
  'S3_SECURE',
  'S3_REGION_LOCAL',
  'S3_NOTIFICATION_QUEUE_ARN',
  'S3_ENDPOINT',
  'S3_STS_REGION',
  'S3_AWS_ENDPOINT',
  'S3_AWS_REGION',
  'S3_AWS_ACCESS_KEY',
  'S3_AWS_SECRET_KEY',
  'STS_ENDPOINT',
  'S3_REGION',
  'S3_AWS_UPLOAD_ROLE_ARN',
  'S3_AWS_DOWNLOAD_ROLE_ARN',
] as const;

export type StorageEnv = Partial<Record<string, string | undefined>>;

export interface AssumeRoleTarget {
  roleArn: string;
  sessionName: string;
}

/** Settings for the temporary-credential sub-call; may differ from the data plane. */
export interface CredentialIssuerConfig {
  endpoint?: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  durationSeconds: number;
  uploadRole?: AssumeRoleTarget;
  downloadRole?: AssumeRoleTarget;
}

export interface SelfHostedStorageConfig {
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  notificationQueueArn?: string;
  issuer: CredentialIssuerConfig;
}

export interface CloudStorageConfig {
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  issuer: CredentialIssuerConfig;
}

export type ConfigResult<T> = { ok: true; config: T } | { ok: false; missing: string[] };

const DEFAULT_SELF_HOSTED_REGION = 'eu-west-1';
const SELF_HOSTED_ROLE: AssumeRoleTarget = {
  // MinIO ignores both values but the STS API requires them
  roleArn: 'arn:x:ignored:by:minio:',
  sessionName: 'ignored-by-minio',
};
const SELF_HOSTED_CREDENTIAL_TTL_SECONDS = 12000;
const CLOUD_CREDENTIAL_TTL_SECONDS = 3600;

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim().length === 0 ? undefined : value;
}

const requiredValue = z.preprocess(blankToUndefined, z.string().trim());
const optionalValue = z.preprocess(blankToUndefined, z.string().trim().optional());
const flagValue = optionalValue.transform((value) => {
  const normalized = value?.toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
});

const SelfHostedEnvSchema = z.object({
  S3_ENDPOINT_LOCAL: requiredValue,
  S3_ACCESS_KEY: requiredValue,
  S3_SECRET_KEY: requiredValue,
  S3_SECURE: flagValue,
  S3_REGION_LOCAL: optionalValue,
  S3_NOTIFICATION_QUEUE_ARN: optionalValue,
  S3_ENDPOINT: optionalValue,
  S3_STS_REGION: optionalValue,
});

const CloudEnvSchema = z.object({
  S3_AWS_ENDPOINT: requiredValue,
  S3_AWS_ACCESS_KEY: requiredValue,
  S3_AWS_SECRET_KEY: requiredValue,
  // Signing region; must match the endpoint's region
  S3_AWS_REGION: requiredValue,
  STS_ENDPOINT: optionalValue,
  S3_REGION: optionalValue,
  S3_ACCESS_KEY: optionalValue,
  S3_SECRET_KEY: optionalValue,
  S3_AWS_UPLOAD_ROLE_ARN: optionalValue,
  S3_AWS_DOWNLOAD_ROLE_ARN: optionalValue,
});

function missingKeys(error: z.ZodError): string[] {
  const keys = new Set<string>();
  for (const issue of error.issues) {
    const key = issue.path[0];
    if (typeof key === 'string') keys.add(key);
  }
  return [...keys];
}

/**
 * Prefix a bare `host:port` with a scheme; full URLs are kept as they are
 */
export function withScheme(endpoint: string, secure: boolean): string {
  if (/^https?:\/\//i.test(endpoint)) {
    return endpoint.replace(/\/+$/, '');
  }
  return `${secure ? 'https' : 'http'}://${endpoint.replace(/\/+$/, '')}`;
}

/**
 * Raw connection target setting (`S3_TARGET`), undefined when unset
 */
export function readConnectionTargetSetting(): string | undefined {
  return readEnv('S3_TARGET') || undefined;
}

export function loadSelfHostedConfig(env: StorageEnv = process.env): ConfigResult<SelfHostedStorageConfig> {
  const parsed = SelfHostedEnvSchema.safeParse(env);
  if (!parsed.success) {
    return { ok: false, missing: missingKeys(parsed.error) };
  }

  const values = parsed.data;
  const endpoint = withScheme(values.S3_ENDPOINT_LOCAL, values.S3_SECURE);
  return {
    ok: true,
    config: {
      endpoint,
      region: values.S3_REGION_LOCAL ?? DEFAULT_SELF_HOSTED_REGION,
      accessKeyId: values.S3_ACCESS_KEY,
      secretAccessKey: values.S3_SECRET_KEY,
      notificationQueueArn: values.S3_NOTIFICATION_QUEUE_ARN,
      issuer: {
        endpoint: values.S3_ENDPOINT ? withScheme(values.S3_ENDPOINT, values.S3_SECURE) : endpoint,
        region: values.S3_STS_REGION ?? DEFAULT_SELF_HOSTED_REGION,
        accessKeyId: values.S3_ACCESS_KEY,
        secretAccessKey: values.S3_SECRET_KEY,
        durationSeconds: SELF_HOSTED_CREDENTIAL_TTL_SECONDS,
        uploadRole: SELF_HOSTED_ROLE,
        downloadRole: SELF_HOSTED_ROLE,
      },
    },
  };
}

export function loadCloudConfig(env: StorageEnv = process.env): ConfigResult<CloudStorageConfig> {
  const parsed = CloudEnvSchema.safeParse(env);
  if (!parsed.success) {
    return { ok: false, missing: missingKeys(parsed.error) };
  }

  const values = parsed.data;
  return {
    ok: true,
    config: {
      endpoint: withScheme(values.S3_AWS_ENDPOINT, true),
      region: values.S3_AWS_REGION,
      accessKeyId: values.S3_AWS_ACCESS_KEY,
      secretAccessKey: values.S3_AWS_SECRET_KEY,
      issuer: {
        endpoint: values.STS_ENDPOINT ? withScheme(values.STS_ENDPOINT, true) : undefined,
        region: values.S3_REGION ?? values.S3_AWS_REGION,
        accessKeyId: values.S3_ACCESS_KEY ?? values.S3_AWS_ACCESS_KEY,
        secretAccessKey: values.S3_SECRET_KEY ?? values.S3_AWS_SECRET_KEY,
        durationSeconds: CLOUD_CREDENTIAL_TTL_SECONDS,
        uploadRole: values.S3_AWS_UPLOAD_ROLE_ARN
          ? { roleArn: values.S3_AWS_UPLOAD_ROLE_ARN, sessionName: 'S3UploadFilesSession' }
          : undefined,
        downloadRole: values.S3_AWS_DOWNLOAD_ROLE_ARN
          ? { roleArn: values.S3_AWS_DOWNLOAD_ROLE_ARN, sessionName: 'S3DownloadFilesSession' }
          : undefined,
      },
    },
  };
}
