/**
 * S3-protocol storage backend
 *
 * Both providers speak the S3 API, so one implementation serves both; the
 * variant supplies configuration, bucket-creation details and the download
 * policy scope.
 */

import { createWriteStream, existsSync } from 'fs';
import { readFile, rm, writeFile } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  S3Client,
  CopyObjectCommand,
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  PutObjectCommand,
  paginateListObjectsV2,
  type CreateBucketCommandInput,
} from '@aws-sdk/client-s3';
import { STSClient } from '@aws-sdk/client-sts';
import { createPresignedPost } from '@aws-sdk/s3-presigned-post';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { ConfigResult, CredentialIssuerConfig } from '@bucketbridge/config';
import { assumeScopedRole } from '../credentials.js';
import {
  ObjectConflictError,
  ObjectNotFoundError,
  StorageConfigurationError,
  isNotFoundError,
} from '../errors.js';
import { logger } from '../logger.js';
import { buildUploadPolicy } from '../policies.js';
import type {
  ConnectionTarget,
  CredentialGrant,
  PolicyDocument,
  PresignedUploadForm,
  PutObjectOptions,
  StorageBackend,
} from '../types.js';

export const ACCESS_LINK_EXPIRY_SECONDS = 60 * 60;
export const UPLOAD_LINK_EXPIRY_SECONDS = 12 * 60 * 60;
const DEFAULT_CONTENT_TYPE = 'application/json';

export interface S3BackendSettings {
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  issuer: CredentialIssuerConfig;
}

export interface S3BackendVariant<C extends S3BackendSettings> {
  target: ConnectionTarget;
  /** Used in logs and error messages */
  label: string;
  forcePathStyle: boolean;
  /** Env keys naming the roles, reported when a role is missing */
  roleSettings?: { upload: string; download: string };
  loadConfig(): ConfigResult<C>;
  onConnect?(config: C): void;
  bucketInput(bucket: string, config: C): CreateBucketCommandInput;
  onBucketCreated?(client: S3Client, bucket: string, config: C): Promise<void>;
  downloadPolicy(bucket: string, objectName: string): PolicyDocument;
}

export interface S3BackendHooks {
  /** Called with every freshly built client, before first use */
  onClient?(client: S3Client): void;
  onIssuer?(client: STSClient): void;
}

interface Connection<C> {
  config: C;
  client: S3Client;
}

/**
 * Extract hostname from endpoint URL for logging (safe, no secrets)
 */
function extractEndpointHost(endpoint: string): string {
  try {
    return new URL(endpoint).hostname;
  } catch {
    return 'invalid';
  }
}

/**
 * CopySource is `bucket/key`, URL-encoded per path segment
 */
export function encodeCopySource(bucket: string, objectName: string): string {
  return [bucket, ...objectName.split('/')].map(encodeURIComponent).join('/');
}

export function createS3Backend<C extends S3BackendSettings>(
  variant: S3BackendVariant<C>,
  hooks: S3BackendHooks = {}
): StorageBackend {
  const { label } = variant;
  let connection: Connection<C> | null = null;
  let issuer: STSClient | null = null;

  /**
   * Get-or-create the data-plane client. Configuration is only cached once a
   * client was built, so a failed attempt is retried on the next call.
   */
  function connect(): Connection<C> {
    if (connection) {
      return connection;
    }

    const result = variant.loadConfig();
    if (!result.ok) {
      throw new StorageConfigurationError(`${label} storage not connected`, result.missing);
    }

    const { config } = result;
    variant.onConnect?.(config);
    const client = new S3Client({
      endpoint: config.endpoint,
      region: config.region,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
      forcePathStyle: variant.forcePathStyle,
      // Provider-default integrity behavior only
      requestChecksumCalculation: 'WHEN_REQUIRED',
      responseChecksumValidation: 'WHEN_REQUIRED',
    });
    hooks.onClient?.(client);

    logger.info({
      event: 'storage.client.created',
      backend: label,
      endpointHost: extractEndpointHost(config.endpoint),
    }, 'Storage client created');

    connection = { config, client };
    return connection;
  }

  function buildIssuer(issuerConfig: CredentialIssuerConfig, endpoint: string | undefined): STSClient {
    const client = new STSClient({
      endpoint,
      region: issuerConfig.region,
      credentials: {
        accessKeyId: issuerConfig.accessKeyId,
        secretAccessKey: issuerConfig.secretAccessKey,
      },
    });
    hooks.onIssuer?.(client);
    return client;
  }

  function tokenService(): { sts: STSClient; issuerConfig: CredentialIssuerConfig } {
    const { config } = connect();
    if (!issuer) {
      issuer = buildIssuer(config.issuer, config.issuer.endpoint);
    }
    return { sts: issuer, issuerConfig: config.issuer };
  }

  async function ensureBucket(bucket: string): Promise<void> {
    if (!(await backend.bucketExists(bucket))) {
      await backend.createBucket(bucket);
    }
  }

  async function fetchObject(bucket: string, objectName: string) {
    const { client } = connect();
    return client.send(new GetObjectCommand({ Bucket: bucket, Key: objectName }));
  }

  /**
   * With `endpoint`, the role is assumed through a one-off client for that
   * endpoint (e.g. the public address clients will upload to)
   */
  async function issueCredentials(
    bucket: string,
    role: 'upload' | 'download',
    policy: PolicyDocument,
    endpoint?: string
  ): Promise<CredentialGrant> {
    await ensureBucket(bucket);
    const { sts, issuerConfig } = tokenService();
    const target = role === 'upload' ? issuerConfig.uploadRole : issuerConfig.downloadRole;
    if (!target) {
      throw new StorageConfigurationError(
        `No ${role} role configured for ${label} credential issuance`,
        variant.roleSettings ? [variant.roleSettings[role]] : []
      );
    }

    const client = endpoint ? buildIssuer(issuerConfig, endpoint) : sts;
    let grant: CredentialGrant;
    try {
      grant = await assumeScopedRole(client, {
        roleArn: target.roleArn,
        sessionName: target.sessionName,
        policy,
        durationSeconds: issuerConfig.durationSeconds,
      });
    } finally {
      if (client !== sts) {
        client.destroy();
      }
    }

    logger.info({
      event: 'storage.credentials.issued',
      backend: label,
      bucket,
      role,
      issuerHost: endpoint ? extractEndpointHost(endpoint) : null,
      durationSeconds: issuerConfig.durationSeconds,
    }, 'Temporary credentials issued');
    return grant;
  }

  const backend: StorageBackend = {
    target: variant.target,

    async bucketExists(bucket) {
      const { client } = connect();
      try {
        await client.send(new HeadBucketCommand({ Bucket: bucket }));
        return true;
      } catch (error) {
        if (isNotFoundError(error)) {
          return false;
        }
        throw error;
      }
    },

    async createBucket(bucket) {
      const { client, config } = connect();
      await client.send(new CreateBucketCommand(variant.bucketInput(bucket, config)));
      await variant.onBucketCreated?.(client, bucket, config);
      logger.info({ event: 'storage.bucket.created', backend: label, bucket }, 'Bucket created');
      return true;
    },

    async removeBucket(bucket) {
      const { client } = connect();
      await client.send(new DeleteBucketCommand({ Bucket: bucket }));
      logger.info({ event: 'storage.bucket.removed', backend: label, bucket }, 'Bucket removed');
      return true;
    },

    async putObject(bucket, objectName, data, options: PutObjectOptions = {}) {
      await ensureBucket(bucket);
      const { client } = connect();
      const body = typeof data === 'string' ? Buffer.from(data, options.encoding ?? 'utf-8') : data;
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: objectName,
          Body: body,
          ContentType: options.contentType ?? DEFAULT_CONTENT_TYPE,
        })
      );
      return true;
    },

    async getObject(bucket, objectName) {
      const bytes = await backend.getObjectBytes(bucket, objectName);
      return Buffer.from(bytes).toString('utf-8');
    },

    async getObjectBytes(bucket, objectName) {
      // No bucket yet means nothing was written, which is not an error
      if (!(await backend.bucketExists(bucket))) {
        return new Uint8Array();
      }
      const response = await fetchObject(bucket, objectName);
      return response.Body ? response.Body.transformToByteArray() : new Uint8Array();
    },

    async downloadObject(bucket, objectName, fileType, fileName) {
      if (!(await backend.bucketExists(bucket))) {
        return '';
      }

      const path = fileName || `tmpfile.${fileType}`;
      await rm(path, { force: true });

      const response = await fetchObject(bucket, objectName);
      const body = response.Body;
      if (body instanceof Readable) {
        await pipeline(body, createWriteStream(path));
      } else {
        await writeFile(path, body ? await body.transformToByteArray() : new Uint8Array());
      }
      return path;
    },

    async uploadObject(bucket, objectName, filePath, force) {
      if (!(await backend.bucketExists(bucket))) {
        return false;
      }

      const taken = await backend.objectExists(bucket, objectName);
      if (taken && !force) {
        logger.warn({ event: 'storage.object.conflict', backend: label, bucket, objectName }, 'Object name already taken');
        throw new ObjectConflictError(bucket, objectName);
      }

      if (!existsSync(filePath)) {
        return false;
      }

      if (taken) {
        await backend.deleteObject(bucket, objectName);
      }

      const { client } = connect();
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: objectName,
          Body: await readFile(filePath),
        })
      );
      return true;
    },

    async deleteObject(bucket, objectName) {
      if (!(await backend.objectExists(bucket, objectName))) {
        return false;
      }
      const { client } = connect();
      await client.send(new DeleteObjectCommand({ Bucket: bucket, Key: objectName }));
      return true;
    },

    async objectExists(bucket, objectName) {
      const { client } = connect();
      try {
        await client.send(new HeadObjectCommand({ Bucket: bucket, Key: objectName }));
        return true;
      } catch (error) {
        if (isNotFoundError(error)) {
          return false;
        }
        throw error;
      }
    },

    async copyObject(sourceBucket, sourceObject, targetBucket, targetObject) {
      const { client } = connect();
      await client.send(
        new CopyObjectCommand({
          Bucket: targetBucket,
          Key: targetObject,
          CopySource: encodeCopySource(sourceBucket, sourceObject),
        })
      );
      return true;
    },

    async listBuckets() {
      const { client } = connect();
      const names = new Set<string>();
      let continuationToken: string | undefined;
      do {
        const page = await client.send(new ListBucketsCommand({ ContinuationToken: continuationToken }));
        for (const bucket of page.Buckets ?? []) {
          if (bucket.Name) names.add(bucket.Name);
        }
        continuationToken = page.ContinuationToken;
      } while (continuationToken);
      return names;
    },

    async listObjects(bucket, prefix) {
      const { client } = connect();
      const names = new Set<string>();
      for await (const page of paginateListObjectsV2({ client }, { Bucket: bucket, Prefix: prefix })) {
        for (const object of page.Contents ?? []) {
          if (object.Key) names.add(object.Key);
        }
      }
      return names;
    },

    async createAccessLink(bucket, objectName) {
      if (!(await backend.objectExists(bucket, objectName))) {
        throw new ObjectNotFoundError(bucket, objectName);
      }
      const { client } = connect();
      const command = new GetObjectCommand({
        Bucket: bucket,
        Key: objectName,
        ResponseContentType: 'application/json',
      });
      // Never log the URL itself
      return getSignedUrl(client, command, { expiresIn: ACCESS_LINK_EXPIRY_SECONDS });
    },

    async createDataUploadLink(bucket, objectName): Promise<PresignedUploadForm> {
      await ensureBucket(bucket);
      const { client } = connect();
      const { url, fields } = await createPresignedPost(client, {
        Bucket: bucket,
        Key: objectName,
        Expires: UPLOAD_LINK_EXPIRY_SECONDS,
      });
      return { url, fields };
    },

    async createFileUploadLink(bucket, objectName) {
      await ensureBucket(bucket);
      const { client } = connect();
      const command = new PutObjectCommand({ Bucket: bucket, Key: objectName });
      return getSignedUrl(client, command, { expiresIn: UPLOAD_LINK_EXPIRY_SECONDS });
    },

    async getUploadCredentialsAndId(bucket, endpoint) {
      return issueCredentials(bucket, 'upload', buildUploadPolicy(bucket), endpoint);
    },

    async getDownloadCredentials(bucket, objectName) {
      return issueCredentials(bucket, 'download', variant.downloadPolicy(bucket, objectName));
    },

    reconnect() {
      connection?.client.destroy();
      issuer?.destroy();
      connection = null;
      issuer = null;
      logger.info({ event: 'storage.client.reset', backend: label }, 'Storage clients dropped');
    },
  };

  return backend;
}
