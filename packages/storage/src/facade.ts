/**
 * Storage facade
 *
 * Routes every call to the backend selected by the connection target and
 * implements the operations that span several provider calls (archive,
 * recursive removal, bulk wipe, cross-backend transfer).
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCloudBackend } from './backends/cloud.js';
import { createSelfHostedBackend } from './backends/self-hosted.js';
import { serializeGrant, toEssentialGrant, toGrantDocument } from './credentials.js';
import { logger } from './logger.js';
import { isUuidBucketName, resolveConnectionTarget } from './target.js';
import {
  ConnectionTarget,
  type CredentialGrantDocument,
  type EssentialCredentialGrant,
  type PresignedUploadForm,
  type PutObjectOptions,
  type StorageBackend,
} from './types.js';

export const ARCHIVE_BUCKET = 'archive';
export const TOKENIZER_OBJECT_NAME = 'docbin_full';

export interface ObjectStorageOptions {
  selfHosted?: StorageBackend;
  cloud?: StorageBackend;
  resolveTarget?: () => ConnectionTarget;
  archiveBucket?: string;
}

export interface ArchiveOptions {
  prefix?: string;
  deleteExisting?: boolean; // Default: true
}

export interface EmptyStorageOptions {
  force?: boolean; // Default: false
  onlyUuid?: boolean; // Default: true
}

export interface TransferOptions {
  removeFromSource?: boolean;
  forceOverwrite?: boolean;
}

export interface UploadCredentialOptions {
  taskId?: string;
  onlyEssentials?: boolean;
  /** Credential issuer to use instead of the configured one, e.g. a public address */
  endpoint?: string;
}

export interface ObjectStorage {
  bucketExists(bucket: string): Promise<boolean>;
  createBucket(bucket: string): Promise<boolean>;
  /** Leaves a non-empty bucket untouched unless `recursive` */
  removeBucket(bucket: string, recursive?: boolean): Promise<boolean>;
  /**
   * Copies every object (under `prefix`) to the archive bucket as
   * `{bucket}/{objectName}`, replacing earlier archive copies.
   * Resolves to null when the source bucket does not exist.
   */
  archiveBucket(bucket: string, options?: ArchiveOptions): Promise<boolean | null>;

  putObject(bucket: string, objectName: string, data: string | Uint8Array, options?: PutObjectOptions): Promise<boolean>;
  getObject(bucket: string, objectName: string): Promise<string | null>;
  getObjectBytes(bucket: string, objectName: string): Promise<Uint8Array | null>;
  downloadObject(bucket: string, objectName: string, fileType: string, fileName?: string): Promise<string | null>;
  uploadObject(bucket: string, objectName: string, filePath: string, force?: boolean): Promise<boolean>;
  deleteObject(bucket: string, objectName: string): Promise<boolean>;
  objectExists(bucket: string, objectName: string): Promise<boolean>;
  copyObject(sourceBucket: string, sourceObject: string, targetBucket: string, targetObject: string): Promise<boolean>;
  listBuckets(): Promise<Set<string>>;
  listObjects(bucket: string, prefix?: string): Promise<Set<string>>;

  createAccessLink(bucket: string, objectName: string): Promise<string | null>;
  createDataUploadLink(bucket: string, objectName: string): Promise<PresignedUploadForm | null>;
  createFileUploadLink(bucket: string, objectName: string): Promise<string | null>;

  getUploadCredentialGrant(
    bucket: string,
    options?: UploadCredentialOptions
  ): Promise<CredentialGrantDocument | EssentialCredentialGrant | null>;
  /** Serialized with sorted keys */
  getUploadCredentialsAndId(bucket: string, options?: UploadCredentialOptions): Promise<string | null>;
  getDownloadCredentialGrant(bucket: string, objectName: string): Promise<CredentialGrantDocument | null>;
  /** Serialized with sorted keys */
  getDownloadCredentials(bucket: string, objectName: string): Promise<string | null>;

  /** Replaces `{projectId}/docbin_full` (or `docbin_full`) with `data` */
  uploadTokenizerData(bucket: string, projectId: string, data: string): Promise<boolean>;
  /** Destructive; does nothing unless `force` is set */
  emptyStorage(options?: EmptyStorageOptions): Promise<boolean>;
  /**
   * Copies a bucket object by object through local temp files. Not resumable:
   * after a failure, run it again to move the remaining objects.
   */
  transferBucketFromSelfHostedToCloud(bucket: string, options?: TransferOptions): Promise<boolean>;

  /** Rebuild the clients of `target` (default: the current target) on next use */
  reconnect(target?: ConnectionTarget): void;
}

export function createObjectStorage(options: ObjectStorageOptions = {}): ObjectStorage {
  const selfHosted = options.selfHosted ?? createSelfHostedBackend();
  const cloud = options.cloud ?? createCloudBackend();
  const resolveTarget = options.resolveTarget ?? resolveConnectionTarget;
  const archiveBucketName = options.archiveBucket ?? ARCHIVE_BUCKET;

  function backendFor(target: ConnectionTarget): StorageBackend | null {
    switch (target) {
      case ConnectionTarget.SELF_HOSTED:
        return selfHosted;
      case ConnectionTarget.CLOUD:
        return cloud;
      default:
        logger.warn({ event: 'storage.target.unknown', target }, 'No storage backend for connection target');
        return null;
    }
  }

  function current(): StorageBackend | null {
    return backendFor(resolveTarget());
  }

  async function dispatch<T>(fallback: T, call: (backend: StorageBackend) => Promise<T>): Promise<T> {
    const backend = current();
    return backend ? call(backend) : fallback;
  }

  async function removeBucketOn(backend: StorageBackend, bucket: string, recursive: boolean): Promise<boolean> {
    const objects = await backend.listObjects(bucket);
    if (objects.size > 0) {
      if (!recursive) {
        return false;
      }
      for (const objectName of objects) {
        await backend.deleteObject(bucket, objectName);
      }
    }
    return backend.removeBucket(bucket);
  }

  const storage: ObjectStorage = {
    bucketExists: (bucket) => dispatch(false, (backend) => backend.bucketExists(bucket)),

    createBucket: (bucket) => dispatch(false, (backend) => backend.createBucket(bucket)),

    removeBucket: (bucket, recursive = false) =>
      dispatch(false, (backend) => removeBucketOn(backend, bucket, recursive)),

    async archiveBucket(bucket, { prefix, deleteExisting = true } = {}) {
      const backend = current();
      // e.g. a project that never stored anything has no bucket yet
      if (!backend || !(await backend.bucketExists(bucket))) {
        return null;
      }

      if (!(await backend.bucketExists(archiveBucketName))) {
        await backend.createBucket(archiveBucketName);
      }

      const objects = await backend.listObjects(bucket, prefix);
      for (const objectName of objects) {
        const archiveName = `${bucket}/${objectName}`;
        if (await backend.objectExists(archiveBucketName, archiveName)) {
          await backend.deleteObject(archiveBucketName, archiveName);
        }
        await backend.copyObject(bucket, objectName, archiveBucketName, archiveName);
        if (deleteExisting) {
          await backend.deleteObject(bucket, objectName);
        }
      }

      if (deleteExisting) {
        // Objects outside the prefix keep the bucket alive
        await removeBucketOn(backend, bucket, false);
      }

      logger.info({
        event: 'storage.archive.completed',
        bucket,
        prefix: prefix ?? null,
        objectCount: objects.size,
        deleteExisting,
      }, 'Bucket archived');
      return true;
    },

    putObject: (bucket, objectName, data, putOptions) =>
      dispatch(false, (backend) => backend.putObject(bucket, objectName, data, putOptions)),

    getObject: (bucket, objectName) =>
      dispatch<string | null>(null, (backend) => backend.getObject(bucket, objectName)),

    getObjectBytes: (bucket, objectName) =>
      dispatch<Uint8Array | null>(null, (backend) => backend.getObjectBytes(bucket, objectName)),

    downloadObject: (bucket, objectName, fileType, fileName) =>
      dispatch<string | null>(null, (backend) => backend.downloadObject(bucket, objectName, fileType, fileName)),

    uploadObject: (bucket, objectName, filePath, force = false) =>
      dispatch(false, (backend) => backend.uploadObject(bucket, objectName, filePath, force)),

    deleteObject: (bucket, objectName) => dispatch(false, (backend) => backend.deleteObject(bucket, objectName)),

    objectExists: (bucket, objectName) => dispatch(false, (backend) => backend.objectExists(bucket, objectName)),

    copyObject: (sourceBucket, sourceObject, targetBucket, targetObject) =>
      dispatch(false, (backend) => backend.copyObject(sourceBucket, sourceObject, targetBucket, targetObject)),

    listBuckets: () => dispatch(new Set<string>(), (backend) => backend.listBuckets()),

    listObjects: (bucket, prefix) => dispatch(new Set<string>(), (backend) => backend.listObjects(bucket, prefix)),

    createAccessLink: (bucket, objectName) =>
      dispatch<string | null>(null, (backend) => backend.createAccessLink(bucket, objectName)),

    createDataUploadLink: (bucket, objectName) =>
      dispatch<PresignedUploadForm | null>(null, (backend) => backend.createDataUploadLink(bucket, objectName)),

    createFileUploadLink: (bucket, objectName) =>
      dispatch<string | null>(null, (backend) => backend.createFileUploadLink(bucket, objectName)),

    async getUploadCredentialGrant(bucket, { taskId, onlyEssentials = false, endpoint } = {}) {
      const backend = current();
      if (!backend) {
        return null;
      }
      const grant = await backend.getUploadCredentialsAndId(bucket, endpoint);
      const document = toGrantDocument(grant, { bucket, uploadTaskId: taskId });
      return onlyEssentials ? toEssentialGrant(document) : document;
    },

    async getUploadCredentialsAndId(bucket, credentialOptions) {
      const grant = await storage.getUploadCredentialGrant(bucket, credentialOptions);
      return grant ? serializeGrant(grant) : null;
    },

    async getDownloadCredentialGrant(bucket, objectName) {
      const backend = current();
      if (!backend) {
        return null;
      }
      const grant = await backend.getDownloadCredentials(bucket, objectName);
      return toGrantDocument(grant, { bucket, objectName });
    },

    async getDownloadCredentials(bucket, objectName) {
      const grant = await storage.getDownloadCredentialGrant(bucket, objectName);
      return grant ? serializeGrant(grant) : null;
    },

    async uploadTokenizerData(bucket, projectId, data) {
      const backend = current();
      if (!backend) {
        return false;
      }

      const objectName = projectId ? `${projectId}/${TOKENIZER_OBJECT_NAME}` : TOKENIZER_OBJECT_NAME;
      if (!(await backend.bucketExists(bucket))) {
        await backend.createBucket(bucket);
      }
      if (await backend.objectExists(bucket, objectName)) {
        await backend.deleteObject(bucket, objectName);
      }
      await backend.putObject(bucket, objectName, data);
      return true;
    },

    async emptyStorage({ force = false, onlyUuid = true } = {}) {
      if (!force) {
        return false;
      }
      const backend = current();
      if (!backend) {
        return false;
      }

      const removed: string[] = [];
      for (const bucket of await backend.listBuckets()) {
        if (onlyUuid && !isUuidBucketName(bucket)) {
          continue;
        }
        for (const objectName of await backend.listObjects(bucket)) {
          await backend.deleteObject(bucket, objectName);
        }
        await backend.removeBucket(bucket);
        removed.push(bucket);
      }

      logger.warn({ event: 'storage.empty.completed', removedBuckets: removed.length, onlyUuid }, 'Storage emptied');
      return true;
    },

    async transferBucketFromSelfHostedToCloud(bucket, { removeFromSource = false, forceOverwrite = false } = {}) {
      if (!(await selfHosted.bucketExists(bucket))) {
        return false;
      }
      if (!(await cloud.bucketExists(bucket))) {
        await cloud.createBucket(bucket);
      }

      const objects = await selfHosted.listObjects(bucket);
      const workDir = await mkdtemp(join(tmpdir(), 'bucketbridge-transfer-'));
      let transferred = 0;
      try {
        for (const objectName of objects) {
          const localPath = await selfHosted.downloadObject(bucket, objectName, '', join(workDir, 'object'));
          let uploaded: boolean;
          try {
            uploaded = await cloud.uploadObject(bucket, objectName, localPath, forceOverwrite);
          } finally {
            await rm(localPath, { force: true });
          }
          if (!uploaded) {
            // Source copy stays; a later run picks it up again
            logger.warn({ event: 'storage.transfer.skipped', bucket, objectName }, 'Object not uploaded to cloud storage');
            continue;
          }
          if (removeFromSource) {
            await selfHosted.deleteObject(bucket, objectName);
          }
          transferred += 1;
        }
      } finally {
        await rm(workDir, { recursive: true, force: true });
        logger.info({
          event: 'storage.transfer.progress',
          bucket,
          transferred,
          total: objects.size,
        }, 'Bucket transfer finished');
      }

      if (removeFromSource && transferred === objects.size) {
        await selfHosted.removeBucket(bucket);
      }
      return true;
    },

    reconnect(target) {
      const backend = target ? backendFor(target) : current();
      backend?.reconnect();
    },
  };

  return storage;
}

let defaultStorage: ObjectStorage | null = null;

/**
 * Process-wide facade over the env-configured backends
 */
export function getObjectStorage(): ObjectStorage {
  if (!defaultStorage) {
    defaultStorage = createObjectStorage();
  }
  return defaultStorage;
}
