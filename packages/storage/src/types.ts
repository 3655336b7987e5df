/**
 * Types for storage operations
 */

export const ConnectionTarget = {
  SELF_HOSTED: 'SELF_HOSTED',
  CLOUD: 'CLOUD',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ConnectionTarget = (typeof ConnectionTarget)[keyof typeof ConnectionTarget];

export interface PutObjectOptions {
  contentType?: string; // Default: application/json
  encoding?: BufferEncoding; // Applied to string data only. Default: utf-8
}

export interface TemporaryCredentials {
  AccessKeyId: string;
  SecretAccessKey: string;
  SessionToken: string;
  Expiration: Date;
}

export interface AssumedRoleUser {
  AssumedRoleId: string;
  Arn: string;
}

/** Temporary credentials as issued by the role-assumption call */
export interface CredentialGrant {
  Credentials: TemporaryCredentials;
  AssumedRoleUser?: AssumedRoleUser;
  PackedPolicySize?: number;
}

export interface CredentialGrantDocument extends CredentialGrant {
  bucket: string;
  objectName?: string;
  uploadTaskId?: string;
}

export interface EssentialCredentialGrant {
  bucket: string;
  Credentials: Omit<TemporaryCredentials, 'Expiration'>;
  uploadTaskId?: string;
}

export interface PresignedUploadForm {
  url: string;
  fields: Record<string, string>;
}

export interface PolicyStatement {
  Sid?: string;
  Effect: 'Allow' | 'Deny';
  Action: string[];
  Resource: string[];
}

export interface PolicyDocument {
  Version: '2012-10-17';
  Statement: PolicyStatement[];
}

/**
 * One storage provider behind the uniform operation set.
 *
 * Missing buckets on reads and downloads yield empty values, missing objects
 * on existence checks and deletes yield false. Everything else the provider
 * raises propagates.
 */
export interface StorageBackend {
  readonly target: ConnectionTarget;

  bucketExists(bucket: string): Promise<boolean>;
  createBucket(bucket: string): Promise<boolean>;
  /** Rejected by the provider when the bucket still holds objects */
  removeBucket(bucket: string): Promise<boolean>;

  /** Creates the bucket if needed and fully replaces any existing object */
  putObject(bucket: string, objectName: string, data: string | Uint8Array, options?: PutObjectOptions): Promise<boolean>;
  /** UTF-8 decoded content, or '' when the bucket does not exist */
  getObject(bucket: string, objectName: string): Promise<string>;
  getObjectBytes(bucket: string, objectName: string): Promise<Uint8Array>;
  /**
   * Writes the object to `fileName` (default `tmpfile.<fileType>`), replacing
   * any file already there. Returns the path, or '' when the bucket does not exist.
   */
  downloadObject(bucket: string, objectName: string, fileType: string, fileName?: string): Promise<string>;
  /**
   * Throws ObjectConflictError when the name is taken and `force` is false.
   * With `force` the existing object is deleted before the upload, so readers
   * may briefly see no object at all.
   */
  uploadObject(bucket: string, objectName: string, filePath: string, force: boolean): Promise<boolean>;
  deleteObject(bucket: string, objectName: string): Promise<boolean>;
  objectExists(bucket: string, objectName: string): Promise<boolean>;
  copyObject(sourceBucket: string, sourceObject: string, targetBucket: string, targetObject: string): Promise<boolean>;

  listBuckets(): Promise<Set<string>>;
  /** Always recursive */
  listObjects(bucket: string, prefix?: string): Promise<Set<string>>;

  createAccessLink(bucket: string, objectName: string): Promise<string>;
  createDataUploadLink(bucket: string, objectName: string): Promise<PresignedUploadForm>;
  createFileUploadLink(bucket: string, objectName: string): Promise<string>;

  /** `endpoint` overrides the configured credential issuer for this request only */
  getUploadCredentialsAndId(bucket: string, endpoint?: string): Promise<CredentialGrant>;
  getDownloadCredentials(bucket: string, objectName: string): Promise<CredentialGrant>;

  /** Drop the cached clients; the next call rebuilds them from fresh settings */
  reconnect(): void;
}
