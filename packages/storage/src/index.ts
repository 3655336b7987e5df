/**
 * Object storage over a self-hosted S3-compatible store and AWS S3,
 * selected per call by S3_TARGET
 */

export * from './types.js';
export * from './errors.js';
export * from './target.js';
export * from './policies.js';
export * from './credentials.js';
export * from './facade.js';
export { logger } from './logger.js';
export {
  ACCESS_LINK_EXPIRY_SECONDS,
  UPLOAD_LINK_EXPIRY_SECONDS,
  createS3Backend,
  type S3BackendHooks,
  type S3BackendSettings,
  type S3BackendVariant,
} from './backends/s3-backend.js';
export { createSelfHostedBackend, OBJECT_CREATED_EVENT } from './backends/self-hosted.js';
export { createCloudBackend } from './backends/cloud.js';
