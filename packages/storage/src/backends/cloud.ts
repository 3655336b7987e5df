/**
 * Cloud object storage (AWS S3)
 */

import { BucketLocationConstraint } from '@aws-sdk/client-s3';
import {
  CLOUD_TARGET_MARKER,
  loadCloudConfig,
  readConnectionTargetSetting,
  type CloudStorageConfig,
} from '@bucketbridge/config';
import { StorageConfigurationError } from '../errors.js';
import { logger } from '../logger.js';
import { buildObjectReadPolicy } from '../policies.js';
import { ConnectionTarget, type StorageBackend } from '../types.js';
import { createS3Backend, type S3BackendHooks } from './s3-backend.js';

const LOCATION_CONSTRAINTS: ReadonlySet<string> = new Set(Object.values(BucketLocationConstraint));

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return LOCATION_CONSTRAINTS.has(region);
}

export function createCloudBackend(hooks: S3BackendHooks = {}): StorageBackend {
  return createS3Backend<CloudStorageConfig>(
    {
      target: ConnectionTarget.CLOUD,
      label: 'cloud',
      forcePathStyle: false,
      roleSettings: { upload: 'S3_AWS_UPLOAD_ROLE_ARN', download: 'S3_AWS_DOWNLOAD_ROLE_ARN' },
      loadConfig: () => loadCloudConfig(),

      onConnect() {
        // Only a diagnostic: a migration needs this client while the target still points elsewhere
        const setting = readConnectionTargetSetting();
        if (setting !== CLOUD_TARGET_MARKER) {
          logger.warn({ event: 'storage.target.mismatch', target: setting ?? null }, 'Cloud client created while S3_TARGET is not AWS');
        }
      },

      bucketInput(bucket, config) {
        const region = config.region;
        // us-east-1 is the default location and must not be sent as a constraint
        if (region === 'us-east-1') {
          return { Bucket: bucket };
        }
        if (!isLocationConstraint(region)) {
          throw new StorageConfigurationError(`Unsupported bucket region: ${region}`, ['S3_AWS_REGION']);
        }
        return { Bucket: bucket, CreateBucketConfiguration: { LocationConstraint: region } };
      },

      downloadPolicy: (bucket, objectName) => buildObjectReadPolicy(bucket, objectName),
    },
    hooks
  );
}
