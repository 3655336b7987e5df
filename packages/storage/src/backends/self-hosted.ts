/**
 * Self-hosted S3-compatible store (MinIO)
 */

import { PutBucketNotificationConfigurationCommand } from '@aws-sdk/client-s3';
import { loadSelfHostedConfig, type SelfHostedStorageConfig } from '@bucketbridge/config';
import { logger } from '../logger.js';
import { buildBucketReadPolicy } from '../policies.js';
import { ConnectionTarget, type StorageBackend } from '../types.js';
import { createS3Backend, type S3BackendHooks } from './s3-backend.js';

export const OBJECT_CREATED_EVENT = 's3:ObjectCreated:*';

export function createSelfHostedBackend(hooks: S3BackendHooks = {}): StorageBackend {
  return createS3Backend<SelfHostedStorageConfig>(
    {
      target: ConnectionTarget.SELF_HOSTED,
      label: 'self-hosted',
      // MinIO serves buckets path-style
      forcePathStyle: true,
      loadConfig: () => loadSelfHostedConfig(),
      bucketInput: (bucket) => ({ Bucket: bucket }),

      async onBucketCreated(client, bucket, config) {
        if (!config.notificationQueueArn) {
          return;
        }
        await client.send(
          new PutBucketNotificationConfigurationCommand({
            Bucket: bucket,
            NotificationConfiguration: {
              QueueConfigurations: [
                {
                  Id: '1',
                  QueueArn: config.notificationQueueArn,
                  Events: [OBJECT_CREATED_EVENT],
                },
              ],
            },
          })
        );
        logger.info({ event: 'storage.bucket.notification', bucket }, 'Object-created notification registered');
      },

      // Read access is granted on the whole bucket here, unlike the cloud store
      downloadPolicy: (bucket) => buildBucketReadPolicy(bucket),
    },
    hooks
  );
}
