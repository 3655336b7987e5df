/**
 * Connection target resolution
 */

import { CLOUD_TARGET_MARKER, readConnectionTargetSetting } from '@bucketbridge/config';
import { logger } from './logger.js';
import { ConnectionTarget } from './types.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Pick the backend for the current call.
 *
 * Read on every call: during a migration both backends are in use and the
 * setting may flip between requests. Anything but the cloud marker selects
 * the self-hosted store.
 */
export function resolveConnectionTarget(): ConnectionTarget {
  const setting = readConnectionTargetSetting();

  if (setting === CLOUD_TARGET_MARKER) {
    return ConnectionTarget.CLOUD;
  }

  if (setting === undefined) {
    logger.debug({ event: 'storage.target.default' }, 'S3_TARGET not set, using self-hosted storage');
  }
  return ConnectionTarget.SELF_HOSTED;
}

/**
 * Tenant buckets are named by organization UUID; fixed infrastructure
 * buckets such as the archive are not
 */
export function isUuidBucketName(name: string): boolean {
  return UUID_PATTERN.test(name);
}
