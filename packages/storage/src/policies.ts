/**
 * Least-privilege session policies for temporary credentials
 */

import type { PolicyDocument } from './types.js';

export function bucketArn(bucket: string): string {
  return `arn:aws:s3:::${bucket}`;
}

/**
 * Object read/write plus multipart housekeeping inside one bucket
 */
export function buildUploadPolicy(bucket: string): PolicyDocument {
  return {
    Version: '2012-10-17',
    Statement: [
      {
        Sid: 'PutObj',
        Effect: 'Allow',
        Action: [
          's3:AbortMultipartUpload',
          's3:DeleteObject',
          's3:ListMultipartUploadParts',
          's3:PutObject',
          's3:GetObject',
        ],
        Resource: [`${bucketArn(bucket)}/*`],
      },
      {
        Sid: 'BucketAccess',
        Effect: 'Allow',
        Action: ['s3:GetBucketLocation', 's3:ListBucket', 's3:ListBucketMultipartUploads'],
        Resource: [bucketArn(bucket)],
      },
    ],
  };
}

/**
 * Read access to exactly one object
 */
export function buildObjectReadPolicy(bucket: string, objectName: string): PolicyDocument {
  return {
    Version: '2012-10-17',
    Statement: [
      {
        Sid: 'GetObj',
        Effect: 'Allow',
        Action: ['s3:GetObject'],
        Resource: [`${bucketArn(bucket)}/${objectName}`],
      },
    ],
  };
}

/**
 * Read access to every object of a bucket
 */
export function buildBucketReadPolicy(bucket: string): PolicyDocument {
  return {
    Version: '2012-10-17',
    Statement: [
      {
        Sid: 'GetObj',
        Effect: 'Allow',
        Action: ['s3:GetObject'],
        Resource: [`${bucketArn(bucket)}/*`],
      },
      {
        Sid: 'AllowGetBucketLocation',
        Effect: 'Allow',
        Action: ['s3:GetBucketLocation'],
        Resource: [bucketArn(bucket)],
      },
    ],
  };
}
