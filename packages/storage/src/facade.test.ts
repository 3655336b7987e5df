import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ObjectConflictError } from './errors.js';
import { createObjectStorage } from './facade.js';
import { createMemoryBackend } from './testing/memory-backend.js';
import { ConnectionTarget } from './types.js';

const ORG_BUCKET = '3fa85f64-5717-4562-b3fc-2c963f66afa6';

function setup(initial: ConnectionTarget = ConnectionTarget.SELF_HOSTED) {
  const selfHosted = createMemoryBackend(ConnectionTarget.SELF_HOSTED);
  const cloud = createMemoryBackend(ConnectionTarget.CLOUD);
  let target = initial;
  const storage = createObjectStorage({ selfHosted, cloud, resolveTarget: () => target });
  return {
    selfHosted,
    cloud,
    storage,
    switchTo: (next: ConnectionTarget) => {
      target = next;
    },
  };
}

describe('object storage facade', () => {
  describe('routing', () => {
    it('sends each call to the backend of the current target', async () => {
      const { selfHosted, cloud, storage, switchTo } = setup();

      await storage.putObject('tenant-data', 'a.json', '1');
      switchTo(ConnectionTarget.CLOUD);
      await storage.putObject('tenant-data', 'b.json', '2');

      expect(selfHosted.read('tenant-data', 'a.json')).toBe('1');
      expect(selfHosted.read('tenant-data', 'b.json')).toBeUndefined();
      expect(cloud.read('tenant-data', 'b.json')).toBe('2');
    });

    it('passes the upload force flag through, defaulting to false', async () => {
      const workDir = await mkdtemp(join(tmpdir(), 'facade-test-'));
      try {
        const { selfHosted, storage } = setup();
        selfHosted.seed('tenant-data', { 'a.json': 'old' });
        const file = join(workDir, 'a.json');
        await writeFile(file, 'new');

        await expect(storage.uploadObject('tenant-data', 'a.json', file)).rejects.toBeInstanceOf(ObjectConflictError);
        expect(await storage.uploadObject('tenant-data', 'a.json', file, true)).toBe(true);
        expect(selfHosted.read('tenant-data', 'a.json')).toBe('new');
      } finally {
        await rm(workDir, { recursive: true, force: true });
      }
    });

    it('answers neutrally for an unknown target without touching a backend', async () => {
      const { selfHosted, cloud, storage } = setup(ConnectionTarget.UNKNOWN);

      expect(await storage.bucketExists('tenant-data')).toBe(false);
      expect(await storage.createBucket('tenant-data')).toBe(false);
      expect(await storage.putObject('tenant-data', 'a.json', '1')).toBe(false);
      expect(await storage.getObject('tenant-data', 'a.json')).toBeNull();
      expect(await storage.getObjectBytes('tenant-data', 'a.json')).toBeNull();
      expect(await storage.downloadObject('tenant-data', 'a.json', 'json')).toBeNull();
      expect(await storage.listBuckets()).toEqual(new Set());
      expect(await storage.listObjects('tenant-data')).toEqual(new Set());
      expect(await storage.createAccessLink('tenant-data', 'a.json')).toBeNull();
      expect(await storage.createDataUploadLink('tenant-data', 'a.json')).toBeNull();
      expect(await storage.createFileUploadLink('tenant-data', 'a.json')).toBeNull();
      expect(await storage.getUploadCredentialsAndId('tenant-data')).toBeNull();
      expect(await storage.getDownloadCredentials('tenant-data', 'a.json')).toBeNull();
      expect(await storage.removeBucket('tenant-data', true)).toBe(false);
      expect(await storage.archiveBucket('tenant-data')).toBeNull();
      expect(await storage.uploadTokenizerData('tenant-data', 'p1', '{}')).toBe(false);
      expect(await storage.emptyStorage({ force: true })).toBe(false);

      expect(selfHosted.operations).toEqual([]);
      expect(cloud.operations).toEqual([]);
    });
  });

  describe('removeBucket', () => {
    it('leaves a non-empty bucket in place unless recursive', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed('tenant-data', { 'a.json': '1', 'b.json': '2' });

      expect(await storage.removeBucket('tenant-data')).toBe(false);
      expect(selfHosted.buckets.has('tenant-data')).toBe(true);
      expect(selfHosted.operations).toEqual([]);
    });

    it('deletes every object first when recursive', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed('tenant-data', { 'a.json': '1', 'b.json': '2' });

      expect(await storage.removeBucket('tenant-data', true)).toBe(true);
      expect(selfHosted.buckets.has('tenant-data')).toBe(false);
      expect(selfHosted.operations).toEqual([
        'deleteObject:tenant-data/a.json',
        'deleteObject:tenant-data/b.json',
        'removeBucket:tenant-data',
      ]);
    });

    it('removes an empty bucket directly', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed('tenant-data');

      expect(await storage.removeBucket('tenant-data')).toBe(true);
      expect(selfHosted.buckets.has('tenant-data')).toBe(false);
    });
  });

  describe('archiveBucket', () => {
    it('moves every object into the archive and drops the source bucket', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed('project-7', { 'a.json': '1', 'dir/b.json': '2' });

      expect(await storage.archiveBucket('project-7')).toBe(true);

      expect(selfHosted.read('archive', 'project-7/a.json')).toBe('1');
      expect(selfHosted.read('archive', 'project-7/dir/b.json')).toBe('2');
      expect(selfHosted.buckets.has('project-7')).toBe(false);
    });

    it('replaces earlier archive copies', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed('archive', { 'project-7/a.json': 'old' }).seed('project-7', { 'a.json': 'new' });

      await storage.archiveBucket('project-7');

      expect(selfHosted.read('archive', 'project-7/a.json')).toBe('new');
      expect(selfHosted.operations).toContain('deleteObject:archive/project-7/a.json');
    });

    it('archives only the prefix and keeps the rest of the bucket', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed('project-7', { 'a.json': '1', 'dir/b.json': '2' });

      expect(await storage.archiveBucket('project-7', { prefix: 'dir/' })).toBe(true);

      expect([...(selfHosted.buckets.get('archive')?.keys() ?? [])]).toEqual(['project-7/dir/b.json']);
      expect([...(selfHosted.buckets.get('project-7')?.keys() ?? [])]).toEqual(['a.json']);
    });

    it('keeps the source when deleteExisting is false', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed('project-7', { 'a.json': '1' });

      await storage.archiveBucket('project-7', { deleteExisting: false });

      expect(selfHosted.read('archive', 'project-7/a.json')).toBe('1');
      expect(selfHosted.read('project-7', 'a.json')).toBe('1');
    });

    it('does nothing for a missing source bucket', async () => {
      const { selfHosted, storage } = setup();

      expect(await storage.archiveBucket('project-7')).toBeNull();
      expect(selfHosted.buckets.has('archive')).toBe(false);
    });

    it('uses a custom archive bucket', async () => {
      const selfHosted = createMemoryBackend(ConnectionTarget.SELF_HOSTED).seed('project-7', { 'a.json': '1' });
      const storage = createObjectStorage({
        selfHosted,
        cloud: createMemoryBackend(ConnectionTarget.CLOUD),
        resolveTarget: () => ConnectionTarget.SELF_HOSTED,
        archiveBucket: 'cold-storage',
      });

      await storage.archiveBucket('project-7');

      expect(selfHosted.read('cold-storage', 'project-7/a.json')).toBe('1');
    });
  });

  describe('emptyStorage', () => {
    it('refuses without force', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed(ORG_BUCKET, { 'a.json': '1' });

      expect(await storage.emptyStorage()).toBe(false);
      expect(selfHosted.buckets.has(ORG_BUCKET)).toBe(true);
    });

    it('removes only organization buckets by default', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed(ORG_BUCKET, { 'a.json': '1' }).seed('archive', { 'x/a.json': '1' });

      expect(await storage.emptyStorage({ force: true })).toBe(true);

      expect(selfHosted.buckets.has(ORG_BUCKET)).toBe(false);
      expect(selfHosted.read('archive', 'x/a.json')).toBe('1');
    });

    it('removes every bucket when not limited to organizations', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed(ORG_BUCKET, { 'a.json': '1' }).seed('archive', { 'x/a.json': '1' });

      await storage.emptyStorage({ force: true, onlyUuid: false });

      expect(selfHosted.buckets.size).toBe(0);
    });
  });

  describe('transferBucketFromSelfHostedToCloud', () => {
    it('copies every object and keeps the source by default', async () => {
      const { selfHosted, cloud, storage } = setup();
      selfHosted.seed('project-7', { 'a.json': '1', 'dir/b.json': '2' });

      expect(await storage.transferBucketFromSelfHostedToCloud('project-7')).toBe(true);

      expect(cloud.read('project-7', 'a.json')).toBe('1');
      expect(cloud.read('project-7', 'dir/b.json')).toBe('2');
      expect(selfHosted.read('project-7', 'a.json')).toBe('1');
    });

    it('drains and removes the source bucket on request', async () => {
      const { selfHosted, cloud, storage } = setup();
      selfHosted.seed('project-7', { 'a.json': '1' });

      await storage.transferBucketFromSelfHostedToCloud('project-7', { removeFromSource: true });

      expect(cloud.read('project-7', 'a.json')).toBe('1');
      expect(selfHosted.buckets.has('project-7')).toBe(false);
    });

    it('returns false without side effects for a missing source bucket', async () => {
      const { cloud, storage } = setup();

      expect(await storage.transferBucketFromSelfHostedToCloud('project-7')).toBe(false);
      expect(cloud.operations).toEqual([]);
    });

    it('stops on an existing target object unless overwriting', async () => {
      const { selfHosted, cloud, storage } = setup();
      selfHosted.seed('project-7', { 'a.json': 'new' });
      cloud.seed('project-7', { 'a.json': 'old' });

      await expect(storage.transferBucketFromSelfHostedToCloud('project-7')).rejects.toBeInstanceOf(ObjectConflictError);
      expect(cloud.read('project-7', 'a.json')).toBe('old');

      await storage.transferBucketFromSelfHostedToCloud('project-7', { forceOverwrite: true });
      expect(cloud.read('project-7', 'a.json')).toBe('new');
    });

    it('keeps the source object when the cloud upload does not happen', async () => {
      const { selfHosted, cloud, storage } = setup();
      selfHosted.seed('project-7', { 'a.json': '1', 'b.json': '2' });
      vi.spyOn(cloud, 'uploadObject').mockImplementation(async (_bucket, objectName) => objectName !== 'a.json');

      expect(await storage.transferBucketFromSelfHostedToCloud('project-7', { removeFromSource: true })).toBe(true);

      expect(selfHosted.read('project-7', 'a.json')).toBe('1');
      expect(selfHosted.read('project-7', 'b.json')).toBeUndefined();
      expect(selfHosted.operations).not.toContain('deleteObject:project-7/a.json');
      expect(selfHosted.operations).not.toContain('removeBucket:project-7');
    });

    it('works regardless of the current target', async () => {
      const { selfHosted, cloud, storage } = setup(ConnectionTarget.UNKNOWN);
      selfHosted.seed('project-7', { 'a.json': '1' });

      expect(await storage.transferBucketFromSelfHostedToCloud('project-7')).toBe(true);
      expect(cloud.read('project-7', 'a.json')).toBe('1');
    });
  });

  describe('transfer temp files', () => {
    let scratch: string;

    beforeEach(async () => {
      scratch = await mkdtemp(join(tmpdir(), 'facade-transfer-'));
      vi.stubEnv('TMPDIR', scratch);
    });

    afterEach(async () => {
      vi.unstubAllEnvs();
      await rm(scratch, { recursive: true, force: true });
    });

    it('leaves nothing behind after a successful transfer', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed('project-7', { 'a.json': '1', 'dir/b.json': '2' });

      await storage.transferBucketFromSelfHostedToCloud('project-7');

      expect(await readdir(scratch)).toEqual([]);
    });

    it('leaves nothing behind when the transfer stops on a conflict', async () => {
      const { selfHosted, cloud, storage } = setup();
      selfHosted.seed('project-7', { 'a.json': 'new' });
      cloud.seed('project-7', { 'a.json': 'old' });

      await expect(storage.transferBucketFromSelfHostedToCloud('project-7')).rejects.toBeInstanceOf(ObjectConflictError);

      expect(await readdir(scratch)).toEqual([]);
    });
  });

  describe('uploadTokenizerData', () => {
    it('writes under the project path, creating the bucket', async () => {
      const { selfHosted, storage } = setup();

      expect(await storage.uploadTokenizerData('proj1', 'p1', '{"vocab":[]}')).toBe(true);

      expect(selfHosted.read('proj1', 'p1/docbin_full')).toBe('{"vocab":[]}');
    });

    it('replaces the previous data', async () => {
      const { selfHosted, storage } = setup();
      selfHosted.seed('proj1', { 'p1/docbin_full': 'old' });

      await storage.uploadTokenizerData('proj1', 'p1', 'new');

      expect(selfHosted.read('proj1', 'p1/docbin_full')).toBe('new');
      expect(selfHosted.operations).toContain('deleteObject:proj1/p1/docbin_full');
    });

    it('writes at the bucket root without a project id', async () => {
      const { selfHosted, storage } = setup();

      await storage.uploadTokenizerData('proj1', '', 'data');

      expect(selfHosted.read('proj1', 'docbin_full')).toBe('data');
    });
  });

  describe('temporary credentials', () => {
    const expiration = new Date('2030-01-01T00:00:00.000Z');

    it('enriches the upload grant with bucket and task id', async () => {
      const { storage } = setup();

      expect(await storage.getUploadCredentialGrant('tenant-data', { taskId: 'task-1' })).toEqual({
        Credentials: {
          AccessKeyId: 'test-upload-access',
          SecretAccessKey: 'test-upload-secret',
          SessionToken: 'test-upload-token',
          Expiration: expiration,
        },
        bucket: 'tenant-data',
        uploadTaskId: 'task-1',
      });
    });

    it('reduces the upload grant to essentials on request', async () => {
      const { storage } = setup();

      expect(await storage.getUploadCredentialGrant('tenant-data', { taskId: 'task-1', onlyEssentials: true })).toEqual({
        bucket: 'tenant-data',
        Credentials: {
          AccessKeyId: 'test-upload-access',
          SecretAccessKey: 'test-upload-secret',
          SessionToken: 'test-upload-token',
        },
        uploadTaskId: 'task-1',
      });
    });

    it('passes a caller-supplied issuer endpoint to the backend', async () => {
      const { selfHosted, storage } = setup();

      await storage.getUploadCredentialsAndId('tenant-data', { endpoint: 'https://public-storage.example.com' });
      await storage.getUploadCredentialsAndId('tenant-data');

      expect(selfHosted.operations).toEqual([
        'getUploadCredentials:tenant-data@https://public-storage.example.com',
        'getUploadCredentials:tenant-data',
      ]);
    });

    it('serializes the upload grant with sorted keys', async () => {
      const { storage } = setup();

      expect(await storage.getUploadCredentialsAndId('tenant-data', { onlyEssentials: true })).toBe(
        '{"Credentials":{"AccessKeyId":"test-upload-access","SecretAccessKey":"test-upload-secret",' +
          '"SessionToken":"test-upload-token"},"bucket":"tenant-data"}'
      );
    });

    it('serializes the download grant with bucket and object name', async () => {
      const { storage } = setup(ConnectionTarget.CLOUD);

      expect(await storage.getDownloadCredentials('tenant-data', 'a.json')).toBe(
        '{"Credentials":{"AccessKeyId":"test-download-access","Expiration":"2030-01-01T00:00:00.000Z",' +
          '"SecretAccessKey":"test-download-secret","SessionToken":"test-download-token"},' +
          '"bucket":"tenant-data","objectName":"a.json"}'
      );
    });
  });

  describe('reconnect', () => {
    it('resets the current backend by default', () => {
      const { selfHosted, cloud, storage } = setup();

      storage.reconnect();

      expect(selfHosted.reconnects).toBe(1);
      expect(cloud.reconnects).toBe(0);
    });

    it('resets the named backend', () => {
      const { selfHosted, cloud, storage } = setup();

      storage.reconnect(ConnectionTarget.CLOUD);

      expect(selfHosted.reconnects).toBe(0);
      expect(cloud.reconnects).toBe(1);
    });

    it('does nothing for an unknown target', () => {
      const { selfHosted, cloud, storage } = setup(ConnectionTarget.UNKNOWN);

      storage.reconnect();

      expect(selfHosted.reconnects + cloud.reconnects).toBe(0);
    });
  });
});

describe('object storage facade downloads', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'facade-download-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('downloads through the current backend to the given path', async () => {
    const { selfHosted, storage } = setup();
    selfHosted.seed('tenant-data', { 'a.json': '1' });
    const target = join(workDir, 'a.json');

    expect(await storage.downloadObject('tenant-data', 'a.json', 'json', target)).toBe(target);
  });
});
