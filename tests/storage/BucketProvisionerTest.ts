import { BucketProvisioner } from '../../src/storage/BucketProvisioner.js';
import { InMemoryObjectStorage } from '../mocks/InMemoryObjectStorage.js';

describe('Bucket provisioner', () => {
  let storage: InMemoryObjectStorage;
  let provisioner: BucketProvisioner;

  beforeEach(() => {
    storage = new InMemoryObjectStorage();
    provisioner = new BucketProvisioner(storage);
  });

  it('should create a missing bucket', async () => {
    await expect(provisioner.ensureBucket('test-lake')).resolves.toBe('created');

    expect(storage.buckets.has('test-lake')).toBe(true);
    expect(storage.createBucketCalls).toBe(1);
  });

  it('should create the bucket exactly once when called twice', async () => {
    await provisioner.ensureBucket('test-lake');
    await expect(provisioner.ensureBucket('test-lake')).resolves.toBe('existing');

    expect(storage.createBucketCalls).toBe(1);
  });

  it('should propagate probe failures other than not found', async () => {
    const denied = new Error('AccessDenied');
    storage.probeError = denied;

    await expect(provisioner.ensureBucket('test-lake')).rejects.toBe(denied);
    expect(storage.createBucketCalls).toBe(0);
  });

  it('should wait for the bucket with the configured timeout', async () => {
    await provisioner.ensureBucket('test-lake');
    await provisioner.waitUntilReady('test-lake', 7);

    expect(storage.waits).toEqual([{ bucket: 'test-lake', timeoutSeconds: 7 }]);
  });

  it('should fail when the bucket never becomes visible', async () => {
    await expect(provisioner.waitUntilReady('missing-lake', 2)).rejects.toThrow(
      'Bucket missing-lake did not appear within 2s',
    );
  });
});
