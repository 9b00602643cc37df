import { IObjectStorage } from './IObjectStorage.js';
import logger from '../logger.js';

export type EnsureBucketOutcome = 'existing' | 'created';

export class BucketProvisioner {
  public constructor(private readonly storage: IObjectStorage) {}

  /**
   * Probes the bucket and creates it only when the probe reports it missing.
   * Probe failures other than "not found" propagate unchanged.
   */
  public async ensureBucket(name: string): Promise<EnsureBucketOutcome> {
    if (await this.storage.bucketExists(name)) {
      logger.info(`Bucket ${name} already exists`);
      return 'existing';
    }

    await this.storage.createBucket(name);
    logger.info(`Bucket ${name} created successfully`);
    return 'created';
  }

  public async waitUntilReady(name: string, timeoutSeconds: number): Promise<void> {
    logger.debug(`Waiting up to ${timeoutSeconds}s for bucket ${name} to become visible`);
    await this.storage.waitUntilBucketExists(name, timeoutSeconds);
    logger.info(`Bucket ${name} is ready`);
  }
}
