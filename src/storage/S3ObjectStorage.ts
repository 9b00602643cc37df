import {
  BucketLocationConstraint,
  CreateBucketCommand,
  CreateBucketCommandInput,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  waitUntilBucketExists,
} from '@aws-sdk/client-s3';

import { IObjectStorage, IPutObjectRequest } from './IObjectStorage.js';

const WAITER_MIN_DELAY_SECONDS = 1;
const MISSING_BUCKET_ERROR_NAMES = new Set(['notfound', 'nosuchbucket']);

export function isMissingBucketError(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  if (error.$metadata.httpStatusCode === 404) {
    return true;
  }
  return MISSING_BUCKET_ERROR_NAMES.has(error.name.toLowerCase());
}

// BucketAlreadyExists also answers 409 but means another account holds the name
export function isBucketAlreadyOwnedError(error: unknown): boolean {
  return error instanceof S3ServiceException && error.name.toLowerCase() === 'bucketalreadyownedbyyou';
}

export class S3ObjectStorage implements IObjectStorage {
  public constructor(
    private readonly client: S3Client,
    private readonly region: string,
  ) {}

  public static create(region: string): S3ObjectStorage {
    return new S3ObjectStorage(new S3Client({ region }), region);
  }

  public async bucketExists(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (error) {
      if (isMissingBucketError(error)) {
        return false;
      }
      throw error;
    }
  }

  public async createBucket(bucket: string): Promise<void> {
    const input: CreateBucketCommandInput = { Bucket: bucket };
    // us-east-1 rejects an explicit location constraint
    if (this.region.toLowerCase() !== 'us-east-1') {
      // the SDK enum lags behind new regions; S3 validates the value itself
      input.CreateBucketConfiguration = { LocationConstraint: this.region as BucketLocationConstraint };
    }
    try {
      await this.client.send(new CreateBucketCommand(input));
    } catch (error) {
      if (!isBucketAlreadyOwnedError(error)) {
        throw error;
      }
    }
  }

  public async waitUntilBucketExists(bucket: string, timeoutSeconds: number): Promise<void> {
    await waitUntilBucketExists(
      {
        client: this.client,
        // the waiter rejects a maximum that is not above its minimum delay
        maxWaitTime: Math.max(timeoutSeconds, WAITER_MIN_DELAY_SECONDS + 1),
        minDelay: WAITER_MIN_DELAY_SECONDS,
      },
      { Bucket: bucket },
    );
  }

  public async putObject(request: IPutObjectRequest): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: request.bucket,
        Key: request.key,
        Body: request.body,
        ContentLength: request.contentLength,
        ContentType: request.contentType,
      }),
    );
  }

  public destroy(): void {
    this.client.destroy();
  }
}
