export interface IPutObjectRequest {
  bucket: string;
  key: string;
  body: string;
  contentLength: number;
  contentType: string;
}

export interface IObjectStorage {
  /**
   * Resolves false when the service reports the bucket as missing. Any other failure is thrown as is.
   */
  bucketExists(bucket: string): Promise<boolean>;
  createBucket(bucket: string): Promise<void>;
  waitUntilBucketExists(bucket: string, timeoutSeconds: number): Promise<void>;
  putObject(request: IPutObjectRequest): Promise<void>;
}
