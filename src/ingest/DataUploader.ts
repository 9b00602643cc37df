import { NDJSON_CONTENT_TYPE, toNdjson } from './NdjsonEncoder.js';
import logger from '../logger.js';
import { RecordBatch } from '../source/RecordBatch.js';
import { IObjectStorage } from '../storage/IObjectStorage.js';

export interface IUploadedObject {
  bucket: string;
  key: string;
  recordCount: number;
  contentLength: number;
}

export class DataUploader {
  public constructor(private readonly storage: IObjectStorage) {}

  /**
   * Writes the batch as one newline-delimited JSON object.
   * @returns null when the batch is empty and nothing was written
   */
  public async upload(bucket: string, key: string, batch: RecordBatch): Promise<IUploadedObject | null> {
    if (batch.length === 0) {
      logger.info('No records to upload, skipping write');
      return null;
    }

    const body = toNdjson(batch);
    const contentLength = Buffer.byteLength(body, 'utf8');

    await this.storage.putObject({
      bucket,
      key,
      body,
      contentLength,
      contentType: NDJSON_CONTENT_TYPE,
    });
    logger.info(`Uploaded ${batch.length} records (${contentLength} bytes) to s3://${bucket}/${key}`);

    return { bucket, key, recordCount: batch.length, contentLength };
  }
}
