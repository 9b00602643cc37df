import { RecordBatch } from '../source/RecordBatch.js';

export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';

/**
 * Serializes every record on its own line. Each line, newline included, is one JSON object.
 */
export function toNdjson(batch: RecordBatch): string {
  return batch.map((record) => `${JSON.stringify(record)}\n`).join('');
}
