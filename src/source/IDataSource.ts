import { RecordBatch } from './RecordBatch.js';

export interface IDataSource {
  fetch(endpoint: string, apiKey: string): Promise<RecordBatch>;
}
