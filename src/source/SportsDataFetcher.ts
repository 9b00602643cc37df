import axios, { AxiosInstance } from 'axios';

import { IDataSource } from './IDataSource.js';
import { JsonValue, RecordBatch, toRecordBatch } from './RecordBatch.js';
import { describeError, HttpStatusError, SourceRequestError } from '../errors.js';
import logger from '../logger.js';

export const API_KEY_HEADER = 'Ocp-Apim-Subscription-Key';

export class SportsDataFetcher implements IDataSource {
  public constructor(private readonly http: AxiosInstance = axios.create()) {}

  /**
   * Issues one GET with the API key attached and decodes the body into a record batch.
   * @throws SourceRequestError when the request fails in transport or the body is not JSON
   * @throws HttpStatusError for any status other than 200, carrying the body verbatim
   * @throws UnexpectedStructureError when the JSON is neither an array of objects nor an object
   */
  public async fetch(endpoint: string, apiKey: string): Promise<RecordBatch> {
    let status: number;
    let body: string;
    try {
      const response = await this.http.get<string>(endpoint, {
        headers: { [API_KEY_HEADER]: apiKey },
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
      status = response.status;
      body = String(response.data);
    } catch (error) {
      throw new SourceRequestError(`API request failed: ${describeError(error)}`, { cause: error });
    }

    if (status !== 200) {
      throw new HttpStatusError(status, body);
    }

    let decoded: JsonValue;
    try {
      decoded = JSON.parse(body);
    } catch (error) {
      throw new SourceRequestError(`API response is not valid JSON: ${describeError(error)}`, { cause: error });
    }

    const batch = toRecordBatch(decoded);
    logger.info(`Fetched ${batch.length} records from ${endpoint}`);
    return batch;
  }
}
