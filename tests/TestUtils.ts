import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';

import { API_KEY_HEADER } from '../src/source/SportsDataFetcher.js';

export interface IRecordedRequest {
  method: string | undefined;
  url: string | undefined;
  apiKey: string | undefined;
}

export interface IStubHttp {
  http: AxiosInstance;
  requests: IRecordedRequest[];
}

function record(requests: IRecordedRequest[], config: InternalAxiosRequestConfig): void {
  const apiKey = config.headers.get(API_KEY_HEADER);
  requests.push({
    method: config.method,
    url: config.url,
    apiKey: typeof apiKey === 'string' ? apiKey : undefined,
  });
}

/**
 * An axios instance answered in process with a fixed status and body text.
 */
export function stubHttp(status: number, body: string): IStubHttp {
  const requests: IRecordedRequest[] = [];
  const http = axios.create({
    adapter: async (config) => {
      record(requests, config);
      return { data: body, status, statusText: '', headers: {}, config };
    },
  });
  return { http, requests };
}

export function failingHttp(code: string, message: string): IStubHttp {
  const requests: IRecordedRequest[] = [];
  const http = axios.create({
    adapter: async (config) => {
      record(requests, config);
      throw new AxiosError(message, code, config);
    },
  });
  return { http, requests };
}

export const TEST_ENV = {
  SPORTS_DATA_API_KEY: 'test-secret',
  NBA_ENDPOINT: 'https://sports.example.test/v3/nba/stats',
};

export interface ISdkResponse {
  $metadata: { httpStatusCode?: number };
}
