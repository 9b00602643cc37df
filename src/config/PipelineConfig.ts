import { InvalidConfigurationError, MissingConfigurationError } from '../errors.js';

export interface ISourceConfig {
  apiKey: string;
  endpoint: string;
}

export interface IStorageConfig {
  region: string;
  bucketName: string;
  objectKey: string;
  bucketReadyTimeoutSeconds: number;
}

export interface ICatalogConfig {
  databaseName: string;
  tableName: string;
}

export interface IQueryConfig {
  resultsPrefix: string;
}

export interface IPipelineConfig {
  readonly source: Readonly<ISourceConfig>;
  readonly storage: Readonly<IStorageConfig>;
  readonly catalog: Readonly<ICatalogConfig>;
  readonly query: Readonly<IQueryConfig>;
}

/**
 * Values given on the command line. They take precedence over the environment.
 */
export interface IPipelineConfigOverrides {
  region?: string;
  bucketName?: string;
  databaseName?: string;
  tableName?: string;
  objectKey?: string;
  bucketReadyTimeoutSeconds?: string;
}

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_BUCKET_NAME = 'sports-analytics-data-lake3';
export const DEFAULT_DATABASE_NAME = 'glue_nba_data_lake';
export const DEFAULT_TABLE_NAME = 'nba_data';
export const DEFAULT_OBJECT_KEY = 'nba_data.json';
export const DEFAULT_RESULTS_PREFIX = 'athena-results/';
export const DEFAULT_BUCKET_READY_TIMEOUT_SECONDS = 30;

export type Environment = { [name: string]: string | undefined };

function required(env: Environment, name: string): string {
  const value = env[name];
  if (!value) {
    throw new MissingConfigurationError(name);
  }
  return value;
}

function optional(value: string | undefined, fallback: string): string {
  return value ? value : fallback;
}

function parseSeconds(name: string, value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const seconds = Number(value);
  if (!/^\d+$/.test(value) || seconds <= 0) {
    throw new InvalidConfigurationError(name, value);
  }
  return seconds;
}

/**
 * Builds the run configuration once, before any client is created.
 * Throws {@link MissingConfigurationError} when the API key or endpoint is empty.
 */
export function loadPipelineConfig(env: Environment, overrides: IPipelineConfigOverrides = {}): IPipelineConfig {
  const apiKey = required(env, 'SPORTS_DATA_API_KEY');
  const endpoint = required(env, 'NBA_ENDPOINT');

  return Object.freeze({
    source: Object.freeze({ apiKey, endpoint }),
    storage: Object.freeze({
      region: optional(overrides.region ?? env.AWS_REGION, DEFAULT_REGION),
      bucketName: optional(overrides.bucketName ?? env.DATA_LAKE_BUCKET, DEFAULT_BUCKET_NAME),
      objectKey: optional(overrides.objectKey ?? env.DATA_OBJECT_KEY, DEFAULT_OBJECT_KEY),
      bucketReadyTimeoutSeconds: overrides.bucketReadyTimeoutSeconds
        ? parseSeconds('--ready-timeout', overrides.bucketReadyTimeoutSeconds, DEFAULT_BUCKET_READY_TIMEOUT_SECONDS)
        : parseSeconds(
            'BUCKET_READY_TIMEOUT_SECONDS',
            env.BUCKET_READY_TIMEOUT_SECONDS,
            DEFAULT_BUCKET_READY_TIMEOUT_SECONDS,
          ),
    }),
    catalog: Object.freeze({
      databaseName: optional(overrides.databaseName ?? env.GLUE_DATABASE, DEFAULT_DATABASE_NAME),
      tableName: optional(overrides.tableName ?? env.GLUE_TABLE, DEFAULT_TABLE_NAME),
    }),
    query: Object.freeze({
      resultsPrefix: optional(env.ATHENA_RESULTS_PREFIX, DEFAULT_RESULTS_PREFIX),
    }),
  });
}

export function bucketLocation(bucketName: string): string {
  return `s3://${bucketName}/`;
}

export function queryResultsLocation(config: IPipelineConfig): string {
  const prefix = config.query.resultsPrefix.replace(/^\/+/, '');
  const normalized = prefix.endsWith('/') ? prefix : `${prefix}/`;
  return `${bucketLocation(config.storage.bucketName)}${normalized}`;
}
