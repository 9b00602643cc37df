import { Command } from 'commander';
import dotenv from 'dotenv';

import { GlueCatalogService } from '../catalog/GlueCatalogService.js';
import { Environment, IPipelineConfig, IPipelineConfigOverrides, loadPipelineConfig } from '../config/PipelineConfig.js';
import { DataLakePipeline, IPipelineResult, IPipelineServices } from '../DataLakePipeline.js';
import { describeError } from '../errors.js';
import logger from '../logger.js';
import { AthenaQueryEngine } from '../query/AthenaQueryEngine.js';
import { SportsDataFetcher } from '../source/SportsDataFetcher.js';
import { S3ObjectStorage } from '../storage/S3ObjectStorage.js';

export interface IDataLakeCommandOptions {
  envFile?: string;
  region?: string;
  bucket?: string;
  database?: string;
  table?: string;
  objectKey?: string;
  readyTimeout?: string;
  debug?: boolean;
}

export interface IServiceHandle {
  services: IPipelineServices;
  close(): void;
}

export type ServiceFactory = (config: IPipelineConfig) => IServiceHandle;

export interface ICliContext {
  env: Environment;
  createServices: ServiceFactory;
  exit: (code: number) => void;
}

export function createAwsServices(config: IPipelineConfig): IServiceHandle {
  const storage = S3ObjectStorage.create(config.storage.region);
  const catalog = GlueCatalogService.create(config.storage.region);
  const queryEngine = AthenaQueryEngine.create(config.storage.region);
  return {
    services: { storage, catalog, queryEngine, source: new SportsDataFetcher() },
    close: (): void => {
      storage.destroy();
      catalog.destroy();
      queryEngine.destroy();
    },
  };
}

export function toConfigOverrides(options: IDataLakeCommandOptions): IPipelineConfigOverrides {
  return {
    region: options.region,
    bucketName: options.bucket,
    databaseName: options.database,
    tableName: options.table,
    objectKey: options.objectKey,
    bucketReadyTimeoutSeconds: options.readyTimeout,
  };
}

/**
 * Loads the configuration, then runs the pipeline against the services built from it.
 * Configuration errors are thrown before the factory is called.
 */
export async function runDataLake(
  env: Environment,
  overrides: IPipelineConfigOverrides,
  createServices: ServiceFactory = createAwsServices,
): Promise<IPipelineResult> {
  const config = loadPipelineConfig(env, overrides);
  const handle = createServices(config);
  try {
    const result = await new DataLakePipeline(config, handle.services).run();
    logger.info('Data lake setup complete.');
    return result;
  } finally {
    handle.close();
  }
}

export function createDataLakeCommand(
  env: Environment = process.env,
  createServices: ServiceFactory = createAwsServices,
): Command {
  const command = new Command();

  return command
    .name('data-lake')
    .description(
      'Provision the sports data lake: storage bucket, catalog database and table, query engine database, and the latest data from the sports API.',
    )
    .option('-e, --env-file <path>', 'Path of a .env file to load before reading the environment.', '.env')
    .option('-r, --region <region>', 'AWS region of every service client.')
    .option('-b, --bucket <name>', 'Name of the storage bucket.')
    .option('--database <name>', 'Name of the catalog database.')
    .option('--table <name>', 'Name of the catalog table.')
    .option('--object-key <key>', 'Key of the uploaded data object.')
    .option('--ready-timeout <seconds>', 'How long to wait for a new bucket to become visible.')
    .option('-d, --debug', 'Enable debugging mode.')
    .action(async (options: IDataLakeCommandOptions) => {
      if (options.debug) {
        logger.level = 'debug';
        logger.debug(`Called ${command.name()} with options ${JSON.stringify(options)}`);
      }
      const loaded = dotenv.config({ path: options.envFile });
      if (loaded.error) {
        logger.debug(`No env file loaded from ${options.envFile}: ${loaded.error.message}`);
      }
      await runDataLake(env, toConfigOverrides(options), createServices);
    });
}

/**
 * Entry point of the binary: a failure is logged as one error line and ends the process with status 1.
 */
export async function runCli(
  argv: string[],
  context: ICliContext = {
    env: process.env,
    createServices: createAwsServices,
    exit: (code: number) => process.exit(code),
  },
): Promise<void> {
  try {
    await createDataLakeCommand(context.env, context.createServices).parseAsync(argv);
  } catch (error) {
    logger.error(describeError(error));
    context.exit(1);
  }
}
