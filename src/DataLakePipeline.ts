import { CatalogProvisioner } from './catalog/CatalogProvisioner.js';
import { ICatalogService } from './catalog/ICatalogService.js';
import { bucketLocation, IPipelineConfig, queryResultsLocation } from './config/PipelineConfig.js';
import { PipelineStage, PipelineStageError } from './errors.js';
import { DataUploader, IUploadedObject } from './ingest/DataUploader.js';
import logger from './logger.js';
import { IQueryEngine } from './query/IQueryEngine.js';
import { QueryEngineConfigurator } from './query/QueryEngineConfigurator.js';
import { IDataSource } from './source/IDataSource.js';
import { BucketProvisioner } from './storage/BucketProvisioner.js';
import { IObjectStorage } from './storage/IObjectStorage.js';

export interface IPipelineServices {
  storage: IObjectStorage;
  catalog: ICatalogService;
  queryEngine: IQueryEngine;
  source: IDataSource;
}

export interface IPipelineResult {
  recordCount: number;
  uploaded: IUploadedObject | null;
  queryExecutionId: string;
}

/**
 * Runs the provisioning steps one after another. The first failing step aborts
 * the run; resources created before it are left in place.
 */
export class DataLakePipeline {
  private readonly bucketProvisioner: BucketProvisioner;
  private readonly catalogProvisioner: CatalogProvisioner;
  private readonly uploader: DataUploader;
  private readonly queryConfigurator: QueryEngineConfigurator;
  private readonly source: IDataSource;

  public constructor(
    private readonly config: IPipelineConfig,
    services: IPipelineServices,
  ) {
    this.bucketProvisioner = new BucketProvisioner(services.storage);
    this.catalogProvisioner = new CatalogProvisioner(services.catalog);
    this.uploader = new DataUploader(services.storage);
    this.queryConfigurator = new QueryEngineConfigurator(services.queryEngine);
    this.source = services.source;
  }

  public async run(): Promise<IPipelineResult> {
    const { source, storage, catalog } = this.config;

    await this.stage('create storage bucket', () => this.bucketProvisioner.ensureBucket(storage.bucketName));
    await this.stage('wait for storage bucket', () =>
      this.bucketProvisioner.waitUntilReady(storage.bucketName, storage.bucketReadyTimeoutSeconds),
    );
    await this.stage('create catalog database', () => this.catalogProvisioner.ensureDatabase(catalog.databaseName));

    const batch = await this.stage('fetch sports data', () => this.source.fetch(source.endpoint, source.apiKey));
    const uploaded = await this.stage('upload data to storage', () =>
      this.uploader.upload(storage.bucketName, storage.objectKey, batch),
    );

    await this.stage('create catalog table', () =>
      this.catalogProvisioner.ensureTable(catalog.databaseName, catalog.tableName, bucketLocation(storage.bucketName)),
    );
    const queryExecutionId = await this.stage('configure query engine', () =>
      this.queryConfigurator.configure(catalog.databaseName, queryResultsLocation(this.config)),
    );

    return { recordCount: batch.length, uploaded, queryExecutionId };
  }

  private async stage<T>(stage: PipelineStage, operation: () => Promise<T>): Promise<T> {
    logger.debug(`Starting stage: ${stage}`);
    try {
      return await operation();
    } catch (error) {
      throw new PipelineStageError(stage, error);
    }
  }
}
