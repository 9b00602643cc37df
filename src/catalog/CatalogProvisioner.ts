import { ICatalogService } from './ICatalogService.js';
import { sportsDataTable } from './TableDefinition.js';
import { CatalogEntityExistsError } from '../errors.js';
import logger from '../logger.js';

export type EnsureCatalogOutcome = 'existing' | 'created';

/**
 * Registers the catalog database and table. Both operations tolerate an entity
 * left behind by an earlier run, so the whole setup can be repeated.
 */
export class CatalogProvisioner {
  public constructor(private readonly catalog: ICatalogService) {}

  public async ensureDatabase(name: string): Promise<EnsureCatalogOutcome> {
    try {
      await this.catalog.createDatabase(name);
    } catch (error) {
      if (error instanceof CatalogEntityExistsError) {
        logger.info(`Catalog database ${name} already exists`);
        return 'existing';
      }
      throw error;
    }
    logger.info(`Catalog database ${name} created successfully`);
    return 'created';
  }

  public async ensureTable(database: string, tableName: string, location: string): Promise<EnsureCatalogOutcome> {
    try {
      await this.catalog.createTable(database, sportsDataTable(tableName, location));
    } catch (error) {
      if (error instanceof CatalogEntityExistsError) {
        logger.info(`Catalog table ${database}.${tableName} already exists`);
        return 'existing';
      }
      throw error;
    }
    logger.info(`Catalog table ${database}.${tableName} created at ${location}`);
    return 'created';
  }
}
