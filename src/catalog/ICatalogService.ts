import { ITableDefinition } from './TableDefinition.js';

export interface ICatalogService {
  /**
   * @throws CatalogEntityExistsError when the database is already registered.
   */
  createDatabase(name: string): Promise<void>;
  /**
   * @throws CatalogEntityExistsError when the table is already registered.
   */
  createTable(database: string, table: ITableDefinition): Promise<void>;
}
