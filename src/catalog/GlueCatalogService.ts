import { AlreadyExistsException, CreateDatabaseCommand, CreateTableCommand, GlueClient } from '@aws-sdk/client-glue';

import { ICatalogService } from './ICatalogService.js';
import { ITableDefinition } from './TableDefinition.js';
import { CatalogEntityExistsError } from '../errors.js';

export class GlueCatalogService implements ICatalogService {
  public constructor(private readonly client: GlueClient) {}

  public static create(region: string): GlueCatalogService {
    return new GlueCatalogService(new GlueClient({ region }));
  }

  public async createDatabase(name: string): Promise<void> {
    try {
      await this.client.send(new CreateDatabaseCommand({ DatabaseInput: { Name: name } }));
    } catch (error) {
      if (error instanceof AlreadyExistsException) {
        throw new CatalogEntityExistsError('database', name, { cause: error });
      }
      throw error;
    }
  }

  public async createTable(database: string, table: ITableDefinition): Promise<void> {
    try {
      await this.client.send(
        new CreateTableCommand({
          DatabaseName: database,
          TableInput: {
            Name: table.name,
            StorageDescriptor: {
              Columns: table.columns.map((column) => ({ Name: column.name, Type: column.type })),
              Location: table.location,
              InputFormat: table.inputFormat,
              OutputFormat: table.outputFormat,
            },
          },
        }),
      );
    } catch (error) {
      if (error instanceof AlreadyExistsException) {
        throw new CatalogEntityExistsError('table', `${database}.${table.name}`, { cause: error });
      }
      throw error;
    }
  }

  public destroy(): void {
    this.client.destroy();
  }
}
