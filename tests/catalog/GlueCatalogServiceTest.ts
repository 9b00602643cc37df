import {
  AlreadyExistsException,
  CreateDatabaseCommand,
  CreateTableCommand,
  GlueClient,
  GlueServiceException,
} from '@aws-sdk/client-glue';

import { GlueCatalogService } from '../../src/catalog/GlueCatalogService.js';
import { sportsDataTable } from '../../src/catalog/TableDefinition.js';
import { CatalogEntityExistsError } from '../../src/errors.js';
import { ISdkResponse } from '../TestUtils.js';

describe('Glue catalog service', () => {
  let client: GlueClient;
  let sent: unknown[];

  function respondWith(handler: (command: unknown) => Promise<ISdkResponse>): void {
    jest.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
      sent.push(command);
      return handler(command);
    });
  }

  beforeEach(() => {
    client = new GlueClient({ region: 'us-east-1' });
    sent = [];
  });

  afterEach(() => {
    jest.restoreAllMocks();
    client.destroy();
  });

  it('should send the database name', async () => {
    respondWith(async () => ({ $metadata: {} }));

    await new GlueCatalogService(client).createDatabase('test_db');

    const command = sent[0];
    expect(command).toBeInstanceOf(CreateDatabaseCommand);
    if (command instanceof CreateDatabaseCommand) {
      expect(command.input).toEqual({ DatabaseInput: { Name: 'test_db' } });
    }
  });

  it('should translate an existing database into a catalog conflict', async () => {
    respondWith(async () => {
      throw new AlreadyExistsException({ message: 'Database already exists.', $metadata: {} });
    });

    const creation = new GlueCatalogService(client).createDatabase('test_db');

    await expect(creation).rejects.toBeInstanceOf(CatalogEntityExistsError);
    await expect(creation).rejects.toMatchObject({
      kind: 'database',
      entityName: 'test_db',
      message: 'Catalog database test_db already exists',
    });
  });

  it('should pass other service errors through', async () => {
    const denied = new GlueServiceException({
      name: 'AccessDeniedException',
      $fault: 'client',
      $metadata: { httpStatusCode: 400 },
      message: 'User is not authorized',
    });
    respondWith(async () => {
      throw denied;
    });

    await expect(new GlueCatalogService(client).createDatabase('test_db')).rejects.toBe(denied);
  });

  it('should describe the table storage', async () => {
    respondWith(async () => ({ $metadata: {} }));

    await new GlueCatalogService(client).createTable('test_db', sportsDataTable('nba_data', 's3://test-lake/'));

    const command = sent[0];
    expect(command).toBeInstanceOf(CreateTableCommand);
    if (command instanceof CreateTableCommand) {
      expect(command.input).toEqual({
        DatabaseName: 'test_db',
        TableInput: {
          Name: 'nba_data',
          StorageDescriptor: {
            Columns: [
              { Name: 'id', Type: 'string' },
              { Name: 'name', Type: 'string' },
              { Name: 'stats', Type: 'string' },
            ],
            Location: 's3://test-lake/',
            InputFormat: 'org.apache.hadoop.mapred.TextInputFormat',
            OutputFormat: 'org.apache.hadoop.hive.ql.io.HiveIgnoreKeyTextOutputFormat',
          },
        },
      });
    }
  });

  it('should translate an existing table into a catalog conflict', async () => {
    respondWith(async () => {
      throw new AlreadyExistsException({ message: 'Table already exists.', $metadata: {} });
    });

    await expect(
      new GlueCatalogService(client).createTable('test_db', sportsDataTable('nba_data', 's3://test-lake/')),
    ).rejects.toThrow('Catalog table test_db.nba_data already exists');
  });
});
