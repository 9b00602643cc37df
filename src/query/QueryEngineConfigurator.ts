import { IQueryEngine } from './IQueryEngine.js';
import logger from '../logger.js';

export function createDatabaseStatement(database: string): string {
  return `CREATE DATABASE IF NOT EXISTS ${database}`;
}

export class QueryEngineConfigurator {
  public constructor(private readonly engine: IQueryEngine) {}

  /**
   * Submits the database declaration without waiting for the execution to finish.
   * @returns the query execution id reported by the engine
   */
  public async configure(database: string, outputLocation: string): Promise<string> {
    const executionId = await this.engine.startQuery({
      database,
      query: createDatabaseStatement(database),
      outputLocation,
    });
    logger.info(`Query engine configured for ${database} (execution ${executionId || 'unknown'}), results at ${outputLocation}`);
    return executionId;
  }
}
