import { AthenaClient, StartQueryExecutionCommand } from '@aws-sdk/client-athena';

import { IQueryEngine, IQueryRequest } from './IQueryEngine.js';

export class AthenaQueryEngine implements IQueryEngine {
  public constructor(private readonly client: AthenaClient) {}

  public static create(region: string): AthenaQueryEngine {
    return new AthenaQueryEngine(new AthenaClient({ region }));
  }

  public async startQuery(request: IQueryRequest): Promise<string> {
    const response = await this.client.send(
      new StartQueryExecutionCommand({
        QueryString: request.query,
        QueryExecutionContext: { Database: request.database },
        ResultConfiguration: { OutputLocation: request.outputLocation },
      }),
    );
    return response.QueryExecutionId ?? '';
  }

  public destroy(): void {
    this.client.destroy();
  }
}
