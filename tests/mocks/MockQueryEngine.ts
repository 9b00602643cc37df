import { IQueryEngine, IQueryRequest } from '../../src/query/IQueryEngine.js';

export class MockQueryEngine implements IQueryEngine {
  public readonly requests: IQueryRequest[] = [];

  public constructor(private readonly executionId: string = 'test-execution-id') {}

  public async startQuery(request: IQueryRequest): Promise<string> {
    this.requests.push(request);
    return this.executionId;
  }
}
