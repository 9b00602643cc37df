export interface IQueryRequest {
  database: string;
  query: string;
  outputLocation: string;
}

export interface IQueryEngine {
  /**
   * Submits the statement and resolves with the execution id once the service accepts it.
   */
  startQuery(request: IQueryRequest): Promise<string>;
}
