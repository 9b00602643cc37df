export class MissingConfigurationError extends Error {
  public constructor(public readonly variable: string) {
    super(`${variable} is not set`);
    this.name = 'MissingConfigurationError';
  }
}

export class InvalidConfigurationError extends Error {
  public constructor(
    public readonly variable: string,
    public readonly value: string,
  ) {
    super(`${variable} has an invalid value: ${value}`);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * The data source could not be reached, or answered with a body that is not JSON.
 */
export class SourceRequestError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SourceRequestError';
  }
}

export class HttpStatusError extends Error {
  public constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`API returned ${status}: ${body}`);
    this.name = 'HttpStatusError';
  }
}

export class UnexpectedStructureError extends Error {
  public constructor(detail?: string) {
    super(detail ? `unexpected JSON structure: ${detail}` : 'unexpected JSON structure');
    this.name = 'UnexpectedStructureError';
  }
}

export class CatalogEntityExistsError extends Error {
  public constructor(
    public readonly kind: 'database' | 'table',
    public readonly entityName: string,
    options?: ErrorOptions,
  ) {
    super(`Catalog ${kind} ${entityName} already exists`, options);
    this.name = 'CatalogEntityExistsError';
  }
}

export type PipelineStage =
  | 'create storage bucket'
  | 'wait for storage bucket'
  | 'create catalog database'
  | 'fetch sports data'
  | 'upload data to storage'
  | 'create catalog table'
  | 'configure query engine';

export class PipelineStageError extends Error {
  public constructor(
    public readonly stage: PipelineStage,
    cause: unknown,
  ) {
    super(`Failed to ${stage}: ${describeError(cause)}`, { cause });
    this.name = 'PipelineStageError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
