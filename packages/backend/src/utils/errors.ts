export type EngineErrorCode =
  | 'TEMPLATE_ERROR'
  | 'PARSE_ERROR'
  | 'EXTRACTION_ERROR'
  | 'VALIDATION_ERROR'
  | 'CONCURRENCY_ERROR'
  | 'NOT_FOUND';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
  abstract readonly statusCode: number;
  readonly isOperational = true;
}

/** Invalid template; fatal to the run that loads it */
export class TemplateError extends EngineError {
  readonly code = 'TEMPLATE_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'TemplateError';
  }
}

export class ParseError extends EngineError {
  readonly code = 'PARSE_ERROR';
  readonly statusCode = 422;

  constructor(public readonly documentId: string, message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export class ExtractionError extends EngineError {
  readonly code = 'EXTRACTION_ERROR';
  readonly statusCode = 500;

  constructor(
    public readonly documentId: string,
    public readonly fieldKey: string,
    message: string
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class ValidationError extends EngineError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConcurrencyError extends EngineError {
  readonly code = 'CONCURRENCY_ERROR';
  readonly statusCode = 409;

  constructor(
    public readonly cellId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number
  ) {
    super(`Cell ${cellId} is at version ${actualVersion}, expected ${expectedVersion}`);
    this.name = 'ConcurrencyError';
  }
}

export class NotFoundError extends EngineError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
