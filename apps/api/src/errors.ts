export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = 'AppError';
    this.status = status;
  }
}

/** Raised when introspection yields no tables, as opposed to tables with no inferable links. */
export class EmptySchemaError extends AppError {
  constructor(message = 'Schema has no tables to analyze') {
    super(message, 422);
    this.name = 'EmptySchemaError';
  }
}

export class IngestError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'IngestError';
  }
}

export class OracleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OracleError';
  }
}

export class EmbeddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));
