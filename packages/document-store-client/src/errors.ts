export class DocumentStoreClientError extends Error {
  readonly statusCode: number;
  readonly code: string | null;
  readonly details: unknown;

  constructor(message: string, options: { statusCode: number; code?: string | null; details?: unknown }) {
    super(message);
    this.name = 'DocumentStoreClientError';
    this.statusCode = options.statusCode;
    this.code = options.code ?? null;
    this.details = options.details;
  }
}

export class DocumentStoreOperationError extends Error {
  readonly operationId: number;
  readonly status: string;
  readonly details: unknown;

  constructor(message: string, options: { operationId: number; status: string; details?: unknown }) {
    super(message);
    this.name = 'DocumentStoreOperationError';
    this.operationId = options.operationId;
    this.status = options.status;
    this.details = options.details;
  }
}
