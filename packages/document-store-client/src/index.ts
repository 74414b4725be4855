export { DocumentStoreClient } from './client';
export { DocumentStoreClientError, DocumentStoreOperationError } from './errors';
export type {
  DocumentStoreClientOptions,
  ImportCsvInput,
  IndexDefinition,
  OperationState,
  OperationStatus,
  PutIndexResult,
  WaitForOperationOptions
} from './types';
