import type { Dispatcher } from 'undici';
import type { Sleeper } from '@tideline/shared/time';

export interface DocumentStoreClientOptions {
  /** Server root, e.g. `http://127.0.0.1:8080`. */
  url: string;
  database: string;
  userAgent?: string;
  /** Limit per request, covering the response body as well as the headers. */
  fetchTimeoutMs?: number;
  /** Overrides undici's global dispatcher for every request. */
  dispatcher?: Dispatcher;
}

export interface IndexDefinition {
  name: string;
  maps: string[];
  reduce?: string;
  outputReduceToCollection?: string;
}

export interface PutIndexResult {
  index: string;
  raftCommandIndex: number | null;
}

export interface ImportCsvInput {
  collection: string;
  operationId: number;
  csv: string;
  filename?: string;
}

export type OperationStatus = 'InProgress' | 'Completed' | 'Faulted' | 'Canceled';

export interface OperationState {
  status: OperationStatus;
  result: Record<string, unknown> | null;
  progress: Record<string, unknown> | null;
}

export interface WaitForOperationOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
  sleep?: Sleeper;
  now?: () => number;
}
