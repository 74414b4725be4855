import { Blob } from 'node:buffer';
import { fetch, FormData, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import { z } from 'zod';
import { sleep as defaultSleep } from '@tideline/shared/time';
import { DocumentStoreClientError, DocumentStoreOperationError } from './errors';
import type {
  DocumentStoreClientOptions,
  ImportCsvInput,
  IndexDefinition,
  OperationState,
  PutIndexResult,
  WaitForOperationOptions
} from './types';

const DEFAULT_POLL_INTERVAL_MS = 1_000;
const DEFAULT_OPERATION_TIMEOUT_MS = 5 * 60_000;

const putIndexesResponseSchema = z.object({
  Results: z.array(
    z.object({
      Index: z.string(),
      RaftCommandIndex: z.number().nullable().optional()
    })
  )
});

const nextOperationIdSchema = z.object({
  Id: z.number().int()
});

const operationStateSchema = z.object({
  Status: z.enum(['InProgress', 'Completed', 'Faulted', 'Canceled']),
  Result: z.record(z.unknown()).nullable().optional(),
  Progress: z.record(z.unknown()).nullable().optional()
});

type QueryParams = Record<string, string | number | undefined>;

interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
  form?: FormData;
  accept?: string;
}

function readFaultMessage(result: Record<string, unknown> | null): string | null {
  if (!result) {
    return null;
  }
  const message = result.Message;
  return typeof message === 'string' && message.trim().length > 0 ? message : null;
}

async function discardBody(response: Response): Promise<void> {
  await response.arrayBuffer();
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Thin client over the document database's REST API, covering the calls the
 * scenarios need: index management, CSV import, operation tracking and
 * streaming queries.
 */
export class DocumentStoreClient {
  private readonly baseUrl: URL;
  private readonly database: string;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs?: number;
  private readonly dispatcher?: DocumentStoreClientOptions['dispatcher'];

  constructor(options: DocumentStoreClientOptions) {
    if (!options.url) {
      throw new Error('DocumentStoreClient requires a url');
    }
    if (!options.database) {
      throw new Error('DocumentStoreClient requires a database');
    }
    this.baseUrl = new URL(options.url);
    this.database = options.database;
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
    this.dispatcher = options.dispatcher;
  }

  get url(): string {
    return this.baseUrl.toString().replace(/\/+$/, '');
  }

  get databaseName(): string {
    return this.database;
  }

  async putIndexes(definitions: IndexDefinition[]): Promise<PutIndexResult[]> {
    const body = {
      Indexes: definitions.map((definition) => ({
        Name: definition.name,
        Maps: definition.maps,
        Reduce: definition.reduce ?? null,
        OutputReduceToCollection: definition.outputReduceToCollection ?? null
      }))
    };
    const payload = await this.send('PUT', '/admin/indexes', { body }, async (response) =>
      putIndexesResponseSchema.parse(await response.json())
    );
    return payload.Results.map((entry) => ({
      index: entry.Index,
      raftCommandIndex: entry.RaftCommandIndex ?? null
    }));
  }

  async deleteIndex(name: string): Promise<void> {
    await this.send('DELETE', '/indexes', { query: { name } }, discardBody);
  }

  async getNextOperationId(): Promise<number> {
    const payload = await this.send('GET', '/operations/next-operation-id', {}, async (response) =>
      nextOperationIdSchema.parse(await response.json())
    );
    return payload.Id;
  }

  async importCsv(input: ImportCsvInput): Promise<void> {
    const form = new FormData();
    const blob = new Blob([input.csv], { type: 'text/csv' });
    form.append('file', blob, input.filename ?? `${input.collection}.csv`);

    await this.send(
      'POST',
      '/smuggler/import/csv',
      { query: { operationId: input.operationId, collection: input.collection }, form },
      discardBody
    );
  }

  async getOperationState(operationId: number): Promise<OperationState> {
    const payload = await this.send('GET', '/operations/state', { query: { id: operationId } }, async (response) =>
      operationStateSchema.parse(await response.json())
    );
    return {
      status: payload.Status,
      result: payload.Result ?? null,
      progress: payload.Progress ?? null
    };
  }

  async waitForOperationCompletion(
    operationId: number,
    options: WaitForOperationOptions = {}
  ): Promise<OperationState> {
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const timeoutMs = options.timeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    const wait = options.sleep ?? defaultSleep;
    const now = options.now ?? Date.now;
    const deadline = now() + timeoutMs;

    while (true) {
      const state = await this.getOperationState(operationId);
      switch (state.status) {
        case 'Completed':
          return state;
        case 'Faulted':
          throw new DocumentStoreOperationError(
            readFaultMessage(state.result) ?? `Operation ${operationId} faulted`,
            { operationId, status: state.status, details: state.result }
          );
        case 'Canceled':
          throw new DocumentStoreOperationError(`Operation ${operationId} was canceled`, {
            operationId,
            status: state.status,
            details: state.result
          });
        case 'InProgress':
          break;
      }
      if (now() >= deadline) {
        throw new DocumentStoreOperationError(
          `Timed out after ${timeoutMs}ms waiting for operation ${operationId}`,
          { operationId, status: state.status, details: state.progress }
        );
      }
      await wait(pollIntervalMs);
    }
  }

  /** Runs an RQL query through the streaming endpoint and returns the CSV body. */
  async streamQueryCsv(query: string): Promise<string> {
    return this.send('GET', '/streams/queries', { query: { format: 'csv', query }, accept: 'text/csv' }, (response) =>
      response.text()
    );
  }

  /** `read` consumes the body before the request timeout is cleared. */
  private async send<T>(
    method: string,
    path: string,
    options: RequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const headers = new Headers({ Accept: options.accept ?? 'application/json' });
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }

    let body: string | FormData | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers.set('Content-Type', 'application/json');
    }

    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    const init: RequestInit = { method, headers, body, signal: controller.signal };
    if (this.dispatcher) {
      init.dispatcher = this.dispatcher;
    }

    try {
      const response = await fetch(this.buildUrl(path, options.query), init);
      if (!response.ok) {
        await this.handleErrorResponse(response);
      }
      return await read(response);
    } catch (err) {
      if (controller.signal.aborted) {
        throw new DocumentStoreClientError('Request aborted', {
          statusCode: 0,
          code: 'ABORTED',
          details: err instanceof Error ? err.message : String(err)
        });
      }
      throw err;
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  private buildUrl(path: string, query?: QueryParams): URL {
    const prefix = this.baseUrl.pathname.replace(/\/+$/, '');
    const url = new URL(`${prefix}/databases/${encodeURIComponent(this.database)}${path}`, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) {
          continue;
        }
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text().catch(() => '');
    const parsed = parseJson(text);
    const details: unknown = parsed ?? text;
    let message = response.statusText || 'Document store request failed';
    if (parsed && typeof parsed === 'object' && 'Message' in parsed && typeof parsed.Message === 'string') {
      message = parsed.Message;
    }

    throw new DocumentStoreClientError(message, {
      statusCode: response.status,
      details
    });
  }
}
