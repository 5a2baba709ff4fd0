/**
 * Offline layer error taxonomy.
 *
 * Background paths (cache refresh, push parsing) log and swallow these;
 * foreground reads with no cache fallback let them reach the caller.
 */

export type StorageOperation =
  | 'open'
  | 'put'
  | 'add'
  | 'get'
  | 'getAll'
  | 'getAllByIndex'
  | 'countByIndex'
  | 'count'
  | 'delete'
  | 'clear'
  | 'deleteDatabase';

export class StorageError extends Error {
  readonly operation: StorageOperation;

  constructor(operation: StorageOperation, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.operation = operation;
  }
}

export class NetworkError extends Error {
  readonly url: string;

  constructor(url: string, options?: { cause?: unknown }) {
    super(`Network request failed: ${url}`, options);
    this.name = 'NetworkError';
    this.url = url;
  }
}

export class ReplaySubmitError extends Error {
  readonly operationId: number;
  // Absent when no HTTP response was received
  readonly status?: number;

  constructor(operationId: number, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ReplaySubmitError';
    this.operationId = operationId;
    this.status = options?.status;
  }
}

export class PayloadParseError extends Error {
  readonly rawText: string;

  constructor(rawText: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PayloadParseError';
    this.rawText = rawText;
  }
}

export class PrecacheError extends Error {
  readonly assets: readonly string[];

  constructor(assets: readonly string[], options?: { cause?: unknown }) {
    super(`Failed to precache ${assets.length} shell assets`, options);
    this.name = 'PrecacheError';
    this.assets = assets;
  }
}

/**
 * True for failures where no HTTP response came back at all.
 * fetch() rejects with a TypeError in that case.
 */
export function isNetworkError(error: unknown): boolean {
  return error instanceof NetworkError || error instanceof TypeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
