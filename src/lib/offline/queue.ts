/**
 * Pending Operation Queue
 *
 * Writes that could not reach the server are persisted here and replayed
 * in enqueue order once connectivity returns. Delivery is at-least-once:
 * a crash between the server's acknowledgement and the local delete
 * replays the operation again, so every submission carries the same
 * client-generated Idempotency-Key and the server is expected to
 * acknowledge a repeated key without applying the write twice.
 */

import { SYNC_CONFIG } from '@/lib/constants';
import { ApiError } from '@/services/api';
import type { JsonValue } from '@/types/json';
import {
  LocalStore,
  PendingOperationRecord,
  PendingOperationRequest,
  openLocalStore,
} from './db';
import { NetworkError, ReplaySubmitError, errorMessage, isNetworkError } from './errors';

export interface PendingOperation extends PendingOperationRecord {
  id: number;
}

export interface EnqueueInput {
  request: PendingOperationRequest;
  kind?: string;
  collectionId?: string;
  // Set when the operation was already attempted under this key
  idempotencyKey?: string;
}

/**
 * Delivers one operation. Must resolve only when the server acknowledged it.
 */
export type OperationSubmitter = (
  operation: Pick<PendingOperationRecord, 'idempotencyKey' | 'request'>
) => Promise<Response>;

export interface ReplayFailure {
  id: number;
  error: ReplaySubmitError;
}

export interface ReplayReport {
  attempted: number;
  sent: number;
  failed: ReplayFailure[];
  startedAt: number;
  finishedAt: number;
}

export type SendOutcome =
  | { status: 'sent'; response: Response }
  | { status: 'queued'; id: number };

export type QueueListener = (pendingCount: number) => void;

export interface PendingOperationQueueOptions {
  submit: OperationSubmitter;
  openStore?: () => Promise<LocalStore>;
  isOnline?: () => boolean;
  // Asks the platform (or the page) to replay later
  requestSync?: () => Promise<unknown>;
  now?: () => number;
  generateKey?: () => string;
}

function hasId(record: PendingOperationRecord): record is PendingOperation {
  return typeof record.id === 'number';
}

/**
 * Submit an operation with fetch. Network failures surface as
 * NetworkError, non-2xx responses as ApiError.
 */
export function createFetchSubmitter(fetchImpl: typeof fetch): OperationSubmitter {
  return async ({ idempotencyKey, request }) => {
    let response: Response;
    try {
      response = await fetchImpl(request.url, {
        method: request.method,
        headers: {
          'Content-Type': 'application/json',
          ...request.headers,
          [SYNC_CONFIG.IDEMPOTENCY_HEADER]: idempotencyKey,
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
      });
    } catch (error) {
      throw new NetworkError(request.url, { cause: error });
    }

    if (!response.ok) {
      throw new ApiError(response.status);
    }
    return response;
  };
}

export class PendingOperationQueue {
  private readonly submit: OperationSubmitter;
  private readonly openStore: () => Promise<LocalStore>;
  private readonly isOnline: () => boolean;
  private readonly requestSync?: () => Promise<unknown>;
  private readonly now: () => number;
  private readonly generateKey: () => string;
  private readonly listeners = new Set<QueueListener>();
  private replaying: Promise<ReplayReport> | null = null;
  private rerun: Promise<ReplayReport> | null = null;

  constructor(options: PendingOperationQueueOptions) {
    this.submit = options.submit;
    this.openStore = options.openStore ?? (() => openLocalStore());
    this.isOnline = options.isOnline ?? (() => true);
    this.requestSync = options.requestSync;
    this.now = options.now ?? Date.now;
    this.generateKey = options.generateKey ?? (() => crypto.randomUUID());
  }

  /**
   * Persist an operation and return its store-assigned id.
   * Rejects with StorageError only when the store is unavailable.
   */
  async enqueue(input: EnqueueInput): Promise<number> {
    const store = await this.openStore();

    const record: PendingOperationRecord = {
      idempotencyKey: input.idempotencyKey ?? this.generateKey(),
      kind: input.kind ?? 'message',
      request: input.request,
      enqueuedAt: this.now(),
    };
    if (input.collectionId !== undefined) {
      record.collectionId = input.collectionId;
    }

    const id = await store.add('pendingOperations', record);
    console.log(`[Queue] Enqueued ${record.kind} #${id} -> ${input.request.method} ${input.request.url}`);

    await this.notify(store);
    return id;
  }

  /**
   * All pending operations, oldest first
   */
  async list(): Promise<PendingOperation[]> {
    const store = await this.openStore();
    return this.readPending(store);
  }

  async listForCollection(collectionId: string): Promise<PendingOperation[]> {
    const store = await this.openStore();
    const records = await store.getAllByIndex('pendingOperations', 'by-collection', collectionId);
    return records.filter(hasId).sort((a, b) => a.id - b.id);
  }

  async count(): Promise<number> {
    const store = await this.openStore();
    return store.count('pendingOperations');
  }

  async remove(id: number): Promise<void> {
    const store = await this.openStore();
    await store.delete('pendingOperations', id);
    await this.notify(store);
  }

  async clear(): Promise<void> {
    const store = await this.openStore();
    await store.clear('pendingOperations');
    await this.notify(store);
  }

  onChange(listener: QueueListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Submit every pending operation in FIFO order. A failure leaves that
   * operation queued and moves on. A call made while a run is in flight
   * resolves with one follow-up pass, shared by every such call, so
   * operations enqueued mid-run are not missed.
   */
  replay(): Promise<ReplayReport> {
    if (!this.replaying) {
      return this.startReplay();
    }

    if (!this.rerun) {
      this.rerun = this.replaying.then(
        () => this.startReplay(),
        () => this.startReplay()
      );
    }
    return this.rerun;
  }

  private startReplay(): Promise<ReplayReport> {
    this.rerun = null;
    const run: Promise<ReplayReport> = this.runReplay().finally(() => {
      // A pending follow-up keeps the slot until it starts
      if (this.replaying === run && !this.rerun) this.replaying = null;
    });
    this.replaying = run;
    return run;
  }

  /**
   * Try the write now; if the network is unreachable, queue it for replay.
   * A response the server rejected is not retried and propagates.
   */
  async sendOrQueue(input: EnqueueInput): Promise<SendOutcome> {
    // One key for the live attempt and every replay
    const idempotencyKey = input.idempotencyKey ?? this.generateKey();

    if (this.isOnline()) {
      try {
        const response = await this.submit({ idempotencyKey, request: input.request });
        return { status: 'sent', response };
      } catch (error) {
        if (!isNetworkError(error)) throw error;
        console.warn(`[Queue] ${input.request.url} unreachable, queueing for replay`);
      }
    }

    const id = await this.enqueue({ ...input, idempotencyKey });
    await this.scheduleSync();
    return { status: 'queued', id };
  }

  private async scheduleSync(): Promise<void> {
    if (!this.requestSync) return;
    try {
      await this.requestSync();
    } catch (error) {
      console.error('[Queue] Failed to schedule replay:', error);
    }
  }

  private async readPending(store: LocalStore): Promise<PendingOperation[]> {
    const records = await store.getAll('pendingOperations');
    // Auto-increment keys are monotonic, so id order is enqueue order
    return records.filter(hasId).sort((a, b) => a.id - b.id);
  }

  private async runReplay(): Promise<ReplayReport> {
    const startedAt = this.now();
    const report: ReplayReport = { attempted: 0, sent: 0, failed: [], startedAt, finishedAt: startedAt };

    let store: LocalStore;
    let pending: PendingOperation[];
    try {
      store = await this.openStore();
      pending = await this.readPending(store);
    } catch (error) {
      console.warn('[Queue] Local store unavailable, skipping replay:', errorMessage(error));
      report.finishedAt = this.now();
      return report;
    }

    if (pending.length > 0) {
      console.log(`[Queue] Replaying ${pending.length} pending operations`);
    }

    for (const operation of pending) {
      report.attempted++;

      try {
        await this.submit(operation);
      } catch (error) {
        const failure = toReplayError(operation.id, error);
        console.error(`[Queue] Operation #${operation.id} failed, keeping it queued:`, failure.message);
        report.failed.push({ id: operation.id, error: failure });
        continue;
      }

      report.sent++;
      try {
        await store.delete('pendingOperations', operation.id);
      } catch (error) {
        // Still queued; the next replay resubmits under the same idempotency key
        console.error(`[Queue] Operation #${operation.id} acknowledged but not removed:`, errorMessage(error));
      }
    }

    report.finishedAt = this.now();
    if (report.attempted > 0) {
      console.log(`[Queue] Sent: ${report.sent}, Failed: ${report.failed.length}`);
    }

    await this.notify(store);
    return report;
  }

  private async notify(store: LocalStore): Promise<void> {
    if (this.listeners.size === 0) return;

    let pendingCount: number;
    try {
      pendingCount = await store.count('pendingOperations');
    } catch (error) {
      console.warn('[Queue] Could not count pending operations:', errorMessage(error));
      return;
    }
    this.listeners.forEach(listener => listener(pendingCount));
  }
}

function toReplayError(operationId: number, error: unknown): ReplaySubmitError {
  if (error instanceof ReplaySubmitError) return error;
  const status = error instanceof ApiError ? error.status : undefined;
  return new ReplaySubmitError(operationId, errorMessage(error), { status, cause: error });
}

export function createPendingOperationRequest(
  url: string,
  method: PendingOperationRequest['method'],
  body?: JsonValue
): PendingOperationRequest {
  return body === undefined ? { url, method } : { url, method, body };
}
