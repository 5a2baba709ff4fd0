/**
 * Offline Module
 *
 * Durable local store, pending write queue and cached reads,
 * shared by the page and the service worker.
 */

// Database
export {
  openLocalStore,
  deleteLocalStore,
  type LocalStore,
  type OfflineDBSchema,
  type PendingOperationRecord,
  type PendingOperationRequest,
  type CachedRecord,
  type NotificationRecord,
  type NotificationState,
  type WriteMethod,
} from './db';

// Errors
export {
  StorageError,
  NetworkError,
  ReplaySubmitError,
  PayloadParseError,
  PrecacheError,
  isNetworkError,
  errorMessage,
} from './errors';

// Offline queue
export {
  PendingOperationQueue,
  createFetchSubmitter,
  createPendingOperationRequest,
  type PendingOperation,
  type EnqueueInput,
  type OperationSubmitter,
  type ReplayReport,
  type ReplayFailure,
  type SendOutcome,
} from './queue';

// Cached reads
export { CachedRecordRepository, recordIdOf } from './records';

// Background sync registration
export { registerBackgroundSync, SyncScheduler, type ReplayRequestOutcome } from './backgroundSync';
