/**
 * Push Notifications
 *
 * Payload parsing and the worker-side notification lifecycle.
 */

export {
  parsePushPayload,
  buildNotification,
  type PushPayload,
  type PushParseResult,
  type NotificationSpec,
} from './payload';

export {
  NotificationDispatcher,
  isSamePage,
  type ClickOutcome,
  type NotificationDispatcherOptions,
} from './dispatcher';
