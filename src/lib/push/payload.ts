/**
 * Push payload parsing
 *
 * Wire format is a JSON object:
 *   { title?, body?, icon?, tag?, url?, requireInteraction? }
 * Older senders use `message` for `body` and `link` for `url`; those two
 * aliases are accepted, and the canonical field wins when both are set.
 */

import { NOTIFICATION_ACTIONS, NOTIFICATION_DEFAULTS } from '@/lib/constants';
import { PayloadParseError } from '@/lib/offline/errors';
import type { ShowNotificationOptions } from '@/lib/sw/types';
import { isJsonObject, JsonObject, JsonValue } from '@/types/json';

export interface PushPayload {
  title?: string;
  body?: string;
  icon?: string;
  tag?: string;
  url?: string;
  requireInteraction?: boolean;
}

export type PushParseResult =
  | { ok: true; payload: PushPayload }
  | { ok: false; error: PayloadParseError };

export interface NotificationSpec {
  title: string;
  options: ShowNotificationOptions;
}

type StringField = 'title' | 'body' | 'icon' | 'tag' | 'url';

const ALIASES: Partial<Record<StringField, string>> = {
  body: 'message',
  url: 'link',
};

const STRING_FIELDS: readonly StringField[] = ['title', 'body', 'icon', 'tag', 'url'];

function ignoreField(key: string, expected: string): undefined {
  console.warn(`[Push] Ignoring field "${key}": expected a ${expected}`);
  return undefined;
}

function readString(raw: JsonObject, key: string): string | undefined {
  const value: JsonValue | undefined = raw[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') return ignoreField(key, 'string');
  return value;
}

/**
 * Only text that is not a JSON object fails. A mistyped field is dropped
 * and falls back to its alias or default.
 */
export function parsePushPayload(text: string): PushParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return { ok: false, error: new PayloadParseError(text, 'Push payload is not JSON', { cause: error }) };
  }

  if (!isJsonObject(parsed)) {
    return { ok: false, error: new PayloadParseError(text, 'Push payload must be a JSON object') };
  }

  const payload: PushPayload = {};
  for (const field of STRING_FIELDS) {
    const alias = ALIASES[field];
    const value = readString(parsed, field) ?? (alias ? readString(parsed, alias) : undefined);
    if (value !== undefined) payload[field] = value;
  }

  const requireInteraction = parsed.requireInteraction;
  if (typeof requireInteraction === 'boolean') {
    payload.requireInteraction = requireInteraction;
  } else if (requireInteraction !== undefined && requireInteraction !== null) {
    ignoreField('requireInteraction', 'boolean');
  }

  return { ok: true, payload };
}

/**
 * Turn a parse result into something showNotification() accepts.
 * A malformed payload still produces a notification, with the raw text as body.
 */
export function buildNotification(result: PushParseResult): NotificationSpec {
  const payload: PushPayload = result.ok ? result.payload : { body: result.error.rawText || undefined };

  return {
    title: payload.title ?? NOTIFICATION_DEFAULTS.TITLE,
    options: {
      body: payload.body ?? NOTIFICATION_DEFAULTS.BODY,
      icon: payload.icon ?? NOTIFICATION_DEFAULTS.ICON,
      badge: NOTIFICATION_DEFAULTS.BADGE,
      tag: payload.tag ?? NOTIFICATION_DEFAULTS.TAG,
      data: { url: payload.url ?? NOTIFICATION_DEFAULTS.URL },
      requireInteraction: payload.requireInteraction ?? false,
      actions: [
        { action: NOTIFICATION_ACTIONS.OPEN, title: 'Open' },
        { action: NOTIFICATION_ACTIONS.DISMISS, title: 'Dismiss' },
      ],
    },
  };
}
