/**
 * Push Payload Tests
 */

import { PayloadParseError } from '@/lib/offline/errors';
import { buildNotification, parsePushPayload } from '@/lib/push/payload';

describe('parsePushPayload', () => {
  it('should read the canonical fields', () => {
    const result = parsePushPayload(
      JSON.stringify({ title: 'T', body: 'B', icon: '/i.png', tag: 'group-1', url: '/x', requireInteraction: true })
    );

    expect(result).toEqual({
      ok: true,
      payload: { title: 'T', body: 'B', icon: '/i.png', tag: 'group-1', url: '/x', requireInteraction: true },
    });
  });

  it('should accept message and link as aliases', () => {
    const result = parsePushPayload(JSON.stringify({ message: 'M', link: '/groups/g1' }));

    expect(result).toEqual({ ok: true, payload: { body: 'M', url: '/groups/g1' } });
  });

  it('should prefer the canonical field over its alias', () => {
    const result = parsePushPayload(JSON.stringify({ body: 'B', message: 'M', url: '/a', link: '/b' }));

    expect(result).toEqual({ ok: true, payload: { body: 'B', url: '/a' } });
  });

  it('should treat empty strings as absent', () => {
    const result = parsePushPayload(JSON.stringify({ title: '', body: '', message: 'M' }));

    expect(result).toEqual({ ok: true, payload: { body: 'M' } });
  });

  it('should ignore unknown fields', () => {
    expect(parsePushPayload('{"title":"T","sender":"u1"}')).toEqual({ ok: true, payload: { title: 'T' } });
  });

  it('should reject text that is not JSON', () => {
    const result = parsePushPayload('hello');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PayloadParseError);
      expect(result.error.rawText).toBe('hello');
    }
  });

  it('should reject JSON that is not an object', () => {
    const result = parsePushPayload('["T"]');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Push payload must be a JSON object');
    }
  });

  it('should drop a mistyped field and keep the rest', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = parsePushPayload('{"title":5,"body":"Hello","url":"/groups/g1"}');

    expect(result).toEqual({ ok: true, payload: { body: 'Hello', url: '/groups/g1' } });
    expect(warn).toHaveBeenCalledWith('[Push] Ignoring field "title": expected a string');
    warn.mockRestore();
  });

  it('should fall back to the alias when the canonical field is mistyped', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = parsePushPayload('{"body":["x"],"message":"from alias"}');

    expect(result).toEqual({ ok: true, payload: { body: 'from alias' } });
    jest.restoreAllMocks();
  });

  it('should drop a non-boolean requireInteraction', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = parsePushPayload('{"title":"T","requireInteraction":"yes"}');

    expect(result).toEqual({ ok: true, payload: { title: 'T' } });
    jest.restoreAllMocks();
  });
});

describe('buildNotification', () => {
  it('should apply defaults for missing fields', () => {
    expect(buildNotification({ ok: true, payload: {} })).toEqual({
      title: 'Huddle',
      options: {
        body: 'You have a new notification',
        icon: '/static/images/icon-192.png',
        badge: '/static/images/badge-72.png',
        tag: 'huddle-notification',
        data: { url: '/' },
        requireInteraction: false,
        actions: [
          { action: 'open', title: 'Open' },
          { action: 'dismiss', title: 'Dismiss' },
        ],
      },
    });
  });

  it('should use the raw text as body for a malformed payload', () => {
    const built = buildNotification(parsePushPayload('hello'));

    expect(built.title).toBe('Huddle');
    expect(built.options.body).toBe('hello');
    expect(built.options.data).toEqual({ url: '/' });
  });

  it('should use the default body for an empty malformed payload', () => {
    const built = buildNotification(parsePushPayload(''));

    expect(built.options.body).toBe('You have a new notification');
  });

  it('should carry payload fields through', () => {
    const built = buildNotification(parsePushPayload('{"title":"T","body":"B","url":"/x","tag":"t1"}'));

    expect(built.title).toBe('T');
    expect(built.options.body).toBe('B');
    expect(built.options.tag).toBe('t1');
    expect(built.options.data).toEqual({ url: '/x' });
  });
});
