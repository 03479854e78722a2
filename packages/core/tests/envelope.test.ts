import { describe, it, expect } from 'vitest';
import { decodeEnvelope, encodeEnvelope, isEnvelope } from '../src/envelope.js';

describe('encodeEnvelope', () => {
  it('writes the marker line followed by one KEY:VALUE field per line', () => {
    const text = encodeEnvelope({ correlationId: 'c-1', originChat: 42, statusMessageId: 7 });
    expect(text).toBe(
      'FORWARDED_FOR_PROCESSING\nCORRELATION_ID:c-1\nORIGINAL_USER_CHAT_ID:42\nBOT_STATUS_MESSAGE_ID:7',
    );
  });
});

describe('isEnvelope', () => {
  it('recognises the marker on the first line only', () => {
    expect(isEnvelope('FORWARDED_FOR_PROCESSING\nCORRELATION_ID:x')).toBe(true);
    expect(isEnvelope('  FORWARDED_FOR_PROCESSING  ')).toBe(true);
    expect(isEnvelope('hello\nFORWARDED_FOR_PROCESSING')).toBe(false);
    expect(isEnvelope('')).toBe(false);
    expect(isEnvelope(undefined)).toBe(false);
  });
});

describe('decodeEnvelope', () => {
  it('decodes what encodeEnvelope wrote', () => {
    const envelope = { correlationId: 'c-1', originChat: -1001234, statusMessageId: 55 };
    expect(decodeEnvelope(encodeEnvelope(envelope))).toEqual({ ok: true, envelope });
  });

  it('trims values, accepts CRLF and ignores unknown lines', () => {
    const text = [
      'FORWARDED_FOR_PROCESSING',
      'CORRELATION_ID:  c-2 ',
      'NOTE: sent by the bot',
      'ORIGINAL_USER_CHAT_ID: 42',
      'garbage line',
      'BOT_STATUS_MESSAGE_ID:9',
    ].join('\r\n');

    expect(decodeEnvelope(text)).toEqual({
      ok: true,
      envelope: { correlationId: 'c-2', originChat: 42, statusMessageId: 9 },
    });
  });

  it('rejects text without the marker', () => {
    expect(decodeEnvelope('CORRELATION_ID:c-1')).toEqual({ ok: false, reason: 'missing envelope marker' });
  });

  it('reports a missing correlation id without one to fail', () => {
    const result = decodeEnvelope('FORWARDED_FOR_PROCESSING\nORIGINAL_USER_CHAT_ID:42\nBOT_STATUS_MESSAGE_ID:7');
    expect(result).toEqual({ ok: false, reason: 'missing CORRELATION_ID' });
  });

  it('keeps the correlation id when another field is malformed', () => {
    const result = decodeEnvelope(
      'FORWARDED_FOR_PROCESSING\nCORRELATION_ID:c-3\nORIGINAL_USER_CHAT_ID:abc\nBOT_STATUS_MESSAGE_ID:7',
    );
    expect(result).toEqual({ ok: false, reason: 'invalid ORIGINAL_USER_CHAT_ID', correlationId: 'c-3' });
  });

  it('rejects non-integer and missing status message ids', () => {
    const fractional = decodeEnvelope(
      'FORWARDED_FOR_PROCESSING\nCORRELATION_ID:c-4\nORIGINAL_USER_CHAT_ID:42\nBOT_STATUS_MESSAGE_ID:7.5',
    );
    const missing = decodeEnvelope('FORWARDED_FOR_PROCESSING\nCORRELATION_ID:c-4\nORIGINAL_USER_CHAT_ID:42');

    expect(fractional).toEqual({ ok: false, reason: 'invalid BOT_STATUS_MESSAGE_ID', correlationId: 'c-4' });
    expect(missing).toEqual({ ok: false, reason: 'invalid BOT_STATUS_MESSAGE_ID', correlationId: 'c-4' });
  });

  it('rejects integers beyond the safe range', () => {
    const result = decodeEnvelope(
      'FORWARDED_FOR_PROCESSING\nCORRELATION_ID:c-5\nORIGINAL_USER_CHAT_ID:99999999999999999999\nBOT_STATUS_MESSAGE_ID:1',
    );
    expect(result).toMatchObject({ ok: false, reason: 'invalid ORIGINAL_USER_CHAT_ID' });
  });
});
