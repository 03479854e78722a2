/**
 * Correlation envelope — the text message the frontend sends into the
 * backend inbox as a reply to each forwarded attachment.
 *
 *   FORWARDED_FOR_PROCESSING
 *   CORRELATION_ID:<id>
 *   ORIGINAL_USER_CHAT_ID:<integer>
 *   BOT_STATUS_MESSAGE_ID:<integer>
 */

export const ENVELOPE_MARKER = 'FORWARDED_FOR_PROCESSING';

const KEY_CORRELATION_ID = 'CORRELATION_ID';
const KEY_ORIGIN_CHAT = 'ORIGINAL_USER_CHAT_ID';
const KEY_STATUS_MESSAGE = 'BOT_STATUS_MESSAGE_ID';

export interface Envelope {
  correlationId: string;
  originChat: number;
  statusMessageId: number;
}

export type DecodeResult =
  | { ok: true; envelope: Envelope }
  | { ok: false; reason: string; correlationId?: string };

export function encodeEnvelope(envelope: Envelope): string {
  return [
    ENVELOPE_MARKER,
    `${KEY_CORRELATION_ID}:${envelope.correlationId}`,
    `${KEY_ORIGIN_CHAT}:${envelope.originChat}`,
    `${KEY_STATUS_MESSAGE}:${envelope.statusMessageId}`,
  ].join('\n');
}

/** True when the text carries the envelope marker on its first line. */
export function isEnvelope(text: string | undefined): boolean {
  if (!text) return false;
  return text.split(/\r?\n/, 1)[0]?.trim() === ENVELOPE_MARKER;
}

export function decodeEnvelope(text: string): DecodeResult {
  if (!isEnvelope(text)) {
    return { ok: false, reason: 'missing envelope marker' };
  }

  const fields = new Map<string, string>();
  for (const line of text.split(/\r?\n/).slice(1)) {
    const idx = line.indexOf(':');
    if (idx === -1) continue;
    fields.set(line.slice(0, idx).trim(), line.slice(idx + 1).trim());
  }

  const correlationId = fields.get(KEY_CORRELATION_ID) || undefined;
  if (!correlationId) {
    return { ok: false, reason: `missing ${KEY_CORRELATION_ID}` };
  }

  const originChat = parseInteger(fields.get(KEY_ORIGIN_CHAT));
  if (originChat === null) {
    return { ok: false, reason: `invalid ${KEY_ORIGIN_CHAT}`, correlationId };
  }

  const statusMessageId = parseInteger(fields.get(KEY_STATUS_MESSAGE));
  if (statusMessageId === null) {
    return { ok: false, reason: `invalid ${KEY_STATUS_MESSAGE}`, correlationId };
  }

  return { ok: true, envelope: { correlationId, originChat, statusMessageId } };
}

function parseInteger(value: string | undefined): number | null {
  if (!value || !/^-?\d+$/.test(value)) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}
