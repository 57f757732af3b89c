import type { TripPayload } from '../entities/trip-record.js';
import { describeError } from '../errors.js';

export type DecodeResult =
  | { readonly ok: true; readonly payload: TripPayload }
  | { readonly ok: false; readonly reason: string };

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;
const utf8 = new TextDecoder('utf-8', { fatal: true });

function isJsonObject(value: unknown): value is TripPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a JSON document that must be an object. */
export function parseTripJson(text: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${describeError(err)}` };
  }
  if (!isJsonObject(parsed)) {
    return { ok: false, reason: 'payload is not a JSON object' };
  }
  return { ok: true, payload: parsed };
}

/** Decode a stream record's base64 data into a trip payload. */
export function decodeStreamPayload(data: string): DecodeResult {
  const compact = data.trim();
  if (compact.length % 4 !== 0 || !BASE64.test(compact)) {
    return { ok: false, reason: 'payload is not valid base64' };
  }
  let text: string;
  try {
    text = utf8.decode(Buffer.from(compact, 'base64'));
  } catch {
    return { ok: false, reason: 'payload is not valid UTF-8' };
  }
  return parseTripJson(text);
}

export function encodeStreamPayload(payload: TripPayload): Uint8Array {
  return Buffer.from(JSON.stringify(payload), 'utf-8');
}
