import { describe, it, expect } from '@jest/globals';

import {
  decodeStreamPayload,
  encodeStreamPayload,
  parseTripJson,
} from '../values/payload-codec.js';
import { tripIdOf } from '../entities/trip-record.js';
import { toText } from '../values/coercion.js';

function b64(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

describe('decodeStreamPayload', () => {
  it('decodes base64 JSON objects', () => {
    const result = decodeStreamPayload(b64('{"trip_id":"T1","distance_km":"8.2"}'));
    expect(result).toEqual({ ok: true, payload: { trip_id: 'T1', distance_km: '8.2' } });
  });

  it('reads what encodeStreamPayload writes', () => {
    const data = Buffer.from(encodeStreamPayload({ trip_id: 'T7', zone_name: 'Bandra' })).toString('base64');
    expect(decodeStreamPayload(data)).toEqual({ ok: true, payload: { trip_id: 'T7', zone_name: 'Bandra' } });
  });

  it('rejects malformed base64', () => {
    expect(decodeStreamPayload('not base64!')).toEqual({
      ok: false,
      reason: 'payload is not valid base64',
    });
    expect(decodeStreamPayload('abc')).toEqual({ ok: false, reason: 'payload is not valid base64' });
  });

  it('rejects bytes that are not UTF-8', () => {
    const data = Buffer.from([0xff, 0xfe, 0xfd]).toString('base64');
    expect(decodeStreamPayload(data)).toEqual({ ok: false, reason: 'payload is not valid UTF-8' });
  });

  it('rejects malformed JSON', () => {
    const result = decodeStreamPayload(b64('{"trip_id":'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason.startsWith('invalid JSON: ')).toBe(true);
  });
});

describe('parseTripJson', () => {
  it('accepts only JSON objects', () => {
    expect(parseTripJson('[1,2]')).toEqual({ ok: false, reason: 'payload is not a JSON object' });
    expect(parseTripJson('null')).toEqual({ ok: false, reason: 'payload is not a JSON object' });
    expect(parseTripJson('{}')).toEqual({ ok: true, payload: {} });
  });
});

describe('tripIdOf', () => {
  it('returns scalar, non-blank ids as text', () => {
    expect(tripIdOf({ trip_id: 'T1' })).toBe('T1');
    expect(tripIdOf({ trip_id: 42 })).toBe('42');
  });

  it('returns undefined for absent, blank or structured ids', () => {
    expect(tripIdOf({})).toBeUndefined();
    expect(tripIdOf({ trip_id: '  ' })).toBeUndefined();
    expect(tripIdOf({ trip_id: null })).toBeUndefined();
    expect(tripIdOf({ trip_id: { id: 'T1' } })).toBeUndefined();
  });
});

describe('toText', () => {
  it('renders scalars and objects', () => {
    expect(toText('TX1')).toBe('TX1');
    expect(toText(7)).toBe('7');
    expect(toText(null, 'CASH')).toBe('CASH');
    expect(toText({ a: 1 })).toBe('{"a":1}');
  });
});
