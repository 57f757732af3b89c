import { describe, it, expect } from '@jest/globals';

import { normalizeRow, stripQuotes } from '../row-normalizer.js';

const ROW = {
  trip_id: 'T1',
  taxi_id: 'TX1',
  pickup_datetime: '2024-01-01T10:00:00',
  latitude: '12.9',
  longitude: '77.6',
  pickup_lat: '12.9',
  pickup_long: '77.6',
  drop_lat: '12.95',
  drop_long: '77.65',
  distance_km: '8.2',
  passenger_count: '2',
  payment_type: 'CARD',
  zone_name: '"Koramangala"',
};

describe('normalizeRow', () => {
  it('coerces typed columns and passes the rest through', () => {
    const result = normalizeRow(ROW);
    expect(result).toEqual({
      admitted: true,
      tripId: 'T1',
      record: {
        trip_id: 'T1',
        taxi_id: 'TX1',
        pickup_datetime: '2024-01-01T10:00:00',
        latitude: 12.9,
        longitude: 77.6,
        pickup_lat: 12.9,
        pickup_long: 77.6,
        drop_lat: 12.95,
        drop_long: 77.65,
        distance_km: 8.2,
        passenger_count: 2,
        payment_type: 'CARD',
        zone_name: 'Koramangala',
        fare_amount: 0,
        tip_amount: 0,
        tolls_amount: 0,
        total_amount: 0,
        extra_charges: 0,
      },
    });
  });

  it('defaults absent or unparsable numbers to zero', () => {
    const result = normalizeRow({
      trip_id: 'T2',
      pickup_datetime: '2024-01-01T11:00:00',
      distance_km: 'unknown',
      passenger_count: '',
    });
    expect(result.admitted).toBe(true);
    if (result.admitted) {
      expect(result.record['distance_km']).toBe(0);
      expect(result.record['pickup_lat']).toBe(0);
      expect(result.record['passenger_count']).toBe(0);
      expect(result.record['zone_name']).toBe('');
    }
  });

  it('fills the pickup point and its legacy columns from each other', () => {
    const legacyOnly = normalizeRow({
      trip_id: 'T6',
      pickup_datetime: '2024-01-03T09:00:00',
      latitude: '12.97',
      longitude: '77.59',
      pickup_long: ' ',
    });
    expect(legacyOnly.admitted).toBe(true);
    if (legacyOnly.admitted) {
      expect(legacyOnly.record['pickup_lat']).toBe(12.97);
      expect(legacyOnly.record['pickup_long']).toBe(77.59);
      expect(legacyOnly.record['latitude']).toBe(12.97);
      expect(legacyOnly.record['longitude']).toBe(77.59);
    }

    const canonicalOnly = normalizeRow({
      trip_id: 'T7',
      pickup_datetime: '2024-01-03T09:30:00',
      pickup_lat: '12.9',
      pickup_long: '77.6',
    });
    expect(canonicalOnly.admitted && canonicalOnly.record['latitude']).toBe(12.9);
    expect(canonicalOnly.admitted && canonicalOnly.record['longitude']).toBe(77.6);
  });

  it('reads extra_charges from the legacy extra column', () => {
    const result = normalizeRow({ trip_id: 'T3', pickup_datetime: '2024-01-02', extra: '12.5' });
    expect(result.admitted && result.record['extra_charges']).toBe(12.5);
  });

  it('refuses rows without pickup_datetime', () => {
    expect(normalizeRow({ trip_id: 'T4', pickup_datetime: '  ' })).toEqual({
      admitted: false,
      tripId: 'T4',
      reason: 'missing pickup_datetime',
    });
    expect(normalizeRow({ trip_id: 'T5' })).toEqual({
      admitted: false,
      tripId: 'T5',
      reason: 'missing pickup_datetime',
    });
  });

  it('refuses rows without a trip id', () => {
    expect(normalizeRow({ trip_id: '', pickup_datetime: '2024-01-01' })).toEqual({
      admitted: false,
      tripId: 'N/A',
      reason: 'missing trip_id',
    });
  });
});

describe('stripQuotes', () => {
  it('removes surrounding double quotes only', () => {
    expect(stripQuotes('""Airport""')).toBe('Airport');
    expect(stripQuotes('MG "Road"')).toBe('MG "Road');
    expect(stripQuotes('Indiranagar')).toBe('Indiranagar');
  });
});
