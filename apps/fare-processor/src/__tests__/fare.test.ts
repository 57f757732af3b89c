import { describe, it, expect } from '@jest/globals';
import { Decimal } from 'decimal.js';

import { calculateFare, computeTotal, finalizeTrip } from '../rules/fare.js';
import { applyTripDefaults } from '../rules/defaults.js';
import { validateTrip } from '../rules/validation.js';

describe('calculateFare', () => {
  it('charges the base fare plus the per-km rate', () => {
    expect(calculateFare('8.2', 'Downtown Plaza').toFixed(2)).toBe('201.70');
  });

  it('adds the airport surcharge when the zone mentions Airport', () => {
    expect(calculateFare(10, 'Airport Terminal 1').toFixed(2)).toBe('335.00');
  });

  it('is case-sensitive about the airport match', () => {
    expect(calculateFare(10, 'airport road').toFixed(2)).toBe('235.00');
  });

  it('ignores a zone that is not a string', () => {
    expect(calculateFare(0, null).toFixed(2)).toBe('50.00');
  });

  it('treats an unparsable distance as zero', () => {
    expect(calculateFare('far', 'Central').toFixed(2)).toBe('50.00');
  });

  it('rounds the stored float sum, not its shortest decimal text', () => {
    // the double nearest 50 + 18.5 * 0.01 lies just above 50.185
    expect(calculateFare('0.01', 'Central').toFixed(2)).toBe('50.19');
    // the double nearest 50 + 18.5 * 0.03 lies just below 50.555
    expect(calculateFare('0.03', 'Central').toFixed(2)).toBe('50.55');
  });

  it('breaks an exact tie to even', () => {
    // 50 + 18.5 * 0.25 = 54.625 exactly
    expect(calculateFare(0.25, 'Central').toFixed(2)).toBe('54.62');
  });
});

describe('computeTotal', () => {
  it('sums fare and surcharges', () => {
    const total = computeTotal(new Decimal('201.7'), {
      extra_charges: '10.5',
      tip_amount: 20,
      tolls_amount: '0.15',
    });
    expect(total.toFixed(2)).toBe('232.35');
  });

  it('rounds an exact tie in the sum to even', () => {
    expect(computeTotal(new Decimal('10'), { tip_amount: '0.125' }).toFixed(2)).toBe('10.12');
  });

  it('counts unparsable surcharges as zero', () => {
    const total = computeTotal(new Decimal('100'), {
      extra_charges: 'n/a',
      tip_amount: null,
    });
    expect(total.toFixed(2)).toBe('100.00');
  });
});

describe('applyTripDefaults', () => {
  it('fills absent and null billing fields', () => {
    expect(applyTripDefaults({ trip_id: 'T1', tip_amount: null })).toEqual({
      trip_id: 'T1',
      passenger_count: 0,
      extra_charges: 0,
      tip_amount: 0,
      tolls_amount: 0,
      payment_type: 'CASH',
    });
  });

  it('keeps present values, including zero and blanks', () => {
    const filled = applyTripDefaults({ passenger_count: 3, payment_type: '', tip_amount: 0 });
    expect(filled['passenger_count']).toBe(3);
    expect(filled['payment_type']).toBe('');
    expect(filled['tip_amount']).toBe(0);
  });

  it('is idempotent', () => {
    const once = applyTripDefaults({ trip_id: 'T1', payment_type: 'CARD' });
    expect(applyTripDefaults(once)).toEqual(once);
  });

  it('does not mutate its input', () => {
    const input = { trip_id: 'T1' };
    applyTripDefaults(input);
    expect(input).toEqual({ trip_id: 'T1' });
  });
});

describe('finalizeTrip', () => {
  it('prices from the validated distance', () => {
    const trip = finalizeTrip({
      tripId: 'T8',
      taxiId: 'TX8',
      pickupDatetime: '2024-01-01T09:00:00',
      pickupLat: 1,
      pickupLong: 2,
      dropLat: 3,
      dropLong: 4,
      distanceKm: 2,
      payload: { trip_id: 'T8', distance_km: '2 km', zone_name: 'Central' },
    });

    expect(trip.fareAmount.toFixed(2)).toBe('87.00');
    expect(trip.taxiId).toBe('TX8');
    expect(trip.payload['distance_km']).toBe('2 km');
  });

  it('prices, defaults and totals a validated trip', () => {
    const validation = validateTrip({
      trip_id: 'T9',
      taxi_id: 'TX9',
      pickup_datetime: '2024-01-01T08:00:00',
      pickup_lat: 1,
      pickup_long: 2,
      drop_lat: 3,
      drop_long: 4,
      distance_km: 10,
      zone_name: 'Airport Terminal 1',
      tip_amount: '15',
    });
    if (!validation.valid) throw new Error(validation.reason);

    const trip = finalizeTrip(validation.trip);

    expect(trip.tripId).toBe('T9');
    expect(trip.fareAmount.toFixed(2)).toBe('335.00');
    expect(trip.totalAmount.toFixed(2)).toBe('350.00');
    expect(trip.payload['fare_amount']).toBe(335);
    expect(trip.payload['total_amount']).toBe(350);
    expect(trip.payload['payment_type']).toBe('CASH');
    expect(trip.payload['tip_amount']).toBe('15');
  });
});
