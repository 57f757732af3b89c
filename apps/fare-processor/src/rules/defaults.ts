import { DEFAULT_PAYMENT_TYPE } from '@taxi-stream/domain';
import type { TripPayload } from '@taxi-stream/domain';

export const TRIP_DEFAULTS: Readonly<Record<string, number | string>> = {
  passenger_count: 0,
  extra_charges: 0.0,
  tip_amount: 0.0,
  tolls_amount: 0.0,
  payment_type: DEFAULT_PAYMENT_TYPE,
};

/** Fill absent or null billing fields. Present values are kept untouched. */
export function applyTripDefaults(payload: TripPayload): TripPayload {
  const filled: TripPayload = { ...payload };
  for (const [field, value] of Object.entries(TRIP_DEFAULTS)) {
    if (filled[field] === undefined || filled[field] === null) filled[field] = value;
  }
  return filled;
}
