import type { TripStoreItem } from '../../entities/trip-record.js';

export interface TripStorePort {
  /** Keyed put by `trip_id`; a redelivered trip overwrites its row. */
  putTrip(item: TripStoreItem): Promise<void>;
}
