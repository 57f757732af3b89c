import {
  UNKNOWN_TRIP_ID,
  describeError,
  parseTripJson,
  processed,
  skipped,
  tallyOutcomes,
  tripIdOf,
} from '@taxi-stream/domain';
import type {
  AnalyticsSinkPort,
  BatchCounts,
  FailureStage,
  FareProcessingPort,
  QueuedTripMessage,
  RecordOutcome,
  TripStorePort,
} from '@taxi-stream/domain';
import { finalizeTrip } from './rules/fare.js';
import { validateTrip } from './rules/validation.js';
import { toStoreItem } from './rules/store-item.js';
import { serializeAnalyticsDocument, toAnalyticsDocument } from './rules/analytics-document.js';

export interface FareProcessingDeps {
  store: TripStorePort;
  sink: AnalyticsSinkPort;
}

/**
 * Validates, prices and persists each queued trip in order. A failing record
 * is logged and counted; the rest of the batch still runs.
 * The store write happens before the sink write, so a sink failure leaves the
 * row in the store and counts the record as failed.
 */
export class FareProcessingService implements FareProcessingPort {
  constructor(private readonly deps: FareProcessingDeps) {}

  async processBatch(messages: readonly QueuedTripMessage[]): Promise<BatchCounts> {
    const outcomes: RecordOutcome[] = [];
    for (const message of messages) {
      outcomes.push(await this.processOne(message));
    }
    const counts = tallyOutcomes(outcomes);
    console.log(
      `[fare] batch done: processed=${counts.processed} failed=${counts.failed} total=${counts.total}`,
    );
    return counts;
  }

  private async processOne(message: QueuedTripMessage): Promise<RecordOutcome> {
    const decoded = parseTripJson(message.body);
    if (!decoded.ok) {
      return this.fail(UNKNOWN_TRIP_ID, 'decode', decoded.reason);
    }

    const validation = validateTrip(decoded.payload);
    if (!validation.valid) {
      return this.fail(tripIdOf(decoded.payload) ?? UNKNOWN_TRIP_ID, 'validation', validation.reason);
    }

    const trip = finalizeTrip(validation.trip);
    console.log(
      `[fare] trip ${trip.tripId}: fare=${trip.fareAmount.toFixed(2)} total=${trip.totalAmount.toFixed(2)}`,
    );

    try {
      await this.deps.store.putTrip(toStoreItem(trip));
    } catch (err) {
      return this.fail(trip.tripId, 'store', describeError(err));
    }

    try {
      await this.deps.sink.putRecord(serializeAnalyticsDocument(toAnalyticsDocument(trip)));
    } catch (err) {
      return this.fail(trip.tripId, 'sink', describeError(err));
    }

    return processed(trip.tripId);
  }

  private fail(tripId: string, stage: FailureStage, reason: string): RecordOutcome {
    console.error(`[fare] ${stage} failed for trip ${tripId}: ${reason}`);
    return skipped(tripId, stage, reason);
  }
}
