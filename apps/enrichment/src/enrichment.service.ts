import {
  UNKNOWN_TRIP_ID,
  UNKNOWN_ZONE,
  decodeStreamPayload,
  describeError,
  parseNumber,
  processed,
  skipped,
  tallyOutcomes,
  tripIdOf,
} from '@taxi-stream/domain';
import type {
  BatchCounts,
  DeadLetterPort,
  FailureStage,
  GeoPoint,
  RecordOutcome,
  ReverseGeocoderPort,
  StreamMessage,
  TripEnrichmentPort,
  TripPayload,
  WorkQueuePort,
} from '@taxi-stream/domain';

export interface TripEnrichmentDeps {
  geocoder: ReverseGeocoderPort;
  queue: WorkQueuePort;
  /** Where skipped messages are parked; without one they are only logged. */
  deadLetters?: DeadLetterPort;
}

/**
 * Pickup point from `pickup_long`/`pickup_lat`. A coordinate that is absent,
 * blank or non-numeric is read from the legacy `longitude`/`latitude` instead.
 */
export function pickupPoint(payload: TripPayload): GeoPoint | undefined {
  const longitude = parseNumber(payload['pickup_long']) ?? parseNumber(payload['longitude']);
  const latitude = parseNumber(payload['pickup_lat']) ?? parseNumber(payload['latitude']);
  if (longitude === undefined || latitude === undefined) return undefined;
  return { longitude, latitude };
}

export class TripEnrichmentService implements TripEnrichmentPort {
  constructor(private readonly deps: TripEnrichmentDeps) {}

  async enrichBatch(messages: readonly StreamMessage[]): Promise<BatchCounts> {
    const outcomes: RecordOutcome[] = [];
    for (const message of messages) {
      outcomes.push(await this.enrichOne(message));
    }
    return tallyOutcomes(outcomes);
  }

  private async enrichOne(message: StreamMessage): Promise<RecordOutcome> {
    const decoded = decodeStreamPayload(message.data);
    if (!decoded.ok) {
      return this.reject(message, UNKNOWN_TRIP_ID, 'decode', decoded.reason);
    }

    const payload = decoded.payload;
    const tripId = tripIdOf(payload);
    if (tripId === undefined) {
      return this.reject(message, UNKNOWN_TRIP_ID, 'decode', 'missing trip_id');
    }
    console.log(`[enrichment] processing trip ${tripId}`);

    const point = pickupPoint(payload);
    if (!point) {
      return this.reject(message, tripId, 'decode', 'missing or non-numeric pickup coordinates');
    }

    let zoneName: string;
    try {
      zoneName = await this.resolveZone(tripId, point);
    } catch (err) {
      return this.reject(message, tripId, 'geocode', describeError(err));
    }

    const enriched: TripPayload = { ...payload, zone_name: zoneName };
    try {
      await this.deps.queue.sendMessage(JSON.stringify(enriched));
    } catch (err) {
      return this.reject(message, tripId, 'publish', describeError(err));
    }

    console.log(`[enrichment] sent trip ${tripId} to work queue`);
    return processed(tripId);
  }

  private async resolveZone(tripId: string, point: GeoPoint): Promise<string> {
    const [best] = await this.deps.geocoder.searchPlaces(point, 1);
    if (best) {
      console.log(`[enrichment] trip ${tripId} zone: ${best.label}`);
      return best.label;
    }
    console.log(`[enrichment] no zone found for trip ${tripId}; using ${UNKNOWN_ZONE}`);
    return UNKNOWN_ZONE;
  }

  private async reject(
    message: StreamMessage,
    tripId: string,
    stage: FailureStage,
    reason: string,
  ): Promise<RecordOutcome> {
    console.error(`[enrichment] ${stage} failed for trip ${tripId}: ${reason}`);
    if (this.deps.deadLetters) {
      try {
        await this.deps.deadLetters.sendDeadLetter({
          stage,
          reason,
          tripId,
          payload: message.data,
          failedAt: new Date(),
        });
      } catch (err) {
        console.error(`[enrichment] dead-letter send failed for trip ${tripId}: ${describeError(err)}`);
      }
    }
    return skipped(tripId, stage, reason);
  }
}
