export const UNKNOWN_TRIP_ID = 'N/A';

export type FailureStage =
  | 'envelope'
  | 'decode'
  | 'validation'
  | 'geocode'
  | 'publish'
  | 'store'
  | 'sink';

export type RecordOutcome =
  | { readonly kind: 'processed'; readonly tripId: string }
  | {
      readonly kind: 'skipped';
      readonly tripId: string;
      readonly stage: FailureStage;
      readonly reason: string;
    };

export interface BatchCounts {
  readonly processed: number;
  readonly failed: number;
  readonly total: number;
}

export const EMPTY_COUNTS: BatchCounts = { processed: 0, failed: 0, total: 0 };

export function processed(tripId: string): RecordOutcome {
  return { kind: 'processed', tripId };
}

export function skipped(tripId: string, stage: FailureStage, reason: string): RecordOutcome {
  return { kind: 'skipped', tripId, stage, reason };
}

export function tallyOutcomes(outcomes: Iterable<RecordOutcome>): BatchCounts {
  let ok = 0;
  let failed = 0;
  for (const outcome of outcomes) {
    if (outcome.kind === 'processed') ok++;
    else failed++;
  }
  return { processed: ok, failed, total: ok + failed };
}

export function mergeCounts(a: BatchCounts, b: BatchCounts): BatchCounts {
  return {
    processed: a.processed + b.processed,
    failed: a.failed + b.failed,
    total: a.total + b.total,
  };
}
