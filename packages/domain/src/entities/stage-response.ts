import type { BatchCounts } from './record-outcome.js';

/** What a stage handler hands back to the invoking runtime. */
export interface StageResponse {
  statusCode: number;
  body: string;
}

export function batchResponse(message: string, counts: BatchCounts): StageResponse {
  return {
    statusCode: 200,
    body: JSON.stringify({ message, ...counts }),
  };
}

export function errorResponse(statusCode: number, message: string): StageResponse {
  return { statusCode, body: JSON.stringify(message) };
}
