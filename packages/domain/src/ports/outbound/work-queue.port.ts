import type { FailureStage } from '../../entities/record-outcome.js';

export interface WorkQueuePort {
  sendMessage(body: string): Promise<void>;
}

export interface DeadLetter {
  stage: FailureStage;
  reason: string;
  tripId: string;
  payload: string;
  failedAt: Date;
}

export interface DeadLetterPort {
  sendDeadLetter(letter: DeadLetter): Promise<void>;
}
