export interface AnalyticsSinkPort {
  /** Append one newline-terminated document to the delivery stream. */
  putRecord(line: string): Promise<void>;
}
