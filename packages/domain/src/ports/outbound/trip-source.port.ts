/** A source row keyed by header name. Absent columns are absent keys. */
export type SourceRow = Record<string, string>;

export interface TripSourcePort {
  /** Rows in file order. Rejects with `SourceNotFoundError` when the file is missing. */
  readRows(sourcePath: string): Promise<SourceRow[]>;
}
