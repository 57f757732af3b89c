import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { SourceNotFoundError } from '@taxi-stream/domain';
import type { SourceRow, TripSourcePort } from '@taxi-stream/domain';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Keep only string cells; csv-parse yields strings for every present column. */
function toSourceRow(record: unknown): SourceRow {
  const row: SourceRow = {};
  if (typeof record !== 'object' || record === null) return row;
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') row[key] = value;
  }
  return row;
}

export class CsvTripSource implements TripSourcePort {
  async readRows(sourcePath: string): Promise<SourceRow[]> {
    let content: string;
    try {
      content = await readFile(sourcePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) throw new SourceNotFoundError(sourcePath);
      throw err;
    }
    return parseTripCsv(content);
  }
}

/** Header row names the columns; short rows simply lack the trailing keys. */
export function parseTripCsv(content: string): SourceRow[] {
  const records: unknown = parse(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return Array.isArray(records) ? records.map(toSourceRow) : [];
}
