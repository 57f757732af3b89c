import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import { SourceNotFoundError } from '@taxi-stream/domain';

import { CsvTripSource, parseTripCsv } from '../csv/csv-trip-source.js';

describe('parseTripCsv', () => {
  it('keys every row by the header', () => {
    const rows = parseTripCsv(
      'trip_id,taxi_id,pickup_datetime,zone_name\n' +
        'T1,TX1,2024-01-01T10:00:00,"""Airport"""\n' +
        'T2,TX2,,Downtown\n',
    );
    expect(rows).toEqual([
      { trip_id: 'T1', taxi_id: 'TX1', pickup_datetime: '2024-01-01T10:00:00', zone_name: '"Airport"' },
      { trip_id: 'T2', taxi_id: 'TX2', pickup_datetime: '', zone_name: 'Downtown' },
    ]);
  });

  it('skips blank lines and tolerates short rows', () => {
    const rows = parseTripCsv('trip_id,taxi_id,distance_km\nT1,TX1\n\nT2,TX2,4.5\n');
    expect(rows).toHaveLength(2);
    expect(rows[0]?.['trip_id']).toBe('T1');
    expect(rows[0]?.['distance_km']).toBeUndefined();
    expect(rows[1]?.['distance_km']).toBe('4.5');
  });

  it('returns no rows for a header-only file', () => {
    expect(parseTripCsv('trip_id,taxi_id\n')).toEqual([]);
  });
});

describe('CsvTripSource', () => {
  it('rejects with SourceNotFoundError for a missing file', async () => {
    const missing = path.join(__dirname, 'does-not-exist.csv');
    await expect(new CsvTripSource().readRows(missing)).rejects.toBeInstanceOf(SourceNotFoundError);
  });

  it('reads the fixture file in order', async () => {
    const rows = await new CsvTripSource().readRows(path.join(__dirname, 'fixtures', 'trips.csv'));
    expect(rows.map((r) => r['trip_id'])).toEqual(['T1', 'T2', 'T3']);
  });
});
