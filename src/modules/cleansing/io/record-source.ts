/**
 * Raw record sources.
 *
 * A source is any AsyncIterable of raw records. Iterating again restarts
 * from the first record.
 */

import { readFile } from 'fs/promises';
import type { RawDemographicRecord } from '../engine/types';

export type RecordSource = AsyncIterable<RawDemographicRecord>;

/** Row shape accepted from JSON files and HTTP bodies. */
export interface RawDemographicRow {
  id: string | number;
  sex?: string | null;
  race?: string | null;
  age?: string | number | null;
}

export function toRawRecord(row: RawDemographicRow): RawDemographicRecord {
  return Object.freeze({
    id: String(row.id),
    sexRaw: row.sex ?? null,
    raceRaw: row.race ?? null,
    ageRaw: row.age === null || row.age === undefined ? null : String(row.age),
  });
}

export class ArrayRecordSource implements RecordSource {
  private readonly records: readonly RawDemographicRecord[];

  constructor(records: readonly RawDemographicRecord[]) {
    this.records = [...records];
  }

  static fromRows(rows: readonly RawDemographicRow[]): ArrayRecordSource {
    return new ArrayRecordSource(rows.map(toRawRecord));
  }

  get size(): number {
    return this.records.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<RawDemographicRecord> {
    for (const record of this.records) {
      yield record;
    }
  }
}

/** Reads a JSON array of rows on every iteration. */
export class JsonFileRecordSource implements RecordSource {
  constructor(private readonly filePath: string) {}

  async *[Symbol.asyncIterator](): AsyncIterator<RawDemographicRecord> {
    const rows = parseRows(await readFile(this.filePath, 'utf-8'), this.filePath);
    for (const row of rows) {
      yield toRawRecord(row);
    }
  }
}

function parseRows(text: string, filePath: string): RawDemographicRow[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    throw new Error(`${filePath}: expected a JSON array of records`);
  }
  return parsed.map((item: unknown, i) => {
    if (!isRow(item)) throw new Error(`${filePath}: row ${i} is missing an id or has non-text fields`);
    return item;
  });
}

function isRow(item: unknown): item is RawDemographicRow {
  if (typeof item !== 'object' || item === null) return false;
  const row: Record<string, unknown> = Object.fromEntries(Object.entries(item));
  const optionalText = (v: unknown) => v === undefined || v === null || typeof v === 'string';
  return (
    (typeof row.id === 'string' || typeof row.id === 'number') &&
    optionalText(row.sex) &&
    optionalText(row.race) &&
    (optionalText(row.age) || typeof row.age === 'number')
  );
}
