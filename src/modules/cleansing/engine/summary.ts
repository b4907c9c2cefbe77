/**
 * Run summary, derived from the cleansed records themselves rather than
 * from counters kept on the side.
 */

import { FIELD_NAMES, type CleansedRecord, type FieldCounts, type RunSummary } from './types';

export function summarizeRun(records: readonly CleansedRecord[]): RunSummary {
  const passthrough: FieldCounts = { sex: 0, race: 0, age: 0 };
  const aiAssisted: FieldCounts = { sex: 0, race: 0, age: 0 };
  const confidence = { HIGH: 0, MEDIUM: 0, LOW: 0 };
  let reviewQueued = 0;

  for (const record of records) {
    for (const field of FIELD_NAMES) {
      if (record[field].source === 'PASSTHROUGH') passthrough[field]++;
      else aiAssisted[field]++;
    }
    confidence[record.confidence]++;
    if (record.needsReview) reviewQueued++;
  }

  const totalRecords = records.length;
  const autoAccepted = totalRecords - reviewQueued;

  return {
    totalRecords,
    passthrough,
    aiAssisted,
    serviceCalls: aiAssisted.sex + aiAssisted.race + aiAssisted.age,
    autoAccepted,
    reviewQueued,
    confidence,
    automationRate: totalRecords > 0 ? round(autoAccepted / totalRecords, 4) : 0,
  };
}

function round(n: number, places: number): number {
  const f = 10 ** places;
  return Math.round(n * f) / f;
}
