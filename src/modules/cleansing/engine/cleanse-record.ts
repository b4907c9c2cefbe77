import { classifyConfidence } from './confidence';
import { cleanseFields, type FieldCleansers } from './field-cleansers';
import type { CanonicalValueRegistry } from './registry';
import { needsReview } from './review-router';
import type { CleansedRecord, RawDemographicRecord } from './types';

/**
 * Cleanse one raw record end to end. Resolves only once all three fields
 * are settled, so a record is never emitted half-cleansed.
 */
export async function cleanseRecord(
  raw: RawDemographicRecord,
  cleansers: FieldCleansers,
  registry: CanonicalValueRegistry,
): Promise<CleansedRecord> {
  const outcomes = await cleanseFields(raw, cleansers);

  const record: CleansedRecord = {
    id: raw.id,
    raw,
    sex: outcomes.sex,
    race: outcomes.race,
    age: outcomes.age,
    confidence: classifyConfidence(raw, outcomes, registry),
    needsReview: needsReview(outcomes, registry),
  };
  return Object.freeze(record);
}
