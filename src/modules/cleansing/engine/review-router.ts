/**
 * Review Router
 *
 * Decides which cleansed records need a human, and builds the pending
 * review entry for them. Routing is additive: a flagged record still
 * belongs to the cleansed output.
 */

import type { CanonicalValueRegistry } from './registry';
import type { CleansedRecord, FieldOutcomes, ReviewEntry } from './types';

export function needsReview(outcomes: FieldOutcomes, registry: CanonicalValueRegistry): boolean {
  const { sex, race, age } = outcomes;

  if (registry.isReviewLabel('sex', sex.value)) return true;
  if (registry.isReviewLabel('race', race.value)) return true;
  if (!age.valid || age.value === null) return true;

  // Re-checked even though the age cleanser already enforces it.
  return !registry.isAgeInRange(age.value);
}

export function buildReviewEntry(record: CleansedRecord): ReviewEntry {
  const entry: ReviewEntry = {
    recordId: record.id,
    original: {
      sex: record.raw.sexRaw,
      race: record.raw.raceRaw,
      age: record.raw.ageRaw,
    },
    cleansed: {
      sex: record.sex.value,
      race: record.race.value,
      age: record.age.value,
    },
    confidence: record.confidence,
    status: 'PENDING',
    reviewer: null,
    correctedSex: null,
    correctedRace: null,
    correctedAge: null,
    notes: null,
    reviewTimestamp: null,
  };
  return Object.freeze(entry);
}
