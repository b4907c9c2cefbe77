/**
 * Confidence Classifier
 *
 * Tiers are checked in order, first match wins:
 *   HIGH   — every field passed through untouched (case aside). A raw
 *            Other/Unknown that was already canonical still counts; the
 *            review router flags it separately.
 *   MEDIUM — nothing degraded, but at least one field needed the service.
 *   LOW    — any Other/Unknown label, or an invalid age.
 */

import type { CanonicalValueRegistry } from './registry';
import type { ConfidenceTier, FieldOutcomes, RawDemographicRecord } from './types';

export function classifyConfidence(
  raw: RawDemographicRecord,
  outcomes: FieldOutcomes,
  registry: CanonicalValueRegistry,
): ConfidenceTier {
  const untouched =
    outcomes.sex.source === 'PASSTHROUGH' &&
    outcomes.race.source === 'PASSTHROUGH' &&
    outcomes.age.source === 'PASSTHROUGH' &&
    sameText(raw.sexRaw, outcomes.sex.value) &&
    sameText(raw.raceRaw, outcomes.race.value) &&
    sameText(raw.ageRaw, outcomes.age.value);

  if (untouched) return 'HIGH';
  if (!hasDegradedField(outcomes, registry)) return 'MEDIUM';
  return 'LOW';
}

/** True when any field landed on a review label or failed validation. */
export function hasDegradedField(outcomes: FieldOutcomes, registry: CanonicalValueRegistry): boolean {
  const { sex, race, age } = outcomes;
  return (
    !sex.valid ||
    !race.valid ||
    registry.isReviewLabel('sex', sex.value) ||
    registry.isReviewLabel('race', race.value) ||
    !age.valid ||
    age.value === null
  );
}

function sameText(raw: string | null, value: string | number | null): boolean {
  if (raw === null || value === null) return false;
  const cleaned = raw.trim();
  if (typeof value === 'number') return Number.parseInt(cleaned, 10) === value;
  return cleaned.toUpperCase() === value.toUpperCase();
}
