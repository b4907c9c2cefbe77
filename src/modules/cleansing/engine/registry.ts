/**
 * Canonical Value Registry
 *
 * Single source of truth for "already clean" checks. Label membership is
 * case-insensitive and resolved through a map keyed on the upper-cased
 * label, so every lookup is O(1) and returns the label in its canonical
 * casing. Age is canonical when it is a bare integer inside the bounds.
 *
 * The registry is built once at startup, frozen, and shared read-only by
 * every worker. It never calls the classification service.
 */

import { ConfigurationError } from './errors';
import type { FieldName, LabelField } from './types';

// ── Vocabulary ─────────────────────────────────────────────────────

export const SEX_LABELS = ['Male', 'Female', 'Other', 'Unknown'] as const;

// OMB race and ethnicity categories, plus Other and Unknown.
export const RACE_LABELS = [
  'White',
  'Black or African American',
  'Asian',
  'Hispanic or Latino',
  'American Indian or Alaska Native',
  'Native Hawaiian or Pacific Islander',
  'Two or More Races',
  'Other',
  'Unknown',
] as const;

export interface LabelSetOptions {
  labels: readonly string[];
  fallback: string;
  reviewLabels: readonly string[]; // outcomes that always go to human review
}

export interface RegistryOptions {
  sex: LabelSetOptions;
  race: LabelSetOptions;
  age: { min: number; max: number };
}

export const DEFAULT_REGISTRY_OPTIONS: RegistryOptions = {
  sex: { labels: SEX_LABELS, fallback: 'Unknown', reviewLabels: ['Other', 'Unknown'] },
  race: { labels: RACE_LABELS, fallback: 'Unknown', reviewLabels: ['Other', 'Unknown'] },
  age: { min: 0, max: 120 },
};

// Hard limits for configured age bounds.
const AGE_BOUND_FLOOR = 0;
const AGE_BOUND_CEILING = 150;

const BARE_INTEGER = /^\d+$/;

// ── Registry ───────────────────────────────────────────────────────

interface LabelSet {
  readonly labels: readonly string[];
  readonly index: ReadonlyMap<string, string>;
  readonly fallback: string;
  readonly reviewLabels: ReadonlySet<string>;
}

export class CanonicalValueRegistry {
  private readonly sets: Readonly<Record<LabelField, LabelSet>>;
  readonly ageBounds: Readonly<{ min: number; max: number }>;

  constructor(options: RegistryOptions = DEFAULT_REGISTRY_OPTIONS) {
    this.sets = Object.freeze({
      sex: buildLabelSet('sex', options.sex),
      race: buildLabelSet('race', options.race),
    });
    this.ageBounds = Object.freeze(validateAgeBounds(options.age));
    Object.freeze(this);
  }

  isCanonical(field: FieldName, value: string | null): boolean {
    if (field === 'age') return this.parseCanonicalAge(value) !== null;
    return this.canonicalLabel(field, value) !== null;
  }

  /** Label in canonical casing, or null when the value is not in the set. */
  canonicalLabel(field: LabelField, value: string | null): string | null {
    if (value === null) return null;
    return this.sets[field].index.get(value.trim().toUpperCase()) ?? null;
  }

  /** Parsed age when the raw value is a bare in-range integer, else null. */
  parseCanonicalAge(value: string | null): number | null {
    if (value === null) return null;
    const trimmed = value.trim();
    if (!BARE_INTEGER.test(trimmed)) return null;
    const age = Number.parseInt(trimmed, 10);
    return this.isAgeInRange(age) ? age : null;
  }

  isAgeInRange(age: number): boolean {
    return Number.isInteger(age) && age >= this.ageBounds.min && age <= this.ageBounds.max;
  }

  labels(field: LabelField): readonly string[] {
    return this.sets[field].labels;
  }

  fallback(field: LabelField): string {
    return this.sets[field].fallback;
  }

  /** True for labels such as Other / Unknown that force human review. */
  isReviewLabel(field: LabelField, label: string): boolean {
    return this.sets[field].reviewLabels.has(label);
  }
}

// ── Validation ─────────────────────────────────────────────────────

function buildLabelSet(field: LabelField, options: LabelSetOptions): LabelSet {
  if (options.labels.length === 0) {
    throw new ConfigurationError(`label set for "${field}" is empty`);
  }

  const index = new Map<string, string>();
  for (const label of options.labels) {
    const key = label.trim().toUpperCase();
    if (key.length === 0) {
      throw new ConfigurationError(`label set for "${field}" contains a blank label`);
    }
    if (index.has(key)) {
      throw new ConfigurationError(`duplicate label "${label}" for "${field}"`, { field, label });
    }
    index.set(key, label);
  }

  const fallback = index.get(options.fallback.trim().toUpperCase());
  if (fallback === undefined) {
    throw new ConfigurationError(`fallback "${options.fallback}" is not a "${field}" label`, {
      field,
      fallback: options.fallback,
    });
  }

  const reviewLabels = new Set<string>();
  for (const label of options.reviewLabels) {
    const canonical = index.get(label.trim().toUpperCase());
    if (canonical === undefined) {
      throw new ConfigurationError(`review label "${label}" is not a "${field}" label`, { field, label });
    }
    reviewLabels.add(canonical);
  }
  // A fallback outcome must always reach a reviewer.
  reviewLabels.add(fallback);

  return {
    labels: Object.freeze([...index.values()]),
    index,
    fallback,
    reviewLabels,
  };
}

function validateAgeBounds(bounds: { min: number; max: number }): { min: number; max: number } {
  const { min, max } = bounds;
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new ConfigurationError('age bounds must be integers', { min, max });
  }
  if (min < AGE_BOUND_FLOOR || max > AGE_BOUND_CEILING) {
    throw new ConfigurationError(
      `age bounds must lie within [${AGE_BOUND_FLOOR}, ${AGE_BOUND_CEILING}]`,
      { min, max },
    );
  }
  if (min > max) {
    throw new ConfigurationError('age lower bound exceeds upper bound', { min, max });
  }
  return { min, max };
}
