/**
 * Demographic Cleansing Engine — Shared Types
 *
 * Everything here is plain data. Records and outcomes are frozen once
 * built; reviewer corrections live on a separate ReviewEntry.
 */

// ── Fields ─────────────────────────────────────────────────────────

export type FieldName = 'sex' | 'race' | 'age';

export type LabelField = Exclude<FieldName, 'age'>;

export const FIELD_NAMES: readonly FieldName[] = ['sex', 'race', 'age'];

// ── Input ──────────────────────────────────────────────────────────

export interface RawDemographicRecord {
  readonly id: string;
  readonly sexRaw: string | null;
  readonly raceRaw: string | null;
  readonly ageRaw: string | null;
}

// ── Field Outcomes ─────────────────────────────────────────────────

/**
 * PASSTHROUGH — the pre-check matched, no service call was made.
 * CLASSIFIED  — closed-set classification (sex, race).
 * EXTRACTED   — open-ended number extraction (age).
 */
export type OutcomeSource = 'PASSTHROUGH' | 'CLASSIFIED' | 'EXTRACTED';

export interface LabelOutcome {
  readonly value: string; // always a member of the field's label set
  readonly source: OutcomeSource;
  readonly valid: boolean;
}

export interface AgeOutcome {
  readonly value: number | null; // null whenever valid === false
  readonly source: OutcomeSource;
  readonly valid: boolean;
}

export interface FieldOutcomes {
  readonly sex: LabelOutcome;
  readonly race: LabelOutcome;
  readonly age: AgeOutcome;
}

export type FieldOutcome = LabelOutcome | AgeOutcome;

// ── Records ────────────────────────────────────────────────────────

export type ConfidenceTier = 'HIGH' | 'MEDIUM' | 'LOW';

export interface CleansedRecord extends FieldOutcomes {
  readonly id: string;
  readonly raw: RawDemographicRecord;
  readonly confidence: ConfidenceTier;
  readonly needsReview: boolean;
}

export type ReviewStatus = 'PENDING' | 'APPROVED' | 'CORRECTED' | 'REJECTED';

export interface ReviewEntry {
  readonly recordId: string;
  readonly original: { sex: string | null; race: string | null; age: string | null };
  readonly cleansed: { sex: string; race: string; age: number | null };
  readonly confidence: ConfidenceTier;
  readonly status: ReviewStatus;
  readonly reviewer: string | null;
  readonly correctedSex: string | null;
  readonly correctedRace: string | null;
  readonly correctedAge: number | null;
  readonly notes: string | null;
  readonly reviewTimestamp: string | null;
}

// ── Run Summary ────────────────────────────────────────────────────

export interface FieldCounts {
  sex: number;
  race: number;
  age: number;
}

export interface RunSummary {
  totalRecords: number;
  passthrough: FieldCounts;
  aiAssisted: FieldCounts;
  serviceCalls: number;
  autoAccepted: number;
  reviewQueued: number;
  confidence: Record<ConfidenceTier, number>;
  automationRate: number; // 0-1, autoAccepted / totalRecords
}
