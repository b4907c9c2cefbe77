/**
 * Demographic Cleansing Engine — Barrel Exports
 */

// Types
export type {
  FieldName,
  LabelField,
  RawDemographicRecord,
  OutcomeSource,
  LabelOutcome,
  AgeOutcome,
  FieldOutcome,
  FieldOutcomes,
  ConfidenceTier,
  CleansedRecord,
  ReviewStatus,
  ReviewEntry,
  FieldCounts,
  RunSummary,
} from './types';
export { FIELD_NAMES } from './types';

// Errors
export { CleansingError, ConfigurationError, ClassifierUnavailableError } from './errors';

// Canonical Value Registry
export {
  CanonicalValueRegistry,
  DEFAULT_REGISTRY_OPTIONS,
  SEX_LABELS,
  RACE_LABELS,
  type RegistryOptions,
  type LabelSetOptions,
} from './registry';

// Age instruction
export {
  buildAgeInstruction,
  assertDecadeOffsets,
  DEFAULT_DECADE_OFFSETS,
  type DecadeOffsets,
  type AgeInstructionOptions,
} from './age-instruction';

// Field Cleansers
export {
  LabelFieldCleanser,
  SexCleanser,
  RaceCleanser,
  AgeCleanser,
  createFieldCleansers,
  cleanseFields,
  type FieldCleanser,
  type FieldCleansers,
} from './field-cleansers';

// Confidence, review routing, record assembly
export { classifyConfidence, hasDegradedField } from './confidence';
export { needsReview, buildReviewEntry } from './review-router';
export { cleanseRecord } from './cleanse-record';

// Summary
export { summarizeRun } from './summary';
