import type { FieldName, LabelField } from '../engine/types';

/** Sentinel returned by `extractNumber` when no valid number exists. */
export const INVALID_SENTINEL = 'INVALID';

export interface ClassifyRequest {
  field: LabelField;
  value: string;
  labels: readonly string[];
  fallback: string;
}

export interface ExtractNumberRequest {
  field: FieldName;
  value: string;
  instruction: string;
}

/**
 * Boundary to the external classification / extraction capability.
 *
 * `classify` must resolve to exactly one of `labels`, coercing anything
 * else to `fallback`. `extractNumber` resolves to a string of digits or
 * INVALID_SENTINEL. Both reject with ClassifierUnavailableError when the
 * service cannot answer.
 */
export interface ClassifierAdapter {
  classify(request: ClassifyRequest): Promise<string>;
  extractNumber(request: ExtractNumberRequest): Promise<string>;
}

export const CLASSIFIER_ADAPTER = Symbol('CLASSIFIER_ADAPTER');
