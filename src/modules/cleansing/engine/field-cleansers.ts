/**
 * Field Cleansers
 *
 * One cleanser per field, all behind the same contract:
 *
 *   RAW → pre-check ─┬─ canonical ──────────────→ PASSTHROUGH
 *                    └─ not canonical → service → VALID | INVALID
 *
 * A cleanser never rejects. Service failures and off-contract answers are
 * turned into a degraded outcome (fallback label or null age, valid=false)
 * so one bad call cannot take the record, or the run, down with it.
 */

import { Logger } from '@nestjs/common';
import { INVALID_SENTINEL, type ClassifierAdapter } from '../classifier/classifier-adapter';
import type { CanonicalValueRegistry } from './registry';
import type {
  AgeOutcome,
  FieldName,
  FieldOutcome,
  FieldOutcomes,
  LabelField,
  LabelOutcome,
  OutcomeSource,
  RawDemographicRecord,
} from './types';

// Missing categorical input is classified as if it read "Unknown".
const MISSING_LABEL_INPUT = 'Unknown';

const BARE_INTEGER = /^\d+$/;

export interface FieldCleanser<O extends FieldOutcome> {
  readonly field: FieldName;
  cleanse(raw: string | null): Promise<O>;
}

export interface FieldCleansers {
  sex: FieldCleanser<LabelOutcome>;
  race: FieldCleanser<LabelOutcome>;
  age: FieldCleanser<AgeOutcome>;
}

// ── Categorical ────────────────────────────────────────────────────

export class LabelFieldCleanser implements FieldCleanser<LabelOutcome> {
  private readonly logger: Logger;

  constructor(
    readonly field: LabelField,
    private readonly registry: CanonicalValueRegistry,
    private readonly classifier: ClassifierAdapter,
  ) {
    this.logger = new Logger(this.constructor.name);
  }

  async cleanse(raw: string | null): Promise<LabelOutcome> {
    const canonical = this.registry.canonicalLabel(this.field, raw);
    if (canonical !== null) {
      return labelOutcome(canonical, 'PASSTHROUGH', true);
    }

    const input = raw === null || raw.trim().length === 0 ? MISSING_LABEL_INPUT : raw;
    const fallback = this.registry.fallback(this.field);

    let answer: string;
    try {
      answer = await this.classifier.classify({
        field: this.field,
        value: input,
        labels: this.registry.labels(this.field),
        fallback,
      });
    } catch (err) {
      this.logger.warn(`Classification failed for "${input}", using ${fallback}: ${errorMessage(err)}`);
      return labelOutcome(fallback, 'CLASSIFIED', false);
    }

    // Re-check membership; the adapter is an external boundary.
    const label = this.registry.canonicalLabel(this.field, answer);
    if (label === null) {
      this.logger.warn(`Classifier returned "${answer}" outside the ${this.field} label set, using ${fallback}`);
      return labelOutcome(fallback, 'CLASSIFIED', true);
    }
    return labelOutcome(label, 'CLASSIFIED', true);
  }
}

export class SexCleanser extends LabelFieldCleanser {
  constructor(registry: CanonicalValueRegistry, classifier: ClassifierAdapter) {
    super('sex', registry, classifier);
  }
}

export class RaceCleanser extends LabelFieldCleanser {
  constructor(registry: CanonicalValueRegistry, classifier: ClassifierAdapter) {
    super('race', registry, classifier);
  }
}

// ── Numeric ────────────────────────────────────────────────────────

const INVALID_AGE = ageOutcome(null, 'EXTRACTED', false);

export class AgeCleanser implements FieldCleanser<AgeOutcome> {
  readonly field = 'age' as const;
  private readonly logger = new Logger(AgeCleanser.name);

  constructor(
    private readonly registry: CanonicalValueRegistry,
    private readonly classifier: ClassifierAdapter,
    private readonly instruction: string,
  ) {}

  async cleanse(raw: string | null): Promise<AgeOutcome> {
    const age = this.registry.parseCanonicalAge(raw);
    if (age !== null) {
      return ageOutcome(age, 'PASSTHROUGH', true);
    }

    const input = raw ?? '';
    let answer: string;
    try {
      answer = await this.classifier.extractNumber({
        field: this.field,
        value: input,
        instruction: this.instruction,
      });
    } catch (err) {
      this.logger.warn(`Age extraction failed for "${input}": ${errorMessage(err)}`);
      return INVALID_AGE;
    }

    return this.interpret(input, answer);
  }

  private interpret(input: string, answer: string): AgeOutcome {
    const trimmed = answer.trim();
    if (trimmed.toUpperCase() === INVALID_SENTINEL) return INVALID_AGE;

    if (!BARE_INTEGER.test(trimmed)) {
      this.logger.warn(`Extractor returned non-numeric "${answer}" for "${input}"`);
      return INVALID_AGE;
    }

    const extracted = Number.parseInt(trimmed, 10);
    if (!this.registry.isAgeInRange(extracted)) {
      this.logger.warn(`Extractor returned out-of-range age ${extracted} for "${input}"`);
      return INVALID_AGE;
    }
    return ageOutcome(extracted, 'EXTRACTED', true);
  }
}

// ── Wiring ─────────────────────────────────────────────────────────

export function createFieldCleansers(
  registry: CanonicalValueRegistry,
  classifier: ClassifierAdapter,
  ageInstruction: string,
): FieldCleansers {
  return {
    sex: new SexCleanser(registry, classifier),
    race: new RaceCleanser(registry, classifier),
    age: new AgeCleanser(registry, classifier, ageInstruction),
  };
}

/** Cleanse the three fields of one record concurrently. */
export async function cleanseFields(
  record: RawDemographicRecord,
  cleansers: FieldCleansers,
): Promise<FieldOutcomes> {
  const [sex, race, age] = await Promise.all([
    cleansers.sex.cleanse(record.sexRaw),
    cleansers.race.cleanse(record.raceRaw),
    cleansers.age.cleanse(record.ageRaw),
  ]);
  return Object.freeze({ sex, race, age });
}

function labelOutcome(value: string, source: OutcomeSource, valid: boolean): LabelOutcome {
  return Object.freeze({ value, source, valid });
}

function ageOutcome(value: number | null, source: OutcomeSource, valid: boolean): AgeOutcome {
  return Object.freeze({ value, source, valid });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
