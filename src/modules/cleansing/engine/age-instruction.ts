/**
 * Age extraction instruction.
 *
 * The rules below define correct age normalisation; the extractor is
 * asked to apply them verbatim and the cleanser re-checks the range on
 * whatever comes back. Decade offsets are configurable because "early",
 * "mid" and "late" have no single agreed meaning.
 */

import { INVALID_SENTINEL } from '../classifier/classifier-adapter';
import { ConfigurationError } from './errors';

export interface DecadeOffsets {
  early: number;
  mid: number;
  late: number;
}

export const DEFAULT_DECADE_OFFSETS: DecadeOffsets = { early: 2, mid: 5, late: 8 };

export interface AgeInstructionOptions {
  min: number;
  max: number;
  decadeOffsets: DecadeOffsets;
}

export function buildAgeInstruction(options: AgeInstructionOptions): string {
  const { min, max } = options;
  const d = assertDecadeOffsets(options.decadeOffsets);

  const rules = [
    `Return ONLY a bare integer between ${min} and ${max}, or the word ${INVALID_SENTINEL}.`,
    'Strip units and prefixes such as "years", "yrs", "y/o", "yo" and "Age:" before interpreting the value.',
    'Convert number words to digits (e.g. "forty-five" -> 45).',
    'Infants, newborns and ages given in months under 12 -> 0.',
    `Decade ranges map to a point inside the decade: "early" -> decade + ${d.early}, ` +
      `"mid" -> decade + ${d.mid}, "late" -> decade + ${d.late} ` +
      `(e.g. "early 20s" -> ${20 + d.early}, "mid-30s" -> ${30 + d.mid}, "late 40s" -> ${40 + d.late}).`,
    `Any value outside ${min}-${max}, or any value you cannot interpret confidently, -> ${INVALID_SENTINEL}.`,
    'No explanation, no punctuation, just the number or the word.',
  ];

  return ['Extract the age in whole years from the value below.', ...rules.map((r) => `- ${r}`)].join('\n');
}

/** Offsets must be single digits ordered early <= mid <= late. */
export function assertDecadeOffsets(offsets: DecadeOffsets): DecadeOffsets {
  const { early, mid, late } = offsets;
  const digit = (n: number) => Number.isInteger(n) && n >= 0 && n <= 9;

  if (!digit(early) || !digit(mid) || !digit(late)) {
    throw new ConfigurationError('decade offsets must be integers between 0 and 9', { early, mid, late });
  }
  if (early > mid || mid > late) {
    throw new ConfigurationError('decade offsets must satisfy early <= mid <= late', { early, mid, late });
  }
  return offsets;
}
