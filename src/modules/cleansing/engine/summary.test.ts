import { summarizeRun } from './summary';
import type { CleansedRecord, ConfidenceTier, OutcomeSource } from './types';

function record(
  id: string,
  sources: [OutcomeSource, OutcomeSource, OutcomeSource],
  confidence: ConfidenceTier,
  needsReview: boolean,
): CleansedRecord {
  const [sex, race, age] = sources;
  return {
    id,
    raw: { id, sexRaw: 'x', raceRaw: 'x', ageRaw: 'x' },
    sex: { value: 'Male', source: sex, valid: true },
    race: { value: 'White', source: race, valid: true },
    age: { value: 30, source: age, valid: true },
    confidence,
    needsReview,
  };
}

describe('summarizeRun', () => {
  it('should derive every count from the records', () => {
    const summary = summarizeRun([
      record('1', ['PASSTHROUGH', 'PASSTHROUGH', 'PASSTHROUGH'], 'HIGH', false),
      record('2', ['CLASSIFIED', 'PASSTHROUGH', 'EXTRACTED'], 'MEDIUM', false),
      record('3', ['CLASSIFIED', 'CLASSIFIED', 'PASSTHROUGH'], 'LOW', true),
      record('4', ['PASSTHROUGH', 'CLASSIFIED', 'EXTRACTED'], 'LOW', true),
    ]);

    expect(summary).toEqual({
      totalRecords: 4,
      passthrough: { sex: 2, race: 2, age: 2 },
      aiAssisted: { sex: 2, race: 2, age: 2 },
      serviceCalls: 6,
      autoAccepted: 2,
      reviewQueued: 2,
      confidence: { HIGH: 1, MEDIUM: 1, LOW: 2 },
      automationRate: 0.5,
    });
  });

  it('should round the automation rate to four places', () => {
    const summary = summarizeRun([
      record('1', ['PASSTHROUGH', 'PASSTHROUGH', 'PASSTHROUGH'], 'HIGH', false),
      record('2', ['PASSTHROUGH', 'PASSTHROUGH', 'PASSTHROUGH'], 'HIGH', false),
      record('3', ['CLASSIFIED', 'PASSTHROUGH', 'PASSTHROUGH'], 'LOW', true),
    ]);
    expect(summary.automationRate).toBe(0.6667);
  });

  it('should report zeros for an empty run', () => {
    const summary = summarizeRun([]);
    expect(summary.totalRecords).toBe(0);
    expect(summary.automationRate).toBe(0);
    expect(summary.confidence).toEqual({ HIGH: 0, MEDIUM: 0, LOW: 0 });
  });
});
