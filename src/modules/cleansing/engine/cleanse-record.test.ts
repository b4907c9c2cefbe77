import { FakeClassifier } from '../testing/fake-classifier';
import { buildAgeInstruction, DEFAULT_DECADE_OFFSETS } from './age-instruction';
import { cleanseRecord } from './cleanse-record';
import { createFieldCleansers } from './field-cleansers';
import { CanonicalValueRegistry } from './registry';

const registry = new CanonicalValueRegistry();
const instruction = buildAgeInstruction({ min: 0, max: 120, decadeOffsets: DEFAULT_DECADE_OFFSETS });

describe('cleanseRecord', () => {
  it('should keep an off-set answer valid as the fallback and send the record to review', async () => {
    const classifier = new FakeClassifier({ labels: { Lady: 'Martian' } });
    const cleansers = createFieldCleansers(registry, classifier, instruction);

    const record = await cleanseRecord({ id: 'r-9', sexRaw: 'Lady', raceRaw: 'Asian', ageRaw: '51' }, cleansers, registry);

    expect(record.sex).toEqual({ value: 'Unknown', source: 'CLASSIFIED', valid: true });
    expect(record.race).toEqual({ value: 'Asian', source: 'PASSTHROUGH', valid: true });
    expect(record.needsReview).toBe(true);
    expect(record.confidence).toBe('LOW');
  });

  it('should rate a record of already-canonical Unknown values HIGH and still flag it', async () => {
    const classifier = new FakeClassifier();
    const cleansers = createFieldCleansers(registry, classifier, instruction);

    const record = await cleanseRecord({ id: 'r-10', sexRaw: 'Unknown', raceRaw: 'White', ageRaw: '30' }, cleansers, registry);

    expect(record.sex).toEqual({ value: 'Unknown', source: 'PASSTHROUGH', valid: true });
    expect(record.confidence).toBe('HIGH');
    expect(record.needsReview).toBe(true);
    expect(classifier.totalCalls).toBe(0);
  });

  it('should return a frozen record', async () => {
    const cleansers = createFieldCleansers(registry, new FakeClassifier(), instruction);
    const record = await cleanseRecord({ id: 'r-11', sexRaw: 'Male', raceRaw: 'Asian', ageRaw: '40' }, cleansers, registry);
    expect(Object.isFrozen(record)).toBe(true);
  });
});
