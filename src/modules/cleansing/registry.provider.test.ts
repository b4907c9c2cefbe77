import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from './engine';
import { createRegistry } from './registry.provider';

describe('createRegistry', () => {
  it('should fall back to the default age bounds', () => {
    expect(createRegistry(new ConfigService({})).ageBounds).toEqual({ min: 0, max: 120 });
  });

  it('should apply configured age bounds', () => {
    const registry = createRegistry(new ConfigService({ cleansing: { ageMin: 18, ageMax: 99 } }));
    expect(registry.parseCanonicalAge('17')).toBeNull();
    expect(registry.parseCanonicalAge('18')).toBe(18);
  });

  it('should refuse inverted bounds', () => {
    expect(() => createRegistry(new ConfigService({ cleansing: { ageMin: 90, ageMax: 10 } }))).toThrow(
      ConfigurationError,
    );
  });
});
