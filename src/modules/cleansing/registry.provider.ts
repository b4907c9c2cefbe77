import type { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CanonicalValueRegistry, DEFAULT_REGISTRY_OPTIONS } from './engine';

export const CANONICAL_REGISTRY = Symbol('CANONICAL_REGISTRY');

/**
 * Builds the registry from `cleansing.*` config. A ConfigurationError
 * thrown here aborts application bootstrap.
 */
export function createRegistry(config: ConfigService): CanonicalValueRegistry {
  return new CanonicalValueRegistry({
    ...DEFAULT_REGISTRY_OPTIONS,
    age: {
      min: config.get<number>('cleansing.ageMin', DEFAULT_REGISTRY_OPTIONS.age.min),
      max: config.get<number>('cleansing.ageMax', DEFAULT_REGISTRY_OPTIONS.age.max),
    },
  });
}

export const registryProvider: Provider = {
  provide: CANONICAL_REGISTRY,
  inject: [ConfigService],
  useFactory: createRegistry,
};
