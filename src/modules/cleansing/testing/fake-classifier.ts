import type { ClassifierAdapter, ClassifyRequest, ExtractNumberRequest } from '../classifier/classifier-adapter';
import { ClassifierUnavailableError } from '../engine/errors';

export interface FakeClassifierOptions {
  /** raw value → answer for `classify`; unmapped values get the fallback. */
  labels?: Record<string, string>;
  /** raw value → answer for `extractNumber`; unmapped values get INVALID. */
  numbers?: Record<string, string>;
  /** raw values whose calls reject as if the service were down. */
  failOn?: string[];
  delayMs?: number;
}

/** In-process stand-in for the classification service. */
export class FakeClassifier implements ClassifierAdapter {
  readonly classifyCalls: ClassifyRequest[] = [];
  readonly extractCalls: ExtractNumberRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly options: FakeClassifierOptions = {}) {}

  get totalCalls(): number {
    return this.classifyCalls.length + this.extractCalls.length;
  }

  async classify(request: ClassifyRequest): Promise<string> {
    this.classifyCalls.push(request);
    return this.answer(request.value, () => this.options.labels?.[request.value] ?? request.fallback);
  }

  async extractNumber(request: ExtractNumberRequest): Promise<string> {
    this.extractCalls.push(request);
    return this.answer(request.value, () => this.options.numbers?.[request.value] ?? 'INVALID');
  }

  private async answer(value: string, resolve: () => string): Promise<string> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.options.delayMs) {
        await new Promise((r) => setTimeout(r, this.options.delayMs));
      }
      if (this.options.failOn?.includes(value)) {
        throw new ClassifierUnavailableError(`simulated outage for "${value}"`);
      }
      return resolve();
    } finally {
      this.inFlight--;
    }
  }
}
