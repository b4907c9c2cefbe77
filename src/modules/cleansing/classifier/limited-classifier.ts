import pLimit from 'p-limit';
import type { ClassifierAdapter, ClassifyRequest, ExtractNumberRequest } from './classifier-adapter';

type Limit = ReturnType<typeof pLimit>;

/**
 * Caps the number of in-flight calls to the wrapped adapter. Every field
 * cleanser of every worker that shares an instance draws from the same
 * permits, so the cap holds however many fields a record sends out.
 */
export class LimitedClassifier implements ClassifierAdapter {
  private readonly limit: Limit;

  constructor(
    private readonly inner: ClassifierAdapter,
    concurrency: number,
  ) {
    this.limit = pLimit(concurrency);
  }

  classify(request: ClassifyRequest): Promise<string> {
    return this.limit(() => this.inner.classify(request));
  }

  extractNumber(request: ExtractNumberRequest): Promise<string> {
    return this.limit(() => this.inner.extractNumber(request));
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }
}
