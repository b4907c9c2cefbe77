import type { CleansedRecord, ReviewEntry } from '../engine/types';

/**
 * Output side of a run. Receives one CleansedRecord per input record, in
 * completion order, and one ReviewEntry per flagged record.
 */
export interface CleansingSink {
  writeCleansed(record: CleansedRecord): Promise<void>;
  writeReview(entry: ReviewEntry): Promise<void>;
}

export class InMemorySink implements CleansingSink {
  readonly cleansed: CleansedRecord[] = [];
  readonly reviews: ReviewEntry[] = [];

  async writeCleansed(record: CleansedRecord): Promise<void> {
    this.cleansed.push(record);
  }

  async writeReview(entry: ReviewEntry): Promise<void> {
    this.reviews.push(entry);
  }
}
