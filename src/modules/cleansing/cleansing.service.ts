/**
 * Cleansing Service
 *
 * Orchestrates a cleansing run over a record source:
 *   1. A pool of `concurrency` workers pulls records from the source
 *   2. Each record is cleansed field by field (sex, race, age in parallel)
 *   3. Confidence tier and review flag are derived from the outcomes
 *   4. Every record goes to the sink; flagged ones also produce a review entry
 *   5. Per-worker results are merged and summarised
 *
 * `cleansing.concurrency` caps in-flight service calls across every run of
 * this service. A run may ask for a lower cap, never a higher one. Cancelling
 * the signal stops workers from taking new records; records already in
 * flight finish and are emitted whole. A failing sink stops the run the same
 * way before its error is rethrown.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import * as path from 'path';
import { CLASSIFIER_ADAPTER, type ClassifierAdapter } from './classifier/classifier-adapter';
import { LimitedClassifier } from './classifier/limited-classifier';
import {
  CanonicalValueRegistry,
  ConfigurationError,
  DEFAULT_DECADE_OFFSETS,
  buildAgeInstruction,
  buildReviewEntry,
  cleanseRecord,
  createFieldCleansers,
  summarizeRun,
  type CleansedRecord,
  type DecadeOffsets,
  type RawDemographicRecord,
  type ReviewEntry,
  type RunSummary,
} from './engine';
import type { CleansingSink } from './io/cleansing-sink';
import { JsonFileRecordSource, type RecordSource } from './io/record-source';
import { CANONICAL_REGISTRY } from './registry.provider';

export interface RunOptions {
  sink?: CleansingSink;
  signal?: AbortSignal;
  concurrency?: number;
}

export interface CleansingRunResult {
  runId: string;
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  summary: RunSummary;
  records: CleansedRecord[];
  reviewQueue: ReviewEntry[];
}

export interface Vocabulary {
  sex: readonly string[];
  race: readonly string[];
  age: { min: number; max: number };
}

interface WorkerBatch {
  records: { seq: number; record: CleansedRecord }[];
  reviews: { seq: number; entry: ReviewEntry }[];
}

const PROGRESS_EVERY = 50;

@Injectable()
export class CleansingService {
  private readonly logger = new Logger(CleansingService.name);
  private readonly classifier: LimitedClassifier;
  private readonly ageInstruction: string;
  private readonly concurrency: number;
  private readonly samplePath: string;

  constructor(
    @Inject(CANONICAL_REGISTRY) private readonly registry: CanonicalValueRegistry,
    @Inject(CLASSIFIER_ADAPTER) classifier: ClassifierAdapter,
    configService: ConfigService,
  ) {
    const decadeOffsets = configService.get<DecadeOffsets>('cleansing.decadeOffsets', DEFAULT_DECADE_OFFSETS);
    this.ageInstruction = buildAgeInstruction({ ...registry.ageBounds, decadeOffsets });
    this.concurrency = assertConcurrency(configService.get<number>('cleansing.concurrency', 4));
    this.classifier = new LimitedClassifier(classifier, this.concurrency);
    this.samplePath = configService.get<string>('cleansing.samplePath', 'data/sample-demographics.json');
  }

  // ═══════════════════════════════════════════════════════════════════
  // Runs
  // ═══════════════════════════════════════════════════════════════════

  async run(source: RecordSource, options: RunOptions = {}): Promise<CleansingRunResult> {
    const runId = randomUUID();
    const startedAt = new Date().toISOString();
    const concurrency = Math.min(assertConcurrency(options.concurrency ?? this.concurrency), this.concurrency);
    const { sink, signal } = options;

    // Below the configured cap the run gets its own, tighter limiter on top
    // of the shared one.
    const classifier =
      concurrency < this.concurrency ? new LimitedClassifier(this.classifier, concurrency) : this.classifier;
    const cleansers = createFieldCleansers(this.registry, classifier, this.ageInstruction);

    this.logger.log(`Run ${runId} started (concurrency=${concurrency})`);

    const iterator = source[Symbol.asyncIterator]();
    let exhausted = false;
    let failed = false;
    let seq = 0;
    let processed = 0;

    // Hands out the next record, or null once the source is drained, the
    // run has been cancelled or another worker has failed.
    const take = async (): Promise<{ seq: number; raw: RawDemographicRecord } | null> => {
      if (exhausted || failed || signal?.aborted) return null;
      const next = await iterator.next();
      if (next.done) {
        exhausted = true;
        return null;
      }
      return { seq: seq++, raw: next.value };
    };

    const worker = async (): Promise<WorkerBatch> => {
      const batch: WorkerBatch = { records: [], reviews: [] };

      try {
        for (let item = await take(); item !== null; item = await take()) {
          const record = await cleanseRecord(item.raw, cleansers, this.registry);
          batch.records.push({ seq: item.seq, record });
          await sink?.writeCleansed(record);

          if (record.needsReview) {
            const entry = buildReviewEntry(record);
            batch.reviews.push({ seq: item.seq, entry });
            await sink?.writeReview(entry);
          }

          processed++;
          if (processed % PROGRESS_EVERY === 0) {
            this.logger.log(`Run ${runId} progress: ${processed} records cleansed`);
          }
        }
      } catch (err) {
        failed = true;
        throw err;
      }
      return batch;
    };

    const settled = await Promise.allSettled(Array.from({ length: concurrency }, () => worker()));

    const batches: WorkerBatch[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') {
        await iterator.return?.();
        this.logger.error(`Run ${runId} failed after ${processed} records: ${errorMessage(result.reason)}`);
        throw result.reason;
      }
      batches.push(result.value);
    }

    const cancelled = !exhausted;
    if (cancelled) {
      await iterator.return?.();
      this.logger.warn(`Run ${runId} cancelled after ${processed} records`);
    }

    const records = batches
      .flatMap((b) => b.records)
      .sort((a, b) => a.seq - b.seq)
      .map((r) => r.record);
    const reviewQueue = batches
      .flatMap((b) => b.reviews)
      .sort((a, b) => a.seq - b.seq)
      .map((r) => r.entry);
    const summary = summarizeRun(records);

    this.logger.log(
      `Run ${runId} finished: total=${summary.totalRecords}, ` +
        `autoAccepted=${summary.autoAccepted}, review=${summary.reviewQueued}, ` +
        `serviceCalls=${summary.serviceCalls}, automation=${(summary.automationRate * 100).toFixed(1)}%`,
    );

    return {
      runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      cancelled,
      summary,
      records,
      reviewQueue,
    };
  }

  /** Run the bundled sample dataset. */
  async runSample(options: RunOptions = {}): Promise<CleansingRunResult> {
    const file = path.resolve(process.cwd(), this.samplePath);
    return this.run(new JsonFileRecordSource(file), options);
  }

  vocabulary(): Vocabulary {
    return {
      sex: this.registry.labels('sex'),
      race: this.registry.labels('race'),
      age: { ...this.registry.ageBounds },
    };
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function assertConcurrency(n: number): number {
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError('concurrency must be a positive integer', { concurrency: n });
  }
  return n;
}
