import { nanoid } from 'nanoid';

import type { AnalyticsAggregator } from './analytics.js';
import type { BrowserCapability, BrowserSessionFactory } from './browser.js';
import { OverloadedError, RunCancelledError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { executeRun } from './run-machine.js';
import { RunRecord } from './run-record.js';
import type { FormMetadata, Scenario } from './schema.js';
import type { RunSink } from './sink.js';
import { planRunValues, type Synthesizer } from './synthesizer.js';
import type { CancelAck, SubmitOptions, TestRun } from './types.js';

export interface SchedulerOptions {
  sessions: BrowserSessionFactory;
  synthesizer: Synthesizer;
  sink?: RunSink;
  analytics?: AnalyticsAggregator;
  maxConcurrency: number;
  /** Waiting runs beyond this are finished errored with an Overloaded summary. Unbounded when unset. */
  maxQueueSize?: number;
  runTimeoutMs: number;
  hardTimeoutGraceMs: number;
  seed: number;
  logger?: Logger;
  idFactory?: () => string;
  /** Called with the metadata of every accepted run before it is queued. */
  onAccepted?: (runId: string, metadata: FormMetadata) => Promise<void>;
}

interface RunJob {
  record: RunRecord;
  metadata: FormMetadata;
  seed: number;
  controller: AbortController;
  session?: BrowserCapability;
  sessionClosed: boolean;
  completed: boolean;
  softTimer?: NodeJS.Timeout;
  hardTimer?: NodeJS.Timeout;
}

function defaultRunId(): string {
  return `run_${nanoid(12)}`;
}

/**
 * Runs form tests in the background: FIFO queue, at most maxConcurrency running
 * at once, cooperative cancellation with a hard timeout backstop.
 */
export class RunScheduler {
  private readonly queue: RunJob[] = [];
  private readonly running = new Map<string, RunJob>();
  private readonly jobs = new Map<string, RunJob>();
  private readonly pendingWrites = new Set<Promise<void>>();
  private idleWaiters: (() => void)[] = [];
  private readonly logger: Logger;
  private readonly idFactory: () => string;

  constructor(private readonly options: SchedulerOptions) {
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
      throw new Error(`maxConcurrency must be a positive integer, got ${options.maxConcurrency}`);
    }
    this.logger = options.logger ?? silentLogger;
    this.idFactory = options.idFactory ?? defaultRunId;
  }

  /** Returns one pending (or, when overloaded, errored) snapshot per distinct scenario. Never throws. */
  submitRun(metadata: FormMetadata, scenarios: readonly Scenario[], options: SubmitOptions = {}): TestRun[] {
    const seed = options.seed ?? this.options.seed;
    const snapshots: TestRun[] = [];
    for (const scenario of new Set(scenarios)) {
      const job: RunJob = {
        record: new RunRecord(this.idFactory(), metadata.id, scenario),
        metadata,
        seed,
        controller: new AbortController(),
        sessionClosed: false,
        completed: false
      };
      this.jobs.set(job.record.id, job);

      const { maxQueueSize } = this.options;
      const freeSlots = Math.max(0, this.options.maxConcurrency - this.running.size);
      const waiting = this.queue.length - freeSlots;
      if (maxQueueSize !== undefined && waiting >= maxQueueSize) {
        const overloaded = new OverloadedError(waiting);
        job.record.finish('errored', { errorSummary: overloaded.message });
        this.logger.warn('run rejected', { runId: job.record.id, reason: overloaded.code });
        this.complete(job);
      } else {
        this.queue.push(job);
        this.track(this.options.onAccepted?.(job.record.id, metadata));
        this.logger.info('run queued', { runId: job.record.id, formId: metadata.id, scenario });
      }
      snapshots.push(job.record.snapshot());
    }
    this.drain();
    return snapshots;
  }

  getRun(runId: string): TestRun | undefined {
    return this.jobs.get(runId)?.record.snapshot();
  }

  listRuns(): TestRun[] {
    return [...this.jobs.values()].map((job) => job.record.snapshot());
  }

  cancelRun(runId: string): CancelAck {
    const job = this.jobs.get(runId);
    if (!job) {
      return { runId, outcome: 'not-found', status: null };
    }
    const { record } = job;
    if (record.terminal) {
      return { runId, outcome: 'noop', status: record.currentStatus };
    }
    const queuedAt = this.queue.indexOf(job);
    if (queuedAt >= 0) {
      this.queue.splice(queuedAt, 1);
      const cancelled = new RunCancelledError('requested');
      record.finish('cancelled', { errorSummary: cancelled.message, cancelCause: 'requested' });
      this.logger.info('queued run cancelled', { runId });
      this.complete(job);
      return { runId, outcome: 'cancelled', status: record.currentStatus };
    }
    if (!job.controller.signal.aborted) {
      job.controller.abort(new RunCancelledError('requested'));
    }
    this.logger.info('run cancelling', { runId });
    return { runId, outcome: 'cancelling', status: record.currentStatus };
  }

  runningCount(): number {
    return this.running.size;
  }

  queuedCount(): number {
    return this.queue.length;
  }

  /** Resolves when nothing is queued or running and every terminal run has been handed to the sink. */
  idle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.running.size === 0 && this.pendingWrites.size === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private track(write: Promise<void> | undefined): void {
    if (!write) {
      return;
    }
    const tracked = write
      .catch((error: unknown) => {
        this.logger.error('run write failed', { error: errorMessage(error) });
      })
      .finally(() => {
        this.pendingWrites.delete(tracked);
        this.notifyIdle();
      });
    this.pendingWrites.add(tracked);
  }

  private drain(): void {
    while (this.running.size < this.options.maxConcurrency) {
      const job = this.queue.shift();
      if (!job) {
        break;
      }
      this.start(job);
    }
    this.notifyIdle();
  }

  private start(job: RunJob): void {
    const { record, controller } = job;
    const { runTimeoutMs, hardTimeoutGraceMs } = this.options;
    this.running.set(record.id, job);
    record.markRunning();
    job.softTimer = setTimeout(() => {
      if (!controller.signal.aborted) {
        this.logger.warn('run timed out, cancelling', { runId: record.id, runTimeoutMs });
        controller.abort(new RunCancelledError('timeout'));
      }
    }, runTimeoutMs);
    job.hardTimer = setTimeout(() => this.forceTimeout(job), runTimeoutMs + hardTimeoutGraceMs);
    this.logger.info('run started', { runId: record.id, scenario: record.scenario });

    void this.execute(job)
      .catch((error: unknown) => {
        record.finish('errored', { errorSummary: errorMessage(error) });
      })
      .finally(() => {
        this.complete(job);
      });
  }

  private async execute(job: RunJob): Promise<void> {
    const { record, metadata, controller } = job;
    const { signal } = controller;
    try {
      const synthesis = await this.options.synthesizer.synthesize(metadata, record.scenario, job.seed);
      const values = planRunValues(metadata, synthesis.values);
      record.setValues(values);
      signal.throwIfAborted();
      const session = await this.options.sessions.open({ runId: record.id });
      job.session = session;
      if (job.completed) {
        return;
      }
      await executeRun({ record, metadata, values, browser: session, signal, logger: this.logger });
    } catch (error) {
      const cancelled =
        error instanceof RunCancelledError
          ? error
          : signal.reason instanceof RunCancelledError
            ? signal.reason
            : undefined;
      if (cancelled) {
        record.finish('cancelled', { errorSummary: cancelled.message, cancelCause: cancelled.cancelCause });
      } else {
        record.finish('errored', { errorSummary: errorMessage(error) });
      }
    } finally {
      await this.releaseSession(job);
    }
  }

  private async releaseSession(job: RunJob): Promise<void> {
    const { session } = job;
    if (!session || job.sessionClosed) {
      return;
    }
    job.sessionClosed = true;
    try {
      await session.close();
    } catch (error) {
      this.logger.warn('session close failed', { runId: job.record.id, error: errorMessage(error) });
    }
  }

  /** The backstop: finalizes the run and frees its slot even if a browser call never returns. */
  private forceTimeout(job: RunJob): void {
    const { record, controller } = job;
    if (job.completed) {
      return;
    }
    const timeout = new RunCancelledError('timeout');
    if (!controller.signal.aborted) {
      controller.abort(timeout);
    }
    record.finish('cancelled', { errorSummary: `${timeout.message} (hard timeout)`, cancelCause: 'timeout' });
    this.logger.warn('run exceeded hard timeout', { runId: record.id });
    this.track(this.releaseSession(job));
    this.complete(job);
  }

  /** Frees the slot and publishes the terminal run. Runs at most once per job. */
  private complete(job: RunJob): void {
    if (job.completed) {
      return;
    }
    job.completed = true;
    clearTimeout(job.softTimer);
    clearTimeout(job.hardTimer);
    const { record } = job;
    if (!record.terminal) {
      record.finish('errored', { errorSummary: 'run ended without a terminal status' });
    }
    this.running.delete(record.id);
    const run = record.snapshot();
    this.options.analytics?.publish(run);
    this.track(this.options.sink?.saveRun(run));
    this.logger.info('run completed', { runId: run.id, status: run.status, durationMs: run.durationMs });
    this.drain();
  }
}
