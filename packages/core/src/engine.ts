import { AnalyticsAggregator, type AnalyticsSnapshot, type FormStats } from './analytics.js';
import type { BrowserSessionFactory } from './browser.js';
import { describeFieldTypes, describeScenarios, type FieldTypeSummary } from './catalog.js';
import type { EngineConfig } from './config.js';
import { createLogger, silentLogger, type Logger } from './logger.js';
import { PlaywrightSessionFactory } from './playwright-session.js';
import { RunScheduler } from './scheduler.js';
import { formMetadataSchema, type FormMetadata, type Scenario } from './schema.js';
import { FileRunSink, type RunSink } from './sink.js';
import { Synthesizer, type SynthesisResult, type ValueGenerator } from './synthesizer.js';
import type { CancelAck, SubmitOptions, TestRun } from './types.js';

export interface FormTestEngineOptions {
  sessions: BrowserSessionFactory;
  sink?: RunSink;
  generator?: ValueGenerator;
  maxConcurrency?: number;
  maxQueueSize?: number;
  runTimeoutMs?: number;
  hardTimeoutGraceMs?: number;
  aiTimeoutMs?: number;
  seed?: number;
  recentFailures?: number;
  logger?: Logger;
  idFactory?: () => string;
  onAccepted?: (runId: string, metadata: FormMetadata) => Promise<void>;
}

/** The one object adapters talk to: synthesis, background runs and metrics. */
export class FormTestEngine {
  private readonly synthesizer: Synthesizer;
  private readonly scheduler: RunScheduler;
  private readonly analytics: AnalyticsAggregator;
  readonly seed: number;

  constructor(options: FormTestEngineOptions) {
    const logger = options.logger ?? silentLogger;
    this.seed = options.seed ?? 1;
    this.analytics = new AnalyticsAggregator({
      recentFailures: options.recentFailures,
      logger: logger.child('analytics')
    });
    this.synthesizer = new Synthesizer({
      generator: options.generator,
      timeoutMs: options.aiTimeoutMs,
      logger: logger.child('synthesizer')
    });
    this.scheduler = new RunScheduler({
      sessions: options.sessions,
      synthesizer: this.synthesizer,
      sink: options.sink,
      analytics: this.analytics,
      maxConcurrency: options.maxConcurrency ?? 2,
      maxQueueSize: options.maxQueueSize,
      runTimeoutMs: options.runTimeoutMs ?? 60_000,
      hardTimeoutGraceMs: options.hardTimeoutGraceMs ?? 5_000,
      seed: this.seed,
      logger: logger.child('scheduler'),
      idFactory: options.idFactory,
      onAccepted: options.onAccepted
    });
  }

  async synthesize(metadata: FormMetadata, scenario: Scenario, seed: number = this.seed): Promise<SynthesisResult> {
    return this.synthesizer.synthesize(formMetadataSchema.parse(metadata), scenario, seed);
  }

  submitRun(metadata: FormMetadata, scenarios: readonly Scenario[], options?: SubmitOptions): TestRun[] {
    return this.scheduler.submitRun(metadata, scenarios, options);
  }

  getRun(runId: string): TestRun | undefined {
    return this.scheduler.getRun(runId);
  }

  listRuns(): TestRun[] {
    return this.scheduler.listRuns();
  }

  runsForForm(formId: string): TestRun[] {
    return this.scheduler.listRuns().filter((run) => run.metadataRef === formId);
  }

  cancelRun(runId: string): CancelAck {
    return this.scheduler.cancelRun(runId);
  }

  aggregatedMetrics(): AnalyticsSnapshot {
    return this.analytics.snapshot();
  }

  /** Undefined until a run of the form has finished. */
  formMetrics(formId: string): FormStats | undefined {
    return this.analytics.snapshot().forms[formId];
  }

  scenarios(): { scenario: Scenario; description: string }[] {
    return describeScenarios();
  }

  fieldTypes(): FieldTypeSummary[] {
    return describeFieldTypes();
  }

  /** Resolves when no run is queued or running and every result has been folded and written. */
  async idle(): Promise<void> {
    await this.scheduler.idle();
    await this.analytics.settled();
  }
}

export interface CreateEngineOverrides {
  sessions?: BrowserSessionFactory;
  sink?: RunSink;
  generator?: ValueGenerator;
  logger?: Logger;
}

/** Wires the default adapters from configuration: Playwright sessions and a file sink under artifactsRoot. */
export function createEngine(config: EngineConfig, overrides: CreateEngineOverrides = {}): FormTestEngine {
  const logger = overrides.logger ?? createLogger('formprobe', config.logLevel);
  const fileSink = new FileRunSink(config.artifactsRoot);
  const sink = overrides.sink ?? fileSink;
  return new FormTestEngine({
    sessions:
      overrides.sessions ??
      new PlaywrightSessionFactory({
        headless: config.headless,
        artifactsRoot: config.artifactsRoot,
        actionTimeoutMs: config.actionTimeoutMs,
        logger: logger.child('browser')
      }),
    sink,
    generator: overrides.generator,
    maxConcurrency: config.maxConcurrency,
    maxQueueSize: config.maxQueueSize,
    runTimeoutMs: config.runTimeoutMs,
    hardTimeoutGraceMs: config.hardTimeoutGraceMs,
    aiTimeoutMs: config.aiTimeoutMs,
    seed: config.seed,
    recentFailures: config.recentFailures,
    logger,
    onAccepted: sink === fileSink ? (runId, metadata) => fileSink.saveMetadata(runId, metadata) : undefined
  });
}
