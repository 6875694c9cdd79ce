import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { SCENARIOS, type Scenario } from './schema.js';
import { isTerminal, type StepStatus, type TerminalStatus, type TestRun } from './types.js';

export const FAILURE_CATEGORIES = [
  'elementNotFound',
  'timeout',
  'valueRejectedByUI',
  'submissionUnknown',
  'runTimeout',
  'cancelled',
  'other'
] as const;

export type FailureCategory = (typeof FAILURE_CATEGORIES)[number];

export interface FieldTypeStats {
  steps: number;
  failures: number;
  failureRate: number;
}

export interface ScenarioStats {
  passed: number;
  total: number;
}

export interface FormStats {
  passed: number;
  total: number;
  passRate: number;
  meanDurationMs: number;
}

export interface FailureEntry {
  runId: string;
  scenario: Scenario;
  status: TerminalStatus;
  category: FailureCategory;
  errorSummary: string | null;
  finishedAt: string | null;
}

export interface AnalyticsSnapshot {
  totalRuns: number;
  byStatus: Record<TerminalStatus, number>;
  passRate: number;
  meanDurationMs: number;
  minDurationMs: number | null;
  maxDurationMs: number | null;
  fieldTypes: Record<string, FieldTypeStats>;
  failureCategories: Record<FailureCategory, number>;
  scenarios: Record<Scenario, ScenarioStats>;
  /** Keyed by the form metadata id each run was created from. */
  forms: Record<string, FormStats>;
  recentFailures: FailureEntry[];
}

/** Fixed-capacity buffer; pushing past capacity evicts the oldest entry. */
export class RingBuffer<T> {
  private readonly items: (T | undefined)[];
  private start = 0;
  private size = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity).fill(undefined);
  }

  push(item: T): void {
    if (this.size < this.capacity) {
      this.items[(this.start + this.size) % this.capacity] = item;
      this.size += 1;
      return;
    }
    this.items[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
  }

  /** Oldest first. */
  toArray(): T[] {
    const output: T[] = [];
    for (let index = 0; index < this.size; index += 1) {
      const item = this.items[(this.start + index) % this.capacity];
      if (item !== undefined) {
        output.push(item);
      }
    }
    return output;
  }
}

const STEP_CATEGORIES: Partial<Record<StepStatus, FailureCategory>> = {
  elementNotFound: 'elementNotFound',
  timeout: 'timeout',
  valueRejectedByUI: 'valueRejectedByUI'
};

export function failureCategoryOf(run: TestRun): FailureCategory {
  if (run.status === 'cancelled') {
    return run.cancelCause === 'timeout' ? 'runTimeout' : 'cancelled';
  }
  if (run.status === 'errored' && run.submission.outcome === 'unknown') {
    return 'submissionUnknown';
  }
  for (const step of run.steps) {
    const category = STEP_CATEGORIES[step.status];
    if (category) {
      return category;
    }
  }
  return 'other';
}

function emptyStatusCounts(): Record<TerminalStatus, number> {
  return { passed: 0, failed: 0, errored: 0, cancelled: 0 };
}

function emptyCategoryCounts(): Record<FailureCategory, number> {
  return {
    elementNotFound: 0,
    timeout: 0,
    valueRejectedByUI: 0,
    submissionUnknown: 0,
    runTimeout: 0,
    cancelled: 0,
    other: 0
  };
}

function emptyScenarioStats(): Record<Scenario, ScenarioStats> {
  return {
    valid: { passed: 0, total: 0 },
    invalid: { passed: 0, total: 0 },
    edgeCase: { passed: 0, total: 0 },
    boundary: { passed: 0, total: 0 }
  };
}

interface FormCounters {
  passed: number;
  total: number;
  durationTotalMs: number;
  durationCount: number;
}

export interface AnalyticsOptions {
  recentFailures?: number;
  logger?: Logger;
}

/**
 * Owns the rolling metrics. Terminal runs arrive through publish() and are folded
 * one at a time from an internal queue, so callers never touch the counters.
 */
export class AnalyticsAggregator {
  private readonly inbox: TestRun[] = [];
  private draining = false;
  private waiters: (() => void)[] = [];

  private totalRuns = 0;
  private readonly byStatus = emptyStatusCounts();
  private readonly failureCategories = emptyCategoryCounts();
  private readonly scenarios = emptyScenarioStats();
  private readonly fieldTypes = new Map<string, { steps: number; failures: number }>();
  private readonly forms = new Map<string, FormCounters>();
  private durationTotalMs = 0;
  private durationCount = 0;
  private minDurationMs: number | null = null;
  private maxDurationMs: number | null = null;
  private readonly recentFailures: RingBuffer<FailureEntry>;
  private readonly logger: Logger;

  constructor(options: AnalyticsOptions = {}) {
    this.recentFailures = new RingBuffer(options.recentFailures ?? 20);
    this.logger = options.logger ?? silentLogger;
  }

  publish(run: TestRun): void {
    this.inbox.push(run);
    if (!this.draining) {
      this.draining = true;
      queueMicrotask(() => this.drain());
    }
  }

  /** Resolves once every published run has been folded. */
  settled(): Promise<void> {
    if (!this.draining && this.inbox.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private drain(): void {
    try {
      let next = this.inbox.shift();
      while (next) {
        try {
          this.fold(next);
        } catch (error) {
          this.logger.error('failed to fold run', { runId: next.id, error: errorMessage(error) });
        }
        next = this.inbox.shift();
      }
    } finally {
      this.draining = false;
      const waiters = this.waiters;
      this.waiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  private fold(run: TestRun): void {
    if (!isTerminal(run.status)) {
      this.logger.warn('ignoring non-terminal run', { runId: run.id, status: run.status });
      return;
    }
    const status = run.status;
    this.totalRuns += 1;
    this.byStatus[status] += 1;
    this.scenarios[run.scenario].total += 1;
    if (status === 'passed') {
      this.scenarios[run.scenario].passed += 1;
    }
    const form = this.forms.get(run.metadataRef) ?? { passed: 0, total: 0, durationTotalMs: 0, durationCount: 0 };
    form.total += 1;
    if (status === 'passed') {
      form.passed += 1;
    }
    if (run.durationMs !== null) {
      this.durationTotalMs += run.durationMs;
      this.durationCount += 1;
      this.minDurationMs = this.minDurationMs === null ? run.durationMs : Math.min(this.minDurationMs, run.durationMs);
      this.maxDurationMs = this.maxDurationMs === null ? run.durationMs : Math.max(this.maxDurationMs, run.durationMs);
      form.durationTotalMs += run.durationMs;
      form.durationCount += 1;
    }
    this.forms.set(run.metadataRef, form);
    for (const step of run.steps) {
      const stats = this.fieldTypes.get(step.semanticType) ?? { steps: 0, failures: 0 };
      stats.steps += 1;
      if (step.status !== 'ok') {
        stats.failures += 1;
      }
      this.fieldTypes.set(step.semanticType, stats);
    }
    if (status !== 'passed') {
      const category = failureCategoryOf(run);
      this.failureCategories[category] += 1;
      this.recentFailures.push({
        runId: run.id,
        scenario: run.scenario,
        status,
        category,
        errorSummary: run.errorSummary,
        finishedAt: run.finishedAt
      });
    }
    this.logger.debug('run folded', { runId: run.id, status, totalRuns: this.totalRuns });
  }

  snapshot(): AnalyticsSnapshot {
    const fieldTypes: Record<string, FieldTypeStats> = {};
    for (const [semanticType, stats] of this.fieldTypes) {
      fieldTypes[semanticType] = {
        steps: stats.steps,
        failures: stats.failures,
        failureRate: stats.steps === 0 ? 0 : stats.failures / stats.steps
      };
    }
    const forms: Record<string, FormStats> = {};
    for (const [formId, stats] of this.forms) {
      forms[formId] = {
        passed: stats.passed,
        total: stats.total,
        passRate: stats.total === 0 ? 0 : stats.passed / stats.total,
        meanDurationMs: stats.durationCount === 0 ? 0 : stats.durationTotalMs / stats.durationCount
      };
    }
    const scenarios = emptyScenarioStats();
    for (const scenario of SCENARIOS) {
      scenarios[scenario] = { ...this.scenarios[scenario] };
    }
    return {
      totalRuns: this.totalRuns,
      byStatus: { ...this.byStatus },
      passRate: this.totalRuns === 0 ? 0 : this.byStatus.passed / this.totalRuns,
      meanDurationMs: this.durationCount === 0 ? 0 : this.durationTotalMs / this.durationCount,
      minDurationMs: this.minDurationMs,
      maxDurationMs: this.maxDurationMs,
      fieldTypes,
      failureCategories: { ...this.failureCategories },
      scenarios,
      forms,
      recentFailures: this.recentFailures.toArray().reverse()
    };
  }
}

const LOW_PASS_RATE = 0.9;
const SLOW_RUN_MS = 60_000;
const WEAK_FIELD_TYPE_RATE = 0.25;

export function recommendationsFor(snapshot: AnalyticsSnapshot): string[] {
  if (snapshot.totalRuns === 0) {
    return ['No runs recorded yet. Submit runs to start collecting metrics.'];
  }
  const recommendations: string[] = [];
  if (snapshot.passRate < LOW_PASS_RATE) {
    recommendations.push(
      `Pass rate is ${(snapshot.passRate * 100).toFixed(1)}%. Review the recent failures for a common cause.`
    );
  }
  if (snapshot.meanDurationMs > SLOW_RUN_MS) {
    const seconds = (snapshot.meanDurationMs / 1000).toFixed(1);
    recommendations.push(`Runs take ${seconds}s on average. Check for slow pages or long action timeouts.`);
  }
  let dominant: { category: FailureCategory; count: number } | undefined;
  for (const category of FAILURE_CATEGORIES) {
    const count = snapshot.failureCategories[category];
    if (count > 0 && (!dominant || count > dominant.count)) {
      dominant = { category, count };
    }
  }
  if (dominant) {
    recommendations.push(`Most failures are ${dominant.category} (${dominant.count} runs).`);
  }
  for (const [semanticType, stats] of Object.entries(snapshot.fieldTypes)) {
    if (stats.failureRate >= WEAK_FIELD_TYPE_RATE) {
      const rate = (stats.failureRate * 100).toFixed(1);
      recommendations.push(
        `${semanticType} fields fail ${rate}% of steps. Verify their locators and interaction rules.`
      );
    }
  }
  if (recommendations.length === 0) {
    recommendations.push('All metrics are within expected ranges.');
  }
  return recommendations;
}

export interface FormRanking extends FormStats {
  formId: string;
}

/** Forms ordered best first: higher pass rate, then faster mean duration, then id. */
export function rankForms(snapshot: AnalyticsSnapshot): FormRanking[] {
  return Object.entries(snapshot.forms)
    .map(([formId, stats]) => ({ formId, ...stats }))
    .sort(
      (left, right) =>
        right.passRate - left.passRate ||
        left.meanDurationMs - right.meanDurationMs ||
        left.formId.localeCompare(right.formId)
    );
}
