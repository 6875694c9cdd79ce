import type { Scenario } from './schema.js';
import {
  isTerminal,
  type CancelCause,
  type GeneratedValue,
  type RunStatus,
  type Screenshot,
  type StepResult,
  type SubmissionOutcome,
  type TerminalStatus,
  type TestRun
} from './types.js';

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Mutable state of one run, owned by the executor that runs it. Every mutator
 * is a no-op once the run has reached a terminal status; readers only ever see
 * frozen snapshots.
 */
export class RunRecord {
  private status: RunStatus = 'pending';
  private readonly steps: StepResult[] = [];
  private readonly screenshots: Screenshot[] = [];
  private values: GeneratedValue[] = [];
  private clicked = false;
  private outcome: SubmissionOutcome | null = null;
  private readonly createdAt = nowIso();
  private startedAt: string | null = null;
  private startedAtMs: number | null = null;
  private finishedAt: string | null = null;
  private durationMs: number | null = null;
  private errorSummary: string | null = null;
  private cancelCause: CancelCause | null = null;

  constructor(
    readonly id: string,
    readonly metadataRef: string,
    readonly scenario: Scenario
  ) {}

  get currentStatus(): RunStatus {
    return this.status;
  }

  get terminal(): boolean {
    return isTerminal(this.status);
  }

  /** Milliseconds since the run started, 0 before it has. */
  elapsedMs(): number {
    return this.startedAtMs === null ? 0 : Date.now() - this.startedAtMs;
  }

  hasErrorCapture(): boolean {
    return this.screenshots.some((screenshot) => screenshot.stage === 'error');
  }

  markRunning(): void {
    if (this.status !== 'pending') {
      return;
    }
    this.status = 'running';
    this.startedAtMs = Date.now();
    this.startedAt = nowIso();
  }

  setValues(values: readonly GeneratedValue[]): void {
    if (!this.terminal) {
      this.values = values.map((value) => ({ ...value }));
    }
  }

  addStep(step: StepResult): void {
    if (!this.terminal) {
      this.steps.push({ ...step });
    }
  }

  addScreenshot(screenshot: Screenshot): void {
    if (this.terminal) {
      return;
    }
    if (screenshot.stage === 'error' && this.hasErrorCapture()) {
      return;
    }
    this.screenshots.push({ ...screenshot });
  }

  recordSubmission(clicked: boolean, outcome: SubmissionOutcome | null): void {
    if (!this.terminal) {
      this.clicked = clicked;
      this.outcome = outcome;
    }
  }

  /** Returns false when the run was already terminal and nothing changed. */
  finish(status: TerminalStatus, details: { errorSummary?: string; cancelCause?: CancelCause } = {}): boolean {
    if (this.terminal) {
      return false;
    }
    this.status = status;
    this.finishedAt = nowIso();
    this.durationMs = this.startedAtMs === null ? 0 : Date.now() - this.startedAtMs;
    this.errorSummary = details.errorSummary ?? null;
    this.cancelCause = details.cancelCause ?? null;
    return true;
  }

  snapshot(): TestRun {
    return deepFreeze({
      id: this.id,
      metadataRef: this.metadataRef,
      scenario: this.scenario,
      status: this.status,
      steps: this.steps.map((step) => ({ ...step })),
      screenshots: this.screenshots.map((screenshot) => ({ ...screenshot })),
      values: this.values.map((value) =>
        value.applicable && Array.isArray(value.value) ? { ...value, value: [...value.value] } : { ...value }
      ),
      submission: { clicked: this.clicked, outcome: this.outcome },
      createdAt: this.createdAt,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      durationMs: this.durationMs,
      errorSummary: this.errorSummary,
      cancelCause: this.cancelCause
    });
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
