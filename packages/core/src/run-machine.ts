import type { BrowserCapability } from './browser.js';
import {
  ActionTimeoutError,
  ElementNotFoundError,
  RunCancelledError,
  SubmissionUnknownError,
  SubmitControlNotFoundError,
  ValueRejectedError,
  errorMessage
} from './errors.js';
import { actionsFor, performAction, stepActionFor } from './interaction.js';
import type { Logger } from './logger.js';
import type { RunRecord } from './run-record.js';
import type { FieldSpec, FormMetadata } from './schema.js';
import type { CaptureLabel, GeneratedValue, ScreenshotStage, StepStatus, SubmissionOutcome } from './types.js';

export interface RunContext {
  record: RunRecord;
  metadata: FormMetadata;
  /** One value per field, in field order. */
  values: readonly GeneratedValue[];
  browser: BrowserCapability;
  signal: AbortSignal;
  logger: Logger;
}

interface FieldOutcome {
  status: StepStatus;
  detail?: string;
}

function cancellationOf(error: unknown, signal: AbortSignal): RunCancelledError | undefined {
  if (error instanceof RunCancelledError) {
    return error;
  }
  if (signal.aborted && signal.reason instanceof RunCancelledError) {
    return signal.reason;
  }
  return undefined;
}

function stepStatusFor(error: unknown): FieldOutcome | undefined {
  if (error instanceof ElementNotFoundError) {
    return { status: 'elementNotFound', detail: error.message };
  }
  if (error instanceof ActionTimeoutError) {
    return { status: 'timeout', detail: error.message };
  }
  if (error instanceof ValueRejectedError) {
    return { status: 'valueRejectedByUI', detail: error.message };
  }
  return undefined;
}

/** All-or-nothing: any value expected to be rejected means the form as a whole should refuse the submission. */
export function expectedSubmission(values: readonly GeneratedValue[]): Exclude<SubmissionOutcome, 'unknown'> {
  return values.some((value) => value.applicable && value.expectedOutcome === 'reject') ? 'validationError' : 'success';
}

class RunMachine {
  private requiredFailure: string | undefined;

  constructor(private readonly ctx: RunContext) {}

  private guard(): void {
    this.ctx.signal.throwIfAborted();
  }

  private async capture(stage: ScreenshotStage, label: CaptureLabel): Promise<void> {
    this.guard();
    const ref = await this.ctx.browser.capture(label);
    this.ctx.record.addScreenshot({ stage, label, ref, capturedAt: new Date().toISOString() });
  }

  private async captureError(): Promise<void> {
    const { record, browser, logger } = this.ctx;
    if (record.hasErrorCapture()) {
      return;
    }
    try {
      const ref = await browser.capture('error');
      record.addScreenshot({ stage: 'error', label: 'error', ref, capturedAt: new Date().toISOString() });
    } catch (error) {
      logger.warn('error capture failed', { runId: record.id, error: errorMessage(error) });
    }
  }

  private async applyField(field: FieldSpec, generated: GeneratedValue): Promise<void> {
    const { record, browser, signal, logger } = this.ctx;
    const actions = actionsFor(field, generated);
    const action = stepActionFor(actions);
    const timestampOffset = record.elapsedMs();
    const base = { fieldName: field.name, semanticType: field.semanticType, action, timestampOffset };

    const skip = actions.find((candidate) => candidate.kind === 'skip');
    if (skip && skip.kind === 'skip') {
      record.addStep({ ...base, status: 'ok', detail: skip.reason });
      return;
    }

    let outcome: FieldOutcome = { status: 'ok' };
    try {
      this.guard();
      const element = await browser.locate(field.locator);
      if (!element) {
        throw new ElementNotFoundError(field.locator);
      }
      for (const next of actions) {
        await performAction(browser, element, next, signal);
      }
    } catch (error) {
      const recorded = stepStatusFor(error);
      if (!recorded) {
        throw error;
      }
      outcome = recorded;
    }

    record.addStep({ ...base, ...outcome });
    if (outcome.status !== 'ok') {
      logger.debug('field step failed', { runId: record.id, field: field.name, status: outcome.status });
    }
    if (field.required && (outcome.status === 'elementNotFound' || outcome.status === 'timeout')) {
      this.requiredFailure ??= `required field ${field.name}: ${outcome.status}`;
    }
  }

  private async submit(): Promise<SubmissionOutcome> {
    const { record, browser, metadata } = this.ctx;
    this.guard();
    const control = await browser.locate(metadata.submitLocator);
    if (!control) {
      throw new SubmitControlNotFoundError(metadata.submitLocator);
    }
    this.guard();
    await browser.act(control, { kind: 'click' });
    record.recordSubmission(true, null);
    await this.capture('after', 'after-submit');
    this.guard();
    const outcome = await browser.readSubmissionOutcome();
    record.recordSubmission(true, outcome);
    return outcome;
  }

  private judge(outcome: SubmissionOutcome): void {
    const { record, values } = this.ctx;
    if (this.requiredFailure) {
      record.finish('failed', { errorSummary: this.requiredFailure });
      return;
    }
    if (outcome === 'unknown') {
      throw new SubmissionUnknownError();
    }
    const expected = expectedSubmission(values);
    if (outcome === expected) {
      record.finish('passed');
    } else {
      record.finish('failed', { errorSummary: `expected ${expected}, form reported ${outcome}` });
    }
  }

  private async fail(error: unknown): Promise<void> {
    const { record, signal } = this.ctx;
    const cancelled = cancellationOf(error, signal);
    if (cancelled) {
      await this.captureError();
      record.finish('cancelled', { errorSummary: cancelled.message, cancelCause: cancelled.cancelCause });
      return;
    }
    if (
      this.requiredFailure &&
      (error instanceof SubmitControlNotFoundError || error instanceof SubmissionUnknownError)
    ) {
      record.finish('failed', { errorSummary: `${this.requiredFailure}; ${error.message}` });
      return;
    }
    await this.captureError();
    record.finish('errored', { errorSummary: errorMessage(error) });
  }

  async run(): Promise<void> {
    const { record, metadata, values, browser } = this.ctx;
    record.markRunning();
    record.setValues(values);
    try {
      this.guard();
      await browser.navigate(metadata.url);
      await this.capture('before', 'before');
      for (const field of metadata.fields) {
        const generated = values.find((value) => value.fieldName === field.name);
        if (!generated) {
          throw new Error(`no value planned for field ${field.name}`);
        }
        await this.applyField(field, generated);
      }
      await this.capture('after', 'after-fill');
      this.judge(await this.submit());
    } catch (error) {
      await this.fail(error);
    }
  }
}

/**
 * Drives one run to a terminal status. Never throws: every failure ends up in
 * the record's status and errorSummary.
 */
export async function executeRun(ctx: RunContext): Promise<void> {
  await new RunMachine(ctx).run();
  const run = ctx.record;
  ctx.logger.info('run finished', { runId: run.id, scenario: run.scenario, status: run.currentStatus });
}
