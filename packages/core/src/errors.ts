import type { CancelCause } from './types.js';

export type FormProbeErrorCode =
  | 'UNSUPPORTED_FIELD_TYPE'
  | 'GENERATION_FALLBACK'
  | 'ELEMENT_NOT_FOUND'
  | 'ACTION_TIMEOUT'
  | 'VALUE_REJECTED'
  | 'SUBMIT_CONTROL_NOT_FOUND'
  | 'SUBMISSION_UNKNOWN'
  | 'RUN_CANCELLED'
  | 'OVERLOADED';

export class FormProbeError extends Error {
  readonly code: FormProbeErrorCode;

  constructor(code: FormProbeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedFieldTypeError extends FormProbeError {
  constructor(readonly semanticType: string) {
    super('UNSUPPORTED_FIELD_TYPE', `Unsupported field type: ${semanticType}`);
  }
}

/** Informational: the AI generator failed and the rule-based path produced the values. */
export class GenerationFallbackError extends FormProbeError {
  constructor(readonly generator: string, reason: string, options?: { cause?: unknown }) {
    super('GENERATION_FALLBACK', `Generator ${generator} failed, using rules: ${reason}`, options);
  }
}

export class ElementNotFoundError extends FormProbeError {
  constructor(readonly locator: string) {
    super('ELEMENT_NOT_FOUND', `Element not found: ${locator}`);
  }
}

export class ActionTimeoutError extends FormProbeError {
  constructor(action: string, timeoutMs: number, options?: { cause?: unknown }) {
    super('ACTION_TIMEOUT', `Action ${action} timed out after ${timeoutMs}ms`, options);
  }
}

export class ValueRejectedError extends FormProbeError {
  constructor(message: string) {
    super('VALUE_REJECTED', message);
  }
}

export class SubmitControlNotFoundError extends FormProbeError {
  constructor(locator: string) {
    super('SUBMIT_CONTROL_NOT_FOUND', `Submit control not found: ${locator}`);
  }
}

export class SubmissionUnknownError extends FormProbeError {
  constructor() {
    super('SUBMISSION_UNKNOWN', 'Submission outcome could not be read');
  }
}

export class RunCancelledError extends FormProbeError {
  constructor(readonly cancelCause: CancelCause) {
    super('RUN_CANCELLED', cancelCause === 'timeout' ? 'Run timed out' : 'Run cancelled on request');
  }
}

export class OverloadedError extends FormProbeError {
  constructor(queueSize: number) {
    super('OVERLOADED', `Overloaded: run queue is full (${queueSize} waiting)`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
