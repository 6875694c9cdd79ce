import type { Scenario } from './schema.js';

export type FieldValue = string | number | boolean | string[];

export type ExpectedOutcome = 'accept' | 'reject';

export type ValueVariant = 'primary' | 'lower-inclusive' | 'upper-inclusive' | 'lower-exceeded' | 'upper-exceeded';

export type ConstraintDimension =
  | 'option-membership'
  | 'range'
  | 'numeric-type'
  | 'format'
  | 'pattern'
  | 'min-length'
  | 'max-length'
  | 'required';

interface GeneratedValueBase {
  fieldName: string;
  scenario: Scenario;
  variant: ValueVariant;
  rationale: string;
}

export interface ApplicableValue extends GeneratedValueBase {
  applicable: true;
  value: FieldValue;
  expectedOutcome: ExpectedOutcome;
  violation?: ConstraintDimension;
}

export interface NotApplicableValue extends GeneratedValueBase {
  applicable: false;
  value: null;
  expectedOutcome: 'accept';
}

export type GeneratedValue = ApplicableValue | NotApplicableValue;

export type StepAction = 'fill' | 'select' | 'check' | 'upload' | 'skip';

export type StepStatus = 'ok' | 'elementNotFound' | 'valueRejectedByUI' | 'timeout';

export interface StepResult {
  fieldName: string;
  semanticType: string;
  action: StepAction;
  status: StepStatus;
  timestampOffset: number;
  detail?: string;
}

export type RunStatus = 'pending' | 'running' | 'passed' | 'failed' | 'errored' | 'cancelled';

export type TerminalStatus = Exclude<RunStatus, 'pending' | 'running'>;

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ['passed', 'failed', 'errored', 'cancelled'];

export type CancelCause = 'requested' | 'timeout';

export type ScreenshotStage = 'before' | 'after' | 'error';

export type CaptureLabel = 'before' | 'after-fill' | 'after-submit' | 'error';

export interface Screenshot {
  stage: ScreenshotStage;
  label: CaptureLabel;
  ref: string;
  capturedAt: string;
}

export type SubmissionOutcome = 'success' | 'validationError' | 'unknown';

export interface SubmissionRecord {
  clicked: boolean;
  outcome: SubmissionOutcome | null;
}

export interface TestRun {
  id: string;
  metadataRef: string;
  scenario: Scenario;
  status: RunStatus;
  steps: StepResult[];
  screenshots: Screenshot[];
  values: GeneratedValue[];
  submission: SubmissionRecord;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number | null;
  errorSummary: string | null;
  cancelCause: CancelCause | null;
}

export interface CancelAck {
  runId: string;
  outcome: 'cancelling' | 'cancelled' | 'noop' | 'not-found';
  status: RunStatus | null;
}

export interface SubmitOptions {
  seed?: number;
}

export function isTerminal(status: RunStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.some((terminal) => terminal === status);
}
