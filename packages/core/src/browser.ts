import type { CaptureLabel, SubmissionOutcome } from './types.js';

/** Opaque handle to an element a session located; only meaningful to the session that issued it. */
export interface ElementRef {
  readonly locator: string;
}

export interface UploadPayload {
  name: string;
  mimeType: string;
  buffer: Buffer;
}

export type ActCommand =
  | { kind: 'fill'; text: string }
  | { kind: 'assign'; text: string }
  | { kind: 'click'; option?: string }
  | { kind: 'select'; option: string; additive: boolean }
  | { kind: 'select-none' }
  | { kind: 'upload'; files: UploadPayload[] };

/**
 * The browser operations a run depends on. Calls may throw ElementNotFoundError,
 * ActionTimeoutError or ValueRejectedError; any other error aborts the run.
 */
export interface BrowserCapability {
  navigate(url: string): Promise<void>;
  locate(locator: string): Promise<ElementRef | null>;
  act(element: ElementRef, command: ActCommand): Promise<void>;
  isChecked(element: ElementRef, option?: string): Promise<boolean>;
  /** Returns an opaque reference to the stored image. */
  capture(label: CaptureLabel): Promise<string>;
  readSubmissionOutcome(): Promise<SubmissionOutcome>;
  close(): Promise<void>;
}

export interface SessionRequest {
  runId: string;
}

export interface BrowserSessionFactory {
  open(request: SessionRequest): Promise<BrowserCapability>;
}
