import type { ActCommand, BrowserCapability, ElementRef, UploadPayload } from './browser.js';
import { resolveRules } from './catalog.js';
import type { FieldSpec } from './schema.js';
import type { FieldValue, GeneratedValue, StepAction } from './types.js';

export type BrowserAction =
  | { kind: 'fill'; text: string }
  | { kind: 'assign'; text: string }
  | { kind: 'check'; option?: string }
  | { kind: 'uncheck' }
  | { kind: 'select'; option: string; additive: boolean }
  | { kind: 'clear' }
  | { kind: 'upload'; files: UploadPayload[] }
  | { kind: 'skip'; reason: string };

const MIME_TYPES: Record<string, string> = {
  txt: 'text/plain',
  csv: 'text/csv',
  pdf: 'application/pdf',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  json: 'application/json'
};

function asText(value: FieldValue): string {
  return Array.isArray(value) ? value.join(',') : String(value);
}

function asChecked(value: FieldValue): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return ['true', 'on', '1', 'yes'].includes(String(value).toLowerCase());
}

/** Builds an in-memory file for a synthesized file name. Names starting with "empty" get no content. */
export function uploadPayload(name: string): UploadPayload {
  const extension = name.includes('.') ? (name.split('.').pop() ?? '').toLowerCase() : '';
  return {
    name,
    mimeType: MIME_TYPES[extension] ?? 'application/octet-stream',
    buffer: name.startsWith('empty') ? Buffer.alloc(0) : Buffer.from(`formprobe sample file ${name}\n`, 'utf8')
  };
}

function uploadFiles(value: FieldValue): UploadPayload[] {
  const names = Array.isArray(value) ? value : [asText(value)];
  return names.filter((name) => name.length > 0).map(uploadPayload);
}

/** Maps one generated value to the browser actions that apply it, in order. */
export function actionsFor(field: FieldSpec, generated: GeneratedValue): BrowserAction[] {
  if (!generated.applicable) {
    return [{ kind: 'skip', reason: generated.rationale || 'not applicable' }];
  }
  const { value } = generated;
  const { rules } = resolveRules(field.semanticType);
  switch (rules.interaction) {
    case 'fill':
      return [{ kind: 'fill', text: asText(value) }];
    case 'assign':
      return [{ kind: 'assign', text: asText(value) }];
    case 'toggle':
      return [asChecked(value) ? { kind: 'check' } : { kind: 'uncheck' }];
    case 'radio': {
      const option = asText(value);
      return option.length > 0
        ? [{ kind: 'check', option }]
        : [{ kind: 'skip', reason: 'a radio group cannot be cleared' }];
    }
    case 'choose': {
      const options = Array.isArray(value) ? value : [asText(value)];
      if (options.length === 0) {
        return [{ kind: 'clear' }];
      }
      return options.map((option, index) => ({ kind: 'select', option, additive: index > 0 }));
    }
    case 'upload':
      return [{ kind: 'upload', files: uploadFiles(value) }];
    default: {
      const unknownRule: never = rules.interaction;
      throw new Error(`Unknown interaction rule: ${String(unknownRule)}`);
    }
  }
}

export function stepActionFor(actions: readonly BrowserAction[]): StepAction {
  const first = actions[0];
  if (!first) {
    return 'skip';
  }
  switch (first.kind) {
    case 'fill':
    case 'assign':
      return 'fill';
    case 'check':
    case 'uncheck':
      return 'check';
    case 'select':
    case 'clear':
      return 'select';
    case 'upload':
      return 'upload';
    case 'skip':
      return 'skip';
    default: {
      const unknownAction: never = first;
      throw new Error(`Unknown action: ${JSON.stringify(unknownAction)}`);
    }
  }
}

function commandFor(action: Exclude<BrowserAction, { kind: 'skip' | 'check' | 'uncheck' }>): ActCommand {
  switch (action.kind) {
    case 'fill':
      return { kind: 'fill', text: action.text };
    case 'assign':
      return { kind: 'assign', text: action.text };
    case 'select':
      return { kind: 'select', option: action.option, additive: action.additive };
    case 'clear':
      return { kind: 'select-none' };
    case 'upload':
      return { kind: 'upload', files: action.files };
    default: {
      const unknownAction: never = action;
      throw new Error(`Unknown action: ${JSON.stringify(unknownAction)}`);
    }
  }
}

/**
 * Applies one action. Check and uncheck are target-state actions: the current
 * state is read first and the element is clicked only when it differs.
 */
export async function performAction(
  browser: BrowserCapability,
  element: ElementRef,
  action: BrowserAction,
  signal: AbortSignal
): Promise<void> {
  switch (action.kind) {
    case 'skip':
      return;
    case 'check':
    case 'uncheck': {
      const option = action.kind === 'check' ? action.option : undefined;
      signal.throwIfAborted();
      const checked = await browser.isChecked(element, option);
      if (checked === (action.kind === 'check')) {
        return;
      }
      signal.throwIfAborted();
      await browser.act(element, { kind: 'click', option });
      return;
    }
    default:
      signal.throwIfAborted();
      await browser.act(element, commandFor(action));
  }
}
