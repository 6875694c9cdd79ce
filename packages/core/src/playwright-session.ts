import { promises as fs } from 'node:fs';
import path from 'node:path';

import { chromium, errors, type Browser, type BrowserContext, type Locator, type Page } from 'playwright-core';

import type { ActCommand, BrowserCapability, BrowserSessionFactory, ElementRef, SessionRequest } from './browser.js';
import { ActionTimeoutError, ElementNotFoundError, ValueRejectedError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { CaptureLabel, SubmissionOutcome } from './types.js';

const LOCATE_TIMEOUT_MS = 2_000;
const OUTCOME_POLL_MS = 100;

export const DEFAULT_SUCCESS_INDICATORS = [
  'text=/thank you/i',
  'text=/successfully submitted/i',
  '.success',
  '.alert-success',
  '[data-testid="form-success"]'
];

export const DEFAULT_ERROR_INDICATORS = [
  'form :invalid',
  '[aria-invalid="true"]',
  '.error',
  '.alert-error',
  '.alert-danger',
  '[data-testid="form-error"]'
];

export interface PlaywrightSessionOptions {
  headless: boolean;
  artifactsRoot: string;
  actionTimeoutMs: number;
  /** How long to wait after submitting for a success or error indicator. */
  outcomeTimeoutMs?: number;
  successIndicators?: string[];
  errorIndicators?: string[];
  logger?: Logger;
}

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

class PlaywrightSession implements BrowserCapability {
  private readonly runDir: string;

  constructor(
    private readonly runId: string,
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: PlaywrightSessionOptions,
    private readonly logger: Logger
  ) {
    this.runDir = path.join(options.artifactsRoot, runId);
  }

  private target(element: ElementRef, option?: string): Locator {
    const locator = this.page.locator(element.locator);
    if (option === undefined) {
      return locator.first();
    }
    return locator.and(this.page.locator(`[value=${JSON.stringify(option)}]`)).first();
  }

  private async guarded<T>(action: string, locator: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof ValueRejectedError || error instanceof ElementNotFoundError) {
        throw error;
      }
      if (isTimeout(error)) {
        throw new ActionTimeoutError(`${action} ${locator}`, this.options.actionTimeoutMs, { cause: error });
      }
      const message = errorMessage(error);
      if (/malformed value|cannot type|not an? (input|select)|element is not/i.test(message)) {
        throw new ValueRejectedError(`${action} ${locator}: ${message.split('\n')[0] ?? message}`);
      }
      throw error;
    }
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.actionTimeoutMs });
  }

  async locate(locator: string): Promise<ElementRef | null> {
    try {
      await this.page
        .locator(locator)
        .first()
        .waitFor({ state: 'attached', timeout: Math.min(this.options.actionTimeoutMs, LOCATE_TIMEOUT_MS) });
      return { locator };
    } catch (error) {
      if (isTimeout(error)) {
        return null;
      }
      throw error;
    }
  }

  async act(element: ElementRef, command: ActCommand): Promise<void> {
    const timeout = this.options.actionTimeoutMs;
    await this.guarded(command.kind, element.locator, async () => {
      switch (command.kind) {
        case 'fill': {
          const locator = this.target(element);
          await locator.fill(command.text, { timeout });
          const actual = await locator.inputValue({ timeout });
          if (actual !== command.text) {
            throw new ValueRejectedError(`field ${element.locator} holds ${JSON.stringify(actual)} after filling`);
          }
          return;
        }
        case 'assign':
          await this.target(element).evaluate((node, value) => {
            if (node instanceof HTMLInputElement || node instanceof HTMLTextAreaElement) {
              node.value = value;
            }
          }, command.text);
          return;
        case 'click':
          await this.target(element, command.option).click({ timeout });
          return;
        case 'select': {
          const locator = this.target(element);
          const available = await locator.evaluate((node) =>
            node instanceof HTMLSelectElement ? Array.from(node.options).map((option) => option.value) : []
          );
          if (!available.includes(command.option)) {
            throw new ValueRejectedError(
              `option ${JSON.stringify(command.option)} is not offered by ${element.locator}`
            );
          }
          const current = command.additive
            ? await locator.evaluate((node) =>
                node instanceof HTMLSelectElement ? Array.from(node.selectedOptions).map((option) => option.value) : []
              )
            : [];
          await locator.selectOption([...current, command.option], { timeout });
          return;
        }
        case 'select-none':
          await this.target(element).selectOption([], { timeout });
          return;
        case 'upload':
          await this.target(element).setInputFiles(command.files, { timeout });
          return;
        default: {
          const unknownCommand: never = command;
          throw new Error(`Unknown command: ${JSON.stringify(unknownCommand)}`);
        }
      }
    });
  }

  async isChecked(element: ElementRef, option?: string): Promise<boolean> {
    return this.guarded('isChecked', element.locator, () =>
      this.target(element, option).isChecked({ timeout: this.options.actionTimeoutMs })
    );
  }

  async capture(label: CaptureLabel): Promise<string> {
    await fs.mkdir(this.runDir, { recursive: true });
    const screenshotPath = path.join(this.runDir, `${label}.png`);
    await this.page.screenshot({ path: screenshotPath, fullPage: true });
    return screenshotPath;
  }

  private async anyVisible(selectors: readonly string[]): Promise<boolean> {
    for (const selector of selectors) {
      if ((await this.page.locator(selector).count()) > 0 && (await this.page.locator(selector).first().isVisible())) {
        return true;
      }
    }
    return false;
  }

  async readSubmissionOutcome(): Promise<SubmissionOutcome> {
    const success = this.options.successIndicators ?? DEFAULT_SUCCESS_INDICATORS;
    const failure = this.options.errorIndicators ?? DEFAULT_ERROR_INDICATORS;
    const deadline = Date.now() + (this.options.outcomeTimeoutMs ?? this.options.actionTimeoutMs);
    while (Date.now() < deadline) {
      if (await this.anyVisible(failure)) {
        return 'validationError';
      }
      if (await this.anyVisible(success)) {
        return 'success';
      }
      await this.page.waitForTimeout(OUTCOME_POLL_MS);
    }
    return 'unknown';
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
      this.logger.debug('browser session closed', { runId: this.runId });
    }
  }
}

/** Opens one headless Chromium per run. */
export class PlaywrightSessionFactory implements BrowserSessionFactory {
  private readonly logger: Logger;

  constructor(private readonly options: PlaywrightSessionOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async open(request: SessionRequest): Promise<BrowserCapability> {
    const browser = await chromium.launch({ headless: this.options.headless });
    try {
      const context = await browser.newContext();
      const page = await context.newPage();
      page.setDefaultTimeout(this.options.actionTimeoutMs);
      this.logger.debug('browser session opened', { runId: request.runId });
      return new PlaywrightSession(request.runId, browser, context, page, this.options, this.logger);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
