import { parseProvider } from '@formprobe/ai';
import { SCENARIOS, scenarioSchema, type EngineConfig, type Scenario } from '@formprobe/core';

export interface ConfigOptions {
  env?: string;
  artifactsRoot?: string;
  provider?: string;
  recent?: string;
}

/** Comma-separated scenarios, or "all". Repeats collapse to one run each. */
export function parseScenarios(value: string): Scenario[] {
  if (value === 'all') {
    return [...SCENARIOS];
  }
  return [...new Set(value.split(',').map((scenario) => scenarioSchema.parse(scenario.trim())))];
}

export function parseSeed(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const seed = Number(value);
  if (!Number.isInteger(seed)) {
    throw new Error(`Seed must be an integer, got ${value}`);
  }
  return seed;
}

export function parsePositiveInt(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${label} must be a positive integer, got ${value}`);
  }
  return parsed;
}

/** Applies command-line overrides on top of the environment configuration. */
export function resolveConfig(options: ConfigOptions, config: EngineConfig): EngineConfig {
  return {
    ...config,
    artifactsRoot: options.artifactsRoot ?? config.artifactsRoot,
    aiProvider: options.provider === undefined ? config.aiProvider : parseProvider(options.provider),
    recentFailures: options.recent === undefined ? config.recentFailures : parsePositiveInt(options.recent, '--recent')
  };
}
