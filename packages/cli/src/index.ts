#!/usr/bin/env node
import { promises as fs } from 'node:fs';

import { valueGeneratorForProvider } from '@formprobe/ai';
import {
  AnalyticsAggregator,
  FileRunSink,
  createEngine,
  createLogger,
  formMetadataSchema,
  loadEngineConfigFromFile,
  metricsReportLines,
  runSummaryLines,
  scenarioSchema,
  valueLines,
  type EngineConfig,
  type FormMetadata,
  type FormTestEngine
} from '@formprobe/core';
import { Command } from 'commander';

import { parseScenarios, parseSeed, resolveConfig, type ConfigOptions } from './options.js';

function loadConfig(options: ConfigOptions): EngineConfig {
  return resolveConfig(options, loadEngineConfigFromFile(options.env));
}

async function readMetadata(metadataPath: string): Promise<FormMetadata> {
  const raw = await fs.readFile(metadataPath, 'utf8');
  return formMetadataSchema.parse(JSON.parse(raw));
}

function engineFor(config: EngineConfig): FormTestEngine {
  return createEngine(config, {
    generator: valueGeneratorForProvider(config.aiProvider, process.env, config.aiTimeoutMs)
  });
}

const program = new Command();
program.name('formprobe').description('Scenario-driven web form testing').version('0.1.0');

program
  .command('synthesize')
  .argument('<metadata-json>', 'Path to form metadata JSON file')
  .option('--scenario <scenario>', 'valid|invalid|edgeCase|boundary', 'valid')
  .option('--seed <n>', 'Generation seed')
  .option('--provider <provider>', 'AI provider: none|openai')
  .option('--env <envFile>', 'Path to .env file')
  .option('--json', 'Print the full result as JSON')
  .action(async (metadataPath: string, cmd: ConfigOptions & { scenario: string; seed?: string; json?: boolean }) => {
    const config = loadConfig(cmd);
    const metadata = await readMetadata(metadataPath);
    const scenario = scenarioSchema.parse(cmd.scenario);
    const result = await engineFor(config).synthesize(metadata, scenario, parseSeed(cmd.seed) ?? config.seed);

    if (cmd.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }
    console.log(`form=${metadata.id} scenario=${scenario} generator=${result.generator}`);
    if (result.fallback) {
      console.log(`fallback=${result.fallback}`);
    }
    for (const line of valueLines(result.values)) {
      console.log(line);
    }
  });

program
  .command('run')
  .argument('<metadata-json>', 'Path to form metadata JSON file')
  .option('--scenarios <list>', 'Comma-separated scenarios, or "all"', 'valid')
  .option('--seed <n>', 'Generation seed')
  .option('--provider <provider>', 'AI provider: none|openai')
  .option('--env <envFile>', 'Path to .env file')
  .option('--artifacts-root <dir>', 'Root output directory for run artifacts')
  .action(async (metadataPath: string, cmd: ConfigOptions & { scenarios: string; seed?: string }) => {
    const config = loadConfig(cmd);
    const metadata = await readMetadata(metadataPath);
    const engine = engineFor(config);

    const submitted = engine.submitRun(metadata, parseScenarios(cmd.scenarios), { seed: parseSeed(cmd.seed) });
    await engine.idle();

    for (const handle of submitted) {
      const run = engine.getRun(handle.id) ?? handle;
      for (const line of runSummaryLines(run)) {
        console.log(line);
      }
    }
    console.log(`artifacts=${config.artifactsRoot}`);
  });

program
  .command('replay')
  .argument('<runId>', 'Run ID (folder under artifacts root)')
  .option('--env <envFile>', 'Path to .env file')
  .option('--artifacts-root <dir>', 'Root output directory for run artifacts')
  .action(async (runId: string, cmd: ConfigOptions) => {
    const sink = new FileRunSink(loadConfig(cmd).artifactsRoot);
    const run = await sink.loadRun(runId);
    for (const line of runSummaryLines(run)) {
      console.log(line);
    }
    for (const line of valueLines(run.values)) {
      console.log(`value ${line}`);
    }
    console.log(`runDir=${sink.runDir(runId)}`);
  });

program
  .command('report')
  .option('--env <envFile>', 'Path to .env file')
  .option('--artifacts-root <dir>', 'Root output directory for run artifacts')
  .option('--recent <n>', 'Number of recent failures to list')
  .action(async (cmd: ConfigOptions) => {
    const config = loadConfig(cmd);
    const runs = await new FileRunSink(config.artifactsRoot).listRuns();
    const analytics = new AnalyticsAggregator({
      recentFailures: config.recentFailures,
      logger: createLogger('report', 'warn')
    });
    for (const run of runs) {
      analytics.publish(run);
    }
    await analytics.settled();
    for (const line of metricsReportLines(analytics.snapshot())) {
      console.log(line);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
