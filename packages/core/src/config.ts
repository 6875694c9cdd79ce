import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  FORMPROBE_MAX_CONCURRENCY: z.coerce.number().int().positive().default(2),
  FORMPROBE_MAX_QUEUE: z.coerce.number().int().nonnegative().optional(),
  FORMPROBE_RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  FORMPROBE_HARD_TIMEOUT_GRACE_MS: z.coerce.number().int().nonnegative().default(5_000),
  FORMPROBE_ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  FORMPROBE_SEED: z.coerce.number().int().default(1),
  FORMPROBE_RECENT_FAILURES: z.coerce.number().int().positive().default(20),
  FORMPROBE_AI_PROVIDER: z.enum(['none', 'openai']).default('none'),
  FORMPROBE_AI_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FORMPROBE_ARTIFACTS_ROOT: z.string().min(1).default('runs'),
  FORMPROBE_HEADLESS: booleanFromEnv.default('true'),
  FORMPROBE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  PORT: z.coerce.number().int().positive().default(4000)
});

export type AiProviderName = z.infer<typeof envSchema>['FORMPROBE_AI_PROVIDER'];

export interface EngineConfig {
  maxConcurrency: number;
  maxQueueSize?: number;
  runTimeoutMs: number;
  hardTimeoutGraceMs: number;
  actionTimeoutMs: number;
  seed: number;
  recentFailures: number;
  aiProvider: AiProviderName;
  aiTimeoutMs: number;
  artifactsRoot: string;
  headless: boolean;
  logLevel: z.infer<typeof envSchema>['FORMPROBE_LOG_LEVEL'];
  port: number;
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  return Object.fromEntries(Object.entries(env).map(([key, value]) => [key, value === '' ? undefined : value]));
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(emptyToUndefined(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const values = parsed.data;
  return {
    maxConcurrency: values.FORMPROBE_MAX_CONCURRENCY,
    maxQueueSize: values.FORMPROBE_MAX_QUEUE,
    runTimeoutMs: values.FORMPROBE_RUN_TIMEOUT_MS,
    hardTimeoutGraceMs: values.FORMPROBE_HARD_TIMEOUT_GRACE_MS,
    actionTimeoutMs: values.FORMPROBE_ACTION_TIMEOUT_MS,
    seed: values.FORMPROBE_SEED,
    recentFailures: values.FORMPROBE_RECENT_FAILURES,
    aiProvider: values.FORMPROBE_AI_PROVIDER,
    aiTimeoutMs: values.FORMPROBE_AI_TIMEOUT_MS,
    artifactsRoot: values.FORMPROBE_ARTIFACTS_ROOT,
    headless: values.FORMPROBE_HEADLESS,
    logLevel: values.FORMPROBE_LOG_LEVEL,
    port: values.PORT
  };
}

/** Loads an optional .env file into process.env, then parses the result. */
export function loadEngineConfigFromFile(envFile?: string): EngineConfig {
  if (envFile) {
    dotenvConfig({ path: envFile, override: true });
  }
  return loadEngineConfig(process.env);
}
