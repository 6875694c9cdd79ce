import type { AiProviderName, ValueGenerator } from '@formprobe/core';

import { createConfigFromEnv, OpenAIValueGenerator } from './openai.js';

export { chatCompletionJson, createConfigFromEnv, OpenAIValueGenerator, type OpenAIClientConfig } from './openai.js';

export type AIProvider = AiProviderName;

export function parseProvider(value: string | undefined): AIProvider {
  if (value === undefined || value === 'none') {
    return 'none';
  }
  if (value === 'openai') {
    return value;
  }
  throw new Error(`Unsupported provider: ${value}. Expected none|openai`);
}

/** The configured AI generator, or undefined when synthesis should use the rules alone. */
export function valueGeneratorForProvider(
  provider: AIProvider,
  env: NodeJS.ProcessEnv = process.env,
  timeoutMs?: number
): ValueGenerator | undefined {
  return provider === 'openai' ? new OpenAIValueGenerator(createConfigFromEnv(env, timeoutMs)) : undefined;
}
