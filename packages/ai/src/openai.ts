import type { FieldSpec, GenerationRequest, ValueGenerator } from '@formprobe/core';
import { z } from 'zod';

export interface OpenAIClientConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

interface ChatCompletionMessage {
  role: 'developer' | 'user' | 'assistant';
  content: string;
}

const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional()
      })
    )
    .optional()
});

const valuesEnvelopeSchema = z.object({ values: z.unknown() });

function envRequired(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env, timeoutMs = 10_000): OpenAIClientConfig {
  return {
    apiKey: envRequired(env, 'OPENAI_API_KEY'),
    model: env.FORMPROBE_OPENAI_MODEL ?? 'gpt-4.1-mini',
    baseUrl: env.OPENAI_BASE_URL ?? 'https://api.openai.com/v1',
    timeoutMs
  };
}

export async function chatCompletionJson(
  messages: ChatCompletionMessage[],
  config: OpenAIClientConfig,
  signal?: AbortSignal
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), config.timeoutMs);
  const forwardAbort = (): void => controller.abort(signal?.reason);
  signal?.addEventListener('abort', forwardAbort, { once: true });
  const fetchImpl = config.fetch ?? fetch;

  try {
    const response = await fetchImpl(`${config.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({
        model: config.model,
        temperature: 0,
        response_format: { type: 'json_object' },
        messages
      }),
      signal: controller.signal
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`OpenAI API error ${response.status}: ${body}`);
    }

    const parsed = chatCompletionResponseSchema.parse(await response.json());
    const content = parsed.choices?.[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI API returned no assistant content');
    }

    return JSON.parse(content);
  } finally {
    clearTimeout(timeoutHandle);
    signal?.removeEventListener('abort', forwardAbort);
  }
}

function describeField(field: FieldSpec): string {
  return JSON.stringify({
    name: field.name,
    label: field.label,
    semanticType: field.semanticType,
    required: field.required,
    constraints: field.constraints
  });
}

const SCENARIO_GUIDANCE: Record<GenerationRequest['scenario'], string> = {
  valid: 'Every value must satisfy all of its field constraints; expectedOutcome "accept".',
  invalid:
    'Each value must break exactly one constraint of its field; expectedOutcome "reject" and name the broken ' +
    'constraint in "violation". Use applicable=false when nothing can be broken.',
  edgeCase:
    'Unusual but valid values: maximum lengths, unicode names, tagged emails, extreme in-range numbers; ' +
    'expectedOutcome "accept".',
  boundary:
    'For numeric or length ranges give the inclusive bounds (accept, variant lower-inclusive / upper-inclusive) ' +
    'and one step outside (reject, variant lower-exceeded / upper-exceeded). ' +
    'Fields without a range get one valid value.'
};

/** Asks a chat-completions model for scenario values. Output is validated by the Synthesizer, not here. */
export class OpenAIValueGenerator implements ValueGenerator {
  readonly name = 'openai';
  private readonly config: OpenAIClientConfig;

  constructor(config: OpenAIClientConfig = createConfigFromEnv()) {
    this.config = config;
  }

  async generate(request: GenerationRequest): Promise<unknown> {
    const { metadata, scenario, seed } = request;
    const userPrompt = [
      `Form: ${metadata.title ?? metadata.id} at ${metadata.url}`,
      `Scenario: ${scenario}. ${SCENARIO_GUIDANCE[scenario]}`,
      `Variation seed: ${seed}`,
      'Fields:',
      ...metadata.fields.map(describeField),
      'Return ONLY JSON of the shape { "values": [ { "fieldName", "scenario", "applicable", "value", ' +
        '"expectedOutcome", "variant", "violation", "rationale" } ] }.',
      'Cover every field at least once, in field order. Use value null when applicable is false.'
    ].join('\n');

    const raw = await chatCompletionJson(
      [
        {
          role: 'developer',
          content:
            'You generate test input data for web forms as JSON. Output must be raw JSON only, no markdown, no prose.'
        },
        { role: 'user', content: userPrompt }
      ],
      this.config,
      request.signal
    );
    return valuesEnvelopeSchema.parse(raw).values;
  }
}
