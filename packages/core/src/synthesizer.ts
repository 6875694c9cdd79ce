import { resolveRules, wordLists, type FieldTypeRules, type GenerationContext } from './catalog.js';
import { distinctViolations, satisfiesConstraints } from './constraints.js';
import { GenerationFallbackError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { samplePattern } from './pattern-sampler.js';
import { createRandom, deriveSeed } from './random.js';
import { generatedValuesSchema, type FieldSpec, type FormMetadata, type Scenario } from './schema.js';
import type {
  ApplicableValue,
  ConstraintDimension,
  FieldValue,
  GeneratedValue,
  NotApplicableValue,
  ValueVariant
} from './types.js';

export interface GenerationRequest {
  metadata: FormMetadata;
  scenario: Scenario;
  seed: number;
  signal: AbortSignal;
}

/** A source of scenario values. Output is untrusted until the Synthesizer validates it. */
export interface ValueGenerator {
  readonly name: string;
  generate(request: GenerationRequest): Promise<unknown>;
}

export interface SynthesisResult {
  values: GeneratedValue[];
  generator: string;
  fallback?: string;
}

const LENGTH_PAD = 'x';

function accept(
  field: FieldSpec,
  scenario: Scenario,
  value: FieldValue,
  rationale: string,
  variant: ValueVariant = 'primary'
): ApplicableValue {
  return { fieldName: field.name, scenario, variant, applicable: true, value, expectedOutcome: 'accept', rationale };
}

function reject(
  field: FieldSpec,
  scenario: Scenario,
  value: FieldValue,
  violation: ConstraintDimension,
  rationale: string,
  variant: ValueVariant = 'primary'
): ApplicableValue {
  return {
    fieldName: field.name,
    scenario,
    variant,
    applicable: true,
    value,
    expectedOutcome: 'reject',
    violation,
    rationale
  };
}

function notApplicable(field: FieldSpec, scenario: Scenario, rationale: string): NotApplicableValue {
  return {
    fieldName: field.name,
    scenario,
    variant: 'primary',
    applicable: false,
    value: null,
    expectedOutcome: 'accept',
    rationale
  };
}

function violatesOnly(field: FieldSpec, value: FieldValue, dimension: ConstraintDimension): boolean {
  const violations = distinctViolations(field, value);
  return violations.length === 1 && violations[0] === dimension;
}

/**
 * Pads or trims `base` to exactly `length` characters. The local part of an
 * email-shaped base absorbs the change; anything else is padded or trimmed at the front.
 */
function fitLength(base: string, length: number): string {
  const at = base.lastIndexOf('@');
  if (at > 0 && base.length - at < length) {
    const local = base.slice(0, at);
    const localLength = length - (base.length - at);
    const fitted =
      local.length >= localLength
        ? local.slice(0, localLength)
        : `${LENGTH_PAD.repeat(localLength - local.length)}${local}`;
    return `${fitted}${base.slice(at)}`;
  }
  if (base.length >= length) {
    return base.slice(base.length - length);
  }
  return `${LENGTH_PAD.repeat(length - base.length)}${base}`;
}

function stringCandidates(values: FieldValue[]): string[] {
  return values.filter((value): value is string => typeof value === 'string');
}

function stringOfLength(
  ctx: GenerationContext,
  rules: FieldTypeRules,
  length: number,
  test: (candidate: string) => boolean
): string | undefined {
  const bases = [...stringCandidates(rules.generation.valid(ctx)), ...stringCandidates(rules.generation.edge(ctx))];
  for (const base of bases) {
    const candidate = fitLength(base, length);
    if (test(candidate)) {
      return candidate;
    }
  }
  const { pattern } = ctx.field.constraints;
  if (pattern !== undefined) {
    const sampled = samplePattern(pattern, ctx.rng, (candidate) => candidate.length === length && test(candidate), 50);
    if (sampled !== undefined) {
      return sampled;
    }
  }
  const plain = LENGTH_PAD.repeat(length);
  return test(plain) ? plain : undefined;
}

function validValue(ctx: GenerationContext, rules: FieldTypeRules): FieldValue | undefined {
  const { field } = ctx;
  const fits = (value: FieldValue): boolean => satisfiesConstraints(field, value);
  const direct = rules.generation.valid(ctx).find(fits);
  if (direct !== undefined || rules.generation.kind !== 'string') {
    return direct;
  }
  if (field.constraints.pattern !== undefined) {
    const sampled = samplePattern(field.constraints.pattern, ctx.rng, fits);
    if (sampled !== undefined) {
      return sampled;
    }
  }
  const { minLength = 0, maxLength } = field.constraints;
  const shortest = maxLength === undefined ? Math.max(minLength, 1) : Math.min(Math.max(minLength, 1), maxLength);
  const clamp = (length: number): number =>
    Math.max(shortest, maxLength === undefined ? length : Math.min(length, maxLength));
  const bases = stringCandidates([...rules.generation.valid(ctx), ...rules.generation.edge(ctx)]);
  for (const base of bases) {
    const candidate = fitLength(base, clamp(base.length));
    if (fits(candidate)) {
      return candidate;
    }
  }
  return stringOfLength(ctx, rules, shortest, fits);
}

function emptyValue(field: FieldSpec, rules: FieldTypeRules): FieldValue {
  switch (rules.generation.kind) {
    case 'boolean':
      return false;
    case 'choice':
      return field.constraints.multiple ? [] : '';
    default:
      return '';
  }
}

function outsideOptions(options: readonly string[]): string {
  let candidate = 'invalid-option';
  while (options.includes(candidate)) {
    candidate = `${candidate}-x`;
  }
  return candidate;
}

function synthesizeValid(ctx: GenerationContext, rules: FieldTypeRules): GeneratedValue {
  const value = validValue(ctx, rules);
  if (value === undefined) {
    return notApplicable(ctx.field, 'valid', 'no value satisfies every constraint');
  }
  return accept(ctx.field, 'valid', value, 'satisfies every constraint');
}

function synthesizeEdge(ctx: GenerationContext, rules: FieldTypeRules): GeneratedValue {
  const edge = rules.generation.edge(ctx).find((value) => satisfiesConstraints(ctx.field, value));
  if (edge !== undefined) {
    return accept(ctx.field, 'edgeCase', edge, 'unusual but valid input');
  }
  const value = validValue(ctx, rules);
  if (value === undefined) {
    return notApplicable(ctx.field, 'edgeCase', 'no value satisfies every constraint');
  }
  return accept(ctx.field, 'edgeCase', value, 'no edge candidate fits the constraints, using a valid value');
}

interface InvalidAttempt {
  dimension: ConstraintDimension;
  candidates: (ctx: GenerationContext, rules: FieldTypeRules) => FieldValue[];
  rationale: string;
}

const INVALID_ATTEMPTS: readonly InvalidAttempt[] = [
  {
    dimension: 'option-membership',
    rationale: 'value is not one of the offered options',
    candidates: ({ field }, rules) => {
      const options = field.constraints.options;
      if (rules.generation.kind !== 'choice' || !options || options.length === 0) {
        return [];
      }
      const outsider = outsideOptions(options);
      return field.constraints.multiple ? [[outsider]] : [outsider];
    }
  },
  {
    dimension: 'range',
    rationale: 'number outside the allowed range',
    candidates: ({ field }, rules) => {
      const { minValue, maxValue } = field.constraints;
      if (rules.generation.kind !== 'number') {
        return [];
      }
      return [
        ...(maxValue !== undefined ? [maxValue + 1] : []),
        ...(minValue !== undefined ? [minValue - 1] : [])
      ];
    }
  },
  {
    dimension: 'numeric-type',
    rationale: 'not a number',
    candidates: (_ctx, rules) => (rules.generation.kind === 'number' ? ['not-a-number'] : [])
  },
  {
    dimension: 'format',
    rationale: 'malformed for the field type',
    candidates: (ctx, rules) => rules.generation.malformed?.(ctx) ?? []
  },
  {
    dimension: 'pattern',
    rationale: 'does not match the required pattern',
    candidates: (ctx, rules) => {
      if (ctx.field.constraints.pattern === undefined || rules.generation.kind !== 'string') {
        return [];
      }
      const base = stringCandidates(rules.generation.valid(ctx))[0] ?? 'sample';
      const minLength = ctx.field.constraints.minLength ?? 1;
      return [`${base}!`, `!${base.slice(1)}`, `#${base}`, '!'.repeat(Math.max(minLength, 1)), '0', 'zz'];
    }
  },
  {
    dimension: 'min-length',
    rationale: 'one character shorter than the minimum length',
    candidates: (ctx, rules) => {
      const { minLength } = ctx.field.constraints;
      if (minLength === undefined || minLength < 2 || rules.generation.kind !== 'string') {
        return [];
      }
      const value = stringOfLength(ctx, rules, minLength - 1, (candidate) =>
        violatesOnly(ctx.field, candidate, 'min-length')
      );
      return value === undefined ? [] : [value];
    }
  },
  {
    dimension: 'max-length',
    rationale: 'one character longer than the maximum length',
    candidates: (ctx, rules) => {
      const { maxLength } = ctx.field.constraints;
      if (maxLength === undefined || rules.generation.kind !== 'string') {
        return [];
      }
      const value = stringOfLength(ctx, rules, maxLength + 1, (candidate) =>
        violatesOnly(ctx.field, candidate, 'max-length')
      );
      return value === undefined ? [] : [value];
    }
  },
  {
    dimension: 'required',
    rationale: 'required field left empty',
    candidates: ({ field }, rules) => (field.required ? [emptyValue(field, rules)] : [])
  }
];

function synthesizeInvalid(ctx: GenerationContext, rules: FieldTypeRules): GeneratedValue {
  if (!rules.generation.editable) {
    return notApplicable(ctx.field, 'invalid', 'field is not user-editable');
  }
  for (const attempt of INVALID_ATTEMPTS) {
    const value = attempt
      .candidates(ctx, rules)
      .find((candidate) => violatesOnly(ctx.field, candidate, attempt.dimension));
    if (value !== undefined) {
      return reject(ctx.field, 'invalid', value, attempt.dimension, attempt.rationale);
    }
  }
  return notApplicable(ctx.field, 'invalid', 'no constraint can be violated');
}

function expectationFor(field: FieldSpec, value: FieldValue, variant: ValueVariant): GeneratedValue | undefined {
  const violations = distinctViolations(field, value);
  if (violations.length === 0) {
    return accept(field, 'boundary', value, `${variant} boundary`, variant);
  }
  if (violations.length === 1 && violations[0] !== undefined) {
    return reject(field, 'boundary', value, violations[0], `${variant} boundary`, variant);
  }
  return undefined;
}

function synthesizeBoundary(ctx: GenerationContext, rules: FieldTypeRules): GeneratedValue[] {
  const { field } = ctx;
  const { minValue, maxValue, minLength, maxLength } = field.constraints;
  const planned: { variant: ValueVariant; value: FieldValue | undefined }[] = [];

  if (rules.generation.kind === 'number' && (minValue !== undefined || maxValue !== undefined)) {
    planned.push(
      { variant: 'lower-inclusive', value: minValue },
      { variant: 'upper-inclusive', value: maxValue },
      { variant: 'lower-exceeded', value: minValue === undefined ? undefined : minValue - 1 },
      { variant: 'upper-exceeded', value: maxValue === undefined ? undefined : maxValue + 1 }
    );
  } else if (
    rules.generation.kind === 'string' &&
    rules.generation.editable &&
    (minLength !== undefined || maxLength !== undefined)
  ) {
    const inRange = (candidate: string): boolean => satisfiesConstraints(field, candidate);
    const exceeds =
      (dimension: ConstraintDimension) =>
      (candidate: string): boolean =>
        violatesOnly(field, candidate, dimension) || (candidate === '' && violatesOnly(field, candidate, 'required'));
    planned.push(
      {
        variant: 'lower-inclusive',
        value: minLength === undefined ? undefined : stringOfLength(ctx, rules, minLength, inRange)
      },
      {
        variant: 'upper-inclusive',
        value: maxLength === undefined ? undefined : stringOfLength(ctx, rules, maxLength, inRange)
      },
      {
        variant: 'lower-exceeded',
        value:
          minLength === undefined || minLength < 1
            ? undefined
            : stringOfLength(ctx, rules, minLength - 1, exceeds('min-length'))
      },
      {
        variant: 'upper-exceeded',
        value: maxLength === undefined ? undefined : stringOfLength(ctx, rules, maxLength + 1, exceeds('max-length'))
      }
    );
  }

  const values: GeneratedValue[] = [];
  for (const { variant, value } of planned) {
    if (value === undefined) {
      continue;
    }
    const generated = expectationFor(field, value, variant);
    if (generated) {
      values.push(generated);
    }
  }
  if (values.length > 0) {
    return values;
  }

  const filler = validValue(ctx, rules);
  if (filler === undefined) {
    return [notApplicable(field, 'boundary', 'no value satisfies every constraint')];
  }
  return [accept(field, 'boundary', filler, 'no range to test, using a valid value')];
}

function synthesizeField(field: FieldSpec, scenario: Scenario, seed: number, logger: Logger): GeneratedValue[] {
  const { rules } = resolveRules(field.semanticType, logger);
  const ctx: GenerationContext = {
    field,
    rng: createRandom(deriveSeed(seed, `${scenario}:${field.name}`)),
    words: wordLists()
  };
  switch (scenario) {
    case 'valid':
      return [synthesizeValid(ctx, rules)];
    case 'invalid':
      return [synthesizeInvalid(ctx, rules)];
    case 'edgeCase':
      return [synthesizeEdge(ctx, rules)];
    case 'boundary':
      return synthesizeBoundary(ctx, rules);
    default: {
      const unknownScenario: never = scenario;
      throw new Error(`Unknown scenario: ${String(unknownScenario)}`);
    }
  }
}

/**
 * Rule-based synthesis. Pure: each field draws from its own generator seeded by
 * (seed, scenario, field name), so the same inputs always yield the same values.
 */
export function synthesizeRuleBased(
  metadata: FormMetadata,
  scenario: Scenario,
  seed: number,
  logger: Logger = silentLogger
): GeneratedValue[] {
  return metadata.fields.flatMap((field) => synthesizeField(field, scenario, seed, logger));
}

/** The value a run applies to each field: the first entry per field, in field order. */
export function planRunValues(metadata: FormMetadata, values: readonly GeneratedValue[]): GeneratedValue[] {
  return metadata.fields.map((field) => {
    const first = values.find((value) => value.fieldName === field.name);
    return first ?? notApplicable(field, values[0]?.scenario ?? 'valid', 'no value was generated for this field');
  });
}

function checkGenerated(
  metadata: FormMetadata,
  scenario: Scenario,
  values: readonly GeneratedValue[]
): GeneratedValue[] {
  const fieldsByName = new Map(metadata.fields.map((field) => [field.name, field]));
  for (const value of values) {
    const field = fieldsByName.get(value.fieldName);
    if (!field) {
      throw new Error(`value for unknown field ${value.fieldName}`);
    }
    if (value.scenario !== scenario) {
      throw new Error(`value for ${value.fieldName} is tagged ${value.scenario}, expected ${scenario}`);
    }
    if (!value.applicable) {
      continue;
    }
    const conforms = satisfiesConstraints(field, value.value);
    if (value.expectedOutcome === 'accept' && !conforms) {
      throw new Error(`value for ${value.fieldName} expects accept but breaks its constraints`);
    }
    if (value.expectedOutcome === 'reject' && conforms) {
      throw new Error(`value for ${value.fieldName} expects reject but satisfies its constraints`);
    }
  }
  const missing = metadata.fields.filter((field) => !values.some((value) => value.fieldName === field.name));
  if (missing.length > 0) {
    throw new Error(`no values for fields: ${missing.map((field) => field.name).join(', ')}`);
  }
  return metadata.fields.flatMap((field) => values.filter((value) => value.fieldName === field.name));
}

async function withTimeout<T>(timeoutMs: number, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, rejectTimeout) => {
    timeoutHandle = setTimeout(() => {
      const error = new Error(`timed out after ${timeoutMs}ms`);
      controller.abort(error);
      rejectTimeout(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

export interface SynthesizerOptions {
  generator?: ValueGenerator;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Produces scenario values, preferring the configured generator and falling back
 * to the rule-based path when it fails, times out or returns unusable output.
 */
export class Synthesizer {
  private readonly generator?: ValueGenerator;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SynthesizerOptions = {}) {
    this.generator = options.generator;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? silentLogger;
  }

  async synthesize(metadata: FormMetadata, scenario: Scenario, seed: number): Promise<SynthesisResult> {
    const generator = this.generator;
    if (generator) {
      try {
        const raw = await withTimeout(this.timeoutMs, (signal) =>
          generator.generate({ metadata, scenario, seed, signal })
        );
        const values = checkGenerated(metadata, scenario, generatedValuesSchema.parse(raw));
        return { values, generator: generator.name };
      } catch (error) {
        const fallback = new GenerationFallbackError(generator.name, errorMessage(error), { cause: error });
        this.logger.warn(fallback.message, { code: fallback.code, formId: metadata.id, scenario });
        return {
          values: synthesizeRuleBased(metadata, scenario, seed, this.logger),
          generator: 'rules',
          fallback: fallback.message
        };
      }
    }
    return { values: synthesizeRuleBased(metadata, scenario, seed, this.logger), generator: 'rules' };
  }
}
