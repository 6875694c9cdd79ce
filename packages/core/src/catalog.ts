import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { UnsupportedFieldTypeError } from './errors.js';
import { isEmail, isHttpUrl, isIsoDate, isLocalDateTime, isPhone, isTime } from './formats.js';
import type { Logger } from './logger.js';
import type { RandomSource } from './random.js';
import { SCENARIOS, isSemanticType, type FieldSpec, type Scenario, type SemanticType } from './schema.js';
import type { FieldValue } from './types.js';

const wordListsSchema = z.object({
  firstNames: z.array(z.string()).min(1),
  lastNames: z.array(z.string()).min(1),
  unicodeNames: z.array(z.string()).min(1),
  cities: z.array(z.string()).min(1),
  states: z.array(z.string()).min(1),
  streets: z.array(z.string()).min(1),
  companies: z.array(z.string()).min(1),
  domains: z.array(z.string()).min(1)
});

export type WordLists = z.infer<typeof wordListsSchema>;

const WORDS: WordLists = wordListsSchema.parse(
  JSON.parse(readFileSync(new URL('../data/sample-values.json', import.meta.url), 'utf8'))
);

export type ValueKind = 'string' | 'number' | 'boolean' | 'choice' | 'file';

/** How a value reaches the page: typed, toggled, picked from a group or list, attached, or assigned directly. */
export type InteractionRule = 'fill' | 'toggle' | 'radio' | 'choose' | 'upload' | 'assign';

export interface GenerationContext {
  field: FieldSpec;
  rng: RandomSource;
  words: WordLists;
}

export interface GenerationRule {
  kind: ValueKind;
  /** False for values the user cannot edit; such fields have nothing to violate. */
  editable: boolean;
  valid(ctx: GenerationContext): FieldValue[];
  edge(ctx: GenerationContext): FieldValue[];
  malformed?(ctx: GenerationContext): string[];
  format?(value: string): boolean;
}

export interface FieldTypeRules {
  semanticType: SemanticType;
  generation: GenerationRule;
  interaction: InteractionRule;
}

function context(field: FieldSpec): string {
  return `${field.name} ${field.label ?? ''}`.toLowerCase();
}

function lowerSlug(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[^a-zA-Z]/g, '')
    .toLowerCase();
}

function contextualText({ field, rng, words }: GenerationContext): string[] {
  const hint = context(field);
  if (/last|family|surname/.test(hint)) {
    return rng.shuffle(words.lastNames);
  }
  if (/full.?name/.test(hint)) {
    return [`${rng.pick(words.firstNames)} ${rng.pick(words.lastNames)}`];
  }
  if (/name|first|given/.test(hint)) {
    return rng.shuffle(words.firstNames);
  }
  if (/city|town/.test(hint)) {
    return rng.shuffle(words.cities);
  }
  if (/state|province/.test(hint)) {
    return rng.shuffle(words.states);
  }
  if (/address|street/.test(hint)) {
    return [`${rng.int(100, 9999)} ${rng.pick(words.streets)} St`];
  }
  if (/zip|postal/.test(hint)) {
    return [String(rng.int(10000, 99999))];
  }
  if (/company|organi[sz]ation/.test(hint)) {
    return rng.shuffle(words.companies);
  }
  return [`Sample text ${rng.int(1, 1000)}`, 'Sample'];
}

function isNameHint(field: FieldSpec): boolean {
  return /name|first|given|last|surname/.test(context(field));
}

function repeatTo(length: number, unit = 'A'): string {
  return unit.repeat(Math.max(length, 0));
}

function password(rng: RandomSource, length: number): string {
  const pool = 'abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ23456789!@#$%^&*';
  const core = 'Aa1!';
  if (length <= core.length) {
    return core.slice(0, Math.max(length, 0));
  }
  let tail = '';
  for (let index = core.length; index < length; index += 1) {
    tail += rng.pick([...pool]);
  }
  return `${core}${tail}`;
}

function isoDate(base: Date, offsetDays: number): string {
  const date = new Date(base.getTime() + offsetDays * 86_400_000);
  return date.toISOString().slice(0, 10);
}

function clock(rng: RandomSource): string {
  return `${String(rng.int(0, 23)).padStart(2, '0')}:${String(rng.int(0, 59)).padStart(2, '0')}`;
}

const DATE_ANCHOR = new Date(Date.UTC(2024, 0, 1));

function numericBounds(field: FieldSpec): { min: number; max: number } {
  const min = field.constraints.minValue ?? 0;
  const max = field.constraints.maxValue ?? min + 1000;
  return { min, max };
}

function optionSubset({ field, rng }: GenerationContext): FieldValue[] {
  const options = field.constraints.options ?? [];
  if (options.length === 0) {
    return [];
  }
  if (!field.constraints.multiple) {
    return rng.shuffle(options);
  }
  const chosen = new Set(rng.shuffle(options).slice(0, rng.int(1, options.length)));
  return [options.filter((option) => chosen.has(option))];
}

function optionEdge({ field }: GenerationContext): FieldValue[] {
  const options = field.constraints.options ?? [];
  if (options.length === 0) {
    return [];
  }
  if (field.constraints.multiple) {
    return [[...options]];
  }
  return [...options].reverse();
}

const textRule: GenerationRule = {
  kind: 'string',
  editable: true,
  valid: (ctx) => contextualText(ctx),
  edge: (ctx) => {
    const max = ctx.field.constraints.maxLength;
    const unicode = isNameHint(ctx.field) ? ctx.rng.shuffle(ctx.words.unicodeNames) : ['Ünïcödé tëxt ✓'];
    return [...unicode, repeatTo(max ?? 255)];
  }
};

const CATALOG = {
  text: { semanticType: 'text', interaction: 'fill', generation: textRule },
  email: {
    semanticType: 'email',
    interaction: 'fill',
    generation: {
      kind: 'string',
      editable: true,
      valid: ({ rng, words }) => [
        `${lowerSlug(rng.pick(words.firstNames))}.${lowerSlug(rng.pick(words.lastNames))}@${rng.pick(words.domains)}`,
        'user@example.com'
      ],
      edge: () => [
        'user+tag@example.com',
        'a@b.co',
        'first.middle.last@sub.example.org',
        `${repeatTo(48, 'x')}@example.com`
      ],
      malformed: () => [
        'not-an-email',
        'user@',
        '@example.com',
        'user@example',
        'user name@example.com',
        'user@example..com'
      ],
      format: isEmail
    }
  },
  phone: {
    semanticType: 'phone',
    interaction: 'fill',
    generation: {
      kind: 'string',
      editable: true,
      valid: ({ rng }) =>
        rng.shuffle(['(555) 123-4567', '555-123-4567', '555.123.4567', '+1 555 123 4567', '5551234567']),
      edge: () => ['+1 (555) 123-4567', '+44 20 7946 0958', '+353 1 234 5678'],
      malformed: () => ['abc-def-ghij', '123', '555-123-456'],
      format: isPhone
    }
  },
  password: {
    semanticType: 'password',
    interaction: 'fill',
    generation: {
      kind: 'string',
      editable: true,
      valid: ({ field, rng }) => {
        const min = field.constraints.minLength ?? 8;
        const max = Math.max(field.constraints.maxLength ?? 20, min);
        const low = Math.min(Math.max(min, 8), max);
        return [password(rng, rng.int(low, max))];
      },
      edge: ({ field, rng }) => [
        password(rng, field.constraints.maxLength ?? 64),
        `Pässwörd1!${password(rng, 4)}`
      ]
    }
  },
  number: {
    semanticType: 'number',
    interaction: 'fill',
    generation: {
      kind: 'number',
      editable: true,
      valid: ({ field, rng }) => {
        const { min, max } = numericBounds(field);
        return [rng.int(min, max), min];
      },
      edge: ({ field }) => [field.constraints.maxValue ?? 999_999, field.constraints.minValue ?? 0]
    }
  },
  date: {
    semanticType: 'date',
    interaction: 'fill',
    generation: {
      kind: 'string',
      editable: true,
      valid: ({ rng }) => [isoDate(DATE_ANCHOR, rng.int(0, 365))],
      edge: () => ['2024-02-29', '1900-01-01', '2099-12-31'],
      malformed: () => ['2023-13-45', '31/12/2023'],
      format: isIsoDate
    }
  },
  time: {
    semanticType: 'time',
    interaction: 'fill',
    generation: {
      kind: 'string',
      editable: true,
      valid: ({ rng }) => [clock(rng)],
      edge: () => ['00:00', '23:59'],
      malformed: () => ['25:70', 'noon'],
      format: isTime
    }
  },
  datetime: {
    semanticType: 'datetime',
    interaction: 'fill',
    generation: {
      kind: 'string',
      editable: true,
      valid: ({ rng }) => [`${isoDate(DATE_ANCHOR, rng.int(0, 365))}T${clock(rng)}`],
      edge: () => ['2024-02-29T23:59', '1900-01-01T00:00'],
      malformed: () => ['2023-13-45T25:70', 'tomorrow'],
      format: isLocalDateTime
    }
  },
  checkbox: {
    semanticType: 'checkbox',
    interaction: 'toggle',
    generation: {
      kind: 'boolean',
      editable: true,
      valid: ({ field, rng }) => [field.required ? true : rng.bool()],
      edge: () => [true]
    }
  },
  radio: {
    semanticType: 'radio',
    interaction: 'radio',
    generation: { kind: 'choice', editable: true, valid: optionSubset, edge: optionEdge }
  },
  select: {
    semanticType: 'select',
    interaction: 'choose',
    generation: { kind: 'choice', editable: true, valid: optionSubset, edge: optionEdge }
  },
  textarea: {
    semanticType: 'textarea',
    interaction: 'fill',
    generation: {
      kind: 'string',
      editable: true,
      valid: ({ rng }) => [
        `This is sample content number ${rng.int(1, 1000)}.\nIt spans more than one line.`,
        'Sample content'
      ],
      edge: ({ field }) => [repeatTo(field.constraints.maxLength ?? 500), 'Zeile eins ✓\nLigne deux — ünïcödé']
    }
  },
  file: {
    semanticType: 'file',
    interaction: 'upload',
    generation: {
      kind: 'file',
      editable: true,
      valid: ({ rng }) => [`sample-${rng.int(1, 999)}.${rng.pick(['txt', 'pdf', 'png'])}`],
      edge: () => ['empty.txt', 'name with spaces.pdf', 'ünïcode.txt']
    }
  },
  hidden: {
    semanticType: 'hidden',
    interaction: 'assign',
    generation: {
      kind: 'string',
      editable: false,
      valid: ({ rng }) => [`token-${rng.int(1000, 9999)}`],
      edge: ({ rng }) => [`token-${rng.int(1000, 9999)}`]
    }
  },
  url: {
    semanticType: 'url',
    interaction: 'fill',
    generation: {
      kind: 'string',
      editable: true,
      valid: ({ rng, words }) => [`https://www.${rng.pick(words.domains)}/page`],
      edge: () => ['https://example.com', 'https://sub.example.co.uk/path?query=1#frag', 'http://localhost:8080'],
      malformed: () => ['not-a-url', 'http//missing-colon.example.com', 'ftp://example.com'],
      format: isHttpUrl
    }
  }
} satisfies Record<SemanticType, FieldTypeRules>;

export const FIELD_TYPE_CATALOG: Readonly<Record<SemanticType, FieldTypeRules>> = CATALOG;

export function wordLists(): WordLists {
  return WORDS;
}

export function rulesFor(semanticType: string): FieldTypeRules {
  if (!isSemanticType(semanticType)) {
    throw new UnsupportedFieldTypeError(semanticType);
  }
  return FIELD_TYPE_CATALOG[semanticType];
}

export interface ResolvedRules {
  rules: FieldTypeRules;
  fallback: boolean;
}

/** Like rulesFor, but unknown types resolve to the text rule instead of throwing. */
export function resolveRules(semanticType: string, logger?: Logger): ResolvedRules {
  try {
    return { rules: rulesFor(semanticType), fallback: false };
  } catch (error) {
    if (!(error instanceof UnsupportedFieldTypeError)) {
      throw error;
    }
    logger?.debug('unsupported field type, using text rule', { semanticType });
    return { rules: FIELD_TYPE_CATALOG.text, fallback: true };
  }
}

export interface FieldTypeSummary {
  semanticType: SemanticType;
  valueKind: ValueKind;
  interaction: InteractionRule;
  editable: boolean;
  /** True when the type has a format the invalid scenario can break. */
  formatChecked: boolean;
}

export function describeFieldTypes(): FieldTypeSummary[] {
  return Object.values(FIELD_TYPE_CATALOG).map(({ semanticType, generation, interaction }) => ({
    semanticType,
    valueKind: generation.kind,
    interaction,
    editable: generation.editable,
    formatChecked: generation.format !== undefined
  }));
}

const SCENARIO_DESCRIPTIONS: Record<Scenario, string> = {
  valid: 'values that satisfy every constraint; the form should accept the submission',
  invalid: 'one constraint broken per field; the form should report a validation error',
  edgeCase: 'unusual but valid values such as unicode, long text and plus-addressed email',
  boundary: 'values at and just past each length or numeric limit'
};

export function describeScenarios(): { scenario: Scenario; description: string }[] {
  return SCENARIOS.map((scenario) => ({ scenario, description: SCENARIO_DESCRIPTIONS[scenario] }));
}
