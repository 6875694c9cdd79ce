import { describe, expect, it } from 'vitest';

import { satisfiesConstraints } from '../src/constraints.js';
import { patternMatcher } from '../src/formats.js';
import { formMetadataSchema, type FormMetadata } from '../src/schema.js';
import {
  Synthesizer,
  planRunValues,
  synthesizeRuleBased,
  type GenerationRequest,
  type ValueGenerator
} from '../src/synthesizer.js';
import type { GeneratedValue } from '../src/types.js';
import { signupForm } from './fakes.js';

function kitchenSinkForm(): FormMetadata {
  return formMetadataSchema.parse({
    id: 'kitchen-sink',
    url: 'https://forms.test/all',
    submitLocator: '#submit',
    fields: [
      {
        name: 'username',
        semanticType: 'text',
        required: true,
        constraints: { minLength: 3, maxLength: 12, pattern: '[a-z]{3,12}' },
        locator: '#username'
      },
      {
        name: 'email',
        semanticType: 'email',
        required: true,
        constraints: { pattern: '.+@example\\.com' },
        locator: '#email'
      },
      {
        name: 'age',
        semanticType: 'number',
        required: true,
        constraints: { minValue: 18, maxValue: 65 },
        locator: '#age'
      },
      { name: 'phone', semanticType: 'phone', locator: '#phone' },
      {
        name: 'password',
        semanticType: 'password',
        required: true,
        constraints: { minLength: 10, maxLength: 16 },
        locator: '#pw'
      },
      { name: 'birthday', semanticType: 'date', locator: '#birthday' },
      { name: 'alarm', semanticType: 'time', locator: '#alarm' },
      { name: 'meeting', semanticType: 'datetime', locator: '#meeting' },
      { name: 'terms', semanticType: 'checkbox', required: true, locator: '#terms' },
      {
        name: 'plan',
        semanticType: 'radio',
        required: true,
        constraints: { options: ['free', 'pro'] },
        locator: 'input[name=plan]'
      },
      { name: 'country', semanticType: 'select', constraints: { options: ['us', 'ca', 'mx'] }, locator: '#country' },
      {
        name: 'topics',
        semanticType: 'select',
        constraints: { options: ['news', 'sports', 'tech'], multiple: true },
        locator: '#topics'
      },
      { name: 'bio', semanticType: 'textarea', constraints: { maxLength: 40 }, locator: '#bio' },
      { name: 'resume', semanticType: 'file', locator: '#resume' },
      { name: 'token', semanticType: 'hidden', locator: '#token' },
      { name: 'website', semanticType: 'url', locator: '#website' },
      { name: 'shade', semanticType: 'color', locator: '#shade' }
    ]
  });
}

function valueFor(values: readonly GeneratedValue[], fieldName: string): GeneratedValue {
  const found = values.find((value) => value.fieldName === fieldName);
  if (!found) {
    throw new Error(`no value for ${fieldName}`);
  }
  return found;
}

describe('synthesizeRuleBased', () => {
  it('produces constraint-satisfying accept values for the valid scenario', () => {
    const metadata = kitchenSinkForm();
    for (const seed of [1, 2, 3, 17, 99]) {
      const values = synthesizeRuleBased(metadata, 'valid', seed);
      expect(values.map((value) => value.fieldName)).toEqual(metadata.fields.map((field) => field.name));
      for (const field of metadata.fields) {
        const value = valueFor(values, field.name);
        expect(value.applicable, field.name).toBe(true);
        expect(value.expectedOutcome).toBe('accept');
        if (value.applicable) {
          expect(satisfiesConstraints(field, value.value), `${field.name}=${JSON.stringify(value.value)}`).toBe(true);
        }
      }
    }
  });

  it('finds a valid value for every type under tight but satisfiable length limits', () => {
    const limits: [string, Record<string, number>][] = [
      ['email', { maxLength: 15 }],
      ['email', { minLength: 3, maxLength: 10 }],
      ['phone', { maxLength: 10 }],
      ['url', { maxLength: 20 }],
      ['date', { maxLength: 10 }],
      ['time', { minLength: 5, maxLength: 5 }],
      ['datetime', { maxLength: 16 }],
      ['text', { minLength: 2, maxLength: 4 }],
      ['password', { minLength: 8, maxLength: 10 }],
      ['textarea', { maxLength: 10 }],
      ['hidden', { maxLength: 6 }]
    ];
    for (const [semanticType, constraints] of limits) {
      const metadata = formMetadataSchema.parse({
        id: 'limits',
        url: 'https://forms.test/limits',
        submitLocator: '#submit',
        fields: [{ name: 'notes', semanticType, required: true, constraints, locator: '#notes' }]
      });
      const [field] = metadata.fields;
      for (const seed of [1, 2, 3, 4, 5]) {
        const value = valueFor(synthesizeRuleBased(metadata, 'valid', seed), 'notes');
        const label = `${semanticType} ${JSON.stringify(constraints)} seed ${seed}`;
        expect(value.applicable, label).toBe(true);
        if (field && value.applicable) {
          expect(satisfiesConstraints(field, value.value), `${label}=${JSON.stringify(value.value)}`).toBe(true);
        }
      }
    }
  });

  it('shortens the local part of an email to fit a length limit', () => {
    const metadata = formMetadataSchema.parse({
      id: 'short-email',
      url: 'https://forms.test/short',
      submitLocator: '#submit',
      fields: [
        { name: 'email', semanticType: 'email', required: true, constraints: { maxLength: 15 }, locator: '#email' }
      ]
    });

    const value = valueFor(synthesizeRuleBased(metadata, 'valid', 1), 'email');

    expect(value).toMatchObject({ applicable: true, expectedOutcome: 'accept' });
    expect(String(value.value)).toHaveLength(15);
    expect(String(value.value)).toMatch(/^[a-z]+@(example\.(com|org|net)|test\.example)$/);
  });

  it('is deterministic for the same metadata, scenario and seed', () => {
    const metadata = kitchenSinkForm();
    for (const scenario of ['valid', 'invalid', 'edgeCase', 'boundary'] as const) {
      expect(synthesizeRuleBased(metadata, scenario, 5)).toEqual(synthesizeRuleBased(metadata, scenario, 5));
    }
  });

  it('keeps a field value stable when another field is added', () => {
    const metadata = signupForm();
    const extended = formMetadataSchema.parse({
      ...metadata,
      fields: [{ name: 'nickname', semanticType: 'text', locator: '#nickname' }, ...metadata.fields]
    });

    const before = valueFor(synthesizeRuleBased(metadata, 'valid', 3), 'email');
    const after = valueFor(synthesizeRuleBased(extended, 'valid', 3), 'email');
    expect(after).toEqual(before);
  });

  it('breaks the email format and the age range for the invalid scenario', () => {
    const values = synthesizeRuleBased(signupForm(), 'invalid', 1);

    expect(valueFor(values, 'email')).toMatchObject({
      applicable: true,
      value: 'not-an-email',
      expectedOutcome: 'reject',
      violation: 'format'
    });
    expect(valueFor(values, 'age')).toMatchObject({
      applicable: true,
      value: 66,
      expectedOutcome: 'reject',
      violation: 'range'
    });
  });

  it('covers both sides of a numeric range for the boundary scenario', () => {
    const values = synthesizeRuleBased(signupForm(), 'boundary', 1).filter((value) => value.fieldName === 'age');

    expect(values.map((value) => [value.value, value.expectedOutcome, value.variant])).toEqual([
      [18, 'accept', 'lower-inclusive'],
      [65, 'accept', 'upper-inclusive'],
      [17, 'reject', 'lower-exceeded'],
      [66, 'reject', 'upper-exceeded']
    ]);
  });

  it('covers string length ranges for the boundary scenario', () => {
    const metadata = formMetadataSchema.parse({
      id: 'profile',
      url: 'https://forms.test/profile',
      submitLocator: '#save',
      fields: [
        { name: 'nickname', semanticType: 'text', constraints: { minLength: 2, maxLength: 5 }, locator: '#nickname' }
      ]
    });

    const values = synthesizeRuleBased(metadata, 'boundary', 4);

    expect(
      values.map((value) => [typeof value.value === 'string' ? value.value.length : null, value.expectedOutcome])
    ).toEqual([
      [2, 'accept'],
      [5, 'accept'],
      [1, 'reject'],
      [6, 'reject']
    ]);
    expect(values.map((value) => (value.applicable ? value.violation : undefined))).toEqual([
      undefined,
      undefined,
      'min-length',
      'max-length'
    ]);
  });

  it('gives fields without a range a valid filler in the boundary scenario', () => {
    const values = synthesizeRuleBased(signupForm(), 'boundary', 1).filter((value) => value.fieldName === 'email');

    expect(values).toHaveLength(1);
    expect(values[0]).toMatchObject({ applicable: true, expectedOutcome: 'accept', variant: 'primary' });
  });

  it('follows the violation preference order for the invalid scenario', () => {
    const metadata = formMetadataSchema.parse({
      id: 'order',
      url: 'https://forms.test/order',
      submitLocator: '#order',
      fields: [
        {
          name: 'size',
          semanticType: 'select',
          required: true,
          constraints: { options: ['s', 'm'] },
          locator: '#size'
        },
        { name: 'quantity', semanticType: 'number', locator: '#quantity' },
        { name: 'code', semanticType: 'text', required: true, constraints: { pattern: '[A-Z]{3}' }, locator: '#code' },
        { name: 'secret', semanticType: 'password', constraints: { minLength: 8 }, locator: '#secret' },
        { name: 'agree', semanticType: 'checkbox', required: true, locator: '#agree' }
      ]
    });

    const values = synthesizeRuleBased(metadata, 'invalid', 2);

    expect(values.map((value) => (value.applicable ? value.violation : null))).toEqual([
      'option-membership',
      'numeric-type',
      'pattern',
      'min-length',
      'required'
    ]);
    expect(valueFor(values, 'size').value).toBe('invalid-option');
    expect(valueFor(values, 'quantity').value).toBe('not-a-number');
    expect(patternMatcher('[A-Z]{3}').test(String(valueFor(values, 'code').value))).toBe(false);
    expect(String(valueFor(values, 'secret').value)).toHaveLength(7);
    expect(valueFor(values, 'agree').value).toBe(false);
    expect(values.every((value) => value.expectedOutcome === 'reject')).toBe(true);
  });

  it('marks fields with nothing to violate as not applicable', () => {
    const metadata = formMetadataSchema.parse({
      id: 'prefs',
      url: 'https://forms.test/prefs',
      submitLocator: '#save',
      fields: [
        { name: 'newsletter', semanticType: 'checkbox', locator: '#newsletter' },
        { name: 'token', semanticType: 'hidden', required: true, locator: '#token' }
      ]
    });

    const values = synthesizeRuleBased(metadata, 'invalid', 1);

    expect(values).toEqual([
      expect.objectContaining({ fieldName: 'newsletter', applicable: false, value: null, expectedOutcome: 'accept' }),
      expect.objectContaining({ fieldName: 'token', applicable: false, value: null, expectedOutcome: 'accept' })
    ]);
  });

  it('uses unusual but valid values for the edge case scenario', () => {
    const metadata = formMetadataSchema.parse({
      id: 'edge',
      url: 'https://forms.test/edge',
      submitLocator: '#go',
      fields: [
        { name: 'email', semanticType: 'email', locator: '#email' },
        { name: 'age', semanticType: 'number', constraints: { minValue: 18, maxValue: 65 }, locator: '#age' }
      ]
    });

    const values = synthesizeRuleBased(metadata, 'edgeCase', 1);

    expect(valueFor(values, 'email').value).toBe('user+tag@example.com');
    expect(valueFor(values, 'age').value).toBe(65);
    expect(values.every((value) => value.expectedOutcome === 'accept')).toBe(true);
  });
});

describe('planRunValues', () => {
  it('takes the first value per field in field order', () => {
    const metadata = signupForm();
    const planned = planRunValues(metadata, synthesizeRuleBased(metadata, 'boundary', 1));

    expect(planned.map((value) => value.fieldName)).toEqual(['email', 'age']);
    expect(planned[1]).toMatchObject({ value: 18, variant: 'lower-inclusive' });
  });
});

class StubGenerator implements ValueGenerator {
  readonly name = 'stub';
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly respond: (request: GenerationRequest) => Promise<unknown>) {}

  generate(request: GenerationRequest): Promise<unknown> {
    this.requests.push(request);
    return this.respond(request);
  }
}

describe('Synthesizer', () => {
  const metadata = signupForm();

  it('uses the rules when no generator is configured', async () => {
    const result = await new Synthesizer().synthesize(metadata, 'valid', 8);

    expect(result.generator).toBe('rules');
    expect(result.fallback).toBeUndefined();
    expect(result.values).toEqual(synthesizeRuleBased(metadata, 'valid', 8));
  });

  it('returns generator output that passes validation', async () => {
    const values = [
      { fieldName: 'email', scenario: 'valid', applicable: true, value: 'ana@example.com', expectedOutcome: 'accept' },
      { fieldName: 'age', scenario: 'valid', applicable: true, value: 40, expectedOutcome: 'accept' }
    ];
    const generator = new StubGenerator(async () => values);

    const result = await new Synthesizer({ generator }).synthesize(metadata, 'valid', 8);

    expect(result.generator).toBe('stub');
    expect(result.fallback).toBeUndefined();
    expect(result.values.map((value) => value.value)).toEqual(['ana@example.com', 40]);
    expect(generator.requests[0]).toMatchObject({ scenario: 'valid', seed: 8 });
  });

  it('falls back to the rules when the generator throws', async () => {
    const generator = new StubGenerator(async () => {
      throw new Error('quota exceeded');
    });

    const result = await new Synthesizer({ generator }).synthesize(metadata, 'invalid', 8);

    expect(result.generator).toBe('rules');
    expect(result.fallback).toBe('Generator stub failed, using rules: quota exceeded');
    expect(result.values).toEqual(synthesizeRuleBased(metadata, 'invalid', 8));
  });

  it('falls back when the generator times out', async () => {
    const generator = new StubGenerator(() => new Promise<unknown>(() => undefined));

    const result = await new Synthesizer({ generator, timeoutMs: 20 }).synthesize(metadata, 'valid', 8);

    expect(result.generator).toBe('rules');
    expect(result.fallback).toBe('Generator stub failed, using rules: timed out after 20ms');
    expect(generator.requests[0]?.signal.aborted).toBe(true);
  });

  it('falls back on malformed output', async () => {
    const generator = new StubGenerator(async () => [{ field: 'email', data: 'x' }]);

    const result = await new Synthesizer({ generator }).synthesize(metadata, 'valid', 8);

    expect(result.generator).toBe('rules');
    expect(result.fallback).toMatch(/^Generator stub failed, using rules: /);
  });

  it('falls back when a field is not covered', async () => {
    const generator = new StubGenerator(async () => [
      { fieldName: 'email', scenario: 'valid', applicable: true, value: 'ana@example.com', expectedOutcome: 'accept' }
    ]);

    const result = await new Synthesizer({ generator }).synthesize(metadata, 'valid', 8);

    expect(result.fallback).toBe('Generator stub failed, using rules: no values for fields: age');
  });

  it('falls back when an accept value breaks its constraints', async () => {
    const generator = new StubGenerator(async () => [
      { fieldName: 'email', scenario: 'valid', applicable: true, value: 'ana@example.com', expectedOutcome: 'accept' },
      { fieldName: 'age', scenario: 'valid', applicable: true, value: 12, expectedOutcome: 'accept' }
    ]);

    const result = await new Synthesizer({ generator }).synthesize(metadata, 'valid', 8);

    expect(result.fallback).toBe(
      'Generator stub failed, using rules: value for age expects accept but breaks its constraints'
    );
  });
});
