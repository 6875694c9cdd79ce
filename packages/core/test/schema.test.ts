import { describe, expect, it } from 'vitest';

import { formMetadataSchema, generatedValuesSchema, isSemanticType } from '../src/schema.js';

const baseForm = {
  id: 'newsletter',
  url: 'https://forms.test/newsletter',
  submitLocator: 'button[type=submit]'
};

describe('form metadata schema', () => {
  it('accepts a valid form and applies defaults', () => {
    const parsed = formMetadataSchema.parse({
      ...baseForm,
      fields: [{ name: 'email', semanticType: 'email', locator: '#email' }]
    });

    expect(parsed.fields[0]).toEqual({
      name: 'email',
      semanticType: 'email',
      required: false,
      constraints: {},
      locator: '#email'
    });
  });

  it('keeps semantic types the catalog does not know', () => {
    const result = formMetadataSchema.safeParse({
      ...baseForm,
      fields: [{ name: 'shade', semanticType: 'color', locator: '#shade' }]
    });

    expect(result.success).toBe(true);
  });

  it('rejects duplicate field names', () => {
    const result = formMetadataSchema.safeParse({
      ...baseForm,
      fields: [
        { name: 'email', semanticType: 'email', locator: '#a' },
        { name: 'email', semanticType: 'email', locator: '#b' }
      ]
    });

    expect(result.success).toBe(false);
  });

  it('rejects inverted ranges and broken patterns', () => {
    const inverted = formMetadataSchema.safeParse({
      ...baseForm,
      fields: [{ name: 'age', semanticType: 'number', constraints: { minValue: 65, maxValue: 18 }, locator: '#age' }]
    });
    const broken = formMetadataSchema.safeParse({
      ...baseForm,
      fields: [{ name: 'code', semanticType: 'text', constraints: { pattern: '[a-z' }, locator: '#code' }]
    });

    expect(inverted.success).toBe(false);
    expect(broken.success).toBe(false);
  });
});

describe('generated values schema', () => {
  it('requires null values on not-applicable entries', () => {
    const result = generatedValuesSchema.safeParse([
      { fieldName: 'token', scenario: 'invalid', applicable: false, value: 'x', expectedOutcome: 'accept' }
    ]);

    expect(result.success).toBe(false);
  });

  it('defaults variant and rationale', () => {
    const parsed = generatedValuesSchema.parse([
      { fieldName: 'age', scenario: 'valid', applicable: true, value: 30, expectedOutcome: 'accept' }
    ]);

    expect(parsed[0]).toMatchObject({ variant: 'primary', rationale: '' });
  });
});

describe('isSemanticType', () => {
  it('recognizes catalog types only', () => {
    expect(isSemanticType('datetime')).toBe(true);
    expect(isSemanticType('color')).toBe(false);
  });
});
