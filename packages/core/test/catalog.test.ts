import { describe, expect, it } from 'vitest';

import {
  FIELD_TYPE_CATALOG,
  describeFieldTypes,
  describeScenarios,
  resolveRules,
  rulesFor,
  wordLists
} from '../src/catalog.js';
import { UnsupportedFieldTypeError } from '../src/errors.js';
import { createRandom } from '../src/random.js';
import { SEMANTIC_TYPES, fieldSpecSchema } from '../src/schema.js';

describe('field type catalog', () => {
  it('has an entry for every semantic type', () => {
    for (const semanticType of SEMANTIC_TYPES) {
      expect(rulesFor(semanticType).semanticType).toBe(semanticType);
    }
    expect(Object.keys(FIELD_TYPE_CATALOG).sort()).toEqual([...SEMANTIC_TYPES].sort());
  });

  it('maps types to interaction rules', () => {
    expect(rulesFor('checkbox').interaction).toBe('toggle');
    expect(rulesFor('radio').interaction).toBe('radio');
    expect(rulesFor('select').interaction).toBe('choose');
    expect(rulesFor('file').interaction).toBe('upload');
    expect(rulesFor('hidden').interaction).toBe('assign');
    expect(rulesFor('email').interaction).toBe('fill');
  });

  it('throws for unknown types and resolveRules falls back to text', () => {
    expect(() => rulesFor('color')).toThrow(UnsupportedFieldTypeError);

    const resolved = resolveRules('color');
    expect(resolved.fallback).toBe(true);
    expect(resolved.rules).toBe(FIELD_TYPE_CATALOG.text);
    expect(resolveRules('email').fallback).toBe(false);
  });

  it('marks hidden fields as not editable', () => {
    expect(rulesFor('hidden').generation.editable).toBe(false);
    expect(rulesFor('text').generation.editable).toBe(true);
  });

  it('draws contextual text from the word lists', () => {
    const field = fieldSpecSchema.parse({ name: 'city', semanticType: 'text', locator: '#city' });
    const values = rulesFor('text').generation.valid({ field, rng: createRandom(3), words: wordLists() });

    expect(values.length).toBe(wordLists().cities.length);
    expect(wordLists().cities).toContain(values[0]);
  });

  it('produces format-conforming valid emails', () => {
    const field = fieldSpecSchema.parse({ name: 'email', semanticType: 'email', locator: '#email' });
    const rules = rulesFor('email').generation;
    const values = rules.valid({ field, rng: createRandom(11), words: wordLists() });

    for (const value of values) {
      expect(typeof value === 'string' && rules.format?.(value)).toBe(true);
    }
  });
});

describe('catalog listings', () => {
  it('summarizes every semantic type', () => {
    const summaries = describeFieldTypes();

    expect(summaries.map((summary) => summary.semanticType).sort()).toEqual([...SEMANTIC_TYPES].sort());
    expect(summaries.find((summary) => summary.semanticType === 'email')).toEqual({
      semanticType: 'email',
      valueKind: 'string',
      interaction: 'fill',
      editable: true,
      formatChecked: true
    });
    expect(summaries.find((summary) => summary.semanticType === 'hidden')).toMatchObject({
      interaction: 'assign',
      editable: false,
      formatChecked: false
    });
  });

  it('lists the scenarios in order', () => {
    expect(describeScenarios().map((entry) => entry.scenario)).toEqual(['valid', 'invalid', 'edgeCase', 'boundary']);
  });
});
