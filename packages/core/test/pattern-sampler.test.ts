import { describe, expect, it } from 'vitest';

import { patternMatcher } from '../src/formats.js';
import { samplePattern } from '../src/pattern-sampler.js';
import { createRandom } from '../src/random.js';

describe('samplePattern', () => {
  const patterns = [
    '[A-Z]{3}-\\d{4}',
    '(?:foo|bar)+_[a-f0-9]{2,6}',
    '^\\w+@corp\\.example$',
    '[^0-9\\s]{5}',
    'SKU-[0-9]{2}(-[A-Z])?',
    'x*y+z?'
  ];

  it.each(patterns)('produces matches for %s', (pattern) => {
    const rng = createRandom(42);
    for (let attempt = 0; attempt < 20; attempt += 1) {
      const sample = samplePattern(pattern, rng);
      expect(sample).toBeDefined();
      expect(patternMatcher(pattern).test(sample ?? '')).toBe(true);
    }
  });

  it('honours the accept predicate', () => {
    const sample = samplePattern('[a-c]{1,8}', createRandom(5), (candidate) => candidate.length === 4, 200);

    expect(sample).toHaveLength(4);
  });

  it('returns undefined for unsupported syntax', () => {
    expect(samplePattern('(?=a)b', createRandom(1))).toBeUndefined();
    expect(samplePattern('(a)\\1', createRandom(1))).toBeUndefined();
    expect(samplePattern('\\bword', createRandom(1))).toBeUndefined();
  });

  it('is deterministic for a seed', () => {
    expect(samplePattern('[a-z]{10}', createRandom(9))).toBe(samplePattern('[a-z]{10}', createRandom(9)));
  });
});
