import { patternMatcher } from './formats.js';
import type { RandomSource } from './random.js';

// Produces strings for the regular-expression subset extracted forms actually use:
// literals, escapes, character classes, groups, alternation and quantifiers.
// Lookarounds, backreferences and word boundaries are not supported.

type PatternNode =
  | { kind: 'chars'; chars: string }
  | { kind: 'group'; alternatives: PatternNode[][] }
  | { kind: 'repeat'; node: PatternNode; min: number; max: number }
  | { kind: 'anchor' };

const DIGITS = '0123456789';
const LOWER = 'abcdefghijklmnopqrstuvwxyz';
const UPPER = LOWER.toUpperCase();
const WORD = `${LOWER}${UPPER}${DIGITS}_`;
const PRINTABLE = Array.from({ length: 95 }, (_, index) => String.fromCharCode(32 + index)).join('');
const UNBOUNDED_EXTRA = 3;

class UnsupportedPatternError extends Error {}

function without(source: string, excluded: string): string {
  return [...source].filter((char) => !excluded.includes(char)).join('');
}

function escapeSet(code: string): string | undefined {
  switch (code) {
    case 'd':
      return DIGITS;
    case 'D':
      return without(PRINTABLE, DIGITS);
    case 'w':
      return WORD;
    case 'W':
      return without(PRINTABLE, WORD);
    case 's':
      return ' ';
    case 'S':
      return without(PRINTABLE, ' ');
    case 'b':
    case 'B':
      throw new UnsupportedPatternError('word boundaries are not supported');
    default:
      if (/[1-9]/.test(code)) {
        throw new UnsupportedPatternError('backreferences are not supported');
      }
      return undefined;
  }
}

class PatternParser {
  private position = 0;

  constructor(private readonly source: string) {}

  parse(): PatternNode[][] {
    const alternatives = this.parseAlternatives();
    if (this.position < this.source.length) {
      throw new UnsupportedPatternError(`unexpected "${this.source[this.position]}"`);
    }
    return alternatives;
  }

  private peek(): string | undefined {
    return this.source[this.position];
  }

  private parseAlternatives(): PatternNode[][] {
    const alternatives: PatternNode[][] = [this.parseSequence()];
    while (this.peek() === '|') {
      this.position += 1;
      alternatives.push(this.parseSequence());
    }
    return alternatives;
  }

  private parseSequence(): PatternNode[] {
    const nodes: PatternNode[] = [];
    while (this.position < this.source.length && this.peek() !== '|' && this.peek() !== ')') {
      const atom = this.parseAtom();
      nodes.push(this.parseQuantifier(atom));
    }
    return nodes;
  }

  private parseAtom(): PatternNode {
    const char = this.source[this.position];
    this.position += 1;
    switch (char) {
      case '^':
      case '$':
        return { kind: 'anchor' };
      case '.':
        return { kind: 'chars', chars: `${LOWER}${DIGITS}` };
      case '(': {
        if (this.source.startsWith('?:', this.position)) {
          this.position += 2;
        } else if (this.peek() === '?') {
          throw new UnsupportedPatternError('lookarounds and named groups are not supported');
        }
        const alternatives = this.parseAlternatives();
        if (this.peek() !== ')') {
          throw new UnsupportedPatternError('unterminated group');
        }
        this.position += 1;
        return { kind: 'group', alternatives };
      }
      case '[':
        return this.parseClass();
      case '\\': {
        const code = this.source[this.position];
        this.position += 1;
        if (code === undefined) {
          throw new UnsupportedPatternError('dangling escape');
        }
        return { kind: 'chars', chars: escapeSet(code) ?? code };
      }
      default:
        if (char === undefined || '*+?{'.includes(char)) {
          throw new UnsupportedPatternError(`unexpected "${char ?? 'end'}"`);
        }
        return { kind: 'chars', chars: char };
    }
  }

  private parseClass(): PatternNode {
    let negated = false;
    if (this.peek() === '^') {
      negated = true;
      this.position += 1;
    }
    let members = '';
    let first = true;
    while (this.position < this.source.length && (this.peek() !== ']' || first)) {
      first = false;
      let char = this.source[this.position] ?? '';
      this.position += 1;
      if (char === '\\') {
        const code = this.source[this.position] ?? '';
        this.position += 1;
        const set = escapeSet(code);
        if (set !== undefined) {
          members += set;
          continue;
        }
        char = code;
      }
      const afterDash = this.source[this.position + 1];
      if (this.peek() === '-' && afterDash !== undefined && afterDash !== ']') {
        const end = afterDash;
        this.position += 2;
        for (let code = char.charCodeAt(0); code <= end.charCodeAt(0); code += 1) {
          members += String.fromCharCode(code);
        }
        continue;
      }
      members += char;
    }
    if (this.peek() !== ']') {
      throw new UnsupportedPatternError('unterminated character class');
    }
    this.position += 1;
    const chars = negated ? without(PRINTABLE, members) : members;
    if (chars.length === 0) {
      throw new UnsupportedPatternError('empty character class');
    }
    return { kind: 'chars', chars };
  }

  private parseQuantifier(node: PatternNode): PatternNode {
    const char = this.peek();
    let min: number;
    let max: number;
    if (char === '*') {
      min = 0;
      max = Number.POSITIVE_INFINITY;
      this.position += 1;
    } else if (char === '+') {
      min = 1;
      max = Number.POSITIVE_INFINITY;
      this.position += 1;
    } else if (char === '?') {
      min = 0;
      max = 1;
      this.position += 1;
    } else if (char === '{') {
      const match = /^\{(\d+)(,(\d*))?\}/.exec(this.source.slice(this.position));
      if (!match) {
        return node;
      }
      min = Number(match[1]);
      max = match[2] === undefined ? min : match[3] ? Number(match[3]) : Number.POSITIVE_INFINITY;
      this.position += match[0].length;
    } else {
      return node;
    }
    if (this.peek() === '?') {
      this.position += 1;
    }
    return { kind: 'repeat', node, min, max };
  }
}

function render(nodes: PatternNode[], rng: RandomSource): string {
  return nodes.map((node) => renderNode(node, rng)).join('');
}

function renderNode(node: PatternNode, rng: RandomSource): string {
  switch (node.kind) {
    case 'anchor':
      return '';
    case 'chars':
      return rng.pick([...node.chars]);
    case 'group':
      return render(rng.pick(node.alternatives), rng);
    case 'repeat': {
      const max = Number.isFinite(node.max) ? node.max : node.min + UNBOUNDED_EXTRA;
      const count = rng.int(node.min, max);
      let output = '';
      for (let index = 0; index < count; index += 1) {
        output += renderNode(node.node, rng);
      }
      return output;
    }
    default: {
      const neverNode: never = node;
      throw new Error(`Unknown pattern node ${JSON.stringify(neverNode)}`);
    }
  }
}

/**
 * Returns a string matching `pattern`, or undefined when the pattern uses syntax
 * outside the supported subset or no attempt satisfied `accept`.
 */
export function samplePattern(
  pattern: string,
  rng: RandomSource,
  accept: (candidate: string) => boolean = () => true,
  attempts = 25
): string | undefined {
  let alternatives: PatternNode[][];
  try {
    alternatives = new PatternParser(pattern).parse();
  } catch (error) {
    if (error instanceof UnsupportedPatternError) {
      return undefined;
    }
    throw error;
  }
  const matcher = patternMatcher(pattern);
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    const candidate = render(rng.pick(alternatives), rng);
    if (matcher.test(candidate) && accept(candidate)) {
      return candidate;
    }
  }
  return undefined;
}
