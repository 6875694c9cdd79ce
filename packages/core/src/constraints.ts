import { resolveRules } from './catalog.js';
import { isNumeric, patternMatcher } from './formats.js';
import type { FieldSpec } from './schema.js';
import type { ConstraintDimension, FieldValue } from './types.js';

function isEmpty(value: FieldValue): boolean {
  if (typeof value === 'string') {
    return value.length === 0;
  }
  if (typeof value === 'boolean') {
    return !value;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return false;
}

/**
 * Lists every constraint dimension `value` breaks for `field`. Empty values only
 * answer to `required`, matching how browsers skip length and pattern checks on them.
 */
export function violatedDimensions(field: FieldSpec, value: FieldValue): ConstraintDimension[] {
  const { rules } = resolveRules(field.semanticType);
  const { constraints } = field;
  const violations: ConstraintDimension[] = [];

  if (isEmpty(value)) {
    return field.required ? ['required'] : [];
  }

  if (rules.generation.kind === 'choice') {
    const options = constraints.options ?? [];
    const chosen = Array.isArray(value) ? value : [String(value)];
    if (chosen.some((option) => !options.includes(option))) {
      violations.push('option-membership');
    }
    if (!constraints.multiple && Array.isArray(value) && value.length > 1) {
      violations.push('option-membership');
    }
    return [...new Set(violations)];
  }

  if (rules.generation.kind === 'number') {
    if (typeof value === 'boolean' || Array.isArray(value) || !isNumeric(value)) {
      return ['numeric-type'];
    }
    const numeric = Number(value);
    if (
      (constraints.minValue !== undefined && numeric < constraints.minValue) ||
      (constraints.maxValue !== undefined && numeric > constraints.maxValue)
    ) {
      violations.push('range');
    }
    return violations;
  }

  if (typeof value !== 'string') {
    return violations;
  }

  if (rules.generation.format && !rules.generation.format(value)) {
    violations.push('format');
  }
  if (constraints.pattern !== undefined && !patternMatcher(constraints.pattern).test(value)) {
    violations.push('pattern');
  }
  if (constraints.minLength !== undefined && value.length < constraints.minLength) {
    violations.push('min-length');
  }
  if (constraints.maxLength !== undefined && value.length > constraints.maxLength) {
    violations.push('max-length');
  }
  return violations;
}

export function satisfiesConstraints(field: FieldSpec, value: FieldValue): boolean {
  return violatedDimensions(field, value).length === 0;
}

/**
 * Dimensions as a tester would count them: on a type with its own format
 * (email, url, ...) a pattern miss is the same kind of mistake as a format miss.
 */
export function distinctViolations(field: FieldSpec, value: FieldValue): ConstraintDimension[] {
  const violations = violatedDimensions(field, value);
  if (violations.includes('format')) {
    return violations.filter((dimension) => dimension !== 'pattern');
  }
  return violations;
}
