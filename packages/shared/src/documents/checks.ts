/**
 * Shared Check Helpers
 */

import type { FieldKey, FieldReader } from '../types';
import { isEmptyValue } from '../pipeline/field-store';
import type { CrossCheck, ValidationOptions } from './types';

/**
 * Allowed difference in cents for an amount compared against `baseCents`:
 * the larger of the absolute and relative tolerances.
 */
export function toleranceCents(baseCents: number, options: ValidationOptions): number {
  return Math.max(
    Math.round(options.amountToleranceAbsolute * 100),
    Math.round(Math.abs(baseCents) * options.amountToleranceRelative)
  );
}

export function unitsToCents(units: number): number {
  return Math.round(units * 100);
}

/**
 * One completeness warning listing every required field that is empty.
 */
export function requiredFieldsCheck<F>(required: ReadonlyArray<FieldKey<F>>): CrossCheck<F> {
  return {
    code: 'missing_required_fields',
    category: 'completeness',
    severity: 'warning',
    run(fields: FieldReader<F>) {
      const missing = required.filter((key) => isEmptyValue(fields.value(key)));
      if (missing.length === 0) return null;
      return {
        message: `Required fields missing: ${missing.join(', ')}`,
        fields: [...missing],
      };
    },
  };
}
