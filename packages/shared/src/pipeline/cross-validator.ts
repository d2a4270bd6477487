/**
 * Cross-Validator
 *
 * Runs a document kind's consistency checks over a set of fields. Checks
 * are independent and non-blocking: each yields at most one warning, a
 * check that throws is logged and skipped, and nothing is written back.
 */

import type { CrossCheck, ValidationOptions } from '../documents/types';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import type { FieldReader, ValidationWarning, WarningCategory } from '../types';

/** Warning categories that mark the named fields as contradicted */
const CONTRADICTION_CATEGORIES: ReadonlySet<WarningCategory> = new Set<WarningCategory>([
  'arithmetic',
  'temporal',
  'range',
]);

export function validate<F>(
  fields: FieldReader<F>,
  checks: ReadonlyArray<CrossCheck<F>>,
  options: ValidationOptions
): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];

  for (const check of checks) {
    try {
      const finding = check.run(fields, options);
      if (finding) {
        warnings.push({
          code: check.code,
          category: check.category,
          severity: check.severity,
          message: finding.message,
          fields: [...finding.fields],
        });
      }
    } catch (error) {
      logger.warn('Consistency check skipped', { check: check.code, error: errorMessage(error) });
    }
  }

  // Stable order regardless of check order
  return warnings.sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
}

/**
 * Fields named by arithmetic, temporal or range warnings, with the codes
 * that flagged each.
 */
export function contradictedFields(warnings: readonly ValidationWarning[]): Map<string, string[]> {
  const flagged = new Map<string, string[]>();
  for (const warning of warnings) {
    if (!CONTRADICTION_CATEGORIES.has(warning.category)) continue;
    for (const field of warning.fields) {
      flagged.set(field, [...(flagged.get(field) ?? []), warning.code]);
    }
  }
  return flagged;
}
