/**
 * Confidence Scorer
 *
 * Sums rubric points for the criteria a record meets. Pure: the same fields
 * and signals always give the same breakdown. Each criterion only checks
 * for presence, so filling a field never lowers the score.
 */

import type { ProcessingSignals, RubricCategory } from '../documents/types';
import type { ConfidenceBreakdown, FieldReader } from '../types';

export function scoreConfidence<F>(
  fields: FieldReader<F>,
  rubric: ReadonlyArray<RubricCategory<F>>,
  signals: ProcessingSignals
): ConfidenceBreakdown {
  const categories = rubric.map(({ category, criteria }) => {
    const scored = criteria.map((criterion) => ({
      id: criterion.id,
      points: criterion.points,
      earned: criterion.earned(fields, signals),
    }));
    return {
      category,
      earned: scored.reduce((total, c) => total + (c.earned ? c.points : 0), 0),
      possible: scored.reduce((total, c) => total + c.points, 0),
      criteria: scored,
    };
  });

  const earned = categories.reduce((total, c) => total + c.earned, 0);
  const possible = categories.reduce((total, c) => total + c.possible, 0);
  const score = possible === 0 ? 0 : Math.round((earned / possible) * 10000) / 10000;

  return { score, categories };
}
