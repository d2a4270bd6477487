/**
 * Processing-quality rubric category shared by every document kind.
 *
 * Known bias: points go to the path taken (visual analysis ran, a table was
 * found), not to the quality of the values it produced. A record read by
 * the visual method always outscores the same record read from tables.
 */

import type { RubricCategory } from './types';

export const TEXT_LAYER_MIN_CHARS = 100;

export function processingQuality<F>(): RubricCategory<F> {
  return {
    category: 'processing_quality',
    criteria: [
      { id: 'visual_analysis_used', points: 5, earned: (_fields, signals) => signals.visualAnalysisUsed },
      { id: 'tables_found', points: 3, earned: (_fields, signals) => signals.tablesFound > 0 },
      { id: 'text_layer', points: 2, earned: (_fields, signals) => signals.textLength > TEXT_LAYER_MIN_CHARS },
    ],
  };
}
