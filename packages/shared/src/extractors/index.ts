/**
 * Extraction Adapters
 *
 * Structured-table, raw-text and visual-analysis, in priority order.
 */

import type { DocumentSource, TextSource, VisualInferenceService } from '../sources/types';
import { RawTextAdapter } from './raw-text';
import { StructuredTableAdapter } from './structured-table';
import type { ExtractionAdapter } from './types';
import { VisualAnalysisAdapter } from './visual-analysis';

export type {
  AdapterContext,
  AdapterDiagnostics,
  AdapterResult,
  AttemptMode,
  ExtractionAdapter,
} from './types';
export { BaseAdapter } from './base-adapter';
export { StructuredTableAdapter } from './structured-table';
export { RawTextAdapter } from './raw-text';
export { VisualAnalysisAdapter } from './visual-analysis';

export function createAdapters(collaborators: {
  documentSource: DocumentSource;
  textSource: TextSource;
  visualService: VisualInferenceService;
}): ExtractionAdapter[] {
  return [
    new StructuredTableAdapter(collaborators.documentSource),
    new RawTextAdapter(collaborators.textSource),
    new VisualAnalysisAdapter(collaborators.visualService),
  ];
}
