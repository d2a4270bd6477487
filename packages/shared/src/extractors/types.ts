/**
 * Extraction Adapter Types
 *
 * The three extraction methods share one capability: attempt the document,
 * return a partial record and an outcome. Adapters never throw.
 */

import type { DocumentProfile } from '../documents/types';
import type { FieldStore } from '../pipeline/field-store';
import type { DocumentInput, PageSet } from '../sources/types';
import type { AttemptErrorKind, ExtractionMethod, MethodOutcome } from '../types';

export type AttemptMode = 'fallback' | 'enhancement';

export interface AdapterContext<F> {
  document: DocumentInput;
  pages: PageSet;
  profile: DocumentProfile<F>;
  /** Fields merged from earlier methods (read-only for adapters) */
  merged: FieldStore<F>;
  mode: AttemptMode;
  signal: AbortSignal;
}

/**
 * Facts about the source signal, kept even when the attempt fails.
 */
export interface AdapterDiagnostics {
  tablesFound?: number;
  textLength?: number;
}

export interface AdapterResult<F> {
  method: ExtractionMethod;
  outcome: MethodOutcome;
  partial: FieldStore<F>;
  error: { kind: AttemptErrorKind; message: string } | null;
  diagnostics: AdapterDiagnostics;
  durationMs: number;
}

export interface ExtractionAdapter {
  readonly method: ExtractionMethod;
  attempt<F>(ctx: AdapterContext<F>): Promise<AdapterResult<F>>;
}

