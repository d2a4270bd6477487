/**
 * Document Profile Types
 *
 * A profile bundles everything the generic pipeline needs to know about
 * one document kind: its field catalogue, how each source signal maps to
 * fields, its consistency checks, its confidence rubric and how the
 * output record is shaped.
 */

import type { ExtractionTemplate } from '../templates/types';
import type { PageText, TableSet } from '../sources/types';
import type {
  ConfidenceCategory,
  DocumentKind,
  DocumentRecord,
  FieldKey,
  FieldReader,
  FieldSink,
  ProcessingMetadata,
  ValidationWarning,
  WarningCategory,
  WarningSeverity,
} from '../types';

/**
 * Tolerances and plausibility bounds. Amounts are in currency units.
 */
export interface ValidationOptions {
  amountToleranceAbsolute: number;
  amountToleranceRelative: number;
  grossPayRange: { min: number; max: number };
  hourlyRateRange: { min: number; max: number };
  annualIncomeRange: { min: number; max: number };
  /** "Today" for temporal checks; injected so validation stays pure */
  referenceDate: Date;
}

export interface CrossCheck<F> {
  code: string;
  category: WarningCategory;
  severity: WarningSeverity;
  run(
    fields: FieldReader<F>,
    options: ValidationOptions
  ): Omit<ValidationWarning, 'code' | 'category' | 'severity'> | null;
}

/**
 * Pipeline facts the rubric may award points for, besides field presence.
 */
export interface ProcessingSignals {
  visualAnalysisUsed: boolean;
  tablesFound: number;
  textLength: number;
}

export interface RubricCriterion<F> {
  id: string;
  points: number;
  earned(fields: FieldReader<F>, signals: ProcessingSignals): boolean;
}

export interface RubricCategory<F> {
  category: ConfidenceCategory;
  criteria: ReadonlyArray<RubricCriterion<F>>;
}

export interface RecordEnvelope {
  confidenceScore: number;
  warnings: ValidationWarning[];
  metadata: ProcessingMetadata;
}

export interface DocumentProfile<F> {
  readonly kind: DocumentKind;
  readonly fieldKeys: ReadonlyArray<FieldKey<F>>;
  readonly requiredFields: ReadonlyArray<FieldKey<F>>;
  readonly template: ExtractionTemplate;
  readonly checks: ReadonlyArray<CrossCheck<F>>;
  readonly rubric: ReadonlyArray<RubricCategory<F>>;

  /** Enough to stop before the costlier methods */
  isSufficient(fields: FieldReader<F>): boolean;

  readTables(tables: TableSet, put: FieldSink<F>): void;
  readText(pages: PageText[], put: FieldSink<F>): void;
  /** Throws InvalidResponseError when the answer does not match the template schema */
  readVisual(response: unknown, put: FieldSink<F>): void;

  buildRecord(fields: FieldReader<F>, envelope: RecordEnvelope): DocumentRecord;
}
