/**
 * Result Assembler
 *
 * Packages merged fields, warnings, confidence and processing metadata into
 * the frozen output. A merge with no required field at all is reported as
 * extraction_failed rather than as a low-confidence record.
 */

import type { DocumentProfile } from '../documents/types';
import type {
  ConfidenceBreakdown,
  ParseResult,
  ProcessingMetadata,
  ValidationWarning,
} from '../types';
import type { FieldStore } from './field-store';

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
  }
  return value;
}

export interface AssemblyInput<F> {
  fields: FieldStore<F>;
  warnings: ValidationWarning[];
  confidence: ConfidenceBreakdown;
  metadata: ProcessingMetadata;
}

export function assemble<F>(profile: DocumentProfile<F>, input: AssemblyInput<F>): ParseResult {
  const { fields, warnings, confidence, metadata } = input;

  if (fields.populated(profile.requiredFields).length === 0) {
    const failed: ParseResult = {
      status: 'extraction_failed',
      failure: {
        document_id: metadata.document_id,
        document_type: profile.kind,
        reason: `No required ${profile.kind} field could be extracted (${profile.requiredFields.join(', ')})`,
        warnings,
        processing_metadata: metadata,
      },
    };
    return deepFreeze(failed);
  }

  const parsed: ParseResult = {
    status: 'parsed',
    record: profile.buildRecord(fields, {
      confidenceScore: confidence.score,
      warnings,
      metadata,
    }),
  };
  return deepFreeze(parsed);
}
