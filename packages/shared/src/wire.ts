/**
 * Wire Format
 *
 * Records travel as JSON. Money is already a two-decimal string, so
 * "2769.80" survives the round trip digit for digit. Parsing validates the
 * payload against its docs/contracts schema.
 */

import { ContractViolationError, errorMessage } from './errors';
import { contractErrors, isPaystubRecord, isW2Record } from './schemas';
import { DOCUMENT_KINDS, type DocumentKind, type DocumentRecord } from './types';

export function serializeRecord(record: DocumentRecord): string {
  return JSON.stringify(record);
}

function documentTypeOf(data: unknown): DocumentKind | null {
  if (typeof data !== 'object' || data === null || !('document_type' in data)) return null;
  const declared = data.document_type;
  return DOCUMENT_KINDS.find((kind) => kind === declared) ?? null;
}

/**
 * Parse and validate a serialized record. Throws ContractViolationError
 * when the text is not JSON or does not satisfy the record contract.
 */
export function parseRecord(text: string): DocumentRecord {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ContractViolationError('Record is not valid JSON', [errorMessage(error)]);
  }

  const kind = documentTypeOf(data);
  if (kind === null) {
    throw new ContractViolationError('Record has no recognised document_type', ['/document_type: must be "paystub" or "w2"']);
  }

  if (kind === 'paystub' && isPaystubRecord(data)) return data;
  if (kind === 'w2' && isW2Record(data)) return data;

  const errors = contractErrors(kind);
  throw new ContractViolationError(`Record violates the ${kind} contract: ${errors.join('; ')}`, errors);
}
