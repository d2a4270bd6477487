/**
 * JSON Schema Validation
 *
 * Ajv validators for the output record contracts (docs/contracts) and for
 * visual-analysis answers.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { DocumentKind, PaystubRecord, W2Record } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const CONTRACT_FILES: Record<DocumentKind, string> = {
  paystub: 'paystub_record.schema.json',
  w2: 'w2_record.schema.json',
};

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package source
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output (dist/packages/shared/src)
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to the working directory
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

// Lazy loaded on first use
let paystubValidator: ValidateFunction<PaystubRecord> | null = null;
let w2Validator: ValidateFunction<W2Record> | null = null;

function getPaystubValidator(): ValidateFunction<PaystubRecord> {
  if (!paystubValidator) {
    paystubValidator = ajv.compile<PaystubRecord>(loadSchema(CONTRACT_FILES.paystub));
  }
  return paystubValidator;
}

function getW2Validator(): ValidateFunction<W2Record> {
  if (!w2Validator) {
    w2Validator = ajv.compile<W2Record>(loadSchema(CONTRACT_FILES.w2));
  }
  return w2Validator;
}

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

export function isPaystubRecord(data: unknown): data is PaystubRecord {
  return getPaystubValidator()(data);
}

export function isW2Record(data: unknown): data is W2Record {
  return getW2Validator()(data);
}

/**
 * Errors from the most recent contract check for `kind`.
 */
export function contractErrors(kind: DocumentKind): string[] {
  return formatErrors(kind === 'paystub' ? getPaystubValidator().errors : getW2Validator().errors);
}

/**
 * Compile a structured-output schema into a type guard for the answer.
 */
export function compileResponseValidator<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}
