/**
 * Pipeline Errors
 *
 * Error classes shared by sources, adapters and the worker. Each carries a
 * stable `code` for logs and job failure reasons.
 */

import type { AttemptErrorKind } from './types';

export class PipelineError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The document cannot be opened at all (corrupt, encrypted, not a PDF).
 * Raised by DocumentSource.getPages; the parser reports it without trying
 * any extraction method.
 */
export class UnreadableDocumentError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('unreadable_document', message, options);
  }
}

/**
 * Base for failures an adapter converts into a method outcome.
 */
export abstract class MethodError extends PipelineError {
  abstract readonly kind: AttemptErrorKind;
}

export class MethodFailureError extends MethodError {
  readonly kind = 'method_failure';

  constructor(message: string, options?: { cause?: unknown }) {
    super('method_failure', message, options);
  }
}

/** The visual service answered, but not with a usable structure */
export class InvalidResponseError extends MethodError {
  readonly kind = 'invalid_response';

  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_response', message, options);
  }
}

export class ServiceUnavailableError extends MethodError {
  readonly kind = 'service_unavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super('service_unavailable', message, options);
  }
}

export class ServiceTimeoutError extends MethodError {
  readonly kind = 'service_timeout';

  constructor(message: string, options?: { cause?: unknown }) {
    super('service_timeout', message, options);
  }
}

/**
 * A serialized record does not satisfy its JSON contract.
 */
export class ContractViolationError extends PipelineError {
  readonly errors: string[];

  constructor(message: string, errors: string[]) {
    super('contract_violation', message);
    this.errors = errors;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
