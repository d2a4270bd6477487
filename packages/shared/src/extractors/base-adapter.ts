/**
 * Base Extraction Adapter
 *
 * Common attempt handling for the extraction methods: timing, logging,
 * outcome classification and error conversion. Subclasses only read their
 * source signal into the sink.
 */

import { MethodError, errorMessage } from '../errors';
import { logger } from '../logger';
import { methodAttemptsCounter } from '../metrics';
import { FieldStore } from '../pipeline/field-store';
import type { AttemptErrorKind, ExtractionMethod, FieldSink, MethodOutcome } from '../types';
import type { AdapterContext, AdapterDiagnostics, AdapterResult, ExtractionAdapter } from './types';

function outcomeForError(kind: AttemptErrorKind): MethodOutcome {
  return kind === 'service_unavailable' || kind === 'service_timeout' || kind === 'pipeline_timeout'
    ? 'unavailable'
    : 'failed';
}

export abstract class BaseAdapter implements ExtractionAdapter {
  abstract readonly method: ExtractionMethod;

  /**
   * Read the method's source signal into `put`. Throw a MethodError (or
   * anything else, which counts as a method failure) when it cannot.
   */
  protected abstract collect<F>(
    ctx: AdapterContext<F>,
    put: FieldSink<F>,
    diagnostics: AdapterDiagnostics
  ): Promise<void>;

  async attempt<F>(ctx: AdapterContext<F>): Promise<AdapterResult<F>> {
    const startTime = Date.now();
    const diagnostics: AdapterDiagnostics = {};

    logger.debug('Starting extraction method', {
      method: this.method,
      mode: ctx.mode,
      page_count: ctx.pages.pages.length,
    });

    let result: AdapterResult<F>;
    try {
      const partial = new FieldStore<F>();
      await this.collect(ctx, partial.sink(this.method), diagnostics);

      const complete = ctx.profile.requiredFields.every((key) => partial.has(key));
      result = {
        method: this.method,
        outcome: complete ? 'success' : 'partial_success',
        partial,
        error: null,
        diagnostics,
        durationMs: Date.now() - startTime,
      };

      logger.info('Extraction method complete', {
        method: this.method,
        outcome: result.outcome,
        field_count: partial.populated(ctx.profile.fieldKeys).length,
        duration_ms: result.durationMs,
      });
    } catch (error) {
      const kind: AttemptErrorKind = error instanceof MethodError ? error.kind : 'method_failure';
      result = {
        method: this.method,
        outcome: outcomeForError(kind),
        partial: new FieldStore<F>(),
        error: { kind, message: errorMessage(error) },
        diagnostics,
        durationMs: Date.now() - startTime,
      };

      if (error instanceof MethodError) {
        logger.warn('Extraction method did not complete', {
          method: this.method,
          outcome: result.outcome,
          error_kind: kind,
          error: result.error?.message,
        });
      } else {
        logger.error('Extraction method failed unexpectedly', error, { method: this.method });
      }
    }

    methodAttemptsCounter.inc({ method: this.method, outcome: result.outcome });
    return result;
  }
}
