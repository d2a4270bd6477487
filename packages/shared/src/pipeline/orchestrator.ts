/**
 * Fallback Orchestrator
 *
 * Runs the extraction methods cheapest first and merges their partial
 * records field by field:
 *
 *   try_structured -> try_text -> try_visual -> done
 *
 * After each attempt that produced data, the merged fields are checked
 * against the profile's sufficiency predicate; once sufficient, the
 * costlier methods are skipped (or, in enhancement mode, only the visual
 * method still runs). A failed or unavailable attempt always advances.
 *
 * Merge rule: a populated field keeps its value unless the cross-validator
 * flags it as contradicted, in which case a later method's differing value
 * replaces it and the override is recorded.
 */

import { isDeepStrictEqual } from 'node:util';
import type { DocumentProfile, ProcessingSignals, ValidationOptions } from '../documents/types';
import type { AdapterContext, AdapterResult, AttemptMode, ExtractionAdapter } from '../extractors/types';
import { logger } from '../logger';
import type { DocumentInput, PageSet } from '../sources/types';
import type { ExtractionMethod, FieldOverride, MethodAttempt } from '../types';
import { contradictedFields, validate } from './cross-validator';
import { FieldStore } from './field-store';

export type OrchestratorState = 'try_structured' | 'try_text' | 'try_visual' | 'done';

const STATE_METHOD: Record<Exclude<OrchestratorState, 'done'>, ExtractionMethod> = {
  try_structured: 'structured_table',
  try_text: 'raw_text',
  try_visual: 'visual_analysis',
};

const NEXT_STATE: Record<Exclude<OrchestratorState, 'done'>, OrchestratorState> = {
  try_structured: 'try_text',
  try_text: 'try_visual',
  try_visual: 'done',
};

export interface OrchestratorOptions {
  enhancementMode: boolean;
  validation: ValidationOptions;
}

export interface OrchestrationResult<F> {
  merged: FieldStore<F>;
  attempts: MethodAttempt[];
  overrides: FieldOverride[];
  signals: ProcessingSignals;
  visualMode: AttemptMode | null;
  timedOut: boolean;
}

/**
 * Next state after an attempt. Exported for tests of the transition table.
 */
export function nextState(
  state: Exclude<OrchestratorState, 'done'>,
  produced: boolean,
  sufficient: boolean,
  enhancementMode: boolean
): OrchestratorState {
  if (state === 'try_visual') return 'done';
  if (produced && sufficient) return enhancementMode ? 'try_visual' : 'done';
  return NEXT_STATE[state];
}

export class FallbackOrchestrator {
  private readonly adapters: ReadonlyMap<ExtractionMethod, ExtractionAdapter>;

  constructor(adapters: readonly ExtractionAdapter[]) {
    this.adapters = new Map(adapters.map((adapter) => [adapter.method, adapter]));
  }

  async run<F>(
    profile: DocumentProfile<F>,
    document: DocumentInput,
    pages: PageSet,
    signal: AbortSignal,
    options: OrchestratorOptions
  ): Promise<OrchestrationResult<F>> {
    const merged = new FieldStore<F>();
    const attempts: MethodAttempt[] = [];
    const overrides: FieldOverride[] = [];
    const signals: ProcessingSignals = { visualAnalysisUsed: false, tablesFound: 0, textLength: 0 };
    let visualMode: AttemptMode | null = null;
    let timedOut = false;

    let state: OrchestratorState = 'try_structured';
    while (state !== 'done') {
      if (signal.aborted) {
        timedOut = true;
        break;
      }

      const method = STATE_METHOD[state];
      const adapter = this.adapters.get(method);
      if (!adapter) {
        state = NEXT_STATE[state];
        continue;
      }

      const mode: AttemptMode =
        method === 'visual_analysis' && profile.isSufficient(merged) ? 'enhancement' : 'fallback';
      const result = await this.attemptWithin(adapter, { document, pages, profile, merged, mode, signal });

      attempts.push({
        method,
        outcome: result.outcome,
        mode,
        fields_extracted: result.partial.populated(profile.fieldKeys).length,
        duration_ms: result.durationMs,
        error: result.error,
      });
      if (result.diagnostics.tablesFound !== undefined) signals.tablesFound = result.diagnostics.tablesFound;
      if (result.diagnostics.textLength !== undefined) signals.textLength = result.diagnostics.textLength;

      if (result.error?.kind === 'pipeline_timeout') {
        timedOut = true;
        break;
      }

      const produced = result.outcome === 'success' || result.outcome === 'partial_success';
      if (method === 'visual_analysis') {
        visualMode = mode;
        signals.visualAnalysisUsed = produced;
      }
      if (produced) {
        overrides.push(...this.merge(profile, merged, result.partial, options.validation));
      }

      const sufficient = profile.isSufficient(merged);
      logger.debug('Extraction method merged', {
        method,
        outcome: result.outcome,
        sufficient,
        merged_fields: merged.populated(profile.fieldKeys).length,
      });
      state = nextState(state, produced, sufficient, options.enhancementMode);
    }

    return { merged, attempts, overrides, signals, visualMode, timedOut };
  }

  /**
   * Run one attempt, giving up when the pipeline signal aborts first. The
   * abandoned attempt is reported as unavailable.
   */
  private async attemptWithin<F>(
    adapter: ExtractionAdapter,
    ctx: AdapterContext<F>
  ): Promise<AdapterResult<F>> {
    const startTime = Date.now();
    let onAbort: (() => void) | undefined;
    const aborted = new Promise<null>((resolve) => {
      onAbort = () => resolve(null);
      ctx.signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      const result = await Promise.race([adapter.attempt<F>(ctx), aborted]);
      if (result) return result;

      logger.warn('Document deadline reached during extraction method', { method: adapter.method });
      return {
        method: adapter.method,
        outcome: 'unavailable',
        partial: new FieldStore<F>(),
        error: { kind: 'pipeline_timeout', message: 'Document deadline reached before the method finished' },
        diagnostics: {},
        durationMs: Date.now() - startTime,
      };
    } finally {
      if (onAbort) ctx.signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Merge a partial record into `merged`. Returns the overrides applied.
   */
  private merge<F>(
    profile: DocumentProfile<F>,
    merged: FieldStore<F>,
    partial: FieldStore<F>,
    validation: ValidationOptions
  ): FieldOverride[] {
    const flagged = contradictedFields(validate(merged, profile.checks, validation));
    const overrides: FieldOverride[] = [];

    for (const key of profile.fieldKeys) {
      const incoming = partial.get(key);
      if (!incoming || !partial.has(key)) continue;

      const current = merged.get(key);
      if (!current || !merged.has(key)) {
        merged.set(key, incoming);
        continue;
      }

      const codes = flagged.get(key);
      if (codes && !isDeepStrictEqual(current.value, incoming.value)) {
        merged.set(key, incoming);
        overrides.push({
          field: key,
          replaced_source: current.source,
          source: incoming.source,
          reason: codes.join(','),
        });
        logger.info('Contradicted field replaced', {
          field: key,
          replaced_source: current.source,
          source: incoming.source,
          reason: codes.join(','),
        });
      }
    }

    return overrides;
  }
}
