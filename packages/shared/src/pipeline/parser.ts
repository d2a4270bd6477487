/**
 * Document Parser
 *
 * Entry point for one document: readability check, fallback extraction,
 * cross-validation, confidence scoring and assembly, all under a
 * per-document deadline that starts before the pages are read.
 * Collaborators are injected so the pipeline holds no module-level clients.
 */

import { ulid } from 'ulid';
import { config } from '../config';
import { getContext, runWithContextAsync } from '../context';
import { paystubProfile } from '../documents/paystub';
import type { DocumentProfile, ValidationOptions } from '../documents/types';
import { w2Profile } from '../documents/w2';
import { UnreadableDocumentError, errorMessage } from '../errors';
import { createAdapters } from '../extractors';
import type { ExtractionAdapter } from '../extractors/types';
import { logger } from '../logger';
import { documentsParsedCounter, parseDurationHistogram } from '../metrics';
import type { DocumentInput, DocumentSource, PageSet, TextSource, VisualInferenceService } from '../sources/types';
import type { ParseResult, ProcessingMetadata } from '../types';
import { assemble } from './assembler';
import { scoreConfidence } from './confidence';
import { validate } from './cross-validator';
import { FieldStore } from './field-store';
import { FallbackOrchestrator, type OrchestrationResult } from './orchestrator';

export interface ParserDependencies {
  documentSource: DocumentSource;
  textSource: TextSource;
  visualService: VisualInferenceService;
  /** Replaces the default adapters built from the sources above */
  adapters?: readonly ExtractionAdapter[];
}

export interface ParserOptions {
  timeoutMs: number;
  enhancementMode: boolean;
  validation: Omit<ValidationOptions, 'referenceDate'>;
  /** Clock for timestamps and temporal checks */
  now: () => Date;
}

export function defaultParserOptions(): ParserOptions {
  return {
    timeoutMs: config.documentTimeoutMs,
    enhancementMode: config.visualEnhancementMode,
    validation: {
      amountToleranceAbsolute: config.amountToleranceAbsolute,
      amountToleranceRelative: config.amountToleranceRelative,
      grossPayRange: { min: config.grossPayMin, max: config.grossPayMax },
      hourlyRateRange: { min: config.hourlyRateMin, max: config.hourlyRateMax },
      annualIncomeRange: { min: config.annualIncomeMin, max: config.annualIncomeMax },
    },
    now: () => new Date(),
  };
}

/**
 * One document on its way through the pipeline. `pages` is null when the
 * deadline passed while they were being read.
 */
interface PipelineRun {
  document: DocumentInput;
  pages: PageSet | null;
  startedAt: Date;
  startTime: number;
  correlationId: string;
}

export class DocumentParser {
  private readonly orchestrator: FallbackOrchestrator;
  private readonly options: ParserOptions;

  constructor(
    private readonly deps: ParserDependencies,
    options: Partial<ParserOptions> = {}
  ) {
    this.orchestrator = new FallbackOrchestrator(deps.adapters ?? createAdapters(deps));
    this.options = { ...defaultParserOptions(), ...options };
  }

  /**
   * Parse one document. Rejects only with UnreadableDocumentError; every
   * other condition yields a record or an extraction_failed result.
   */
  async parse(document: DocumentInput): Promise<ParseResult> {
    const context = {
      correlationId: getContext()?.correlationId ?? ulid(),
      documentId: document.documentId,
      documentType: document.kind,
    };

    return runWithContextAsync(context, async () => {
      const endTimer = parseDurationHistogram.startTimer({ document_type: document.kind });
      logger.info('Parsing document', { filename: document.filename, bytes: document.content.byteLength });

      const startedAt = this.options.now();
      const startTime = Date.now();
      const controller = new AbortController();
      const deadline = setTimeout(() => controller.abort(), this.options.timeoutMs);
      try {
        const pages = await this.readPages(document, controller.signal);
        const job: PipelineRun = {
          document,
          pages,
          startedAt,
          startTime,
          correlationId: context.correlationId,
        };

        const result =
          document.kind === 'paystub'
            ? await this.run(paystubProfile, job, controller.signal)
            : await this.run(w2Profile, job, controller.signal);

        documentsParsedCounter.inc({ document_type: document.kind, status: result.status });
        logger.info('Document parsed', {
          status: result.status,
          confidence_score: result.status === 'parsed' ? result.record.confidence_score : null,
        });
        return result;
      } catch (error) {
        const status = error instanceof UnreadableDocumentError ? 'unreadable' : 'error';
        documentsParsedCounter.inc({ document_type: document.kind, status });
        logger.error('Document parse aborted', error, { filename: document.filename, status });
        throw error;
      } finally {
        clearTimeout(deadline);
        endTimer();
      }
    });
  }

  /**
   * Readability check. Any source failure means the document cannot be
   * read; null when the deadline passes first.
   */
  private async readPages(document: DocumentInput, signal: AbortSignal): Promise<PageSet | null> {
    let onAbort: (() => void) | undefined;
    const aborted = new Promise<null>((resolve) => {
      onAbort = () => resolve(null);
      signal.addEventListener('abort', onAbort, { once: true });
    });

    let pages: PageSet | null;
    try {
      pages = await Promise.race([this.deps.documentSource.getPages(document), aborted]);
    } catch (error) {
      if (error instanceof UnreadableDocumentError) throw error;
      throw new UnreadableDocumentError(`Cannot read ${document.filename}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    }

    if (pages === null) {
      logger.warn('Document deadline reached while reading pages');
      return null;
    }
    if (pages.pages.length === 0) {
      throw new UnreadableDocumentError('Document has no pages');
    }
    return pages;
  }

  private async run<F>(profile: DocumentProfile<F>, job: PipelineRun, signal: AbortSignal): Promise<ParseResult> {
    const { document, pages, startedAt, startTime, correlationId } = job;
    const validation: ValidationOptions = { ...this.options.validation, referenceDate: startedAt };

    const orchestration: OrchestrationResult<F> = pages
      ? await this.orchestrator.run(profile, document, pages, signal, {
          enhancementMode: this.options.enhancementMode,
          validation,
        })
      : {
          merged: new FieldStore<F>(),
          attempts: [],
          overrides: [],
          signals: { visualAnalysisUsed: false, tablesFound: 0, textLength: 0 },
          visualMode: null,
          timedOut: true,
        };
    const { merged, attempts, overrides, signals, visualMode, timedOut } = orchestration;
    const warnings = validate(merged, profile.checks, validation);
    const confidence = scoreConfidence(merged, profile.rubric, signals);

    const metadata: ProcessingMetadata = {
      document_id: document.documentId,
      correlation_id: correlationId,
      source_filename: document.filename,
      page_count: pages ? pages.pages.length : 0,
      started_at: startedAt.toISOString(),
      duration_ms: Date.now() - startTime,
      methods: attempts,
      tables_found: signals.tablesFound,
      text_length: signals.textLength,
      visual_analysis_used: signals.visualAnalysisUsed,
      visual_analysis_mode: visualMode,
      timed_out: timedOut,
      provenance: merged.provenance(profile.fieldKeys),
      overrides,
      confidence_breakdown: confidence.categories,
    };

    return assemble(profile, { fields: merged, warnings, confidence, metadata });
  }
}
