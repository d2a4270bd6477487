/**
 * parse_document job processor
 *
 * Reads the document named by the job, runs it through the parser and
 * publishes a parse_complete event. Kept free of Redis and OpenAI wiring so
 * it can be exercised with in-process fakes.
 */

import fs from 'fs/promises';
import { Job, UnrecoverableError } from 'bullmq';
import {
  logger,
  errorMessage,
  runWithContextAsync,
  serializeRecord,
  jobsProcessedCounter,
  jobDurationHistogram,
  QUEUE_NAMES,
  UnreadableDocumentError,
  type DocumentParser,
  type ParseCompleteJob,
  type ParseDocumentJob,
} from '@payverify/shared';

export type ParseJob = Pick<Job<ParseDocumentJob, void>, 'id' | 'data' | 'attemptsMade'>;

export interface ParseProcessorDependencies {
  parser: Pick<DocumentParser, 'parse'>;
  readDocument: (rawUri: string) => Promise<Uint8Array>;
  publish: (payload: ParseCompleteJob) => Promise<void>;
  now?: () => Date;
}

/**
 * Read a document from a local path or file:// URI.
 */
export async function readLocalDocument(rawUri: string): Promise<Uint8Array> {
  const filePath = rawUri.replace(/^file:\/\//, '');
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new UnreadableDocumentError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
}

export function createParseProcessor(deps: ParseProcessorDependencies): (job: ParseJob) => Promise<void> {
  const now = deps.now ?? (() => new Date());

  return async function processParseDocument(job: ParseJob): Promise<void> {
    const { correlation_id, document_id, document_type, raw_uri, source_filename } = job.data;

    return runWithContextAsync(
      { correlationId: correlation_id, documentId: document_id, documentType: document_type },
      async () => {
        const startTime = Date.now();

        logger.info('Processing parse_document', {
          jobId: job.id,
          source_filename,
          attempt: job.attemptsMade + 1,
        });

        try {
          const content = await deps.readDocument(raw_uri);
          const result = await deps.parser.parse({
            documentId: document_id,
            kind: document_type,
            filename: source_filename,
            content,
          });

          const base = {
            event_type: 'document.parsed' as const,
            correlation_id,
            document_id,
            document_type,
            completed_at: now().toISOString(),
          };
          const payload: ParseCompleteJob =
            result.status === 'parsed'
              ? {
                  ...base,
                  status: 'parsed',
                  confidence_score: result.record.confidence_score,
                  record_json: serializeRecord(result.record),
                }
              : { ...base, status: 'extraction_failed', failure: result.failure };

          await deps.publish(payload);

          const duration = (Date.now() - startTime) / 1000;
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PARSE_DOCUMENT, status: 'success' });
          jobDurationHistogram.observe({ queue: QUEUE_NAMES.PARSE_DOCUMENT, status: 'success' }, duration);
          logger.info('Published parse_complete', { status: payload.status });
        } catch (error) {
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PARSE_DOCUMENT, status: 'failed' });

          // Retrying cannot make an unreadable file readable
          if (error instanceof UnreadableDocumentError) {
            throw new UnrecoverableError(error.message);
          }
          throw error;
        }
      }
    );
  };
}
