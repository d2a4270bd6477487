/**
 * Batch Parsing
 *
 * Parses many documents with bounded concurrency. Each document's pipeline
 * is independent; one document failing never affects the others.
 */

import pLimit from 'p-limit';
import { config } from '../config';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import type { DocumentInput } from '../sources/types';
import type { ParseResult } from '../types';
import type { DocumentParser } from './parser';

export type BatchItemResult =
  | { documentId: string; status: 'completed'; result: ParseResult }
  | { documentId: string; status: 'rejected'; error: Error };

export interface BatchOptions {
  concurrency?: number;
}

/**
 * Results come back in input order.
 */
export async function parseBatch(
  parser: Pick<DocumentParser, 'parse'>,
  documents: readonly DocumentInput[],
  options: BatchOptions = {}
): Promise<BatchItemResult[]> {
  const concurrency = Math.max(1, options.concurrency ?? config.batchConcurrency);
  const limit = pLimit(concurrency);

  logger.info('Starting batch', { document_count: documents.length, concurrency });

  const results = await Promise.all(
    documents.map((document) =>
      limit(async (): Promise<BatchItemResult> => {
        try {
          const result = await parser.parse(document);
          return { documentId: document.documentId, status: 'completed', result };
        } catch (error) {
          logger.warn('Document rejected in batch', {
            document_id: document.documentId,
            error: errorMessage(error),
          });
          return {
            documentId: document.documentId,
            status: 'rejected',
            error: error instanceof Error ? error : new Error(String(error)),
          };
        }
      })
    )
  );

  logger.info('Batch complete', {
    document_count: documents.length,
    rejected: results.filter((r) => r.status === 'rejected').length,
  });

  return results;
}
