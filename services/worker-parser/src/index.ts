/**
 * Parser Worker
 *
 * Consumes parse_document jobs, runs the extraction pipeline and enqueues
 * parse_complete for the downstream consumer.
 */

import {
  logger,
  config,
  createQueue,
  createWorker,
  createRateLimitedVisualService,
  serveMetrics,
  DocumentParser,
  QUEUE_NAMES,
  type ParseCompleteJob,
  type ParseDocumentJob,
} from '@payverify/shared';
import { OpenAiVisionService } from './lib/llm';
import { PdfDocumentSource } from './lib/pdf';
import { createParseProcessor, readLocalDocument } from './processor';

const parseCompleteQueue = createQueue<ParseCompleteJob, void>(QUEUE_NAMES.PARSE_COMPLETE);

const pdfSource = new PdfDocumentSource();
const visualService = createRateLimitedVisualService(
  new OpenAiVisionService({
    apiKey: config.openaiApiKey,
    model: config.llmModelVision,
    timeoutMs: config.llmRequestTimeoutMs,
  }),
  config.visionMaxConcurrent
);

const parser = new DocumentParser({
  documentSource: pdfSource,
  textSource: pdfSource,
  visualService,
});

const processParseDocument = createParseProcessor({
  parser,
  readDocument: readLocalDocument,
  publish: async (payload) => {
    await parseCompleteQueue.add('parse_complete', payload, {
      jobId: `complete_${payload.document_id.replace(':', '_')}`,
    });
  },
});

const worker = createWorker<ParseDocumentJob, void>(QUEUE_NAMES.PARSE_DOCUMENT, processParseDocument, {
  concurrency: config.workerConcurrency,
  limiter: { max: config.visionRateLimitMax, duration: config.visionRateLimitDurationMs },
});

const metricsServer = serveMetrics(config.metricsPort);

logger.info('Parser worker started', {
  model: config.llmModelVision,
  enhancement_mode: config.visualEnhancementMode,
  document_timeout_ms: config.documentTimeoutMs,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await parseCompleteQueue.close();
  metricsServer.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
