/**
 * BullMQ Queue Definitions
 *
 * Queue names, job payloads, and queue/worker factories for the parse
 * worker.
 */

import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { config } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { DocumentKind, ExtractionFailure } from './types';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  PARSE_DOCUMENT: 'parse_document',
  PARSE_COMPLETE: 'parse_complete',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * parse_document - one document to run through the pipeline
 */
export interface ParseDocumentJob {
  event_type: 'document.parse_requested';
  correlation_id: string;
  document_id: string;
  document_type: DocumentKind;
  /** Local path or file:// URI of the document */
  raw_uri: string;
  source_filename: string;
  requested_at: string;
}

/**
 * parse_complete - enqueued for the output consumer after every parse
 */
export type ParseCompleteJob = {
  event_type: 'document.parsed';
  correlation_id: string;
  document_id: string;
  document_type: DocumentKind;
  completed_at: string;
} & (
  | { status: 'parsed'; confidence_score: number; record_json: string }
  | { status: 'extraction_failed'; failure: ExtractionFailure }
);

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (error) {
      logger.warn('REDIS_URL is not a valid URL, using REDIS_HOST/REDIS_PORT', {
        error: errorMessage(error),
      });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

const defaultJobOptions = {
  attempts: config.maxJobAttempts,
  backoff: {
    type: 'exponential' as const,
    delay: config.backoffBaseMs,
  },
  removeOnComplete: 100, // Keep last 100 completed jobs
  removeOnFail: 1000, // Keep last 1000 failed jobs
};

export function createQueue<TData, TResult>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions,
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
  /** At most `max` jobs started per `duration` ms across all workers */
  limiter?: { max: number; duration: number };
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency || config.workerConcurrency;
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
    limiter: options.limiter,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      queue: queueName,
      jobId: job.id,
    });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', {
    queue: queueName,
    concurrency,
    limiter: options.limiter,
  });

  return worker;
}
