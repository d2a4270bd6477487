/**
 * Rate-limited Visual Service
 *
 * Semaphore around a VisualInferenceService so parallel parses share one
 * request budget. Lives outside the pipeline; wrap the service before
 * handing it to the parser.
 */

import pLimit from 'p-limit';
import { ServiceTimeoutError } from '../errors';
import { logger } from '../logger';
import type { VisualAnalysisRequest, VisualInferenceService } from './types';

export function createRateLimitedVisualService(
  service: VisualInferenceService,
  maxConcurrent: number
): VisualInferenceService {
  const limit = pLimit(Math.max(1, maxConcurrent));

  return {
    analyze(request: VisualAnalysisRequest, signal?: AbortSignal): Promise<unknown> {
      if (limit.pendingCount > 0) {
        logger.debug('Visual request queued behind rate limit', {
          document_id: request.documentId,
          active: limit.activeCount,
          pending: limit.pendingCount,
        });
      }
      return limit(() => {
        if (signal?.aborted) {
          throw new ServiceTimeoutError('Visual request cancelled while waiting for a slot');
        }
        return service.analyze(request, signal);
      });
    },
  };
}
