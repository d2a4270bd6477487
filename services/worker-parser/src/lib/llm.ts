/**
 * OpenAI Vision Service
 *
 * VisualInferenceService backed by OpenAI chat completions with Structured
 * Outputs. PDFs go up as a file part; rendered pages as an image part.
 * Transport failures are mapped onto the pipeline's error kinds so the
 * visual adapter can classify the attempt.
 */

import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import type { ChatCompletionContentPart } from 'openai/resources/chat/completions';
import {
  logger,
  errorMessage,
  visionRequestsCounter,
  visionRequestDurationHistogram,
  InvalidResponseError,
  MethodFailureError,
  ServiceTimeoutError,
  ServiceUnavailableError,
  type PageImage,
  type VisualAnalysisRequest,
  type VisualInferenceService,
} from '@payverify/shared';

export interface OpenAiVisionOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** Preconfigured client, mainly for tests */
  client?: OpenAI;
}

function pageContent(filename: string, page: PageImage): ChatCompletionContentPart {
  const base64 = Buffer.from(page.data).toString('base64');
  if (page.mediaType === 'application/pdf') {
    return {
      type: 'file',
      file: {
        filename,
        file_data: `data:application/pdf;base64,${base64}`,
      },
    };
  }
  return { type: 'image_url', image_url: { url: `data:${page.mediaType};base64,${base64}` } };
}

/**
 * Translate an OpenAI SDK error into a pipeline error.
 */
export function toPipelineError(error: unknown): Error {
  if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
    return new ServiceTimeoutError(`Vision request timed out: ${errorMessage(error)}`, { cause: error });
  }
  if (error instanceof APIConnectionError) {
    return new ServiceUnavailableError(`Vision service unreachable: ${errorMessage(error)}`, { cause: error });
  }
  if (error instanceof APIError) {
    const status = error.status ?? 0;
    if (status === 401 || status === 403 || status === 429 || status >= 500) {
      return new ServiceUnavailableError(`Vision service returned ${status}: ${error.message}`, { cause: error });
    }
    return new MethodFailureError(`Vision request rejected (${status}): ${error.message}`, { cause: error });
  }
  return error instanceof Error ? error : new MethodFailureError(errorMessage(error));
}

export class OpenAiVisionService implements VisualInferenceService {
  private readonly openai: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiVisionOptions) {
    this.openai =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        timeout: options.timeoutMs,
        maxRetries: 1,
      });
    this.model = options.model;
  }

  async analyze(request: VisualAnalysisRequest, signal?: AbortSignal): Promise<unknown> {
    logger.info('Starting OpenAI vision extraction', {
      model: this.model,
      document_id: request.documentId,
      page_number: request.page.pageNumber,
      media_type: request.page.mediaType,
      bytes: request.page.data.byteLength,
    });

    const endTimer = visionRequestDurationHistogram.startTimer({ model: this.model });
    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            {
              role: 'user',
              content: [
                pageContent(request.filename, request.page),
                { type: 'text', text: request.userPrompt },
              ],
            },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: request.responseSchema,
          },
          max_tokens: 4096,
          temperature: 0,
        },
        { signal }
      );
      visionRequestsCounter.inc({ model: this.model, status: 'success' });
      content = response.choices[0]?.message?.content;

      logger.info('OpenAI vision extraction complete', {
        model: this.model,
        request_id: response.id,
        finish_reason: response.choices[0]?.finish_reason,
      });
    } catch (error) {
      visionRequestsCounter.inc({ model: this.model, status: 'error' });
      const mapped = toPipelineError(error);
      logger.warn('OpenAI vision extraction failed', {
        model: this.model,
        document_id: request.documentId,
        error: mapped.message,
      });
      throw mapped;
    } finally {
      endTimer();
    }

    if (!content) {
      throw new InvalidResponseError('Empty response from OpenAI vision');
    }
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new InvalidResponseError(`Vision response is not JSON: ${errorMessage(error)}`, { cause: error });
    }
  }
}
