/**
 * Visual-Analysis Adapter
 *
 * Sends the rendered document to the vision service with the document
 * kind's template. The prompt carries the fields already merged so the
 * model can confirm or correct them.
 */

import { MethodFailureError } from '../errors';
import { renderUserPrompt } from '../templates';
import type { VisualInferenceService } from '../sources/types';
import type { FieldSink } from '../types';
import { BaseAdapter } from './base-adapter';
import type { AdapterContext, AttemptMode } from './types';

const MODE_INSTRUCTIONS: Record<AttemptMode, string> = {
  fallback:
    'The text layer could not supply the key fields. Read every field directly from the image.',
  enhancement:
    'The key fields were already read from the text layer. Verify them against the image and fill any that are missing.',
};

export class VisualAnalysisAdapter extends BaseAdapter {
  readonly method = 'visual_analysis';

  constructor(private readonly service: VisualInferenceService) {
    super();
  }

  protected async collect<F>(ctx: AdapterContext<F>, put: FieldSink<F>): Promise<void> {
    // Multi-page PDFs travel whole in the first page's payload
    const page = ctx.pages.pages[0];
    if (!page) {
      throw new MethodFailureError('No rendered page to analyze');
    }

    const template = ctx.profile.template;
    const preliminary = ctx.merged.snapshot(ctx.profile.fieldKeys);
    const userPrompt = renderUserPrompt(template, {
      document_id: ctx.document.documentId,
      source_filename: ctx.document.filename,
      mode_instructions: MODE_INSTRUCTIONS[ctx.mode],
      preliminary_fields: Object.keys(preliminary).length > 0 ? JSON.stringify(preliminary, null, 2) : '(none)',
    });

    const response = await this.service.analyze(
      {
        documentId: ctx.document.documentId,
        filename: ctx.document.filename,
        page,
        systemPrompt: template.systemPrompt,
        userPrompt,
        responseSchema: template.responseSchema,
      },
      ctx.signal
    );

    ctx.profile.readVisual(response, put);
  }
}
