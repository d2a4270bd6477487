/**
 * Raw-Text Adapter
 *
 * Reads labelled lines and section blocks from the linearized text layer.
 * Image-only documents have no text layer and fail this method.
 */

import { MethodFailureError } from '../errors';
import type { TextSource } from '../sources/types';
import type { FieldSink } from '../types';
import { BaseAdapter } from './base-adapter';
import type { AdapterContext, AdapterDiagnostics } from './types';

export class RawTextAdapter extends BaseAdapter {
  readonly method = 'raw_text';

  constructor(private readonly source: TextSource) {
    super();
  }

  protected async collect<F>(
    ctx: AdapterContext<F>,
    put: FieldSink<F>,
    diagnostics: AdapterDiagnostics
  ): Promise<void> {
    const pages = await this.source.getText(ctx.document);
    const textLength = pages.reduce((total, page) => total + page.text.trim().length, 0);
    diagnostics.textLength = textLength;
    if (textLength === 0) {
      throw new MethodFailureError('Document has no text layer');
    }
    ctx.profile.readText(pages, put);
  }
}
