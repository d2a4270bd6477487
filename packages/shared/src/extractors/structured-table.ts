/**
 * Structured-Table Adapter
 *
 * Cheapest method: reads label/value cells and line-item sections out of
 * the tables the document source detected.
 */

import { MethodFailureError } from '../errors';
import type { DocumentSource } from '../sources/types';
import type { FieldSink } from '../types';
import { BaseAdapter } from './base-adapter';
import type { AdapterContext, AdapterDiagnostics } from './types';

export class StructuredTableAdapter extends BaseAdapter {
  readonly method = 'structured_table';

  constructor(private readonly source: DocumentSource) {
    super();
  }

  protected async collect<F>(
    ctx: AdapterContext<F>,
    put: FieldSink<F>,
    diagnostics: AdapterDiagnostics
  ): Promise<void> {
    const tables = await this.source.getTables(ctx.document);
    diagnostics.tablesFound = tables.tables.length;
    if (tables.tables.length === 0) {
      throw new MethodFailureError('No tables detected');
    }
    ctx.profile.readTables(tables, put);
  }
}
