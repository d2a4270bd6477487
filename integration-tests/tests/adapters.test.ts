/**
 * Extraction Adapter Tests
 */

import {
  FieldStore,
  RawTextAdapter,
  ServiceTimeoutError,
  StructuredTableAdapter,
  VisualAnalysisAdapter,
  paystubProfile,
  type AdapterContext,
  type AttemptMode,
  type PaystubFields,
} from '@payverify/shared';
import {
  FakeDocumentSource,
  FakeVisualService,
  PAGE_SET,
  documentInput,
  loadJson,
  loadTables,
  paystubAnswer,
} from './helpers';

function context(
  merged = new FieldStore<PaystubFields>(),
  mode: AttemptMode = 'fallback'
): AdapterContext<PaystubFields> {
  return {
    document: documentInput('paystub'),
    pages: PAGE_SET,
    profile: paystubProfile,
    merged,
    mode,
    signal: new AbortController().signal,
  };
}

describe('StructuredTableAdapter', () => {
  it('succeeds when every required field comes out of the tables', async () => {
    const source = new FakeDocumentSource({ tables: loadTables('paystub_acme_tables.json') });
    const result = await new StructuredTableAdapter(source).attempt(context());

    expect(result.method).toBe('structured_table');
    expect(result.outcome).toBe('success');
    expect(result.error).toBeNull();
    expect(result.diagnostics.tablesFound).toBe(4);
    expect(result.partial.populated(paystubProfile.fieldKeys)).toHaveLength(14);
  });

  it('fails when no table was detected', async () => {
    const source = new FakeDocumentSource({ tables: { tables: [] } });
    const result = await new StructuredTableAdapter(source).attempt(context());

    expect(result.outcome).toBe('failed');
    expect(result.error).toEqual({ kind: 'method_failure', message: 'No tables detected' });
    expect(result.diagnostics.tablesFound).toBe(0);
  });
});

describe('RawTextAdapter', () => {
  it('reports partial success when some required fields are missing', async () => {
    const source = new FakeDocumentSource({ text: [{ pageNumber: 1, text: 'Employee Name: Jane Q Doe' }] });
    const result = await new RawTextAdapter(source).attempt(context());

    expect(result.outcome).toBe('partial_success');
    expect(result.partial.value('employee.name')).toBe('Jane Q Doe');
    expect(result.diagnostics.textLength).toBe(25);
  });

  it('fails on a document with no text layer', async () => {
    const source = new FakeDocumentSource({ text: [{ pageNumber: 1, text: '  \n ' }] });
    const result = await new RawTextAdapter(source).attempt(context());

    expect(result.outcome).toBe('failed');
    expect(result.error).toEqual({ kind: 'method_failure', message: 'Document has no text layer' });
    expect(result.diagnostics.textLength).toBe(0);
  });
});

describe('VisualAnalysisAdapter', () => {
  it('sends the template with the fields merged so far', async () => {
    const service = new FakeVisualService(async () => loadJson('paystub_acme_vision.json'));
    const merged = new FieldStore<PaystubFields>();
    merged.sink('raw_text')('employee.name', 'Jane Q Doe');

    const result = await new VisualAnalysisAdapter(service).attempt(context(merged));

    expect(result.outcome).toBe('success');
    expect(result.partial.get('financials.gross_pay_current')).toEqual({
      value: '4056.31',
      source: 'visual_analysis',
      confidence: 0.87,
    });

    expect(service.requests).toHaveLength(1);
    const request = service.requests[0];
    expect(request.documentId).toBe('doc-001');
    expect(request.page).toBe(PAGE_SET.pages[0]);
    expect(request.responseSchema.name).toBe('paystub_extraction');
    expect(request.userPrompt).toContain('"employee.name": "Jane Q Doe"');
    expect(request.userPrompt).toContain('Read every field directly from the image.');
  });

  it('asks for verification in enhancement mode', async () => {
    const service = new FakeVisualService(async () => paystubAnswer());
    await new VisualAnalysisAdapter(service).attempt(context(new FieldStore<PaystubFields>(), 'enhancement'));

    expect(service.requests[0].userPrompt).toContain('Verify them against the image');
    expect(service.requests[0].userPrompt).toContain('(none)');
  });

  it('reports a timed-out service as unavailable', async () => {
    const service = new FakeVisualService(async () => {
      throw new ServiceTimeoutError('Vision request timed out');
    });
    const result = await new VisualAnalysisAdapter(service).attempt(context());

    expect(result.outcome).toBe('unavailable');
    expect(result.error).toEqual({ kind: 'service_timeout', message: 'Vision request timed out' });
    expect(result.partial.populated(paystubProfile.fieldKeys)).toEqual([]);
  });

  it('reports a malformed answer as a failed attempt', async () => {
    const service = new FakeVisualService(async () => ({ unexpected: true }));
    const result = await new VisualAnalysisAdapter(service).attempt(context());

    expect(result.outcome).toBe('failed');
    expect(result.error?.kind).toBe('invalid_response');
  });

  it('never throws, even on unexpected errors', async () => {
    const service = new FakeVisualService(async () => {
      throw new TypeError('boom');
    });
    const result = await new VisualAnalysisAdapter(service).attempt(context());

    expect(result.outcome).toBe('failed');
    expect(result.error).toEqual({ kind: 'method_failure', message: 'boom' });
  });
});
