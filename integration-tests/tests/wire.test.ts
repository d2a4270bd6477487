/**
 * Wire Format Tests
 */

import {
  ContractViolationError,
  DocumentParser,
  ServiceUnavailableError,
  parseRecord,
  serializeRecord,
  type DocumentRecord,
} from '@payverify/shared';
import {
  FakeDocumentSource,
  FakeVisualService,
  PARSER_OPTIONS,
  documentInput,
  expectPaystub,
  expectW2,
  loadTables,
  loadText,
  type FakeLayers,
} from './helpers';

async function parseWith(layers: FakeLayers, kind: 'paystub' | 'w2') {
  const source = new FakeDocumentSource(layers);
  const visualService = new FakeVisualService(async () => {
    throw new ServiceUnavailableError('Vision service returned 503');
  });
  const parser = new DocumentParser({ documentSource: source, textSource: source, visualService }, PARSER_OPTIONS);
  return parser.parse(documentInput(kind));
}

function violation(fn: () => unknown): ContractViolationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ContractViolationError) return error;
    throw error;
  }
  throw new Error('Expected a ContractViolationError');
}

describe('serializeRecord / parseRecord', () => {
  let paystub: DocumentRecord;
  let w2: DocumentRecord;

  beforeAll(async () => {
    paystub = expectPaystub(await parseWith({ tables: loadTables('paystub_acme_tables.json') }, 'paystub'));
    w2 = expectW2(await parseWith({ text: loadText('w2_northwind_text.txt') }, 'w2'));
  });

  it('round-trips a paystub record', () => {
    expect(parseRecord(serializeRecord(paystub))).toEqual(paystub);
  });

  it('round-trips a W-2 record', () => {
    expect(parseRecord(serializeRecord(w2))).toEqual(w2);
  });

  it('writes money as two-decimal strings', () => {
    expect(serializeRecord(paystub)).toContain('"net_pay_current":"2769.80"');
  });

  it('rejects money sent as a number', () => {
    const json = serializeRecord(paystub).replace('"net_pay_current":"2769.80"', '"net_pay_current":2769.8');

    const error = violation(() => parseRecord(json));
    expect(error.errors.some((e) => e.startsWith('/financials/net_pay_current'))).toBe(true);
  });

  it('rejects money without exactly two decimals', () => {
    const json = serializeRecord(paystub).replace('"net_pay_current":"2769.80"', '"net_pay_current":"2769.8"');

    const error = violation(() => parseRecord(json));
    expect(error.errors.some((e) => e.startsWith('/financials/net_pay_current'))).toBe(true);
  });

  it('rejects a record with an unknown document type', () => {
    const error = violation(() => parseRecord('{"document_type":"1099"}'));
    expect(error.errors).toEqual(['/document_type: must be "paystub" or "w2"']);
  });

  it('rejects text that is not JSON', () => {
    const error = violation(() => parseRecord('{not json'));
    expect(error.message).toBe('Record is not valid JSON');
  });
});
