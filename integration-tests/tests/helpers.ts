/**
 * Test Helpers
 *
 * In-process stand-ins for the document source, text source and vision
 * service, scripted adapters for orchestrator tests, and fixture loading.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  BaseAdapter,
  type AdapterContext,
  type AttemptMode,
  type DetectedTable,
  type DocumentInput,
  type DocumentKind,
  type DocumentSource,
  type ExtractionFailure,
  type ExtractionMethod,
  type FieldSink,
  type PageSet,
  type PageText,
  type ParseResult,
  type PaystubRecord,
  type PaystubVisionResponse,
  type TableSet,
  type TextSource,
  type ValidationOptions,
  type VisualAnalysisRequest,
  type VisualInferenceService,
  type W2Record,
  type W2VisionResponse,
  UnreadableDocumentError,
} from '@payverify/shared';

const FIXTURES_DIR = path.join(__dirname, '../../fixtures');

export const VALIDATION: ValidationOptions = {
  amountToleranceAbsolute: 1,
  amountToleranceRelative: 0.005,
  grossPayRange: { min: 100, max: 50000 },
  hourlyRateRange: { min: 7.25, max: 1000 },
  annualIncomeRange: { min: 1000, max: 5000000 },
  referenceDate: new Date('2024-02-01T12:00:00Z'),
};

export const PARSER_OPTIONS = {
  timeoutMs: 5000,
  enhancementMode: false,
  validation: {
    amountToleranceAbsolute: VALIDATION.amountToleranceAbsolute,
    amountToleranceRelative: VALIDATION.amountToleranceRelative,
    grossPayRange: VALIDATION.grossPayRange,
    hourlyRateRange: VALIDATION.hourlyRateRange,
    annualIncomeRange: VALIDATION.annualIncomeRange,
  },
  now: () => new Date('2024-02-01T12:00:00Z'),
};

export const PAGE_SET: PageSet = {
  pages: [
    {
      pageNumber: 1,
      widthPx: 1700,
      heightPx: 2200,
      mediaType: 'application/pdf',
      data: new Uint8Array([0x25, 0x50, 0x44, 0x46]),
    },
  ],
};

export function documentInput(kind: DocumentKind, documentId = 'doc-001'): DocumentInput {
  return {
    documentId,
    kind,
    filename: `${documentId}.pdf`,
    content: new Uint8Array([0x25, 0x50, 0x44, 0x46]),
  };
}

// ============================================================================
// Fixtures
// ============================================================================

interface TableFixture {
  tables: Array<{ pageNumber: number; accuracy: number | null; rows: string[][] }>;
}

/**
 * Table fixture with cell boxes laid out on a simple grid.
 */
export function loadTables(name: string): TableSet {
  const fixture: TableFixture = JSON.parse(fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf-8'));
  const tables: DetectedTable[] = fixture.tables.map((table) => ({
    pageNumber: table.pageNumber,
    accuracy: table.accuracy,
    rows: table.rows.map((row, r) =>
      row.map((text, c) => ({ text, bbox: { x: 40 + c * 120, y: 60 + r * 14, width: 110, height: 12 } }))
    ),
  }));
  return { tables };
}

export function loadText(name: string): PageText[] {
  return [{ pageNumber: 1, text: fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf-8') }];
}

export function loadJson(name: string): unknown {
  const data: unknown = JSON.parse(fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf-8'));
  return data;
}

export function fixturePath(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

// ============================================================================
// Vision answers
// ============================================================================

export const NO_ADDRESS = { street: null, city: null, state: null, zip: null };

export function paystubAnswer(overrides: Partial<PaystubVisionResponse> = {}): PaystubVisionResponse {
  return {
    employer: { company_name: null, address: NO_ADDRESS, employee_id: null },
    employee: { name: null, address: NO_ADDRESS, ssn_masked: null },
    payroll_period: { start_date: null, end_date: null, pay_date: null },
    gross_pay_current: null,
    gross_pay_ytd: null,
    net_pay_current: null,
    net_pay_ytd: null,
    total_hours_current: null,
    pay_frequency: null,
    earnings: [],
    deductions: [],
    taxes: [],
    extraction_confidence: 0.9,
    ...overrides,
  };
}

export function w2Answer(overrides: Partial<W2VisionResponse> = {}): W2VisionResponse {
  return {
    tax_year: null,
    employee: { ssn: null, name: null, address: NO_ADDRESS },
    employer: { ein: null, name: null, address: NO_ADDRESS, control_number: null },
    income_tax_info: {
      wages_tips_compensation: null,
      federal_income_tax_withheld: null,
      social_security_wages: null,
      social_security_tax_withheld: null,
      medicare_wages_tips: null,
      medicare_tax_withheld: null,
      social_security_tips: null,
      allocated_tips: null,
      dependent_care_benefits: null,
      nonqualified_plans: null,
      box_12_codes: [],
      statutory_employee: null,
      retirement_plan: null,
      third_party_sick_pay: null,
    },
    state_local_info: [],
    extraction_confidence: 0.9,
    ...overrides,
  };
}

// ============================================================================
// Fake collaborators
// ============================================================================

export interface FakeLayers {
  pages?: PageSet;
  tables?: TableSet;
  text?: PageText[];
  unreadable?: boolean;
  /** Thrown as-is from getPages */
  pagesError?: Error;
  /** getPages never settles */
  pagesHang?: boolean;
}

export class FakeDocumentSource implements DocumentSource, TextSource {
  tableCalls = 0;
  textCalls = 0;

  constructor(private readonly layers: FakeLayers) {}

  async getPages(): Promise<PageSet> {
    if (this.layers.unreadable) {
      throw new UnreadableDocumentError('File is not a PDF');
    }
    if (this.layers.pagesError) throw this.layers.pagesError;
    if (this.layers.pagesHang) return new Promise<PageSet>(() => undefined);
    return this.layers.pages ?? PAGE_SET;
  }

  async getTables(): Promise<TableSet> {
    this.tableCalls++;
    return this.layers.tables ?? { tables: [] };
  }

  async getText(): Promise<PageText[]> {
    this.textCalls++;
    return this.layers.text ?? [{ pageNumber: 1, text: '' }];
  }
}

export class FakeVisualService implements VisualInferenceService {
  readonly requests: VisualAnalysisRequest[] = [];

  constructor(private readonly respond: (request: VisualAnalysisRequest) => Promise<unknown>) {}

  analyze(request: VisualAnalysisRequest): Promise<unknown> {
    this.requests.push(request);
    return this.respond(request);
  }
}

// ============================================================================
// Scripted adapters
// ============================================================================

export interface Script {
  /** Vision-shaped answer read through the profile's visual reader */
  answer?: unknown;
  error?: Error;
  /** Held until this settles */
  waitFor?: Promise<void>;
}

/**
 * Adapter whose output is fixed up front. Values are written through the
 * profile's visual reader, tagged with this adapter's method.
 */
export class ScriptedAdapter extends BaseAdapter {
  calls = 0;
  readonly modes: AttemptMode[] = [];
  readonly mergedSeen: Array<Record<string, unknown>> = [];

  constructor(
    readonly method: ExtractionMethod,
    private readonly script: Script
  ) {
    super();
  }

  protected async collect<F>(ctx: AdapterContext<F>, put: FieldSink<F>): Promise<void> {
    this.calls++;
    this.modes.push(ctx.mode);
    this.mergedSeen.push(ctx.merged.snapshot(ctx.profile.fieldKeys));
    if (this.script.waitFor) await this.script.waitFor;
    if (this.script.error) throw this.script.error;
    ctx.profile.readVisual(this.script.answer, put);
  }
}

// ============================================================================
// Result narrowing
// ============================================================================

export function expectPaystub(result: ParseResult): PaystubRecord {
  if (result.status !== 'parsed' || result.record.document_type !== 'paystub') {
    throw new Error(`Expected a parsed paystub, got ${result.status}`);
  }
  return result.record;
}

export function expectW2(result: ParseResult): W2Record {
  if (result.status !== 'parsed' || result.record.document_type !== 'w2') {
    throw new Error(`Expected a parsed W-2, got ${result.status}`);
  }
  return result.record;
}

export function expectFailure(result: ParseResult): ExtractionFailure {
  if (result.status !== 'extraction_failed') {
    throw new Error('Expected extraction_failed');
  }
  return result.failure;
}
