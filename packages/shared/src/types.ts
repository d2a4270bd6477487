/**
 * Shared Types
 *
 * Field catalogue for paystubs and W-2s, extraction provenance, and the
 * output record contracts (see docs/contracts/*.schema.json).
 */

// ============================================================================
// Document Kinds & Methods
// ============================================================================

export type DocumentKind = 'paystub' | 'w2';

export const DOCUMENT_KINDS: readonly DocumentKind[] = ['paystub', 'w2'];

/**
 * Extraction methods, cheapest first.
 */
export type ExtractionMethod = 'structured_table' | 'raw_text' | 'visual_analysis';

/**
 * Monetary amount as a plain decimal string with exactly two fractional
 * digits, e.g. "2769.80". Never a binary float.
 */
export type Money = string;

export type PayFrequency =
  | 'weekly'
  | 'biweekly'
  | 'semi_monthly'
  | 'monthly'
  | 'quarterly'
  | 'annual';

// ============================================================================
// Field Value Types
// ============================================================================

export interface Address {
  street: string | null;
  city: string | null;
  state: string | null;
  zip: string | null;
  full_address: string | null;
}

export interface EarningsLine {
  description: string;
  rate: string | null;
  hours: string | null;
  current_amount: Money;
  ytd_amount: Money | null;
  /** Employer-paid benefit (401k match, employer HSA) shown on the stub but not paid to the employee */
  is_employer_contribution: boolean;
}

export interface DeductionLine {
  description: string;
  current_amount: Money;
  ytd_amount: Money | null;
  is_pre_tax: boolean;
}

export interface TaxLine {
  tax_type: string;
  current_amount: Money;
  ytd_amount: Money | null;
  taxable_wages_current: Money | null;
  taxable_wages_ytd: Money | null;
}

export interface Box12Entry {
  code: string;
  amount: Money | null;
}

export interface StateLocalLine {
  state: string | null;
  employer_state_id: string | null;
  state_wages: Money | null;
  state_income_tax: Money | null;
  locality: string | null;
  local_wages: Money | null;
  local_income_tax: Money | null;
}

// ============================================================================
// Field Catalogue
// ============================================================================

/**
 * Paystub fields keyed by their dotted output path.
 */
export interface PaystubFields {
  'employee.name': string;
  'employee.address': Address;
  'employee.ssn_masked': string;
  'employer.company_name': string;
  'employer.address': Address;
  'employer.employee_id': string;
  'payroll_period.start_date': string;
  'payroll_period.end_date': string;
  'payroll_period.pay_date': string;
  'financials.gross_pay_current': Money;
  'financials.gross_pay_ytd': Money;
  'financials.net_pay_current': Money;
  'financials.net_pay_ytd': Money;
  'financials.total_hours_current': string;
  'financials.pay_frequency': PayFrequency;
  earnings: EarningsLine[];
  deductions: DeductionLine[];
  taxes: TaxLine[];
}

/**
 * W-2 fields keyed by their dotted output path. Box numbers are noted
 * where the field maps to a numbered box on the form.
 */
export interface W2Fields {
  tax_year: string;
  'employee.ssn': string;
  'employee.name': string;
  'employee.address': Address;
  'employer.ein': string;
  'employer.name': string;
  'employer.address': Address;
  'employer.control_number': string;
  /** Box 1 */
  'income_tax_info.wages_tips_compensation': Money;
  /** Box 2 */
  'income_tax_info.federal_income_tax_withheld': Money;
  /** Box 3 */
  'income_tax_info.social_security_wages': Money;
  /** Box 4 */
  'income_tax_info.social_security_tax_withheld': Money;
  /** Box 5 */
  'income_tax_info.medicare_wages_tips': Money;
  /** Box 6 */
  'income_tax_info.medicare_tax_withheld': Money;
  /** Box 7 */
  'income_tax_info.social_security_tips': Money;
  /** Box 8 */
  'income_tax_info.allocated_tips': Money;
  /** Box 10 */
  'income_tax_info.dependent_care_benefits': Money;
  /** Box 11 */
  'income_tax_info.nonqualified_plans': Money;
  /** Box 12a-d */
  'income_tax_info.box_12_codes': Box12Entry[];
  /** Box 13 checkboxes */
  'income_tax_info.statutory_employee': boolean;
  'income_tax_info.retirement_plan': boolean;
  'income_tax_info.third_party_sick_pay': boolean;
  /** Boxes 15-20 */
  state_local_info: StateLocalLine[];
}

export interface FieldsByKind {
  paystub: PaystubFields;
  w2: W2Fields;
}

export type FieldKey<F> = keyof F & string;

/**
 * A populated field tagged with the method that produced it.
 */
export interface FieldValue<T> {
  value: T;
  source: ExtractionMethod;
  /** Per-field confidence reported by the source, when it has one */
  confidence?: number;
}

export type FieldMap<F> = { [P in keyof F]?: FieldValue<F[P]> };

/**
 * Read-only view over a set of extracted fields.
 */
export interface FieldReader<F> {
  value<P extends keyof F>(key: P): F[P] | undefined;
  get<P extends keyof F>(key: P): FieldValue<F[P]> | undefined;
}

/**
 * Write callback handed to field readers. Empty values are ignored, and a
 * key already written in the same pass keeps its first value.
 */
export type FieldSink<F> = <P extends keyof F>(
  key: P,
  value: F[P] | null | undefined,
  confidence?: number
) => void;

// ============================================================================
// Method Attempts
// ============================================================================

export type MethodOutcome = 'success' | 'partial_success' | 'failed' | 'unavailable';

export type AttemptErrorKind =
  | 'method_failure'
  | 'invalid_response'
  | 'service_unavailable'
  | 'service_timeout'
  | 'pipeline_timeout';

export interface MethodAttempt {
  method: ExtractionMethod;
  outcome: MethodOutcome;
  /** 'enhancement' when visual analysis ran after the record was already sufficient */
  mode: 'fallback' | 'enhancement';
  fields_extracted: number;
  duration_ms: number;
  error: { kind: AttemptErrorKind; message: string } | null;
}

export interface FieldOverride {
  field: string;
  replaced_source: ExtractionMethod;
  source: ExtractionMethod;
  reason: string;
}

export interface FieldProvenance {
  source: ExtractionMethod;
  confidence: number | null;
}

// ============================================================================
// Validation & Confidence
// ============================================================================

export type WarningCategory = 'arithmetic' | 'temporal' | 'range' | 'completeness';

export type WarningSeverity = 'info' | 'warning' | 'error';

export interface ValidationWarning {
  code: string;
  category: WarningCategory;
  severity: WarningSeverity;
  message: string;
  fields: string[];
}

export type ConfidenceCategory =
  | 'identity'
  | 'core_financial'
  | 'detailed_breakdown'
  | 'processing_quality';

export interface ConfidenceCategoryScore {
  category: ConfidenceCategory;
  earned: number;
  possible: number;
  criteria: Array<{ id: string; points: number; earned: boolean }>;
}

export interface ConfidenceBreakdown {
  score: number;
  categories: ConfidenceCategoryScore[];
}

// ============================================================================
// Output Records
// ============================================================================

export interface ProcessingMetadata {
  document_id: string;
  correlation_id: string;
  source_filename: string;
  page_count: number;
  started_at: string;
  duration_ms: number;
  methods: MethodAttempt[];
  tables_found: number;
  text_length: number;
  visual_analysis_used: boolean;
  visual_analysis_mode: 'fallback' | 'enhancement' | null;
  timed_out: boolean;
  provenance: Record<string, FieldProvenance>;
  overrides: FieldOverride[];
  confidence_breakdown: ConfidenceCategoryScore[];
}

export interface PaystubRecord {
  schema_version: '1.0';
  document_type: 'paystub';
  employee: {
    name: string | null;
    address: Address | null;
    ssn_masked: string | null;
  };
  employer: {
    company_name: string | null;
    address: Address | null;
    employee_id: string | null;
  };
  payroll_period: {
    start_date: string | null;
    end_date: string | null;
    pay_date: string | null;
  };
  financials: {
    gross_pay_current: Money | null;
    gross_pay_ytd: Money | null;
    net_pay_current: Money | null;
    net_pay_ytd: Money | null;
    total_hours_current: string | null;
    pay_frequency: PayFrequency | null;
  };
  earnings: EarningsLine[];
  deductions: DeductionLine[];
  taxes: TaxLine[];
  confidence_score: number;
  warnings: ValidationWarning[];
  processing_metadata: ProcessingMetadata;
}

export type IncomeVerificationMethod =
  | 'box_1_wages'
  | 'box_3_social_security_wages'
  | 'box_5_medicare_wages'
  | 'unavailable';

export interface CalculatedIncome {
  primary_income: Money | null;
  social_security_wages: Money | null;
  medicare_wages: Money | null;
  annual_income: Money | null;
  monthly_income: Money | null;
  income_verification_method: IncomeVerificationMethod;
  /** Sum of box 12 amounts */
  additional_benefits: Money | null;
}

export interface W2Record {
  schema_version: '1.0';
  document_type: 'w2';
  tax_year: string | null;
  employee: {
    ssn: string | null;
    name: string | null;
    address: Address | null;
  };
  employer: {
    ein: string | null;
    name: string | null;
    address: Address | null;
    control_number: string | null;
  };
  income_tax_info: {
    wages_tips_compensation: Money | null;
    federal_income_tax_withheld: Money | null;
    social_security_wages: Money | null;
    social_security_tax_withheld: Money | null;
    medicare_wages_tips: Money | null;
    medicare_tax_withheld: Money | null;
    social_security_tips: Money | null;
    allocated_tips: Money | null;
    dependent_care_benefits: Money | null;
    nonqualified_plans: Money | null;
    box_12_codes: Box12Entry[];
    statutory_employee: boolean | null;
    retirement_plan: boolean | null;
    third_party_sick_pay: boolean | null;
  };
  state_local_info: StateLocalLine[];
  calculated_income: CalculatedIncome;
  confidence_score: number;
  warnings: ValidationWarning[];
  processing_metadata: ProcessingMetadata;
}

export type DocumentRecord = PaystubRecord | W2Record;

export interface ExtractionFailure {
  document_id: string;
  document_type: DocumentKind;
  reason: string;
  warnings: ValidationWarning[];
  processing_metadata: ProcessingMetadata;
}

export type ParseResult =
  | { status: 'parsed'; record: DocumentRecord }
  | { status: 'extraction_failed'; failure: ExtractionFailure };
