/**
 * Paystub (Earnings Statement) Visual Template
 *
 * Document semantics:
 * - Header carries the employer; the body carries the employee
 * - Earnings, deductions and taxes are separate tables with current and YTD columns
 * - Employer-paid benefits (401k match, employer HSA) may be listed with earnings
 *   but are not part of gross pay
 */

import type { ExtractionTemplate } from './types';

const ADDRESS = {
  type: 'object',
  additionalProperties: false,
  required: ['street', 'city', 'state', 'zip'],
  properties: {
    street: { type: ['string', 'null'] },
    city: { type: ['string', 'null'] },
    state: { type: ['string', 'null'] },
    zip: { type: ['string', 'null'] },
  },
} as const;

const NULLABLE_NUMBER = { type: ['number', 'null'] } as const;
const NULLABLE_STRING = { type: ['string', 'null'] } as const;

export const PAYSTUB_RESPONSE_SCHEMA = {
  name: 'paystub_extraction',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: [
      'employer',
      'employee',
      'payroll_period',
      'gross_pay_current',
      'gross_pay_ytd',
      'net_pay_current',
      'net_pay_ytd',
      'total_hours_current',
      'pay_frequency',
      'earnings',
      'deductions',
      'taxes',
      'extraction_confidence',
    ],
    properties: {
      employer: {
        type: 'object',
        additionalProperties: false,
        required: ['company_name', 'address', 'employee_id'],
        properties: {
          company_name: NULLABLE_STRING,
          address: ADDRESS,
          employee_id: NULLABLE_STRING,
        },
      },
      employee: {
        type: 'object',
        additionalProperties: false,
        required: ['name', 'address', 'ssn_masked'],
        properties: {
          name: NULLABLE_STRING,
          address: ADDRESS,
          ssn_masked: NULLABLE_STRING,
        },
      },
      payroll_period: {
        type: 'object',
        additionalProperties: false,
        required: ['start_date', 'end_date', 'pay_date'],
        properties: {
          start_date: NULLABLE_STRING,
          end_date: NULLABLE_STRING,
          pay_date: NULLABLE_STRING,
        },
      },
      gross_pay_current: NULLABLE_NUMBER,
      gross_pay_ytd: NULLABLE_NUMBER,
      net_pay_current: NULLABLE_NUMBER,
      net_pay_ytd: NULLABLE_NUMBER,
      total_hours_current: NULLABLE_NUMBER,
      pay_frequency: NULLABLE_STRING,
      earnings: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['description', 'rate', 'hours', 'current_amount', 'ytd_amount', 'is_employer_contribution'],
          properties: {
            description: { type: 'string' },
            rate: NULLABLE_NUMBER,
            hours: NULLABLE_NUMBER,
            current_amount: { type: 'number' },
            ytd_amount: NULLABLE_NUMBER,
            is_employer_contribution: { type: 'boolean' },
          },
        },
      },
      deductions: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['description', 'current_amount', 'ytd_amount', 'is_pre_tax'],
          properties: {
            description: { type: 'string' },
            current_amount: { type: 'number' },
            ytd_amount: NULLABLE_NUMBER,
            is_pre_tax: { type: 'boolean' },
          },
        },
      },
      taxes: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['tax_type', 'current_amount', 'ytd_amount', 'taxable_wages_current', 'taxable_wages_ytd'],
          properties: {
            tax_type: { type: 'string' },
            current_amount: { type: 'number' },
            ytd_amount: NULLABLE_NUMBER,
            taxable_wages_current: NULLABLE_NUMBER,
            taxable_wages_ytd: NULLABLE_NUMBER,
          },
        },
      },
      extraction_confidence: { type: 'number', minimum: 0, maximum: 1 },
    },
  },
} as const;

interface VisionAddress {
  street: string | null;
  city: string | null;
  state: string | null;
  zip: string | null;
}

/** Answer shape enforced by PAYSTUB_RESPONSE_SCHEMA */
export interface PaystubVisionResponse {
  employer: { company_name: string | null; address: VisionAddress; employee_id: string | null };
  employee: { name: string | null; address: VisionAddress; ssn_masked: string | null };
  payroll_period: { start_date: string | null; end_date: string | null; pay_date: string | null };
  gross_pay_current: number | null;
  gross_pay_ytd: number | null;
  net_pay_current: number | null;
  net_pay_ytd: number | null;
  total_hours_current: number | null;
  pay_frequency: string | null;
  earnings: Array<{
    description: string;
    rate: number | null;
    hours: number | null;
    current_amount: number;
    ytd_amount: number | null;
    is_employer_contribution: boolean;
  }>;
  deductions: Array<{
    description: string;
    current_amount: number;
    ytd_amount: number | null;
    is_pre_tax: boolean;
  }>;
  taxes: Array<{
    tax_type: string;
    current_amount: number;
    ytd_amount: number | null;
    taxable_wages_current: number | null;
    taxable_wages_ytd: number | null;
  }>;
  extraction_confidence: number;
}

export const PAYSTUB_TEMPLATE: ExtractionTemplate = {
  documentType: 'paystub',
  description: 'Pay stub / earnings statement - employer, employee, pay period, gross/net pay and line items',

  systemPrompt: `You read paystubs (earnings statements) for income verification.

DOCUMENT STRUCTURE:
1. HEADER: company name, company address, sometimes the employee ID.
2. EMPLOYEE BLOCK: employee name, employee address, masked SSN.
3. PAY PERIOD: period start, period end, pay (check) date.
4. EARNINGS TABLE: one row per earning type with rate, hours, current amount, YTD amount.
5. DEDUCTIONS TABLE: pre-tax and post-tax deductions with current and YTD amounts.
6. TAXES TABLE: federal, FICA/social security, medicare, state and local taxes.
7. SUMMARY: gross pay and net pay, current and YTD.

EXTRACTION RULES:
- Report amounts as plain numbers without currency symbols or thousands separators.
- Report dates as YYYY-MM-DD.
- Use null for anything not printed on the document. Never guess or compute missing values.
- Mark an earnings row is_employer_contribution=true when the employer pays it on the
  employee's behalf (401k match, employer HSA/FSA contribution, "ER" cost lines).
- Mark a deduction is_pre_tax=true for 401k/403b, health, dental, vision, HSA, FSA and
  other section 125 deductions.
- Keep the SSN masked exactly as printed.
- pay_frequency is one of weekly, biweekly, semi_monthly, monthly, quarterly, annual, or null.
- extraction_confidence is your confidence in the overall reading, from 0 to 1.`,

  userPromptTemplate: `Extract the paystub fields from the attached document.

DOCUMENT METADATA:
- document_id: {{document_id}}
- source_filename: {{source_filename}}

{{mode_instructions}}

FIELDS ALREADY READ FROM THE TEXT LAYER (may be incomplete or wrong):
{{preliminary_fields}}`,

  responseSchema: PAYSTUB_RESPONSE_SCHEMA,
};
