/**
 * W-2 (Wage and Tax Statement) Visual Template
 *
 * Document semantics:
 * - Lettered boxes a-f hold identity (SSN, EIN, employer, control number, employee)
 * - Numbered boxes 1-11 hold annual wages and withholding
 * - Box 12 holds coded amounts, box 13 holds three checkboxes
 * - Boxes 15-20 hold one or more state/local rows
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
const NULLABLE_BOOLEAN = { type: ['boolean', 'null'] } as const;

export const W2_RESPONSE_SCHEMA = {
  name: 'w2_extraction',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['tax_year', 'employee', 'employer', 'income_tax_info', 'state_local_info', 'extraction_confidence'],
    properties: {
      tax_year: NULLABLE_STRING,
      employee: {
        type: 'object',
        additionalProperties: false,
        required: ['ssn', 'name', 'address'],
        properties: {
          ssn: NULLABLE_STRING,
          name: NULLABLE_STRING,
          address: ADDRESS,
        },
      },
      employer: {
        type: 'object',
        additionalProperties: false,
        required: ['ein', 'name', 'address', 'control_number'],
        properties: {
          ein: NULLABLE_STRING,
          name: NULLABLE_STRING,
          address: ADDRESS,
          control_number: NULLABLE_STRING,
        },
      },
      income_tax_info: {
        type: 'object',
        additionalProperties: false,
        required: [
          'wages_tips_compensation',
          'federal_income_tax_withheld',
          'social_security_wages',
          'social_security_tax_withheld',
          'medicare_wages_tips',
          'medicare_tax_withheld',
          'social_security_tips',
          'allocated_tips',
          'dependent_care_benefits',
          'nonqualified_plans',
          'box_12_codes',
          'statutory_employee',
          'retirement_plan',
          'third_party_sick_pay',
        ],
        properties: {
          wages_tips_compensation: NULLABLE_NUMBER,
          federal_income_tax_withheld: NULLABLE_NUMBER,
          social_security_wages: NULLABLE_NUMBER,
          social_security_tax_withheld: NULLABLE_NUMBER,
          medicare_wages_tips: NULLABLE_NUMBER,
          medicare_tax_withheld: NULLABLE_NUMBER,
          social_security_tips: NULLABLE_NUMBER,
          allocated_tips: NULLABLE_NUMBER,
          dependent_care_benefits: NULLABLE_NUMBER,
          nonqualified_plans: NULLABLE_NUMBER,
          box_12_codes: {
            type: 'array',
            items: {
              type: 'object',
              additionalProperties: false,
              required: ['code', 'amount'],
              properties: {
                code: { type: 'string' },
                amount: NULLABLE_NUMBER,
              },
            },
          },
          statutory_employee: NULLABLE_BOOLEAN,
          retirement_plan: NULLABLE_BOOLEAN,
          third_party_sick_pay: NULLABLE_BOOLEAN,
        },
      },
      state_local_info: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['state', 'employer_state_id', 'state_wages', 'state_income_tax', 'locality', 'local_wages', 'local_income_tax'],
          properties: {
            state: NULLABLE_STRING,
            employer_state_id: NULLABLE_STRING,
            state_wages: NULLABLE_NUMBER,
            state_income_tax: NULLABLE_NUMBER,
            locality: NULLABLE_STRING,
            local_wages: NULLABLE_NUMBER,
            local_income_tax: NULLABLE_NUMBER,
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

/** Answer shape enforced by W2_RESPONSE_SCHEMA */
export interface W2VisionResponse {
  tax_year: string | null;
  employee: { ssn: string | null; name: string | null; address: VisionAddress };
  employer: { ein: string | null; name: string | null; address: VisionAddress; control_number: string | null };
  income_tax_info: {
    wages_tips_compensation: number | null;
    federal_income_tax_withheld: number | null;
    social_security_wages: number | null;
    social_security_tax_withheld: number | null;
    medicare_wages_tips: number | null;
    medicare_tax_withheld: number | null;
    social_security_tips: number | null;
    allocated_tips: number | null;
    dependent_care_benefits: number | null;
    nonqualified_plans: number | null;
    box_12_codes: Array<{ code: string; amount: number | null }>;
    statutory_employee: boolean | null;
    retirement_plan: boolean | null;
    third_party_sick_pay: boolean | null;
  };
  state_local_info: Array<{
    state: string | null;
    employer_state_id: string | null;
    state_wages: number | null;
    state_income_tax: number | null;
    locality: string | null;
    local_wages: number | null;
    local_income_tax: number | null;
  }>;
  extraction_confidence: number;
}

export const W2_TEMPLATE: ExtractionTemplate = {
  documentType: 'w2',
  description: 'W-2 wage and tax statement - identity boxes, wage and withholding boxes 1-13, state/local rows',

  systemPrompt: `You read IRS Form W-2 (Wage and Tax Statement) for income verification.

FORM LAYOUT:
- Box a: employee's social security number
- Box b: employer identification number (EIN), format XX-XXXXXXX
- Box c: employer's name, address and ZIP code
- Box d: control number
- Box e/f: employee's name and address
- Box 1: wages, tips, other compensation
- Box 2: federal income tax withheld
- Box 3: social security wages; Box 4: social security tax withheld
- Box 5: medicare wages and tips; Box 6: medicare tax withheld
- Box 7: social security tips; Box 8: allocated tips
- Box 10: dependent care benefits; Box 11: nonqualified plans
- Box 12a-12d: a letter code and an amount each
- Box 13: statutory employee, retirement plan, third-party sick pay checkboxes
- Boxes 15-20: state, employer state ID, state wages, state income tax, local wages,
  local income tax, locality name (one row per state/locality)

EXTRACTION RULES:
- Report amounts as plain numbers without currency symbols or thousands separators.
- Use null for boxes that are blank. Never compute a box from another box.
- Box 13 checkboxes: true when checked, false when visibly unchecked, null when unreadable.
- Keep the SSN exactly as printed, including any masking.
- tax_year is the four-digit year printed on the form.
- extraction_confidence is your confidence in the overall reading, from 0 to 1.`,

  userPromptTemplate: `Extract the W-2 fields from the attached form.

DOCUMENT METADATA:
- document_id: {{document_id}}
- source_filename: {{source_filename}}

{{mode_instructions}}

FIELDS ALREADY READ FROM THE TEXT LAYER (may be incomplete or wrong):
{{preliminary_fields}}`,

  responseSchema: W2_RESPONSE_SCHEMA,
};
