/**
 * W-2 Output Record
 *
 * calculated_income takes annual income from the first positive wage figure
 * in box 1, box 3, box 5 order; monthly income is that over twelve, rounded
 * to the cent. primary_income is always box 1.
 */

import { centsToMoney, moneyToCents, sumCents } from '../../money';
import type {
  Box12Entry,
  CalculatedIncome,
  FieldReader,
  IncomeVerificationMethod,
  Money,
  W2Fields,
  W2Record,
} from '../../types';
import type { RecordEnvelope } from '../types';

const INCOME_SOURCES: ReadonlyArray<{
  key: 'income_tax_info.wages_tips_compensation' | 'income_tax_info.social_security_wages' | 'income_tax_info.medicare_wages_tips';
  method: IncomeVerificationMethod;
}> = [
  { key: 'income_tax_info.wages_tips_compensation', method: 'box_1_wages' },
  { key: 'income_tax_info.social_security_wages', method: 'box_3_social_security_wages' },
  { key: 'income_tax_info.medicare_wages_tips', method: 'box_5_medicare_wages' },
];

/**
 * Sum of the box 12 amounts, or null when none carries an amount.
 */
export function box12Total(entries: readonly Box12Entry[]): Money | null {
  const amounts = entries.flatMap((entry) => (entry.amount === null ? [] : [entry.amount]));
  return amounts.length === 0 ? null : centsToMoney(sumCents(amounts));
}

export function calculateIncome(fields: FieldReader<W2Fields>): CalculatedIncome {
  const present = INCOME_SOURCES.flatMap((source) => {
    const value = fields.value(source.key);
    return value === undefined ? [] : [{ value, method: source.method }];
  });
  // A zero box does not count as reported wages
  const chosen = present.find((source) => moneyToCents(source.value) > 0) ?? present[0];
  const annual = chosen?.value ?? null;

  return {
    primary_income: fields.value('income_tax_info.wages_tips_compensation') ?? null,
    social_security_wages: fields.value('income_tax_info.social_security_wages') ?? null,
    medicare_wages: fields.value('income_tax_info.medicare_wages_tips') ?? null,
    annual_income: annual,
    monthly_income: annual === null ? null : centsToMoney(Math.round(moneyToCents(annual) / 12)),
    income_verification_method: chosen?.method ?? 'unavailable',
    additional_benefits: box12Total(fields.value('income_tax_info.box_12_codes') ?? []),
  };
}

export function buildW2Record(fields: FieldReader<W2Fields>, envelope: RecordEnvelope): W2Record {
  return {
    schema_version: '1.0',
    document_type: 'w2',
    tax_year: fields.value('tax_year') ?? null,
    employee: {
      ssn: fields.value('employee.ssn') ?? null,
      name: fields.value('employee.name') ?? null,
      address: fields.value('employee.address') ?? null,
    },
    employer: {
      ein: fields.value('employer.ein') ?? null,
      name: fields.value('employer.name') ?? null,
      address: fields.value('employer.address') ?? null,
      control_number: fields.value('employer.control_number') ?? null,
    },
    income_tax_info: {
      wages_tips_compensation: fields.value('income_tax_info.wages_tips_compensation') ?? null,
      federal_income_tax_withheld: fields.value('income_tax_info.federal_income_tax_withheld') ?? null,
      social_security_wages: fields.value('income_tax_info.social_security_wages') ?? null,
      social_security_tax_withheld: fields.value('income_tax_info.social_security_tax_withheld') ?? null,
      medicare_wages_tips: fields.value('income_tax_info.medicare_wages_tips') ?? null,
      medicare_tax_withheld: fields.value('income_tax_info.medicare_tax_withheld') ?? null,
      social_security_tips: fields.value('income_tax_info.social_security_tips') ?? null,
      allocated_tips: fields.value('income_tax_info.allocated_tips') ?? null,
      dependent_care_benefits: fields.value('income_tax_info.dependent_care_benefits') ?? null,
      nonqualified_plans: fields.value('income_tax_info.nonqualified_plans') ?? null,
      box_12_codes: (fields.value('income_tax_info.box_12_codes') ?? []).map((entry) => ({ ...entry })),
      statutory_employee: fields.value('income_tax_info.statutory_employee') ?? null,
      retirement_plan: fields.value('income_tax_info.retirement_plan') ?? null,
      third_party_sick_pay: fields.value('income_tax_info.third_party_sick_pay') ?? null,
    },
    state_local_info: (fields.value('state_local_info') ?? []).map((row) => ({ ...row })),
    calculated_income: calculateIncome(fields),
    confidence_score: envelope.confidenceScore,
    warnings: envelope.warnings,
    processing_metadata: envelope.metadata,
  };
}
