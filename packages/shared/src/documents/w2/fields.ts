/**
 * W-2 Field Catalogue
 */

import type { FieldKey, FieldReader, W2Fields } from '../../types';

export const W2_FIELD_KEYS: ReadonlyArray<FieldKey<W2Fields>> = [
  'tax_year',
  'employee.ssn',
  'employee.name',
  'employee.address',
  'employer.ein',
  'employer.name',
  'employer.address',
  'employer.control_number',
  'income_tax_info.wages_tips_compensation',
  'income_tax_info.federal_income_tax_withheld',
  'income_tax_info.social_security_wages',
  'income_tax_info.social_security_tax_withheld',
  'income_tax_info.medicare_wages_tips',
  'income_tax_info.medicare_tax_withheld',
  'income_tax_info.social_security_tips',
  'income_tax_info.allocated_tips',
  'income_tax_info.dependent_care_benefits',
  'income_tax_info.nonqualified_plans',
  'income_tax_info.box_12_codes',
  'income_tax_info.statutory_employee',
  'income_tax_info.retirement_plan',
  'income_tax_info.third_party_sick_pay',
  'state_local_info',
];

export const W2_REQUIRED_FIELDS: ReadonlyArray<FieldKey<W2Fields>> = [
  'employee.name',
  'employee.ssn',
  'employer.name',
  'tax_year',
  'income_tax_info.wages_tips_compensation',
  'income_tax_info.federal_income_tax_withheld',
];

/**
 * Employee name plus any of the box 1, 3 or 5 wage figures.
 */
export function isW2Sufficient(fields: FieldReader<W2Fields>): boolean {
  return (
    Boolean(fields.value('employee.name')) &&
    Boolean(
      fields.value('income_tax_info.wages_tips_compensation') ||
        fields.value('income_tax_info.social_security_wages') ||
        fields.value('income_tax_info.medicare_wages_tips')
    )
  );
}
