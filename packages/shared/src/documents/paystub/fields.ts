/**
 * Paystub Field Catalogue
 */

import type { FieldKey, FieldReader, PaystubFields } from '../../types';

export const PAYSTUB_FIELD_KEYS: ReadonlyArray<FieldKey<PaystubFields>> = [
  'employee.name',
  'employee.address',
  'employee.ssn_masked',
  'employer.company_name',
  'employer.address',
  'employer.employee_id',
  'payroll_period.start_date',
  'payroll_period.end_date',
  'payroll_period.pay_date',
  'financials.gross_pay_current',
  'financials.gross_pay_ytd',
  'financials.net_pay_current',
  'financials.net_pay_ytd',
  'financials.total_hours_current',
  'financials.pay_frequency',
  'earnings',
  'deductions',
  'taxes',
];

export const PAYSTUB_REQUIRED_FIELDS: ReadonlyArray<FieldKey<PaystubFields>> = [
  'employee.name',
  'employer.company_name',
  'payroll_period.pay_date',
  'financials.gross_pay_current',
  'financials.net_pay_current',
];

/**
 * Employee name plus gross or net pay is enough to skip costlier methods.
 */
export function isPaystubSufficient(fields: FieldReader<PaystubFields>): boolean {
  return (
    Boolean(fields.value('employee.name')) &&
    Boolean(fields.value('financials.gross_pay_current') || fields.value('financials.net_pay_current'))
  );
}
