/**
 * Paystub Confidence Rubric
 *
 * 100 points: identity 30, core financial 40, detailed breakdown 20,
 * processing quality 10.
 */

import { moneyToCents } from '../../money';
import type { Money, PaystubFields } from '../../types';
import type { RubricCategory } from '../types';
import { processingQuality } from '../rubric';

function positive(amount: Money | undefined): boolean {
  return amount !== undefined && moneyToCents(amount) > 0;
}

export const PAYSTUB_RUBRIC: ReadonlyArray<RubricCategory<PaystubFields>> = [
  {
    category: 'identity',
    criteria: [
      { id: 'company_name', points: 10, earned: (f) => Boolean(f.value('employer.company_name')) },
      { id: 'employee_name', points: 10, earned: (f) => Boolean(f.value('employee.name')) },
      { id: 'pay_date', points: 10, earned: (f) => Boolean(f.value('payroll_period.pay_date')) },
    ],
  },
  {
    category: 'core_financial',
    criteria: [
      { id: 'gross_pay', points: 15, earned: (f) => positive(f.value('financials.gross_pay_current')) },
      { id: 'net_pay', points: 15, earned: (f) => positive(f.value('financials.net_pay_current')) },
      { id: 'earnings', points: 10, earned: (f) => (f.value('earnings') ?? []).length > 0 },
    ],
  },
  {
    category: 'detailed_breakdown',
    criteria: [
      { id: 'taxes', points: 10, earned: (f) => (f.value('taxes') ?? []).length > 0 },
      { id: 'deductions', points: 10, earned: (f) => (f.value('deductions') ?? []).length > 0 },
    ],
  },
  processingQuality<PaystubFields>(),
];
