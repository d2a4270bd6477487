/**
 * W-2 Confidence Rubric
 *
 * Same 30/40/20/10 split as paystubs. Identity weighs the employee more
 * than the employer; boxes 1 and 2 carry most of the financial points.
 */

import type { W2Fields } from '../../types';
import type { RubricCategory } from '../types';
import { processingQuality } from '../rubric';

export const W2_RUBRIC: ReadonlyArray<RubricCategory<W2Fields>> = [
  {
    category: 'identity',
    criteria: [
      { id: 'employee_name', points: 10, earned: (f) => Boolean(f.value('employee.name')) },
      { id: 'employee_ssn', points: 10, earned: (f) => Boolean(f.value('employee.ssn')) },
      { id: 'employer_name', points: 5, earned: (f) => Boolean(f.value('employer.name')) },
      { id: 'employer_ein', points: 5, earned: (f) => Boolean(f.value('employer.ein')) },
    ],
  },
  {
    category: 'core_financial',
    criteria: [
      { id: 'box_1', points: 15, earned: (f) => f.value('income_tax_info.wages_tips_compensation') !== undefined },
      { id: 'box_2', points: 15, earned: (f) => f.value('income_tax_info.federal_income_tax_withheld') !== undefined },
      { id: 'box_3', points: 5, earned: (f) => f.value('income_tax_info.social_security_wages') !== undefined },
      { id: 'box_5', points: 5, earned: (f) => f.value('income_tax_info.medicare_wages_tips') !== undefined },
    ],
  },
  {
    category: 'detailed_breakdown',
    criteria: [
      { id: 'box_4', points: 5, earned: (f) => f.value('income_tax_info.social_security_tax_withheld') !== undefined },
      { id: 'box_6', points: 5, earned: (f) => f.value('income_tax_info.medicare_tax_withheld') !== undefined },
      { id: 'state_local', points: 5, earned: (f) => (f.value('state_local_info') ?? []).length > 0 },
      { id: 'tax_year', points: 5, earned: (f) => Boolean(f.value('tax_year')) },
    ],
  },
  processingQuality<W2Fields>(),
];
