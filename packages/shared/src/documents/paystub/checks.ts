/**
 * Paystub Consistency Checks
 */

import { centsToMoney, moneyToCents, sumCents } from '../../money';
import type { PaystubFields } from '../../types';
import { PERIODS_PER_YEAR } from '../normalize';
import { requiredFieldsCheck, toleranceCents, unitsToCents } from '../checks';
import type { CrossCheck } from '../types';
import { PAYSTUB_REQUIRED_FIELDS } from './fields';

const grossMatchesEarnings: CrossCheck<PaystubFields> = {
  code: 'gross_earnings_mismatch',
  category: 'arithmetic',
  severity: 'warning',
  run(fields, options) {
    const gross = fields.value('financials.gross_pay_current');
    const employeeEarnings = (fields.value('earnings') ?? []).filter(
      (line) => !line.is_employer_contribution
    );
    if (!gross || employeeEarnings.length === 0) return null;

    const grossCents = moneyToCents(gross);
    const totalCents = sumCents(employeeEarnings.map((line) => line.current_amount));
    const diff = Math.abs(totalCents - grossCents);
    if (diff <= toleranceCents(grossCents, options)) return null;

    return {
      message: `Employee earnings total ${centsToMoney(totalCents)} does not match gross pay ${gross} (difference ${centsToMoney(diff)})`,
      fields: ['financials.gross_pay_current', 'earnings'],
    };
  },
};

const netMatchesDeductions: CrossCheck<PaystubFields> = {
  code: 'net_pay_mismatch',
  category: 'arithmetic',
  severity: 'warning',
  run(fields, options) {
    const gross = fields.value('financials.gross_pay_current');
    const net = fields.value('financials.net_pay_current');
    const deductions = fields.value('deductions') ?? [];
    const taxes = fields.value('taxes') ?? [];
    if (!gross || !net || (deductions.length === 0 && taxes.length === 0)) return null;

    const grossCents = moneyToCents(gross);
    const expectedCents =
      grossCents -
      sumCents(deductions.map((line) => line.current_amount)) -
      sumCents(taxes.map((line) => line.current_amount));
    const diff = Math.abs(expectedCents - moneyToCents(net));
    if (diff <= toleranceCents(grossCents, options)) return null;

    return {
      message: `Gross pay minus deductions and taxes is ${centsToMoney(expectedCents)}, but net pay is ${net} (difference ${centsToMoney(diff)})`,
      fields: ['financials.net_pay_current', 'financials.gross_pay_current', 'deductions', 'taxes'],
    };
  },
};

const netBelowGross: CrossCheck<PaystubFields> = {
  code: 'net_exceeds_gross',
  category: 'arithmetic',
  severity: 'error',
  run(fields) {
    const gross = fields.value('financials.gross_pay_current');
    const net = fields.value('financials.net_pay_current');
    if (!gross || !net) return null;
    if (moneyToCents(net) < moneyToCents(gross)) return null;
    return {
      message: `Net pay ${net} is not less than gross pay ${gross}`,
      fields: ['financials.net_pay_current', 'financials.gross_pay_current'],
    };
  },
};

const payPeriodOrder: CrossCheck<PaystubFields> = {
  code: 'pay_period_order',
  category: 'temporal',
  severity: 'warning',
  run(fields) {
    const start = fields.value('payroll_period.start_date');
    const end = fields.value('payroll_period.end_date');
    const payDate = fields.value('payroll_period.pay_date');

    const problems: string[] = [];
    const involved = new Set<string>();
    if (start && end && start > end) {
      problems.push(`period start ${start} is after period end ${end}`);
      involved.add('payroll_period.start_date').add('payroll_period.end_date');
    }
    if (end && payDate && end > payDate) {
      problems.push(`period end ${end} is after pay date ${payDate}`);
      involved.add('payroll_period.end_date').add('payroll_period.pay_date');
    } else if (!end && start && payDate && start > payDate) {
      problems.push(`period start ${start} is after pay date ${payDate}`);
      involved.add('payroll_period.start_date').add('payroll_period.pay_date');
    }
    if (problems.length === 0) return null;

    return { message: `Pay period dates out of order: ${problems.join('; ')}`, fields: [...involved] };
  },
};

const grossPayRange: CrossCheck<PaystubFields> = {
  code: 'gross_pay_out_of_range',
  category: 'range',
  severity: 'info',
  run(fields, options) {
    const gross = fields.value('financials.gross_pay_current');
    if (!gross) return null;
    const cents = moneyToCents(gross);
    const { min, max } = options.grossPayRange;
    if (cents >= unitsToCents(min) && cents <= unitsToCents(max)) return null;
    return {
      message: `Gross pay ${gross} is outside the expected per-period range ${min}-${max}`,
      fields: ['financials.gross_pay_current'],
    };
  },
};

const hourlyRateRange: CrossCheck<PaystubFields> = {
  code: 'hourly_rate_out_of_range',
  category: 'range',
  severity: 'info',
  run(fields, options) {
    const gross = fields.value('financials.gross_pay_current');
    const hours = Number(fields.value('financials.total_hours_current'));
    if (!gross || !Number.isFinite(hours) || hours <= 0) return null;

    const rate = moneyToCents(gross) / 100 / hours;
    const { min, max } = options.hourlyRateRange;
    if (rate >= min && rate <= max) return null;
    return {
      message: `Derived hourly rate ${rate.toFixed(2)} is outside the expected range ${min}-${max}`,
      fields: ['financials.gross_pay_current', 'financials.total_hours_current'],
    };
  },
};

const annualIncomeRange: CrossCheck<PaystubFields> = {
  code: 'annual_income_out_of_range',
  category: 'range',
  severity: 'info',
  run(fields, options) {
    const gross = fields.value('financials.gross_pay_current');
    const frequency = fields.value('financials.pay_frequency');
    if (!gross || !frequency) return null;

    const annualCents = moneyToCents(gross) * PERIODS_PER_YEAR[frequency];
    const { min, max } = options.annualIncomeRange;
    if (annualCents >= unitsToCents(min) && annualCents <= unitsToCents(max)) return null;
    return {
      message: `Annualized income ${centsToMoney(annualCents)} (${frequency}) is outside the expected range ${min}-${max}`,
      fields: ['financials.gross_pay_current', 'financials.pay_frequency'],
    };
  },
};

export const PAYSTUB_CHECKS: ReadonlyArray<CrossCheck<PaystubFields>> = [
  grossMatchesEarnings,
  netMatchesDeductions,
  netBelowGross,
  payPeriodOrder,
  grossPayRange,
  hourlyRateRange,
  annualIncomeRange,
  requiredFieldsCheck<PaystubFields>(PAYSTUB_REQUIRED_FIELDS),
];
