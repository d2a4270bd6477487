/**
 * W-2 Consistency Checks
 */

import { applyRate, centsToMoney, moneyToCents } from '../../money';
import type { W2Fields } from '../../types';
import { requiredFieldsCheck, toleranceCents, unitsToCents } from '../checks';
import type { CrossCheck } from '../types';
import { W2_REQUIRED_FIELDS } from './fields';

const SOCIAL_SECURITY_RATE = 0.062;
const MEDICARE_RATE_MIN = 0.0145;
/** 1.45% plus the 0.9% additional Medicare tax */
const MEDICARE_RATE_MAX = 0.0235;
const EARLIEST_TAX_YEAR = 1990;

const withholdingWithinWages: CrossCheck<W2Fields> = {
  code: 'federal_withholding_exceeds_wages',
  category: 'arithmetic',
  severity: 'warning',
  run(fields) {
    const wages = fields.value('income_tax_info.wages_tips_compensation');
    const withheld = fields.value('income_tax_info.federal_income_tax_withheld');
    if (!wages || !withheld) return null;
    if (moneyToCents(withheld) <= moneyToCents(wages)) return null;
    return {
      message: `Federal income tax withheld ${withheld} exceeds box 1 wages ${wages}`,
      fields: ['income_tax_info.federal_income_tax_withheld', 'income_tax_info.wages_tips_compensation'],
    };
  },
};

const socialSecurityRate: CrossCheck<W2Fields> = {
  code: 'social_security_tax_rate',
  category: 'arithmetic',
  severity: 'warning',
  run(fields, options) {
    const wages = fields.value('income_tax_info.social_security_wages');
    const tax = fields.value('income_tax_info.social_security_tax_withheld');
    if (!wages || !tax) return null;

    const expectedCents = applyRate(moneyToCents(wages), SOCIAL_SECURITY_RATE);
    const diff = Math.abs(moneyToCents(tax) - expectedCents);
    if (diff <= toleranceCents(expectedCents, options)) return null;
    return {
      message: `Social security tax ${tax} is not 6.2% of social security wages ${wages} (expected ${centsToMoney(expectedCents)})`,
      fields: ['income_tax_info.social_security_tax_withheld', 'income_tax_info.social_security_wages'],
    };
  },
};

const medicareRate: CrossCheck<W2Fields> = {
  code: 'medicare_tax_rate',
  category: 'arithmetic',
  severity: 'warning',
  run(fields, options) {
    const wages = fields.value('income_tax_info.medicare_wages_tips');
    const tax = fields.value('income_tax_info.medicare_tax_withheld');
    if (!wages || !tax) return null;

    const wageCents = moneyToCents(wages);
    const taxCents = moneyToCents(tax);
    const low = applyRate(wageCents, MEDICARE_RATE_MIN);
    const high = applyRate(wageCents, MEDICARE_RATE_MAX);
    const tolerance = toleranceCents(low, options);
    if (taxCents >= low - tolerance && taxCents <= high + tolerance) return null;
    return {
      message: `Medicare tax ${tax} is outside 1.45%-2.35% of medicare wages ${wages} (${centsToMoney(low)}-${centsToMoney(high)})`,
      fields: ['income_tax_info.medicare_tax_withheld', 'income_tax_info.medicare_wages_tips'],
    };
  },
};

const taxYearPlausible: CrossCheck<W2Fields> = {
  code: 'tax_year_plausible',
  category: 'temporal',
  severity: 'warning',
  run(fields, options) {
    const taxYear = fields.value('tax_year');
    if (!taxYear) return null;
    const year = Number(taxYear);
    const latest = options.referenceDate.getUTCFullYear();
    if (year >= EARLIEST_TAX_YEAR && year <= latest) return null;
    return {
      message: `Tax year ${taxYear} is outside ${EARLIEST_TAX_YEAR}-${latest}`,
      fields: ['tax_year'],
    };
  },
};

const annualWagesRange: CrossCheck<W2Fields> = {
  code: 'annual_wages_out_of_range',
  category: 'range',
  severity: 'info',
  run(fields, options) {
    const wages = fields.value('income_tax_info.wages_tips_compensation');
    if (!wages) return null;
    const cents = moneyToCents(wages);
    const { min, max } = options.annualIncomeRange;
    if (cents >= unitsToCents(min) && cents <= unitsToCents(max)) return null;
    return {
      message: `Box 1 wages ${wages} are outside the expected annual range ${min}-${max}`,
      fields: ['income_tax_info.wages_tips_compensation'],
    };
  },
};

export const W2_CHECKS: ReadonlyArray<CrossCheck<W2Fields>> = [
  withholdingWithinWages,
  socialSecurityRate,
  medicareRate,
  taxYearPlausible,
  annualWagesRange,
  requiredFieldsCheck<W2Fields>(W2_REQUIRED_FIELDS),
];
