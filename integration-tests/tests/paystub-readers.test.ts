/**
 * Paystub Field Reader Tests
 */

import { FieldStore, InvalidResponseError, paystubProfile, type PaystubFields } from '@payverify/shared';
import { loadJson, loadTables, loadText, paystubAnswer } from './helpers';

function newStore() {
  return new FieldStore<PaystubFields>();
}

describe('paystub table reader', () => {
  const store = newStore();
  paystubProfile.readTables(loadTables('paystub_acme_tables.json'), store.sink('structured_table'));

  it('reads label/value cells, several pairs per row', () => {
    expect(store.value('employer.company_name')).toBe('Acme Widgets Inc');
    expect(store.value('employee.name')).toBe('Jane Q Doe');
    expect(store.value('employer.employee_id')).toBe('E-1042');
    expect(store.value('payroll_period.pay_date')).toBe('2024-01-19');
    expect(store.value('financials.pay_frequency')).toBe('biweekly');
  });

  it('splits a pay period range into start and end', () => {
    expect(store.value('payroll_period.start_date')).toBe('2024-01-01');
    expect(store.value('payroll_period.end_date')).toBe('2024-01-14');
  });

  it('takes the second amount beside gross and net pay as YTD', () => {
    expect(store.value('financials.gross_pay_current')).toBe('4056.31');
    expect(store.value('financials.gross_pay_ytd')).toBe('48675.72');
    expect(store.value('financials.net_pay_current')).toBe('2769.80');
    expect(store.value('financials.net_pay_ytd')).toBe('33237.60');
  });

  it('reads earnings by column header and flags employer contributions', () => {
    expect(store.value('earnings')).toEqual([
      {
        description: 'Regular',
        rate: '48.00',
        hours: '80.00',
        current_amount: '3840.00',
        ytd_amount: '46080.00',
        is_employer_contribution: false,
      },
      {
        description: 'Overtime',
        rate: '72.10',
        hours: '3.00',
        current_amount: '216.31',
        ytd_amount: '1299.72',
        is_employer_contribution: false,
      },
      {
        description: '401k Match',
        rate: null,
        hours: null,
        current_amount: '121.69',
        ytd_amount: '1460.28',
        is_employer_contribution: true,
      },
    ]);
  });

  it('reads deductions and taxes', () => {
    expect(store.value('deductions')).toEqual([
      { description: '401k', current_amount: '243.38', ytd_amount: '2920.56', is_pre_tax: true },
      { description: 'Medical', current_amount: '125.00', ytd_amount: '1500.00', is_pre_tax: true },
    ]);
    expect((store.value('taxes') ?? []).map((line) => [line.tax_type, line.current_amount])).toEqual([
      ['Federal Income Tax', '512.40'],
      ['Social Security', '251.49'],
      ['Medicare', '58.82'],
      ['State Income Tax', '95.42'],
    ]);
  });

  it('tags values with the table accuracy when the detector reports one', () => {
    const birch = newStore();
    paystubProfile.readTables(loadTables('paystub_birch_short_earnings_tables.json'), birch.sink('structured_table'));
    expect(birch.get('employee.name')).toEqual({ value: 'Sam Lee', source: 'structured_table', confidence: 0.92 });
  });
});

describe('paystub text reader', () => {
  const store = newStore();
  paystubProfile.readText(loadText('paystub_acme_text.txt'), store.sink('raw_text'));

  it('reads several labels on one line', () => {
    expect(store.value('employee.name')).toBe('Jane Q Doe');
    expect(store.value('employer.employee_id')).toBe('E-1042');
  });

  it('finds the company from its legal suffix', () => {
    expect(store.value('employer.company_name')).toBe('Acme Widgets Inc');
  });

  it('reads dates, totals, masked SSN and frequency', () => {
    expect(store.value('payroll_period.start_date')).toBe('2024-01-01');
    expect(store.value('payroll_period.end_date')).toBe('2024-01-14');
    expect(store.value('payroll_period.pay_date')).toBe('2024-01-19');
    expect(store.value('financials.gross_pay_current')).toBe('4056.31');
    expect(store.value('financials.gross_pay_ytd')).toBe('48675.72');
    expect(store.value('financials.net_pay_current')).toBe('2769.80');
    expect(store.value('employee.ssn_masked')).toBe('XXX-XX-6789');
    expect(store.value('financials.pay_frequency')).toBe('biweekly');
  });

  it('reads line items under section headings with column roles', () => {
    expect(store.value('earnings')).toEqual([
      {
        description: 'Regular',
        rate: '48.00',
        hours: '80.00',
        current_amount: '3840.00',
        ytd_amount: '46080.00',
        is_employer_contribution: false,
      },
      {
        description: 'Overtime',
        rate: '72.10',
        hours: '3.00',
        current_amount: '216.31',
        ytd_amount: '1299.72',
        is_employer_contribution: false,
      },
    ]);
    expect(store.value('deductions')).toEqual([
      { description: '401k', current_amount: '243.38', ytd_amount: '2920.56', is_pre_tax: true },
    ]);
    expect(store.value('taxes')).toEqual([
      {
        tax_type: 'Federal Income Tax',
        current_amount: '512.40',
        ytd_amount: '6148.80',
        taxable_wages_current: null,
        taxable_wages_ytd: null,
      },
    ]);
  });
});

describe('paystub visual reader', () => {
  it('normalizes the vision answer', () => {
    const store = newStore();
    paystubProfile.readVisual(loadJson('paystub_acme_vision.json'), store.sink('visual_analysis'));

    expect(store.value('employer.address')).toEqual({
      street: '100 Main St',
      city: 'Springfield',
      state: 'IL',
      zip: '62701',
      full_address: '100 Main St, Springfield, IL 62701',
    });
    expect(store.has('employee.address')).toBe(false);
    expect(store.value('employee.ssn_masked')).toBe('XXX-XX-6789');
    expect(store.value('payroll_period.pay_date')).toBe('2024-01-19');
    expect(store.value('financials.net_pay_current')).toBe('2769.80');
    expect(store.value('financials.net_pay_ytd')).toBe('33237.60');
    expect(store.value('financials.total_hours_current')).toBe('83');
    expect(store.value('financials.pay_frequency')).toBe('biweekly');
    expect(store.get('employee.name')).toEqual({ value: 'Jane Q Doe', source: 'visual_analysis', confidence: 0.87 });
  });

  it('corrects contribution and pre-tax flags from the description', () => {
    const store = newStore();
    paystubProfile.readVisual(loadJson('paystub_acme_vision.json'), store.sink('visual_analysis'));

    expect(store.value('earnings')).toEqual([
      {
        description: 'Regular',
        rate: '48',
        hours: '80',
        current_amount: '3840.00',
        ytd_amount: '46080.00',
        is_employer_contribution: false,
      },
      {
        description: '401(k) Match',
        rate: null,
        hours: null,
        current_amount: '121.69',
        ytd_amount: null,
        is_employer_contribution: true,
      },
    ]);
    expect(store.value('deductions')).toEqual([
      { description: 'Dental', current_amount: '18.50', ytd_amount: null, is_pre_tax: true },
    ]);
    expect(store.value('taxes')).toEqual([
      {
        tax_type: 'Medicare',
        current_amount: '58.82',
        ytd_amount: '705.84',
        taxable_wages_current: '4056.31',
        taxable_wages_ytd: null,
      },
    ]);
  });

  it('skips line items without a description', () => {
    const store = newStore();
    const answer = paystubAnswer({
      earnings: [
        { description: '  ', rate: null, hours: null, current_amount: 10, ytd_amount: null, is_employer_contribution: false },
      ],
    });
    paystubProfile.readVisual(answer, store.sink('visual_analysis'));
    expect(store.has('earnings')).toBe(false);
  });

  it('rejects answers that do not match the response schema', () => {
    const store = newStore();
    expect(() => paystubProfile.readVisual({ employer: 'Acme' }, store.sink('visual_analysis'))).toThrow(
      InvalidResponseError
    );
  });
});
