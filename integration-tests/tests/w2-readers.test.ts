/**
 * W-2 Field Reader Tests
 */

import { FieldStore, calculateIncome, w2Profile, type W2Fields } from '@payverify/shared';
import { loadTables, loadText, w2Answer } from './helpers';

function newStore() {
  return new FieldStore<W2Fields>();
}

describe('W-2 text reader', () => {
  const store = newStore();
  w2Profile.readText(loadText('w2_northwind_text.txt'), store.sink('raw_text'));

  it('reads identity boxes with the value beside or below the label', () => {
    expect(store.value('tax_year')).toBe('2023');
    expect(store.value('employee.ssn')).toBe('123-45-6789');
    expect(store.value('employer.ein')).toBe('12-3456789');
    expect(store.value('employer.name')).toBe('Northwind Traders Inc');
    expect(store.value('employee.name')).toBe('Maria Garcia');
  });

  it('reads a row of box labels from the amounts on the next line', () => {
    expect(store.value('income_tax_info.wages_tips_compensation')).toBe('85000.00');
    expect(store.value('income_tax_info.federal_income_tax_withheld')).toBe('9800.00');
    expect(store.value('income_tax_info.social_security_wages')).toBe('87500.00');
    expect(store.value('income_tax_info.social_security_tax_withheld')).toBe('5425.00');
    expect(store.value('income_tax_info.medicare_wages_tips')).toBe('87500.00');
    expect(store.value('income_tax_info.medicare_tax_withheld')).toBe('1268.75');
  });

  it('reads box 12 codes and state rows', () => {
    expect(store.value('income_tax_info.box_12_codes')).toEqual([
      { code: 'D', amount: '2500.00' },
      { code: 'DD', amount: '6200.00' },
    ]);
    expect(store.value('state_local_info')).toEqual([
      {
        state: 'CA',
        employer_state_id: '123-4567-8',
        state_wages: '85000.00',
        state_income_tax: '4200.00',
        locality: null,
        local_wages: null,
        local_income_tax: null,
      },
    ]);
  });

  it('leaves box 13 checkboxes unset', () => {
    expect(store.has('income_tax_info.retirement_plan')).toBe(false);
  });

  it('derives income from box 1', () => {
    expect(calculateIncome(store)).toEqual({
      primary_income: '85000.00',
      social_security_wages: '87500.00',
      medicare_wages: '87500.00',
      annual_income: '85000.00',
      monthly_income: '7083.33',
      income_verification_method: 'box_1_wages',
      additional_benefits: '8700.00',
    });
  });
});

describe('W-2 table reader', () => {
  it('takes the value from the next cell, else the cell below', () => {
    const store = newStore();
    w2Profile.readTables(loadTables('w2_northwind_tables.json'), store.sink('structured_table'));

    expect(store.value('employee.ssn')).toBe('123-45-6789');
    expect(store.value('employer.ein')).toBe('12-3456789');
    expect(store.value('income_tax_info.wages_tips_compensation')).toBe('85000.00');
    expect(store.value('income_tax_info.federal_income_tax_withheld')).toBe('9800.00');
    expect(store.value('income_tax_info.box_12_codes')).toEqual([{ code: 'D', amount: '2500.00' }]);
    expect(store.has('employee.name')).toBe(false);
  });
});

describe('W-2 visual reader', () => {
  it('normalizes identifiers, box 12 codes and checkboxes', () => {
    const store = newStore();
    const answer = w2Answer({
      tax_year: '2023',
      employee: {
        ssn: '123456789',
        name: 'Maria Garcia',
        address: { street: null, city: null, state: null, zip: null },
      },
    });
    answer.income_tax_info.wages_tips_compensation = 85000;
    answer.income_tax_info.box_12_codes = [
      { code: ' dd ', amount: 6200 },
      { code: '', amount: 5 },
    ];
    answer.income_tax_info.retirement_plan = true;
    answer.income_tax_info.statutory_employee = false;
    answer.state_local_info = [
      {
        state: null,
        employer_state_id: null,
        state_wages: null,
        state_income_tax: null,
        locality: null,
        local_wages: null,
        local_income_tax: null,
      },
    ];

    w2Profile.readVisual(answer, store.sink('visual_analysis'));

    expect(store.value('employee.ssn')).toBe('123-45-6789');
    expect(store.value('income_tax_info.wages_tips_compensation')).toBe('85000.00');
    expect(store.value('income_tax_info.box_12_codes')).toEqual([{ code: 'DD', amount: '6200.00' }]);
    expect(store.value('income_tax_info.retirement_plan')).toBe(true);
    expect(store.value('income_tax_info.statutory_employee')).toBe(false);
    expect(store.has('state_local_info')).toBe(false);
  });

  it('falls back to box 3 wages when box 1 is missing', () => {
    const store = newStore();
    store.sink('visual_analysis')('income_tax_info.social_security_wages', '60000.00');

    const income = calculateIncome(store);
    expect(income.income_verification_method).toBe('box_3_social_security_wages');
    expect(income.monthly_income).toBe('5000.00');
    expect(income.additional_benefits).toBeNull();
  });

  it('skips a zero box 1 in favour of box 3 wages', () => {
    const store = newStore();
    const put = store.sink('raw_text');
    put('income_tax_info.wages_tips_compensation', '0.00');
    put('income_tax_info.social_security_wages', '52000.00');

    expect(calculateIncome(store)).toEqual({
      primary_income: '0.00',
      social_security_wages: '52000.00',
      medicare_wages: null,
      annual_income: '52000.00',
      monthly_income: '4333.33',
      income_verification_method: 'box_3_social_security_wages',
      additional_benefits: null,
    });
  });

  it('reaches box 5 when boxes 1 and 3 are zero', () => {
    const store = newStore();
    const put = store.sink('raw_text');
    put('income_tax_info.wages_tips_compensation', '0.00');
    put('income_tax_info.social_security_wages', '0.00');
    put('income_tax_info.medicare_wages_tips', '36000.00');

    const income = calculateIncome(store);
    expect(income.income_verification_method).toBe('box_5_medicare_wages');
    expect(income.annual_income).toBe('36000.00');
    expect(income.monthly_income).toBe('3000.00');
  });

  it('reports zero box 1 wages when no box is positive', () => {
    const store = newStore();
    store.sink('raw_text')('income_tax_info.wages_tips_compensation', '0.00');

    const income = calculateIncome(store);
    expect(income.income_verification_method).toBe('box_1_wages');
    expect(income.annual_income).toBe('0.00');
    expect(income.monthly_income).toBe('0.00');
  });
});
