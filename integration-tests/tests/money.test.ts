/**
 * Money Handling Tests
 */

import {
  applyRate,
  centsToMoney,
  isMoney,
  moneyToCents,
  parseDecimal,
  parseMoney,
  sumCents,
} from '@payverify/shared';

describe('parseMoney', () => {
  it('strips currency symbols and thousands separators', () => {
    expect(parseMoney('$4,056.31')).toBe('4056.31');
    expect(parseMoney('USD 1,200')).toBe('1200.00');
  });

  it('reads parenthesised and trailing-minus amounts as negative', () => {
    expect(parseMoney('(125.00)')).toBe('-125.00');
    expect(parseMoney('1,200.00-')).toBe('-1200.00');
  });

  it('pads numbers to two decimals without float drift', () => {
    expect(parseMoney(2769.8)).toBe('2769.80');
    expect(parseMoney(4056.31)).toBe('4056.31');
  });

  it('rounds a third fractional digit half-up', () => {
    expect(parseMoney('12.345')).toBe('12.35');
    expect(parseMoney('12.344')).toBe('12.34');
  });

  it('returns null for anything that is not an amount', () => {
    expect(parseMoney('n/a')).toBeNull();
    expect(parseMoney('')).toBeNull();
    expect(parseMoney(null)).toBeNull();
    expect(parseMoney(Number.NaN)).toBeNull();
  });
});

describe('cents arithmetic', () => {
  it('converts between money and integer cents', () => {
    expect(moneyToCents('2769.80')).toBe(276980);
    expect(moneyToCents('-0.05')).toBe(-5);
    expect(centsToMoney(-5)).toBe('-0.05');
    expect(centsToMoney(708333)).toBe('7083.33');
  });

  it('rejects strings that are not canonical money', () => {
    expect(isMoney('2769.80')).toBe(true);
    expect(isMoney('2769.8')).toBe(false);
    expect(() => moneyToCents('2769.8')).toThrow(RangeError);
  });

  it('sums exactly', () => {
    expect(centsToMoney(sumCents(['0.10', '0.20']))).toBe('0.30');
  });

  it('applies a rate rounded to the cent', () => {
    expect(applyRate(8750000, 0.062)).toBe(542500);
    expect(applyRate(8750000, 0.0145)).toBe(126875);
  });
});

describe('parseDecimal', () => {
  it('keeps hours and rates as written', () => {
    expect(parseDecimal('80.00')).toBe('80.00');
    expect(parseDecimal('1,200.5')).toBe('1200.5');
    expect(parseDecimal(83)).toBe('83');
    expect(parseDecimal('n/a')).toBeNull();
  });
});
