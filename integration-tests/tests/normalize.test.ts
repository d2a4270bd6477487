/**
 * Value Normalizer Tests
 */

import {
  normalizeDate,
  normalizeEin,
  normalizePayFrequency,
  normalizeSsn,
  parseAddress,
} from '@payverify/shared';

describe('normalizeDate', () => {
  it.each([
    ['2024-1-5', '2024-01-05'],
    ['01/19/2024', '2024-01-19'],
    ['1-15-24', '2024-01-15'],
    ['Jan 5, 2024', '2024-01-05'],
    ['September 30 2023', '2023-09-30'],
  ])('reads %s', (raw, expected) => {
    expect(normalizeDate(raw)).toBe(expected);
  });

  it('rejects impossible calendar dates', () => {
    expect(normalizeDate('2/30/2024')).toBeNull();
    expect(normalizeDate('13/01/2024')).toBeNull();
  });

  it('returns null for non-dates', () => {
    expect(normalizeDate('someday')).toBeNull();
    expect(normalizeDate(20240105)).toBeNull();
  });
});

describe('normalizePayFrequency', () => {
  it.each([
    ['Bi-Weekly', 'biweekly'],
    ['every two weeks', 'biweekly'],
    ['Semi-Monthly', 'semi_monthly'],
    ['WEEKLY', 'weekly'],
    ['Monthly', 'monthly'],
    ['Annually', 'annual'],
  ])('maps %s', (raw, expected) => {
    expect(normalizePayFrequency(raw)).toBe(expected);
  });

  it('returns null for unknown frequencies', () => {
    expect(normalizePayFrequency('whenever')).toBeNull();
  });
});

describe('identifiers', () => {
  it('formats SSNs and keeps masks', () => {
    expect(normalizeSsn('123456789')).toBe('123-45-6789');
    expect(normalizeSsn('xxx-xx-1234')).toBe('XXX-XX-1234');
    expect(normalizeSsn('***-**-1234')).toBe('***-**-1234');
    expect(normalizeSsn('unknown')).toBeNull();
  });

  it('formats EINs', () => {
    expect(normalizeEin('123456789')).toBe('12-3456789');
    expect(normalizeEin('EIN 12-3456789')).toBe('12-3456789');
    expect(normalizeEin('1234')).toBeNull();
  });
});

describe('parseAddress', () => {
  it('splits street, city, state and zip', () => {
    expect(parseAddress('123 Main St, Springfield, IL 62701')).toEqual({
      street: '123 Main St',
      city: 'Springfield',
      state: 'IL',
      zip: '62701',
      full_address: '123 Main St, Springfield, IL 62701',
    });
  });

  it('keeps only the full text for other shapes', () => {
    expect(parseAddress('PO Box 9')).toEqual({
      street: null,
      city: null,
      state: null,
      zip: null,
      full_address: 'PO Box 9',
    });
    expect(parseAddress('   ')).toBeNull();
  });
});
