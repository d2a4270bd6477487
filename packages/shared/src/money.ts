/**
 * Money Handling
 *
 * Amounts travel as two-decimal strings; all arithmetic happens on integer
 * cents so "2769.80" never becomes 2769.7999999.
 */

import type { Money } from './types';

const MONEY_PATTERN = /^(-?)(\d+)\.(\d{2})$/;
const DECIMAL_PATTERN = /^-?\d+(?:\.\d+)?$/;

export function isMoney(value: string): boolean {
  return MONEY_PATTERN.test(value);
}

/**
 * Normalize a raw amount ("$4,056.31", "(125.00)", "2769.8", 2769.8) into
 * Money. Returns null when the input is not a readable amount.
 * More than two fractional digits round half-up.
 */
export function parseMoney(raw: unknown): Money | null {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) return null;
    return centsToMoney(Math.round(raw * 100));
  }
  if (typeof raw !== 'string') return null;

  let text = raw.trim();
  if (!text) return null;

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }
  text = text.replace(/^USD/i, '').replace(/[$,\s]/g, '');
  if (text.startsWith('-')) {
    negative = true;
    text = text.slice(1);
  } else if (text.endsWith('-')) {
    negative = true;
    text = text.slice(0, -1);
  }

  const match = /^(\d*)(?:\.(\d*))?$/.exec(text);
  if (!match) return null;
  const whole = match[1];
  const fraction = match[2] ?? '';
  if (!whole && !fraction) return null;

  const roundUp = fraction.length > 2 && Number(fraction[2]) >= 5 ? 1 : 0;
  const cents =
    Number(whole || '0') * 100 + Number(fraction.padEnd(2, '0').slice(0, 2)) + roundUp;

  return centsToMoney(negative ? -cents : cents);
}

export function moneyToCents(value: Money): number {
  const match = MONEY_PATTERN.exec(value);
  if (!match) {
    throw new RangeError(`Not a money value: ${value}`);
  }
  const cents = Number(match[2]) * 100 + Number(match[3]);
  return match[1] === '-' ? -cents : cents;
}

export function centsToMoney(cents: number): Money {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
}

export function sumCents(values: readonly Money[]): number {
  return values.reduce((total, value) => total + moneyToCents(value), 0);
}

/**
 * Cents of `value` multiplied by a rate, rounded half-up to the cent.
 */
export function applyRate(cents: number, rate: number): number {
  return Math.round(cents * rate);
}

/**
 * Plain decimal (hours, rates) kept as written: "80.00", "25.5".
 */
export function parseDecimal(raw: unknown): string | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? String(raw) : null;
  }
  if (typeof raw !== 'string') return null;
  const text = raw.trim().replace(/[$,\s]/g, '');
  return DECIMAL_PATTERN.test(text) ? text : null;
}
