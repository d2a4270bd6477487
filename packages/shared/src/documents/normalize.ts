/**
 * Value Normalizers
 *
 * Turn raw strings from tables, text lines or the vision model into the
 * canonical field formats (ISO dates, pay frequency enum, addresses).
 */

import type { Address, PayFrequency } from '../types';

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

export const DATE_IN_TEXT = /\b(\d{4}-\d{1,2}-\d{1,2}|\d{1,2}[/-]\d{1,2}[/-](?:\d{4}|\d{2}))\b/g;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function buildDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * ISO date (YYYY-MM-DD) from "2024-01-15", "01/15/2024", "1-15-24" or
 * "Jan 15, 2024". Two-digit years are taken as 20xx.
 */
export function normalizeDate(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;
  const text = raw.trim();

  let m = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(text);
  if (m) return buildDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4}|\d{2})$/.exec(text);
  if (m) {
    const year = m[3].length === 2 ? 2000 + Number(m[3]) : Number(m[3]);
    return buildDate(year, Number(m[1]), Number(m[2]));
  }

  m = /^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/.exec(text);
  if (m) {
    const month = MONTHS[m[1].slice(0, 3).toLowerCase()];
    return month === undefined ? null : buildDate(Number(m[3]), month, Number(m[2]));
  }

  return null;
}

export function findDates(text: string): string[] {
  const dates: string[] = [];
  for (const match of text.matchAll(DATE_IN_TEXT)) {
    const date = normalizeDate(match[1]);
    if (date) dates.push(date);
  }
  return dates;
}

/**
 * Pay frequency from free text ("Bi-Weekly", "Semi Monthly", "every two weeks").
 */
export function normalizePayFrequency(raw: unknown): PayFrequency | null {
  if (typeof raw !== 'string') return null;
  const text = raw.toLowerCase().replace(/[^a-z]+/g, ' ').trim();
  if (!text) return null;

  if (/\bsemi ?monthly\b|twice a month/.test(text)) return 'semi_monthly';
  if (/\bbi ?weekly\b|every (two|2) weeks/.test(text)) return 'biweekly';
  if (/\bweekly\b/.test(text)) return 'weekly';
  if (/\bmonthly\b/.test(text)) return 'monthly';
  if (/\bquarterly\b/.test(text)) return 'quarterly';
  if (/\bannual(ly)?\b|\byearly\b/.test(text)) return 'annual';
  return null;
}

/** Pay periods per year, for annualizing per-period amounts */
export const PERIODS_PER_YEAR: Record<PayFrequency, number> = {
  weekly: 52,
  biweekly: 26,
  semi_monthly: 24,
  monthly: 12,
  quarterly: 4,
  annual: 1,
};

export function cleanText(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;
  const text = raw.replace(/\s+/g, ' ').trim();
  return text || null;
}

/**
 * SSN as printed; masked forms (XXX-XX-1234, ***-**-1234) are kept masked.
 */
export function normalizeSsn(raw: unknown): string | null {
  const text = cleanText(raw);
  if (!text) return null;
  const m = /([0-9Xx*]{3})[- ]?([0-9Xx*]{2})[- ]?(\d{4})/.exec(text);
  return m ? `${m[1].toUpperCase()}-${m[2].toUpperCase()}-${m[3]}` : null;
}

export function normalizeEin(raw: unknown): string | null {
  const text = cleanText(raw);
  if (!text) return null;
  const m = /\b(\d{2})-?(\d{7})\b/.exec(text);
  return m ? `${m[1]}-${m[2]}` : null;
}

export function normalizeTaxYear(raw: unknown): string | null {
  const text = typeof raw === 'number' ? String(raw) : cleanText(raw);
  if (!text) return null;
  const m = /\b((?:19|20)\d{2})\b/.exec(text);
  return m ? m[1] : null;
}

/**
 * Split "123 Main St, Springfield, IL 62701" into parts. Anything that does
 * not follow the street, city, state zip shape keeps only full_address.
 */
export function parseAddress(raw: unknown): Address | null {
  const text = cleanText(raw);
  if (!text) return null;

  const m = /^(.*?),\s*([^,]+?),?\s+([A-Z]{2})\s+(\d{5}(?:-\d{4})?)$/.exec(text);
  if (!m) {
    return { street: null, city: null, state: null, zip: null, full_address: text };
  }
  return { street: m[1], city: m[2], state: m[3], zip: m[4], full_address: text };
}

/**
 * Address from separately reported parts (vision output).
 */
export function buildAddress(parts: {
  street: string | null;
  city: string | null;
  state: string | null;
  zip: string | null;
}): Address | null {
  const street = cleanText(parts.street);
  const city = cleanText(parts.city);
  const state = cleanText(parts.state);
  const zip = cleanText(parts.zip);
  if (!street && !city && !state && !zip) return null;

  const locality = [city, [state, zip].filter(Boolean).join(' ')].filter(Boolean).join(', ');
  const full = [street, locality].filter(Boolean).join(', ');
  return { street, city, state, zip, full_address: full || null };
}
