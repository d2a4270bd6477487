/**
 * Label Matching & Line Items
 *
 * Shared by the table and text readers: label normalization, synonym
 * dictionaries loaded from data/field-labels.json, amount tokenizing and
 * line-item construction for earnings, deductions and taxes.
 */

import fieldLabels from '../data/field-labels.json';
import { parseDecimal, parseMoney } from '../money';
import type { DeductionLine, EarningsLine, TaxLine } from '../types';

export { fieldLabels };

/**
 * Lowercase, drop apostrophes and punctuation, and strip W-2 box prefixes
 * ("1 Wages, tips..." / "b Employer identification number").
 */
export function normalizeLabel(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^a-z0-9#%]+/g, ' ')
    .trim()
    .replace(/^(?:box )?\d{1,2}[a-d]? (?=[a-z])/, '')
    .replace(/^[a-f] (?=[a-z]{2})/, '');
}

export interface LabelHit<L> {
  field: L;
  index: number;
  length: number;
}

export class LabelDictionary<L extends string> {
  private readonly bySynonym = new Map<string, L>();
  private readonly scanOrder: Array<[string, L]>;

  constructor(entries: ReadonlyArray<readonly [L, readonly string[]]>) {
    for (const [field, synonyms] of entries) {
      for (const synonym of synonyms) {
        const key = normalizeLabel(synonym);
        if (key && !this.bySynonym.has(key)) this.bySynonym.set(key, field);
      }
    }
    this.scanOrder = [...this.bySynonym.entries()].sort((a, b) => b[0].length - a[0].length);
  }

  /** Exact match of a whole label */
  match(label: string): L | undefined {
    return this.bySynonym.get(normalizeLabel(label));
  }

  /**
   * Every non-overlapping label occurrence inside a line, left to right.
   * Only synonyms of at least `minLength` characters are considered.
   */
  scan(line: string, minLength = 8): Array<LabelHit<L>> {
    const text = ` ${normalizeLabel(line)} `;
    const taken: Array<[number, number]> = [];
    const hits: Array<LabelHit<L>> = [];

    for (const [synonym, field] of this.scanOrder) {
      if (synonym.length < minLength) continue;
      let from = 0;
      for (;;) {
        const at = text.indexOf(` ${synonym} `, from);
        if (at < 0) break;
        const start = at + 1;
        const end = start + synonym.length;
        from = end;
        if (taken.some(([s, e]) => start < e && end > s)) continue;
        taken.push([start, end]);
        hits.push({ field, index: start, length: synonym.length });
      }
    }

    return hits.sort((a, b) => a.index - b.index);
  }
}

export function containsKeyword(text: string, keywords: readonly string[]): boolean {
  const haystack = ` ${text.toLowerCase()} `;
  return keywords.some((keyword) => haystack.includes(keyword));
}

// ============================================================================
// Amounts
// ============================================================================

const AMOUNT_TOKEN = /^\(?-?\$?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?\)?-?$/;

export function isAmountToken(token: string): boolean {
  return AMOUNT_TOKEN.test(token.trim());
}

/**
 * Split a text line into its leading label and trailing amount tokens:
 * "Gross Pay 4,056.31 48,675.72" -> label "Gross Pay", two amounts.
 */
export function splitTrailingAmounts(line: string): { label: string; amounts: string[] } {
  const tokens = line.trim().split(/\s+/);
  const amounts: string[] = [];
  while (tokens.length > 1 && isAmountToken(tokens[tokens.length - 1])) {
    amounts.unshift(tokens.pop() ?? '');
  }
  return { label: tokens.join(' '), amounts };
}

// ============================================================================
// Line Items
// ============================================================================

export type SectionKind = 'earnings' | 'deductions' | 'taxes';

export type ColumnRole = 'description' | 'rate' | 'hours' | 'current' | 'ytd' | 'taxable_current' | 'taxable_ytd';

const COLUMN_SYNONYMS: ReadonlyArray<readonly [ColumnRole, readonly string[]]> = [
  ['taxable_current', ['taxable wages', 'taxable wages current', 'taxable']],
  ['taxable_ytd', ['taxable wages ytd', 'taxable ytd']],
  ['rate', ['rate', 'pay rate', 'hourly rate']],
  ['hours', ['hours', 'hrs', 'units', 'hours units']],
  ['current', ['current', 'this period', 'amount', 'current amount', 'curr', 'current period']],
  ['ytd', ['ytd', 'year to date', 'ytd amount', 'ytd total']],
  ['description', ['description', 'type', 'item']],
];

const SECTION_DICTIONARY = new LabelDictionary<SectionKind>([
  ['earnings', fieldLabels.paystub_sections.earnings],
  ['deductions', fieldLabels.paystub_sections.deductions],
  ['taxes', fieldLabels.paystub_sections.taxes],
]);

export function columnRole(header: string): ColumnRole | null {
  const text = normalizeLabel(header);
  for (const [role, synonyms] of COLUMN_SYNONYMS) {
    if (synonyms.includes(text)) return role;
  }
  return null;
}

export function sectionOf(label: string): SectionKind | undefined {
  return SECTION_DICTIONARY.match(label);
}

/**
 * Section heading with optional column headers, as one text line:
 * "Earnings Rate Hours Current YTD". Returns the section and the roles
 * of the amount columns that follow.
 */
export function parseSectionHeading(
  line: string
): { section: SectionKind; roles: ColumnRole[] } | null {
  const words = normalizeLabel(line).split(' ');
  for (let cut = Math.min(words.length, 3); cut >= 1; cut--) {
    const section = sectionOf(words.slice(0, cut).join(' '));
    if (!section) continue;
    const roles = parseColumnWords(words.slice(cut));
    if (roles) return { section, roles };
  }
  return null;
}

function parseColumnWords(words: string[]): ColumnRole[] | null {
  const roles: ColumnRole[] = [];
  let i = 0;
  while (i < words.length) {
    let matched = false;
    for (let span = Math.min(3, words.length - i); span >= 1; span--) {
      const role = columnRole(words.slice(i, i + span).join(' '));
      if (role) {
        if (role !== 'description') roles.push(role);
        i += span;
        matched = true;
        break;
      }
    }
    if (!matched) return null;
  }
  return roles;
}

export type RoleValues = Partial<Record<ColumnRole, string>>;

/**
 * Assign amount tokens to roles. With known column roles the amounts are
 * aligned from the right; without them the last two amounts are
 * current and YTD.
 */
export function assignRoles(amounts: readonly string[], roles: readonly ColumnRole[]): RoleValues {
  const values: RoleValues = {};
  if (roles.length > 0) {
    const offset = roles.length - amounts.length;
    amounts.forEach((amount, i) => {
      const role = roles[i + Math.max(offset, 0)];
      if (role) values[role] = amount;
    });
    return values;
  }

  if (amounts.length === 1) {
    values.current = amounts[0];
  } else if (amounts.length >= 2) {
    values.current = amounts[amounts.length - 2];
    values.ytd = amounts[amounts.length - 1];
  }
  return values;
}

/**
 * Earnings without column roles: when the first two amounts multiply to
 * the third they are rate and hours.
 */
export function inferEarningsRoles(amounts: readonly string[]): RoleValues {
  if (amounts.length >= 3) {
    const [a, b, c] = amounts.map((amount) => Number(parseDecimal(amount) ?? NaN));
    if (Number.isFinite(a) && Number.isFinite(b) && Math.abs(a * b - c) <= 0.05) {
      return { rate: amounts[0], hours: amounts[1], current: amounts[2], ytd: amounts[3] };
    }
  }
  return assignRoles(amounts, []);
}

function isTotalLabel(description: string): boolean {
  return /^total\b/i.test(description.trim());
}

export function isEmployerContribution(description: string): boolean {
  return containsKeyword(description, fieldLabels.employer_contribution_keywords);
}

export function isPreTax(description: string): boolean {
  return containsKeyword(description, fieldLabels.pre_tax_keywords);
}

export function buildEarningsLine(description: string, values: RoleValues): EarningsLine | null {
  const current = parseMoney(values.current);
  if (!description || current === null || isTotalLabel(description)) return null;
  return {
    description,
    rate: parseDecimal(values.rate),
    hours: parseDecimal(values.hours),
    current_amount: current,
    ytd_amount: parseMoney(values.ytd),
    is_employer_contribution: isEmployerContribution(description),
  };
}

export function buildDeductionLine(description: string, values: RoleValues): DeductionLine | null {
  const current = parseMoney(values.current);
  if (!description || current === null || isTotalLabel(description)) return null;
  return {
    description,
    current_amount: current,
    ytd_amount: parseMoney(values.ytd),
    is_pre_tax: isPreTax(description),
  };
}

export function buildTaxLine(description: string, values: RoleValues): TaxLine | null {
  const current = parseMoney(values.current);
  if (!description || current === null || isTotalLabel(description)) return null;
  return {
    tax_type: description,
    current_amount: current,
    ytd_amount: parseMoney(values.ytd),
    taxable_wages_current: parseMoney(values.taxable_current),
    taxable_wages_ytd: parseMoney(values.taxable_ytd),
  };
}

// ============================================================================
// Labelled Lines
// ============================================================================

const MAX_LABEL_WORDS = 6;

/**
 * Longest trailing run of words that is a known label:
 * "Jane Doe Employee ID" -> { value: "Jane Doe", field: employer.employee_id }.
 */
function splitTrailingLabel<L extends string>(
  segment: string,
  dictionary: LabelDictionary<L>
): { value: string; field: L | undefined } {
  const words = segment.trim().split(/\s+/).filter(Boolean);
  for (let start = Math.max(0, words.length - MAX_LABEL_WORDS); start < words.length; start++) {
    const field = dictionary.match(words.slice(start).join(' '));
    if (field) return { value: words.slice(0, start).join(' '), field };
  }
  return { value: words.join(' '), field: undefined };
}

/**
 * Label/value pairs on one text line or table cell. Handles
 * "Label: value Label: value" runs and "Label value" with the label first.
 * A pair with an empty value means the value sits elsewhere (next line,
 * next cell).
 */
export function labelledPairs<L extends string>(
  line: string,
  dictionary: LabelDictionary<L>
): Array<{ field: L; value: string }> {
  const pairs: Array<{ field: L; value: string }> = [];
  const parts = line.split(/:(?!\d{2}\b)/);

  if (parts.length >= 2) {
    let field = dictionary.match(parts[0]) ?? splitTrailingLabel(parts[0], dictionary).field;
    for (let k = 1; k < parts.length; k++) {
      const isLast = k === parts.length - 1;
      const { value, field: next } = isLast
        ? { value: parts[k].trim(), field: undefined }
        : splitTrailingLabel(parts[k], dictionary);
      if (field) pairs.push({ field, value });
      field = next;
    }
    return pairs;
  }

  const words = line.trim().split(/\s+/);
  for (let n = Math.min(MAX_LABEL_WORDS, words.length); n >= 1; n--) {
    const field = dictionary.match(words.slice(0, n).join(' '));
    if (field) {
      pairs.push({ field, value: words.slice(n).join(' ') });
      break;
    }
  }
  return pairs;
}

export function amountTokens(text: string): string[] {
  return text.split(/\s+/).filter((token) => token !== '' && isAmountToken(token));
}

const US_STATES = new Set<string>(fieldLabels.us_states);

export function isStateCode(text: string): boolean {
  return US_STATES.has(text);
}
