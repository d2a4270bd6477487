/**
 * W-2 Field Readers
 *
 * The W-2 is a fixed grid of labelled boxes. Table and text layers put a
 * box's value beside its label, under it, or (for a row of boxes) on the
 * next line in the same order as the labels. Box 13 checkboxes and the
 * addresses only come from the visual reading.
 */

import { InvalidResponseError } from '../../errors';
import { parseMoney } from '../../money';
import { compileResponseValidator, formatErrors } from '../../schemas';
import { W2_RESPONSE_SCHEMA, type W2VisionResponse } from '../../templates';
import type { PageText, TableSet } from '../../sources/types';
import type { Box12Entry, FieldSink, Money, StateLocalLine, W2Fields } from '../../types';
import { LabelDictionary, fieldLabels, isStateCode, labelledPairs } from '../labels';
import { buildAddress, cleanText, normalizeEin, normalizeSsn, normalizeTaxYear } from '../normalize';

type LabelField = Extract<keyof W2Fields, keyof typeof fieldLabels.w2>;

type MoneyField = Exclude<
  LabelField,
  'tax_year' | 'employee.ssn' | 'employee.name' | 'employer.ein' | 'employer.name' | 'employer.control_number'
>;

const MONEY_FIELDS: readonly MoneyField[] = [
  'income_tax_info.wages_tips_compensation',
  'income_tax_info.federal_income_tax_withheld',
  'income_tax_info.social_security_wages',
  'income_tax_info.social_security_tax_withheld',
  'income_tax_info.medicare_wages_tips',
  'income_tax_info.medicare_tax_withheld',
  'income_tax_info.social_security_tips',
  'income_tax_info.allocated_tips',
  'income_tax_info.dependent_care_benefits',
  'income_tax_info.nonqualified_plans',
];

const LABEL_FIELDS: readonly LabelField[] = [
  'tax_year',
  'employee.ssn',
  'employee.name',
  'employer.ein',
  'employer.name',
  'employer.control_number',
  ...MONEY_FIELDS,
];

const LABELS = new LabelDictionary<LabelField>(
  LABEL_FIELDS.map((field) => [field, fieldLabels.w2[field]] as const)
);

/** Amount printed with cents; box numbers ("1", "12a") never match */
const MONEY_TOKEN = /^\(?-?\$?(?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2}\)?$/;

function moneyTokens(text: string): string[] {
  return text.split(/\s+/).filter((token) => MONEY_TOKEN.test(token));
}

function leadingMoney(raw: string): Money | null {
  const first = raw.replace(/^\$\s+/, '$').trim().split(/\s+/)[0] ?? '';
  return MONEY_TOKEN.test(first) ? parseMoney(first) : null;
}

function isMoneyField(field: LabelField): field is MoneyField {
  return MONEY_FIELDS.some((candidate) => candidate === field);
}

function putLabelled(field: LabelField, raw: string, put: FieldSink<W2Fields>, confidence?: number): void {
  if (isMoneyField(field)) {
    put(field, leadingMoney(raw), confidence);
    return;
  }
  switch (field) {
    case 'tax_year':
      put(field, normalizeTaxYear(raw), confidence);
      break;
    case 'employee.ssn':
      put(field, normalizeSsn(raw), confidence);
      break;
    case 'employer.ein':
      put(field, normalizeEin(raw), confidence);
      break;
    case 'employee.name':
    case 'employer.name':
    case 'employer.control_number':
      put(field, cleanText(raw), confidence);
      break;
  }
}

function isLabelText(text: string): boolean {
  return LABELS.match(text) !== undefined || LABELS.scan(text).length > 0;
}

// ============================================================================
// Patterns outside the labelled boxes
// ============================================================================

const BOX_12 = /\b12([a-dA-D])\s+([A-Z]{1,2})\s+(\$?(?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2})\b/g;
const EIN = /\b(\d{2}-\d{7})\b/;
const SSN = /(?:^|[^\w*])((?:\d{3}|XXX|\*{3})-(?:\d{2}|XX|\*{2})-\d{4})\b/i;
const FORM_TITLE = /wage and tax statement|form w-?2/i;

/**
 * Box 12 entries, state/local rows and the identifiers that are
 * recognisable by shape alone.
 */
class PatternScan {
  private readonly box12 = new Map<string, Box12Entry>();
  private readonly states: StateLocalLine[] = [];
  private ssn: string | null = null;
  private ein: string | null = null;
  private taxYear: string | null = null;

  read(line: string): void {
    for (const match of line.matchAll(BOX_12)) {
      const slot = match[1].toLowerCase();
      if (!this.box12.has(slot)) {
        this.box12.set(slot, { code: match[2], amount: parseMoney(match[3]) });
      }
    }

    const state = parseStateLine(line);
    if (state) this.states.push(state);

    this.ssn = this.ssn ?? normalizeSsn(SSN.exec(line)?.[1]);
    this.ein = this.ein ?? normalizeEin(EIN.exec(line)?.[1]);
    if (FORM_TITLE.test(line)) this.taxYear = this.taxYear ?? normalizeTaxYear(line);
  }

  flush(put: FieldSink<W2Fields>, confidence?: number): void {
    const slots = [...this.box12.keys()].sort();
    put(
      'income_tax_info.box_12_codes',
      slots.flatMap((slot) => this.box12.get(slot) ?? []),
      confidence
    );
    put('state_local_info', this.states, confidence);
    put('employee.ssn', this.ssn, confidence);
    put('employer.ein', this.ein, confidence);
    put('tax_year', this.taxYear, confidence);
  }
}

/**
 * "CA 123-4567-8 85000.00 4200.00 [local wages] [local tax] [locality]"
 */
function parseStateLine(line: string): StateLocalLine | null {
  const [state, ...rest] = line.trim().split(/\s+/);
  if (!state || !isStateCode(state) || rest.length === 0) return null;

  let employerStateId: string | null = null;
  if (!MONEY_TOKEN.test(rest[0])) {
    employerStateId = rest.shift() ?? null;
  }

  const amounts: string[] = [];
  while (rest.length > 0 && MONEY_TOKEN.test(rest[0]) && amounts.length < 4) {
    amounts.push(rest.shift() ?? '');
  }
  if (amounts.length === 0) return null;

  const [stateWages, stateTax, localWages, localTax] = amounts;
  return {
    state,
    employer_state_id: employerStateId,
    state_wages: parseMoney(stateWages),
    state_income_tax: parseMoney(stateTax),
    locality: cleanText(rest.join(' ')),
    local_wages: parseMoney(localWages),
    local_income_tax: parseMoney(localTax),
  };
}

// ============================================================================
// Tables
// ============================================================================

export function readW2Tables(tables: TableSet, put: FieldSink<W2Fields>): void {
  const patterns = new PatternScan();

  for (const table of tables.tables) {
    const confidence = table.accuracy ?? undefined;
    const rows = table.rows.map((row) => row.map((cell) => cell.text.replace(/\s+/g, ' ').trim()));

    rows.forEach((cells, r) => {
      cells.forEach((text, c) => {
        if (!text) return;

        const field = LABELS.match(text);
        if (field) {
          const value = cellValue(rows, r, c);
          if (value) putLabelled(field, value, put, confidence);
          return;
        }

        for (const pair of labelledPairs(text, LABELS)) {
          if (pair.value) putLabelled(pair.field, pair.value, put, confidence);
        }
      });

      patterns.read(cells.filter(Boolean).join(' '));
    });
  }

  patterns.flush(put);
}

/**
 * Value for the label at (r, c): the next cell on the row, else the cell
 * below it.
 */
function cellValue(rows: string[][], r: number, c: number): string | undefined {
  const right = rows[r].slice(c + 1).find(Boolean);
  if (right && !isLabelText(right)) return right;
  const below = rows[r + 1]?.[c];
  if (below && !isLabelText(below)) return below;
  return undefined;
}

// ============================================================================
// Text
// ============================================================================

export function readW2Text(pages: PageText[], put: FieldSink<W2Fields>): void {
  const lines = pages
    .flatMap((page) => page.text.split('\n'))
    .map((line) => line.trim())
    .filter(Boolean);

  const patterns = new PatternScan();

  lines.forEach((line, i) => {
    patterns.read(line);
    const next = lines[i + 1];
    const nextValue = next !== undefined && !isLabelText(next) ? next : undefined;

    const whole = LABELS.match(line);
    if (whole) {
      if (nextValue) putLabelled(whole, nextValue, put);
      return;
    }

    const hits = LABELS.scan(line);
    if (hits.length >= 2) {
      readBoxRow(hits.map((hit) => hit.field), line, next, put);
      return;
    }

    for (const pair of labelledPairs(line, LABELS)) {
      const value = pair.value || nextValue;
      if (value) putLabelled(pair.field, value, put);
    }
  });

  patterns.flush(put);
}

/**
 * Several box labels on one line: amounts follow on the same line, or on
 * the next line, in label order.
 */
function readBoxRow(
  fields: LabelField[],
  line: string,
  next: string | undefined,
  put: FieldSink<W2Fields>
): void {
  const moneyFields = fields.filter(isMoneyField);
  if (moneyFields.length !== fields.length) return;

  let amounts = moneyTokens(line);
  if (amounts.length === 0 && next !== undefined && LABELS.scan(next).length === 0) {
    amounts = moneyTokens(next);
  }
  if (amounts.length !== moneyFields.length) return;

  moneyFields.forEach((field, k) => put(field, parseMoney(amounts[k])));
}

// ============================================================================
// Visual
// ============================================================================

const isW2Response = compileResponseValidator<W2VisionResponse>(W2_RESPONSE_SCHEMA.schema);

export function readW2Visual(response: unknown, put: FieldSink<W2Fields>): void {
  if (!isW2Response(response)) {
    throw new InvalidResponseError(
      `Visual answer does not match the W-2 schema: ${formatErrors(isW2Response.errors).join('; ')}`
    );
  }

  const confidence = response.extraction_confidence;
  const info = response.income_tax_info;

  put('tax_year', normalizeTaxYear(response.tax_year), confidence);
  put('employee.ssn', normalizeSsn(response.employee.ssn), confidence);
  put('employee.name', cleanText(response.employee.name), confidence);
  put('employee.address', buildAddress(response.employee.address), confidence);
  put('employer.ein', normalizeEin(response.employer.ein), confidence);
  put('employer.name', cleanText(response.employer.name), confidence);
  put('employer.address', buildAddress(response.employer.address), confidence);
  put('employer.control_number', cleanText(response.employer.control_number), confidence);

  put('income_tax_info.wages_tips_compensation', parseMoney(info.wages_tips_compensation), confidence);
  put('income_tax_info.federal_income_tax_withheld', parseMoney(info.federal_income_tax_withheld), confidence);
  put('income_tax_info.social_security_wages', parseMoney(info.social_security_wages), confidence);
  put('income_tax_info.social_security_tax_withheld', parseMoney(info.social_security_tax_withheld), confidence);
  put('income_tax_info.medicare_wages_tips', parseMoney(info.medicare_wages_tips), confidence);
  put('income_tax_info.medicare_tax_withheld', parseMoney(info.medicare_tax_withheld), confidence);
  put('income_tax_info.social_security_tips', parseMoney(info.social_security_tips), confidence);
  put('income_tax_info.allocated_tips', parseMoney(info.allocated_tips), confidence);
  put('income_tax_info.dependent_care_benefits', parseMoney(info.dependent_care_benefits), confidence);
  put('income_tax_info.nonqualified_plans', parseMoney(info.nonqualified_plans), confidence);

  put(
    'income_tax_info.box_12_codes',
    info.box_12_codes.flatMap((entry) => {
      const code = cleanText(entry.code)?.toUpperCase();
      return code ? [{ code, amount: parseMoney(entry.amount) }] : [];
    }),
    confidence
  );
  put('income_tax_info.statutory_employee', info.statutory_employee, confidence);
  put('income_tax_info.retirement_plan', info.retirement_plan, confidence);
  put('income_tax_info.third_party_sick_pay', info.third_party_sick_pay, confidence);

  put(
    'state_local_info',
    response.state_local_info
      .map((row) => ({
        state: cleanText(row.state),
        employer_state_id: cleanText(row.employer_state_id),
        state_wages: parseMoney(row.state_wages),
        state_income_tax: parseMoney(row.state_income_tax),
        locality: cleanText(row.locality),
        local_wages: parseMoney(row.local_wages),
        local_income_tax: parseMoney(row.local_income_tax),
      }))
      .filter((row) => Object.values(row).some((value) => value !== null)),
    confidence
  );
}
