/**
 * Paystub Field Readers
 *
 * Map table cells, text lines and visual answers onto PaystubFields.
 */

import { InvalidResponseError } from '../../errors';
import { parseDecimal, parseMoney } from '../../money';
import { compileResponseValidator, formatErrors } from '../../schemas';
import { PAYSTUB_RESPONSE_SCHEMA, type PaystubVisionResponse } from '../../templates';
import type { PageText, TableSet } from '../../sources/types';
import type { DeductionLine, EarningsLine, FieldSink, PaystubFields, TaxLine } from '../../types';
import {
  LabelDictionary,
  amountTokens,
  buildDeductionLine,
  buildEarningsLine,
  buildTaxLine,
  columnRole,
  fieldLabels,
  inferEarningsRoles,
  isAmountToken,
  isEmployerContribution,
  isPreTax,
  labelledPairs,
  assignRoles,
  parseSectionHeading,
  sectionOf,
  splitTrailingAmounts,
  type ColumnRole,
  type RoleValues,
  type SectionKind,
} from '../labels';
import {
  buildAddress,
  cleanText,
  findDates,
  normalizeDate,
  normalizePayFrequency,
  normalizeSsn,
} from '../normalize';

type LabelField = Extract<keyof PaystubFields, keyof typeof fieldLabels.paystub>;

const LABEL_FIELDS: readonly LabelField[] = [
  'employee.name',
  'employee.ssn_masked',
  'employer.company_name',
  'employer.employee_id',
  'payroll_period.start_date',
  'payroll_period.end_date',
  'payroll_period.pay_date',
  'financials.gross_pay_current',
  'financials.net_pay_current',
  'financials.total_hours_current',
  'financials.pay_frequency',
];

const LABELS = new LabelDictionary<LabelField>(
  LABEL_FIELDS.map((field) => [field, fieldLabels.paystub[field]] as const)
);

const PERIOD_RANGE = new LabelDictionary<'range'>([['range', fieldLabels.paystub_period_range]]);

/** Fields whose value is free text; a value mixing words and amounts is a line item, not this field */
const TEXT_FIELDS: ReadonlySet<LabelField> = new Set<LabelField>([
  'employee.name',
  'employer.company_name',
]);

const COMPANY_LINE =
  /^[A-Z0-9][A-Za-z0-9&.,' -]*\b(?:Inc|LLC|L\.L\.C|Corp|Corporation|Company|Co|Ltd|LP|LLP|PC|Group|Holdings)\.?$/;

const MASKED_SSN = /(?:^|[^\w*])((?:XXX|\*{3}|\d{3})-(?:XX|\*{2}|\d{2})-\d{4})\b/i;

function firstAmount(raw: string): string | undefined {
  return amountTokens(raw)[0];
}

const LABEL_PARSERS: { [P in LabelField]: (raw: string) => PaystubFields[P] | null } = {
  'employee.name': cleanText,
  'employee.ssn_masked': normalizeSsn,
  'employer.company_name': cleanText,
  'employer.employee_id': cleanText,
  'payroll_period.start_date': (raw) => findDates(raw)[0] ?? null,
  'payroll_period.end_date': (raw) => findDates(raw)[0] ?? null,
  'payroll_period.pay_date': (raw) => findDates(raw)[0] ?? null,
  'financials.gross_pay_current': (raw) => parseMoney(firstAmount(raw)),
  'financials.net_pay_current': (raw) => parseMoney(firstAmount(raw)),
  'financials.total_hours_current': (raw) => parseDecimal(firstAmount(raw)),
  'financials.pay_frequency': normalizePayFrequency,
};

const YTD_COMPANION: Partial<Record<LabelField, 'financials.gross_pay_ytd' | 'financials.net_pay_ytd'>> = {
  'financials.gross_pay_current': 'financials.gross_pay_ytd',
  'financials.net_pay_current': 'financials.net_pay_ytd',
};

function mixesWordsAndAmounts(value: string): boolean {
  const tokens = value.split(/\s+/).filter(Boolean);
  return tokens.some(isAmountToken) && tokens.some((t) => /[A-Za-z]/.test(t));
}

/**
 * Write one labelled value. Returns false when the pair should be treated
 * as something else (a line item).
 */
function putLabelled(
  field: LabelField,
  value: string,
  put: FieldSink<PaystubFields>,
  confidence?: number
): boolean {
  if (TEXT_FIELDS.has(field) && mixesWordsAndAmounts(value)) return false;
  put(field, LABEL_PARSERS[field](value), confidence);

  const companion = YTD_COMPANION[field];
  const ytd = amountTokens(value)[1];
  if (companion && ytd !== undefined) put(companion, parseMoney(ytd), confidence);
  return true;
}

function putPeriodRange(value: string, put: FieldSink<PaystubFields>, confidence?: number): void {
  const [start, end] = findDates(value);
  put('payroll_period.start_date', start, confidence);
  put('payroll_period.end_date', end, confidence);
}

/**
 * Try the line as "Label: value" / "Label value". True when it was consumed.
 */
function readLabelledLine(line: string, put: FieldSink<PaystubFields>, confidence?: number): boolean {
  const range = labelledPairs(line, PERIOD_RANGE);
  if (range.length > 0 && findDates(range[0].value).length >= 2) {
    putPeriodRange(range[0].value, put, confidence);
    return true;
  }

  let consumed = false;
  for (const { field, value } of labelledPairs(line, LABELS)) {
    if (putLabelled(field, value, put, confidence)) consumed = true;
  }
  return consumed;
}

class LineItems {
  readonly earnings: EarningsLine[] = [];
  readonly deductions: DeductionLine[] = [];
  readonly taxes: TaxLine[] = [];

  add(section: SectionKind, description: string, values: RoleValues): void {
    switch (section) {
      case 'earnings': {
        const line = buildEarningsLine(description, values);
        if (line) this.earnings.push(line);
        break;
      }
      case 'deductions': {
        const line = buildDeductionLine(description, values);
        if (line) this.deductions.push(line);
        break;
      }
      case 'taxes': {
        const line = buildTaxLine(description, values);
        if (line) this.taxes.push(line);
        break;
      }
    }
  }

  flush(put: FieldSink<PaystubFields>, confidence?: number): void {
    put('earnings', this.earnings, confidence);
    put('deductions', this.deductions, confidence);
    put('taxes', this.taxes, confidence);
  }
}

function valuesFromAmounts(section: SectionKind, amounts: string[], roles: readonly ColumnRole[]): RoleValues {
  if (roles.length > 0) return assignRoles(amounts, roles);
  return section === 'earnings' ? inferEarningsRoles(amounts) : assignRoles(amounts, []);
}

// ============================================================================
// Tables
// ============================================================================

export function readPaystubTables(tables: TableSet, put: FieldSink<PaystubFields>): void {
  const items = new LineItems();

  for (const table of tables.tables) {
    const confidence = table.accuracy ?? undefined;
    let section: SectionKind | null = null;
    let roles: Array<ColumnRole | null> = [];

    for (const row of table.rows) {
      const cells = row.map((cell) => cell.text.replace(/\s+/g, ' ').trim());
      const first = cells.findIndex((text) => text !== '');
      if (first < 0) continue;

      const rest = cells.slice(first + 1);
      const heading = sectionOf(cells[first]);
      if (heading && !rest.some(isAmountToken)) {
        section = heading;
        roles = cells.map((text, i) => (i <= first ? null : columnRole(text)));
        continue;
      }

      if (readLabelledCells(cells, put, confidence)) continue;

      if (section) {
        const description = cells[first];
        const known = roles.some((role) => role !== null);
        const values: RoleValues = {};
        if (known) {
          cells.forEach((text, i) => {
            const role = roles[i];
            if (role && text) values[role] = text;
          });
        }
        const amounts = rest.filter(isAmountToken);
        items.add(section, description, known ? values : valuesFromAmounts(section, amounts, []));
      }
    }
  }

  items.flush(put);
}

/**
 * Label cells with their values in the following cells, several pairs per
 * row allowed: ["Employee Name", "Jane Doe", "Pay Date", "01/15/2024"].
 */
function readLabelledCells(cells: string[], put: FieldSink<PaystubFields>, confidence?: number): boolean {
  let consumed = false;
  let i = 0;
  while (i < cells.length) {
    const text = cells[i];
    if (!text) {
      i++;
      continue;
    }

    const field = LABELS.match(text);
    const isRange = PERIOD_RANGE.match(text) !== undefined;
    if (!field && !isRange) {
      if (text.includes(':') && readLabelledLine(text, put, confidence)) consumed = true;
      i++;
      continue;
    }

    let j = i + 1;
    const values: string[] = [];
    while (j < cells.length && !LABELS.match(cells[j]) && PERIOD_RANGE.match(cells[j]) === undefined) {
      if (cells[j]) values.push(cells[j]);
      j++;
    }
    const value = values.join(' ');

    if (isRange) {
      putPeriodRange(value, put, confidence);
      consumed = true;
    } else if (field && putLabelled(field, value, put, confidence)) {
      consumed = true;
    }
    i = j;
  }
  return consumed;
}

// ============================================================================
// Text
// ============================================================================

export function readPaystubText(pages: PageText[], put: FieldSink<PaystubFields>): void {
  const lines = pages
    .flatMap((page) => page.text.split('\n'))
    .map((line) => line.trim())
    .filter(Boolean);

  const items = new LineItems();
  let section: SectionKind | null = null;
  let roles: ColumnRole[] = [];

  for (const line of lines) {
    const heading = parseSectionHeading(line);
    if (heading) {
      section = heading.section;
      roles = heading.roles;
      continue;
    }

    if (readLabelledLine(line, put)) {
      section = null;
      continue;
    }

    if (section) {
      const { label, amounts } = splitTrailingAmounts(line);
      if (amounts.length > 0) {
        items.add(section, label, valuesFromAmounts(section, amounts, roles));
      }
    }
  }

  items.flush(put);

  const ssn = lines.map((line) => MASKED_SSN.exec(line)?.[1]).find(Boolean);
  put('employee.ssn_masked', normalizeSsn(ssn));

  const company = lines.find((line) => COMPANY_LINE.test(line));
  put('employer.company_name', cleanText(company));

  const frequencyLine = lines.find((line) => /\b(weekly|bi-?weekly|semi-?monthly|monthly)\b/i.test(line));
  put('financials.pay_frequency', normalizePayFrequency(frequencyLine));
}

// ============================================================================
// Visual
// ============================================================================

const isPaystubResponse = compileResponseValidator<PaystubVisionResponse>(PAYSTUB_RESPONSE_SCHEMA.schema);

export function readPaystubVisual(response: unknown, put: FieldSink<PaystubFields>): void {
  if (!isPaystubResponse(response)) {
    throw new InvalidResponseError(
      `Visual answer does not match the paystub schema: ${formatErrors(isPaystubResponse.errors).join('; ')}`
    );
  }

  const confidence = response.extraction_confidence;

  put('employer.company_name', cleanText(response.employer.company_name), confidence);
  put('employer.address', buildAddress(response.employer.address), confidence);
  put('employer.employee_id', cleanText(response.employer.employee_id), confidence);
  put('employee.name', cleanText(response.employee.name), confidence);
  put('employee.address', buildAddress(response.employee.address), confidence);
  put('employee.ssn_masked', normalizeSsn(response.employee.ssn_masked), confidence);
  put('payroll_period.start_date', normalizeDate(response.payroll_period.start_date), confidence);
  put('payroll_period.end_date', normalizeDate(response.payroll_period.end_date), confidence);
  put('payroll_period.pay_date', normalizeDate(response.payroll_period.pay_date), confidence);
  put('financials.gross_pay_current', parseMoney(response.gross_pay_current), confidence);
  put('financials.gross_pay_ytd', parseMoney(response.gross_pay_ytd), confidence);
  put('financials.net_pay_current', parseMoney(response.net_pay_current), confidence);
  put('financials.net_pay_ytd', parseMoney(response.net_pay_ytd), confidence);
  put('financials.total_hours_current', parseDecimal(response.total_hours_current), confidence);
  put('financials.pay_frequency', normalizePayFrequency(response.pay_frequency), confidence);

  const earnings: EarningsLine[] = [];
  for (const row of response.earnings) {
    const description = cleanText(row.description);
    const current = parseMoney(row.current_amount);
    if (!description || current === null) continue;
    earnings.push({
      description,
      rate: parseDecimal(row.rate),
      hours: parseDecimal(row.hours),
      current_amount: current,
      ytd_amount: parseMoney(row.ytd_amount),
      is_employer_contribution: row.is_employer_contribution || isEmployerContribution(description),
    });
  }

  const deductions: DeductionLine[] = [];
  for (const row of response.deductions) {
    const description = cleanText(row.description);
    const current = parseMoney(row.current_amount);
    if (!description || current === null) continue;
    deductions.push({
      description,
      current_amount: current,
      ytd_amount: parseMoney(row.ytd_amount),
      is_pre_tax: row.is_pre_tax || isPreTax(description),
    });
  }

  const taxes: TaxLine[] = [];
  for (const row of response.taxes) {
    const taxType = cleanText(row.tax_type);
    const current = parseMoney(row.current_amount);
    if (!taxType || current === null) continue;
    taxes.push({
      tax_type: taxType,
      current_amount: current,
      ytd_amount: parseMoney(row.ytd_amount),
      taxable_wages_current: parseMoney(row.taxable_wages_current),
      taxable_wages_ytd: parseMoney(row.taxable_wages_ytd),
    });
  }

  put('earnings', earnings, confidence);
  put('deductions', deductions, confidence);
  put('taxes', taxes, confidence);
}
