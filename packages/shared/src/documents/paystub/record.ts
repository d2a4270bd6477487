/**
 * Paystub Output Record
 */

import type { FieldReader, PaystubFields, PaystubRecord } from '../../types';
import type { RecordEnvelope } from '../types';

export function buildPaystubRecord(
  fields: FieldReader<PaystubFields>,
  envelope: RecordEnvelope
): PaystubRecord {
  return {
    schema_version: '1.0',
    document_type: 'paystub',
    employee: {
      name: fields.value('employee.name') ?? null,
      address: fields.value('employee.address') ?? null,
      ssn_masked: fields.value('employee.ssn_masked') ?? null,
    },
    employer: {
      company_name: fields.value('employer.company_name') ?? null,
      address: fields.value('employer.address') ?? null,
      employee_id: fields.value('employer.employee_id') ?? null,
    },
    payroll_period: {
      start_date: fields.value('payroll_period.start_date') ?? null,
      end_date: fields.value('payroll_period.end_date') ?? null,
      pay_date: fields.value('payroll_period.pay_date') ?? null,
    },
    financials: {
      gross_pay_current: fields.value('financials.gross_pay_current') ?? null,
      gross_pay_ytd: fields.value('financials.gross_pay_ytd') ?? null,
      net_pay_current: fields.value('financials.net_pay_current') ?? null,
      net_pay_ytd: fields.value('financials.net_pay_ytd') ?? null,
      total_hours_current: fields.value('financials.total_hours_current') ?? null,
      pay_frequency: fields.value('financials.pay_frequency') ?? null,
    },
    earnings: (fields.value('earnings') ?? []).map((line) => ({ ...line })),
    deductions: (fields.value('deductions') ?? []).map((line) => ({ ...line })),
    taxes: (fields.value('taxes') ?? []).map((line) => ({ ...line })),
    confidence_score: envelope.confidenceScore,
    warnings: envelope.warnings,
    processing_metadata: envelope.metadata,
  };
}
