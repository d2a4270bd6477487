/**
 * Paystub Profile
 */

import { PAYSTUB_TEMPLATE } from '../../templates';
import type { PaystubFields } from '../../types';
import type { DocumentProfile } from '../types';
import { PAYSTUB_CHECKS } from './checks';
import { PAYSTUB_FIELD_KEYS, PAYSTUB_REQUIRED_FIELDS, isPaystubSufficient } from './fields';
import { readPaystubTables, readPaystubText, readPaystubVisual } from './readers';
import { buildPaystubRecord } from './record';
import { PAYSTUB_RUBRIC } from './rubric';

export const paystubProfile: DocumentProfile<PaystubFields> = {
  kind: 'paystub',
  fieldKeys: PAYSTUB_FIELD_KEYS,
  requiredFields: PAYSTUB_REQUIRED_FIELDS,
  template: PAYSTUB_TEMPLATE,
  checks: PAYSTUB_CHECKS,
  rubric: PAYSTUB_RUBRIC,
  isSufficient: isPaystubSufficient,
  readTables: readPaystubTables,
  readText: readPaystubText,
  readVisual: readPaystubVisual,
  buildRecord: buildPaystubRecord,
};

export { PAYSTUB_FIELD_KEYS, PAYSTUB_REQUIRED_FIELDS, isPaystubSufficient } from './fields';
export { PAYSTUB_CHECKS } from './checks';
export { PAYSTUB_RUBRIC } from './rubric';
export { readPaystubTables, readPaystubText, readPaystubVisual } from './readers';
