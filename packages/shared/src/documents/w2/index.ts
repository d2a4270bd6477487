/**
 * W-2 Profile
 */

import { W2_TEMPLATE } from '../../templates';
import type { W2Fields } from '../../types';
import type { DocumentProfile } from '../types';
import { W2_CHECKS } from './checks';
import { W2_FIELD_KEYS, W2_REQUIRED_FIELDS, isW2Sufficient } from './fields';
import { readW2Tables, readW2Text, readW2Visual } from './readers';
import { buildW2Record } from './record';
import { W2_RUBRIC } from './rubric';

export const w2Profile: DocumentProfile<W2Fields> = {
  kind: 'w2',
  fieldKeys: W2_FIELD_KEYS,
  requiredFields: W2_REQUIRED_FIELDS,
  template: W2_TEMPLATE,
  checks: W2_CHECKS,
  rubric: W2_RUBRIC,
  isSufficient: isW2Sufficient,
  readTables: readW2Tables,
  readText: readW2Text,
  readVisual: readW2Visual,
  buildRecord: buildW2Record,
};

export { W2_FIELD_KEYS, W2_REQUIRED_FIELDS, isW2Sufficient } from './fields';
export { W2_CHECKS } from './checks';
export { W2_RUBRIC } from './rubric';
export { readW2Tables, readW2Text, readW2Visual } from './readers';
export { box12Total, calculateIncome } from './record';
