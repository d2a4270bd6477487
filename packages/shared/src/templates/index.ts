/**
 * Visual Extraction Templates
 */

import type { DocumentKind } from '../types';
import type { ExtractionTemplate } from './types';
import { PAYSTUB_TEMPLATE } from './paystub.template';
import { W2_TEMPLATE } from './w2.template';

export type { ExtractionTemplate } from './types';
export { PAYSTUB_TEMPLATE, PAYSTUB_RESPONSE_SCHEMA, type PaystubVisionResponse } from './paystub.template';
export { W2_TEMPLATE, W2_RESPONSE_SCHEMA, type W2VisionResponse } from './w2.template';

const TEMPLATES: Record<DocumentKind, ExtractionTemplate> = {
  paystub: PAYSTUB_TEMPLATE,
  w2: W2_TEMPLATE,
};

export function getTemplateForDocumentType(documentType: DocumentKind): ExtractionTemplate {
  return TEMPLATES[documentType];
}

export interface PromptValues {
  document_id: string;
  source_filename: string;
  preliminary_fields: string;
  mode_instructions: string;
}

/**
 * Fill {{placeholders}} in a template's user prompt.
 */
export function renderUserPrompt(template: ExtractionTemplate, values: PromptValues): string {
  return template.userPromptTemplate
    .replace('{{document_id}}', values.document_id)
    .replace('{{source_filename}}', values.source_filename)
    .replace('{{mode_instructions}}', values.mode_instructions)
    .replace('{{preliminary_fields}}', values.preliminary_fields);
}
