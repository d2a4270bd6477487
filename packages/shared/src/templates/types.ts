/**
 * Visual Extraction Template Types
 *
 * A template carries the prompts and the structured-output schema sent to
 * the visual inference service for one document kind.
 */

import type { DocumentKind } from '../types';
import type { VisualResponseSchema } from '../sources/types';

export interface ExtractionTemplate {
  /** The document kind this template handles */
  documentType: DocumentKind;

  /** System prompt with document-specific extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{document_id}}: The document's unique identifier
   * - {{source_filename}}: The original filename
   * - {{preliminary_fields}}: JSON of fields already extracted by cheaper methods
   * - {{mode_instructions}}: Fallback or enhancement instructions
   */
  userPromptTemplate: string;

  /** JSON Schema for OpenAI structured outputs; also validates the answer */
  responseSchema: VisualResponseSchema;

  /** Human-readable description of what this template extracts */
  description: string;
}
