/**
 * External Collaborator Interfaces
 *
 * The pipeline never touches PDF rendering, table detection or the vision
 * model directly; it goes through these seams so any backend (or a test
 * fake) can be plugged in.
 */

import type { DocumentKind } from '../types';

export interface DocumentInput {
  documentId: string;
  kind: DocumentKind;
  filename: string;
  content: Uint8Array;
}

export interface PageImage {
  pageNumber: number;
  widthPx: number;
  heightPx: number;
  mediaType: 'image/png' | 'image/jpeg' | 'application/pdf';
  data: Uint8Array;
}

export interface PageSet {
  pages: PageImage[];
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TableCell {
  text: string;
  bbox: BoundingBox;
}

export interface DetectedTable {
  pageNumber: number;
  /** Detector's own accuracy estimate in [0, 1], when it has one */
  accuracy: number | null;
  rows: TableCell[][];
}

export interface TableSet {
  tables: DetectedTable[];
}

export interface PageText {
  pageNumber: number;
  text: string;
}

/**
 * Rendered pages and detected tables. getPages doubles as the readability
 * check and throws UnreadableDocumentError when the file cannot be opened.
 */
export interface DocumentSource {
  getPages(document: DocumentInput): Promise<PageSet>;
  getTables(document: DocumentInput): Promise<TableSet>;
}

/**
 * Linearized text per page; a scanned page yields an empty string.
 */
export interface TextSource {
  getText(document: DocumentInput): Promise<PageText[]>;
}

export interface VisualResponseSchema {
  name: string;
  strict: boolean;
  schema: Record<string, unknown>;
}

export interface VisualAnalysisRequest {
  documentId: string;
  filename: string;
  page: PageImage;
  systemPrompt: string;
  userPrompt: string;
  responseSchema: VisualResponseSchema;
}

/**
 * Opaque vision oracle. Resolves with the parsed JSON answer; rejects with
 * ServiceUnavailableError or ServiceTimeoutError when it cannot answer.
 */
export interface VisualInferenceService {
  analyze(request: VisualAnalysisRequest, signal?: AbortSignal): Promise<unknown>;
}
