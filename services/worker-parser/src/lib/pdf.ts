/**
 * PDF Document Source
 *
 * DocumentSource and TextSource on top of pdfjs-dist. Text is linearized by
 * grouping text items on their Y position; "tables" are runs of lines with
 * two or more separated cells, using item geometry only. Pages carry the
 * PDF bytes themselves, since the vision model reads PDFs directly.
 */

import path from 'path';
import * as pdfjsLib from 'pdfjs-dist';
import type { TextItem } from 'pdfjs-dist/types/src/display/api';
import {
  logger,
  errorMessage,
  UnreadableDocumentError,
  type DetectedTable,
  type DocumentInput,
  type DocumentSource,
  type PageImage,
  type PageSet,
  type PageText,
  type TableCell,
  type TableSet,
  type TextSource,
} from '@payverify/shared';

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(
  path.dirname(require.resolve('pdfjs-dist/package.json')),
  'build/pdf.worker.js'
);

/** Resolution the page dimensions are reported at */
const RENDER_DPI = 200;
const POINTS_PER_INCH = 72;
/** Items closer than this (in points) on one line belong to the same cell */
const CELL_GAP = 6;

interface PositionedText {
  x: number;
  y: number;
  width: number;
  height: number;
  str: string;
}

interface PageLayout {
  pageNumber: number;
  widthPt: number;
  heightPt: number;
  /** Top to bottom; each line's cells left to right */
  lines: TableCell[][];
}

interface DocumentLayout {
  pages: PageLayout[];
}

function isTextItem(item: unknown): item is TextItem {
  return typeof item === 'object' && item !== null && 'str' in item && 'transform' in item;
}

/**
 * Group items on one line into cells, merging neighbours closer than
 * CELL_GAP.
 */
function toCells(items: PositionedText[]): TableCell[] {
  const sorted = [...items].sort((a, b) => a.x - b.x);
  const cells: TableCell[] = [];

  for (const item of sorted) {
    const last = cells[cells.length - 1];
    if (last && item.x - (last.bbox.x + last.bbox.width) < CELL_GAP) {
      last.text = `${last.text} ${item.str}`.trim();
      last.bbox.width = Math.max(last.bbox.width, item.x + item.width - last.bbox.x);
      last.bbox.height = Math.max(last.bbox.height, item.height);
    } else {
      cells.push({
        text: item.str.trim(),
        bbox: { x: item.x, y: item.y, width: item.width, height: item.height },
      });
    }
  }

  return cells;
}

export class PdfDocumentSource implements DocumentSource, TextSource {
  private readonly layouts = new WeakMap<DocumentInput, Promise<DocumentLayout>>();

  async getPages(document: DocumentInput): Promise<PageSet> {
    const layout = await this.layout(document);
    const scale = RENDER_DPI / POINTS_PER_INCH;

    const pages: PageImage[] = layout.pages.map((page) => ({
      pageNumber: page.pageNumber,
      widthPx: Math.round(page.widthPt * scale),
      heightPx: Math.round(page.heightPt * scale),
      mediaType: 'application/pdf',
      data: document.content,
    }));
    return { pages };
  }

  async getTables(document: DocumentInput): Promise<TableSet> {
    const layout = await this.layout(document);
    const tables: DetectedTable[] = [];

    for (const page of layout.pages) {
      let rows: TableCell[][] = [];
      const flush = () => {
        if (rows.length >= 2) tables.push({ pageNumber: page.pageNumber, accuracy: null, rows });
        rows = [];
      };

      for (const line of page.lines) {
        if (line.length >= 2) {
          rows.push(line);
        } else {
          flush();
        }
      }
      flush();
    }

    logger.debug('PDF table grouping complete', { table_count: tables.length });
    return { tables };
  }

  async getText(document: DocumentInput): Promise<PageText[]> {
    const layout = await this.layout(document);
    return layout.pages.map((page) => ({
      pageNumber: page.pageNumber,
      text: page.lines.map((cells) => cells.map((cell) => cell.text).join(' ').trim()).join('\n'),
    }));
  }

  private layout(document: DocumentInput): Promise<DocumentLayout> {
    let layout = this.layouts.get(document);
    if (!layout) {
      layout = this.load(document);
      this.layouts.set(document, layout);
    }
    return layout;
  }

  private async load(document: DocumentInput): Promise<DocumentLayout> {
    logger.info('Loading PDF', { filename: document.filename, bytes: document.content.byteLength });

    // pdfjs takes ownership of the buffer it is given
    const pdf = await pdfjsLib
      .getDocument({ data: new Uint8Array(document.content), isEvalSupported: false })
      .promise.catch((error: unknown) => {
        throw new UnreadableDocumentError(`Cannot open ${document.filename}: ${errorMessage(error)}`, {
          cause: error,
        });
      });

    try {
      const pages: PageLayout[] = [];
      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const viewport = page.getViewport({ scale: 1 });
        const textContent = await page.getTextContent();

        // Group text items by rounded Y position to preserve line structure
        const itemsByY = new Map<number, PositionedText[]>();
        for (const item of textContent.items) {
          if (!isTextItem(item) || item.str.trim() === '') continue;
          const y = Math.round(item.transform[5]);
          const line = itemsByY.get(y) ?? [];
          line.push({
            x: item.transform[4],
            y: viewport.height - item.transform[5],
            width: item.width,
            height: item.height,
            str: item.str,
          });
          itemsByY.set(y, line);
        }

        // PDF Y grows upwards: sort descending for top-to-bottom order
        const lines = [...itemsByY.entries()]
          .sort((a, b) => b[0] - a[0])
          .map(([, items]) => toCells(items))
          .filter((cells) => cells.length > 0);

        pages.push({ pageNumber: pageNum, widthPt: viewport.width, heightPt: viewport.height, lines });
      }

      logger.info('PDF layout read', {
        filename: document.filename,
        totalPages: pdf.numPages,
        totalLines: pages.reduce((total, page) => total + page.lines.length, 0),
      });
      return { pages };
    } catch (error) {
      throw new UnreadableDocumentError(`Cannot read pages of ${document.filename}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      await pdf.destroy();
    }
  }
}
