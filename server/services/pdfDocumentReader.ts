import type { OutlineEntry } from "@shared/schema";
import { DocumentReadError } from "../utils/errors";

// The slice of pdf.js' PDFDocumentProxy this module relies on
export interface PdfOutlineNode {
  title: string;
  dest: string | unknown[] | null;
  items: PdfOutlineNode[];
}

export interface PdfPageLike {
  getTextContent(): Promise<{ items: unknown[] }>;
  cleanup(): unknown;
}

export interface PdfDocumentLike {
  numPages: number;
  getOutline(): Promise<PdfOutlineNode[] | null>;
  getDestination(id: string): Promise<unknown[] | null>;
  getPageIndex(ref: { num: number; gen: number }): Promise<number>;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  destroy(): Promise<void>;
}

export interface PdfContent {
  outline: OutlineEntry[];
  pages: string[];
  totalPages: number;
}

interface PdfTextItem {
  str: string;
  hasEOL: boolean;
}

function isTextItem(item: unknown): item is PdfTextItem {
  return typeof item === "object" && item !== null && "str" in item && typeof item.str === "string";
}

function isRef(value: unknown): value is { num: number; gen: number } {
  return (
    typeof value === "object" &&
    value !== null &&
    "num" in value &&
    "gen" in value &&
    typeof value.num === "number" &&
    typeof value.gen === "number"
  );
}

/**
 * Resolve an outline destination to a 1-based page number, or 0 when the
 * entry does not point into the document (external links, broken refs).
 */
export async function resolveDestinationPage(
  pdf: PdfDocumentLike,
  dest: string | unknown[] | null,
): Promise<number> {
  const explicit = typeof dest === "string" ? await pdf.getDestination(dest) : dest;
  if (!explicit || explicit.length === 0) return 0;

  const target = explicit[0];
  if (typeof target === "number") return target + 1;
  if (isRef(target)) {
    try {
      return (await pdf.getPageIndex(target)) + 1;
    } catch (error) {
      console.warn(`⚠️ Outline destination points to an unknown page:`, error);
      return 0;
    }
  }
  return 0;
}

// Depth-first, depth 1 for top-level entries
export async function flattenOutline(pdf: PdfDocumentLike): Promise<OutlineEntry[]> {
  const outline = await pdf.getOutline();
  const entries: OutlineEntry[] = [];

  const walk = async (nodes: PdfOutlineNode[], depth: number): Promise<void> => {
    for (const node of nodes) {
      entries.push({
        depth,
        title: node.title,
        page: await resolveDestinationPage(pdf, node.dest),
      });
      if (node.items.length > 0) {
        await walk(node.items, depth + 1);
      }
    }
  };

  await walk(outline ?? [], 1);
  return entries;
}

/**
 * Plain text of one page: text items in content order, with a newline
 * wherever pdf.js reports the end of a line.
 */
export async function extractPageText(page: PdfPageLike): Promise<string> {
  const content = await page.getTextContent();
  let text = "";
  for (const item of content.items) {
    if (!isTextItem(item)) continue;
    text += item.str;
    if (item.hasEOL) text += "\n";
  }
  return text;
}

export async function readPdfContent(pdf: PdfDocumentLike): Promise<PdfContent> {
  const outline = await flattenOutline(pdf);
  const pages: string[] = [];

  for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
    const page = await pdf.getPage(pageNumber);
    pages.push(await extractPageText(page));
    page.cleanup();
  }

  return { outline, pages, totalPages: pdf.numPages };
}

export class PdfDocumentReader {
  /**
   * Load a PDF from memory and pull out its outline and per-page text.
   */
  async read(data: Uint8Array): Promise<PdfContent> {
    console.log(`📄 Loading PDF (${data.byteLength} bytes)`);

    // Loaded lazily so the rest of the pipeline does not pay for pdf.js
    const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");

    let pdf: PdfDocumentLike;
    try {
      pdf = await getDocument({
        data: new Uint8Array(data),
        useSystemFonts: true,
        isEvalSupported: false,
        verbosity: 0,
      }).promise;
    } catch (error) {
      throw new DocumentReadError(
        `Unable to open PDF: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    try {
      const content = await readPdfContent(pdf);
      console.log(`📑 Read ${content.outline.length} outline entries and ${content.totalPages} pages`);
      return content;
    } finally {
      await pdf.destroy();
    }
  }
}

export const pdfDocumentReader = new PdfDocumentReader();
