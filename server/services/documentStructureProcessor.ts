import type {
  DocumentStructure,
  OutlineEntry,
  SearchMode,
  StructureStats,
  StructureWarning,
} from "@shared/schema";
import { buildOutlineStructure } from "./outlineBuilder";
import { splitDocumentText } from "./sequentialSplitter";
import { assembleDocumentText } from "./textAssembler";
import { pdfDocumentReader, type PdfContent } from "./pdfDocumentReader";

export interface ProcessorOptions {
  startPage?: number;
  chapterMarker?: string;
  searchMode?: SearchMode;
  descendIntoUnmatched?: boolean;
}

export interface ProcessingResult {
  structure: DocumentStructure;
  warnings: StructureWarning[];
  stats: StructureStats;
}

export interface PdfContentSource {
  read(data: Uint8Array): Promise<PdfContent>;
}

function countNodes(structure: DocumentStructure): Pick<StructureStats, "chapters" | "sections" | "subsections"> {
  let sections = 0;
  let subsections = 0;
  for (const chapter of structure.values()) {
    sections += chapter.sections.size;
    for (const section of chapter.sections.values()) {
      subsections += section.subsections.size;
    }
  }
  return { chapters: structure.size, sections, subsections };
}

function mergeOptions(defaults: ProcessorOptions, overrides: ProcessorOptions): ProcessorOptions {
  return {
    startPage: overrides.startPage ?? defaults.startPage,
    chapterMarker: overrides.chapterMarker ?? defaults.chapterMarker,
    searchMode: overrides.searchMode ?? defaults.searchMode,
    descendIntoUnmatched: overrides.descendIntoUnmatched ?? defaults.descendIntoUnmatched,
  };
}

export class DocumentStructureProcessor {
  constructor(
    private readonly defaults: ProcessorOptions = {},
    private readonly pdfSource: PdfContentSource = pdfDocumentReader,
  ) {}

  /**
   * Outline + page texts → populated tree. Structural problems come back as
   * warnings; this never throws on document content.
   */
  process(outline: OutlineEntry[], pages: string[], overrides: ProcessorOptions = {}): ProcessingResult {
    const options = mergeOptions(this.defaults, overrides);

    console.log(`🔍 Building structure from ${outline.length} outline entries`);
    const built = buildOutlineStructure(outline, { chapterMarker: options.chapterMarker });

    const text = assembleDocumentText(pages, { startPage: options.startPage });
    console.log(`📝 Text extraction complete: ${text.length} characters from page ${options.startPage ?? 1}`);

    const split = splitDocumentText(built.structure, text, {
      chapterMarker: options.chapterMarker,
      searchMode: options.searchMode,
      descendIntoUnmatched: options.descendIntoUnmatched,
    });

    const warnings = [...built.warnings, ...split.warnings];
    for (const warning of warnings) {
      console.warn(`⚠️ ${warning.message}`);
    }

    const stats: StructureStats = {
      ...countNodes(split.structure),
      matchedHeadings: split.headings.length,
      textLength: text.length,
      preambleLength: split.preamble ? split.preamble.end - split.preamble.start : 0,
    };
    console.log(
      `✅ Structure matching complete: ${stats.matchedHeadings}/${stats.chapters + stats.sections + stats.subsections} headings matched, ${warnings.length} warnings`,
    );

    return { structure: split.structure, warnings, stats };
  }

  async processPdf(data: Uint8Array, overrides: ProcessorOptions = {}): Promise<ProcessingResult> {
    const content = await this.pdfSource.read(data);
    return this.process(content.outline, content.pages, overrides);
  }
}
