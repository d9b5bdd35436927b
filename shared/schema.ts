import { z } from "zod";

// Outline entries as they come out of a document's table of contents
export const outlineEntrySchema = z.object({
  depth: z.number().int().positive(),
  title: z.string(),
  page: z.number().int(),
});

export const searchModeSchema = z.enum(["full-text", "from-cursor"]);

export const structureOptionsSchema = z.object({
  chapterMarker: z.string().trim().min(1).optional(),
  searchMode: searchModeSchema.optional(),
  descendIntoUnmatched: z.boolean().optional(),
});

export const structureRequestSchema = z.object({
  outline: z.array(outlineEntrySchema),
  pages: z.array(z.string()),
  startPage: z.number().int().positive().optional(),
  options: structureOptionsSchema.optional(),
});

// Multipart fields arrive as strings
export const pdfStructureFieldsSchema = z.object({
  startPage: z.coerce.number().int().positive().optional(),
  chapterMarker: z.string().trim().min(1).optional(),
  searchMode: searchModeSchema.optional(),
  descendIntoUnmatched: z
    .enum(["true", "false"])
    .transform(value => value === "true")
    .optional(),
});

export type OutlineEntry = z.infer<typeof outlineEntrySchema>;
export type SearchMode = z.infer<typeof searchModeSchema>;
export type StructureOptions = z.infer<typeof structureOptionsSchema>;
export type StructureRequest = z.infer<typeof structureRequestSchema>;
export type PdfStructureFields = z.infer<typeof pdfStructureFieldsSchema>;

// Document tree. Maps keep outline encounter order, which is also the
// order headings are searched for.
export type NodeLevel = "chapter" | "section" | "subsection";

export interface SubsectionNode {
  number: string;
  title: string;
  text: string;
}

export interface SectionNode {
  number: string;
  title: string;
  text: string;
  subsections: Map<string, SubsectionNode>;
}

export interface ChapterNode {
  number: string;
  title: string;
  text: string;
  sections: Map<string, SectionNode>;
}

export type DocumentStructure = Map<string, ChapterNode>;

export type StructureNode = ChapterNode | SectionNode | SubsectionNode;

export type WarningCode =
  | "unmatched-heading"
  | "skipped-heading"
  | "out-of-order-match"
  | "malformed-entry"
  | "orphan-entry"
  | "unsupported-depth"
  | "unclassified-number"
  | "duplicate-number"
  | "implicit-section";

export interface StructureWarning {
  code: WarningCode;
  message: string;
  level?: NodeLevel;
  number?: string;
  /** Node numbers from the chapter down, since a section number alone repeats across chapters */
  path?: string[];
  /** Position of the offending entry in the outline */
  entryIndex?: number;
  /** Offset into the document text */
  offset?: number;
}

export interface StructureStats {
  chapters: number;
  sections: number;
  subsections: number;
  matchedHeadings: number;
  textLength: number;
  preambleLength: number;
}
