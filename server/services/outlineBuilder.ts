import type {
  ChapterNode,
  DocumentStructure,
  OutlineEntry,
  SectionNode,
  StructureWarning,
} from "@shared/schema";

export const DEFAULT_CHAPTER_MARKER = "Глава";

const SECTION_NUMBER = /^\d+$/;            // "2"
const SUBSECTION_NUMBER = /^\d+\.\d+$/;    // "2.1"
const SECTION_TITLE = /^(\d+(?:\.\d+)*)(?:\.\s*)?(.*)/;  // "2.1. Title" / "2 Title"

export interface OutlineBuilderOptions {
  chapterMarker?: string;
}

export interface OutlineBuildResult {
  structure: DocumentStructure;
  warnings: StructureWarning[];
}

export type NumberKind = "section" | "subsection" | "unclassified";

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function chapterTitlePattern(marker: string): RegExp {
  return new RegExp(`^(${escapeRegExp(marker)}\\s*)?(\\d+)\\.?\\s*(.*)`, "i");
}

export function parseChapterTitle(
  title: string,
  marker: string = DEFAULT_CHAPTER_MARKER,
): { number: string; title: string } {
  const match = title.match(chapterTitlePattern(marker));
  if (match) {
    return { number: match[2], title: match[3].trim() };
  }
  return { number: "", title: title.trim() };
}

export function parseSectionTitle(title: string): { number: string; title: string } {
  const match = title.match(SECTION_TITLE);
  if (match) {
    return { number: match[1], title: match[2].trim() };
  }
  return { number: "", title: title.trim() };
}

export function classifyNumber(number: string): NumberKind {
  if (SECTION_NUMBER.test(number)) return "section";
  if (SUBSECTION_NUMBER.test(number)) return "subsection";
  return "unclassified";
}

/**
 * Outlines that put the chapter marker on its own entry ("Глава 3") carry
 * the chapter's real title in the entry right after it. Only applies when
 * the chapter entry parsed a number but no title.
 */
export function borrowChapterTitle(entries: OutlineEntry[], index: number): string {
  const next = entries[index + 1];
  return next ? next.title.trim() : "";
}

/**
 * Turn a flat outline into the chapter → section → subsection tree.
 * Entries that cannot be placed are dropped and reported, never thrown.
 */
export function buildOutlineStructure(
  entries: OutlineEntry[],
  options: OutlineBuilderOptions = {},
): OutlineBuildResult {
  const marker = options.chapterMarker ?? DEFAULT_CHAPTER_MARKER;
  const structure: DocumentStructure = new Map();
  const warnings: StructureWarning[] = [];

  let currentChapter: ChapterNode | null = null;
  let currentSection: SectionNode | null = null;

  entries.forEach((entry, entryIndex) => {
    if (entry.depth === 1) {
      const parsed = parseChapterTitle(entry.title, marker);
      if (!parsed.number) {
        warnings.push({
          code: "malformed-entry",
          message: `Outline entry "${entry.title}" has no chapter number`,
          level: "chapter",
          entryIndex,
        });
        return;
      }

      if (structure.has(parsed.number)) {
        warnings.push({
          code: "duplicate-number",
          message: `Chapter ${parsed.number} appears more than once; the later entry replaces it`,
          level: "chapter",
          number: parsed.number,
          entryIndex,
        });
      }

      const chapter: ChapterNode = {
        number: parsed.number,
        title: parsed.title || borrowChapterTitle(entries, entryIndex),
        text: "",
        sections: new Map(),
      };
      structure.set(chapter.number, chapter);
      currentChapter = chapter;
      currentSection = null;
      return;
    }

    if (entry.depth > 3) {
      warnings.push({
        code: "unsupported-depth",
        message: `Outline entry "${entry.title}" is nested ${entry.depth} levels deep`,
        entryIndex,
      });
      return;
    }

    if (!currentChapter) {
      warnings.push({
        code: "orphan-entry",
        message: `Outline entry "${entry.title}" appears before any chapter`,
        entryIndex,
      });
      return;
    }

    const parsed = parseSectionTitle(entry.title);
    if (!parsed.number) {
      warnings.push({
        code: "malformed-entry",
        message: `Outline entry "${entry.title}" has no section number`,
        entryIndex,
      });
      return;
    }

    const kind = classifyNumber(parsed.number);

    if (kind === "section") {
      if (currentChapter.sections.has(parsed.number)) {
        warnings.push({
          code: "duplicate-number",
          message: `Section ${parsed.number} of chapter ${currentChapter.number} appears more than once; the later entry replaces it`,
          level: "section",
          number: parsed.number,
          entryIndex,
        });
      }
      const section: SectionNode = {
        number: parsed.number,
        title: parsed.title,
        text: "",
        subsections: new Map(),
      };
      currentChapter.sections.set(section.number, section);
      currentSection = section;
      return;
    }

    if (kind === "subsection") {
      if (!currentSection) {
        const sectionNumber = parsed.number.split(".")[0];
        // No section has been seen in this chapter yet, so the map is empty
        currentSection = {
          number: sectionNumber,
          title: "",
          text: "",
          subsections: new Map(),
        };
        currentChapter.sections.set(sectionNumber, currentSection);
        warnings.push({
          code: "implicit-section",
          message: `Subsection ${parsed.number} has no section entry; attached to section ${sectionNumber}`,
          level: "section",
          number: sectionNumber,
          entryIndex,
        });
      }

      if (currentSection.subsections.has(parsed.number)) {
        warnings.push({
          code: "duplicate-number",
          message: `Subsection ${parsed.number} appears more than once; the later entry replaces it`,
          level: "subsection",
          number: parsed.number,
          entryIndex,
        });
      }
      currentSection.subsections.set(parsed.number, {
        number: parsed.number,
        title: parsed.title,
        text: "",
      });
      return;
    }

    warnings.push({
      code: "unclassified-number",
      message: `Number "${parsed.number}" is neither a section nor a subsection number`,
      number: parsed.number,
      entryIndex,
    });
  });

  return { structure, warnings };
}
