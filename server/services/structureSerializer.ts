import type {
  ChapterNode,
  DocumentStructure,
  SectionNode,
  StructureStats,
  StructureWarning,
  SubsectionNode,
} from "@shared/schema";

// JSON.stringify on a plain object would move integer-like keys ("2", "10")
// ahead of the rest in numeric order, so objects are written by hand from
// the Maps to keep outline order.

type Entry = [key: string, json: string];

function formatObject(entries: Entry[], indent: string, level: number): string {
  if (entries.length === 0) return "{}";
  if (!indent) {
    return `{${entries.map(([key, json]) => `${JSON.stringify(key)}:${json}`).join(",")}}`;
  }
  const pad = indent.repeat(level + 1);
  const body = entries.map(([key, json]) => `${pad}${JSON.stringify(key)}: ${json}`).join(",\n");
  return `{\n${body}\n${indent.repeat(level)}}`;
}

function formatValue(value: unknown, indent: string, level: number): string {
  const json = JSON.stringify(value, null, indent) ?? "null";
  return indent ? json.replace(/\n/g, `\n${indent.repeat(level)}`) : json;
}

function subsectionEntries(subsection: SubsectionNode): Entry[] {
  return [
    ["title", JSON.stringify(subsection.title)],
    ["text", JSON.stringify(subsection.text)],
  ];
}

function sectionEntries(section: SectionNode, indent: string, level: number): Entry[] {
  const subsections: Entry[] = Array.from(section.subsections, ([number, subsection]) => [
    number,
    formatObject(subsectionEntries(subsection), indent, level + 2),
  ]);
  return [
    ["title", JSON.stringify(section.title)],
    ["subsections", formatObject(subsections, indent, level + 1)],
    ["text", JSON.stringify(section.text)],
  ];
}

function chapterEntries(chapter: ChapterNode, indent: string, level: number): Entry[] {
  const sections: Entry[] = Array.from(chapter.sections, ([number, section]) => [
    number,
    formatObject(sectionEntries(section, indent, level + 2), indent, level + 2),
  ]);
  return [
    ["title", JSON.stringify(chapter.title)],
    ["sections", formatObject(sections, indent, level + 1)],
    ["text", JSON.stringify(chapter.text)],
  ];
}

function indentUnit(indent: number | string): string {
  return typeof indent === "number" ? " ".repeat(Math.max(0, indent)) : indent;
}

function formatStructure(structure: DocumentStructure, indent: string, level: number): string {
  const chapters: Entry[] = Array.from(structure, ([number, chapter]) => [
    number,
    formatObject(chapterEntries(chapter, indent, level + 1), indent, level + 1),
  ]);
  return formatObject(chapters, indent, level);
}

/**
 * Serialize the tree as `{ chapter: { title, sections: { section: { title,
 * subsections: { ... }, text } }, text } }` with keys in outline order.
 */
export function serializeStructure(structure: DocumentStructure, indent: number | string = 4): string {
  return formatStructure(structure, indentUnit(indent), 0);
}

export interface StructureResponse {
  structure: DocumentStructure;
  warnings: StructureWarning[];
  stats: StructureStats;
}

export function serializeStructureResponse(response: StructureResponse, indent: number | string = 0): string {
  const unit = indentUnit(indent);
  return formatObject(
    [
      ["structure", formatStructure(response.structure, unit, 1)],
      ["warnings", formatValue(response.warnings, unit, 1)],
      ["stats", formatValue(response.stats, unit, 1)],
    ],
    unit,
    0,
  );
}
