import type { NodeLevel } from "@shared/schema";
import { DEFAULT_CHAPTER_MARKER, escapeRegExp } from "./outlineBuilder";

export interface PatternOptions {
  chapterMarker?: string;
}

/**
 * Escape a heading title and let every whitespace run match any amount of
 * whitespace (including none), so titles broken across lines by text
 * extraction still match.
 */
export function relaxTitle(title: string): string {
  return title
    .trim()
    .split(/\s+/)
    .filter(part => part.length > 0)
    .map(escapeRegExp)
    .join("\\s*");
}

// "Глава 3 Title" anywhere in the text
export function compileChapterPattern(
  number: string,
  title: string,
  options: PatternOptions = {},
): RegExp {
  const marker = escapeRegExp(options.chapterMarker ?? DEFAULT_CHAPTER_MARKER);
  return new RegExp(`${marker}\\s*${escapeRegExp(number)}\\s*${relaxTitle(title)}`, "i");
}

// "3 Title" / "3.1 Title" at the start of a line
export function compileSectionPattern(number: string, title: string): RegExp {
  return new RegExp(`^${escapeRegExp(number)}\\s*${relaxTitle(title)}`, "im");
}

export function compileHeadingPattern(
  level: NodeLevel,
  number: string,
  title: string,
  options: PatternOptions = {},
): RegExp {
  return level === "chapter"
    ? compileChapterPattern(number, title, options)
    : compileSectionPattern(number, title);
}
