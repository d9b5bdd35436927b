import type {
  ChapterNode,
  DocumentStructure,
  NodeLevel,
  SearchMode,
  SectionNode,
  StructureNode,
  StructureWarning,
} from "@shared/schema";
import { compileHeadingPattern, type PatternOptions } from "./patternCompiler";

export interface NodeRef {
  level: NodeLevel;
  /** Numbers from the chapter down, e.g. ["2", "1", "1.3"] */
  path: string[];
  node: StructureNode;
}

export interface TextSpan {
  /** null for text before the first matched heading */
  owner: NodeRef | null;
  start: number;
  end: number;
  /** Whether the span is written into its owner's text */
  assigned: boolean;
}

export interface HeadingMatch {
  target: NodeRef;
  start: number;
  end: number;
}

export interface SplitState {
  cursor: number;
  active: NodeRef | null;
  spans: TextSpan[];
  headings: HeadingMatch[];
  warnings: StructureWarning[];
}

export interface SplitOptions extends PatternOptions {
  /**
   * "full-text" takes the first occurrence anywhere in the document, even
   * before the cursor. "from-cursor" only looks at or after the cursor.
   */
  searchMode?: SearchMode;
  /** Keep searching for the children of a heading that was not found */
  descendIntoUnmatched?: boolean;
}

export interface SplitResult {
  structure: DocumentStructure;
  warnings: StructureWarning[];
  spans: TextSpan[];
  headings: HeadingMatch[];
  preamble: { start: number; end: number } | null;
}

export function createSplitState(): SplitState {
  return { cursor: 0, active: null, spans: [], headings: [], warnings: [] };
}

export function findHeading(
  pattern: RegExp,
  text: string,
  cursor: number,
  searchMode: SearchMode = "full-text",
): { start: number; end: number } | null {
  let match: RegExpExecArray | null;
  if (searchMode === "from-cursor") {
    const forward = new RegExp(pattern.source, `${pattern.flags.replace("g", "")}g`);
    forward.lastIndex = cursor;
    match = forward.exec(text);
  } else {
    match = pattern.exec(text);
  }
  if (!match) return null;
  return { start: match.index, end: match.index + match[0].length };
}

function describe(target: NodeRef): string {
  return `${target.level} ${target.node.number}`;
}

/**
 * One fold step: look for the target's heading and, when found, close the
 * span owned by the previously active node.
 */
export function advanceSplit(
  state: SplitState,
  target: NodeRef,
  text: string,
  options: SplitOptions = {},
): { state: SplitState; matched: boolean } {
  const pattern = compileHeadingPattern(target.level, target.node.number, target.node.title, options);
  const found = findHeading(pattern, text, state.cursor, options.searchMode);

  if (!found) {
    return {
      matched: false,
      state: {
        ...state,
        warnings: [
          ...state.warnings,
          {
            code: "unmatched-heading",
            message: `No match found for ${describe(target)}`,
            level: target.level,
            number: target.node.number,
            path: target.path,
          },
        ],
      },
    };
  }

  const warnings = [...state.warnings];
  if (found.start < state.cursor) {
    warnings.push({
      code: "out-of-order-match",
      message: `Heading for ${describe(target)} found at ${found.start}, before the current position ${state.cursor}`,
      level: target.level,
      number: target.node.number,
      path: target.path,
      offset: found.start,
    });
  }

  const end = Math.max(found.start, state.cursor);
  const span: TextSpan = {
    owner: state.active,
    start: state.cursor,
    end,
    assigned: state.active !== null && text.slice(state.cursor, end).trim().length > 0,
  };

  return {
    matched: true,
    state: {
      cursor: found.end,
      active: target,
      spans: [...state.spans, span],
      headings: [...state.headings, { target, start: found.start, end: found.end }],
      warnings,
    },
  };
}

// The tail of the document belongs to whatever was matched last
export function finishSplit(state: SplitState, text: string): SplitState {
  if (state.cursor >= text.length) return state;
  return {
    ...state,
    cursor: text.length,
    spans: [
      ...state.spans,
      { owner: state.active, start: state.cursor, end: text.length, assigned: state.active !== null },
    ],
  };
}

export function applySplit(spans: TextSpan[], text: string): void {
  for (const span of spans) {
    if (span.owner && span.assigned) {
      span.owner.node.text = text.slice(span.start, span.end);
    }
  }
}

function chapterRef(chapter: ChapterNode): NodeRef {
  return { level: "chapter", path: [chapter.number], node: chapter };
}

function sectionRef(chapter: ChapterNode, section: SectionNode): NodeRef {
  return { level: "section", path: [chapter.number, section.number], node: section };
}

function skipHeadings(state: SplitState, skipped: NodeRef[]): SplitState {
  if (skipped.length === 0) return state;
  return {
    ...state,
    warnings: [
      ...state.warnings,
      ...skipped.map((target): StructureWarning => ({
        code: "skipped-heading",
        message: `Skipped ${describe(target)}: its parent heading was not found`,
        level: target.level,
        number: target.node.number,
        path: target.path,
      })),
    ],
  };
}

function sectionDescendants(chapter: ChapterNode, section: SectionNode): NodeRef[] {
  return Array.from(section.subsections.values()).map(subsection => ({
    level: "subsection" as const,
    path: [chapter.number, section.number, subsection.number],
    node: subsection,
  }));
}

function chapterDescendants(chapter: ChapterNode): NodeRef[] {
  return Array.from(chapter.sections.values()).flatMap(section => [
    sectionRef(chapter, section),
    ...sectionDescendants(chapter, section),
  ]);
}

/**
 * Walk the outline in pre-order and hand each node the text between its
 * heading and the next heading that was found. Missing headings are
 * reported as warnings; nothing here throws on content.
 */
export function splitDocumentText(
  structure: DocumentStructure,
  text: string,
  options: SplitOptions = {},
): SplitResult {
  const descend = options.descendIntoUnmatched ?? true;
  let state = createSplitState();

  for (const chapter of structure.values()) {
    const chapterStep = advanceSplit(state, chapterRef(chapter), text, options);
    state = chapterStep.state;
    if (!chapterStep.matched && !descend) {
      state = skipHeadings(state, chapterDescendants(chapter));
      continue;
    }

    for (const section of chapter.sections.values()) {
      const sectionStep = advanceSplit(state, sectionRef(chapter, section), text, options);
      state = sectionStep.state;
      if (!sectionStep.matched && !descend) {
        state = skipHeadings(state, sectionDescendants(chapter, section));
        continue;
      }

      for (const subsection of sectionDescendants(chapter, section)) {
        state = advanceSplit(state, subsection, text, options).state;
      }
    }
  }

  state = finishSplit(state, text);
  applySplit(state.spans, text);

  const preambleSpan = state.spans.find(span => span.owner === null);
  return {
    structure,
    warnings: state.warnings,
    spans: state.spans,
    headings: state.headings,
    preamble: preambleSpan ? { start: preambleSpan.start, end: preambleSpan.end } : null,
  };
}
