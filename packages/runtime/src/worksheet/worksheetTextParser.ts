import {
  OVERFLOW_SECTION,
  WORKSHEET_DEFAULTS,
  countQuestions,
  type Logger,
  type RecognizedSection,
  type WorksheetRecord,
  type WorksheetSection
} from '@worksheetbot/core';

export type ScalarField = 'title' | 'instructions' | 'tips';

/**
 * What a single trimmed, non-empty line means to the parser.
 *
 * - `scalar`: sets a field; `value` is undefined when the header has no colon.
 * - `section`: moves the cursor.
 * - `content`: a candidate question, kept only while a cursor is set.
 */
export type LineClass =
  | { kind: 'scalar'; field: ScalarField; value: string | undefined }
  | { kind: 'section'; section: RecognizedSection }
  | { kind: 'content'; text: string };

type HeaderRule =
  | { prefix: string; field: ScalarField }
  | { prefix: string; section: RecognizedSection };

/** Checked in order against the upper-cased line; first prefix match wins. */
const HEADER_RULES: readonly HeaderRule[] = [
  { prefix: 'TITLE', field: 'title' },
  { prefix: 'INSTRUCTIONS', field: 'instructions' },
  { prefix: 'PARENT TIPS', field: 'tips' },
  { prefix: 'PART A', section: 'Part A' },
  { prefix: 'PART B', section: 'Part B' },
  { prefix: 'PART C', section: 'Part C' }
];

const QUESTION_MARKER = /^[-*0-9. ]+/;

export function headerValue(line: string): string | undefined {
  const colon = line.indexOf(':');
  return colon === -1 ? undefined : line.slice(colon + 1).trim();
}

/** Strips bullet and numbering markers: "12. Count", "- Count", "* 3. Count" all become "Count". */
export function cleanQuestion(line: string): string {
  return line.replace(QUESTION_MARKER, '').trim();
}

export function classifyLine(line: string): LineClass {
  const upper = line.toUpperCase();

  for (const rule of HEADER_RULES) {
    if (!upper.startsWith(rule.prefix)) continue;
    if ('field' in rule) {
      return { kind: 'scalar', field: rule.field, value: headerValue(line) };
    }
    return { kind: 'section', section: rule.section };
  }

  return { kind: 'content', text: line };
}

export function splitLines(rawText: string): string[] {
  return rawText
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Parser state: a cursor over {no-section, Part A, Part B, Part C} plus a side
 * table of the three scalar fields.
 */
export interface ParserState {
  cursor    : RecognizedSection | null;
  fields    : Partial<Record<ScalarField, string>>;
  sections  : Map<RecognizedSection, string[]>;
  /** Content lines seen before any section header. */
  discarded : number;
}

export function initialParserState(): ParserState {
  return { cursor: null, fields: {}, sections: new Map(), discarded: 0 };
}

export function applyLine(state: ParserState, line: LineClass): ParserState {
  switch (line.kind) {
    case 'scalar':
      if (line.value !== undefined) {
        state.fields[line.field] = line.value;
      }
      return state;

    case 'section':
      state.cursor = line.section;
      if (!state.sections.has(line.section)) {
        state.sections.set(line.section, []);
      }
      return state;

    case 'content': {
      const questions = state.cursor ? state.sections.get(state.cursor) : undefined;
      if (!questions) {
        state.discarded += 1;
        return state;
      }
      const question = cleanQuestion(line.text);
      if (question) {
        questions.push(question);
      }
      return state;
    }
  }
}

export function defaultTitle(childDisplayName: string): string {
  return `${childDisplayName}'s Worksheet`;
}

export function fillerQuestion(number: number): string {
  return `Practice question ${number}: ${WORKSHEET_DEFAULTS.FILLER_PROMPT}`;
}

export interface WorksheetTextParserOptions {
  minQuestions?: number;
  logger?: Logger;
}

/**
 * Best-effort extraction of a worksheet from free-form model text.
 *
 * Header matching is a case-insensitive prefix test, so a question that starts
 * with a header word ("Title the picture...") is read as a header. Repeated
 * scalar headers overwrite each other.
 */
export class WorksheetTextParser {
  private readonly minQuestions: number;
  private readonly logger: Logger | undefined;

  public constructor(options: WorksheetTextParserOptions = {}) {
    this.minQuestions = options.minQuestions ?? WORKSHEET_DEFAULTS.MIN_QUESTIONS;
    this.logger = options.logger?.child({ component: 'worksheet-parser' });
  }

  public parse(rawText: string, childDisplayName: string): WorksheetRecord {
    const state = splitLines(rawText)
      .map(classifyLine)
      .reduce(applyLine, initialParserState());

    const sections: WorksheetSection[] = [...state.sections].map(([name, questions]) => ({ name, questions }));
    const found = countQuestions({ sections });

    const filler: string[] = [];
    for (let total = found; total < this.minQuestions; total++) {
      filler.push(fillerQuestion(total + 1));
    }
    if (filler.length > 0) {
      sections.push({ name: OVERFLOW_SECTION, questions: filler });
    }

    this.logger?.debug(
      { sections: state.sections.size, questions: found, filler: filler.length, discarded: state.discarded },
      'worksheet parsed'
    );

    return {
      title: state.fields.title || defaultTitle(childDisplayName),
      instructions: state.fields.instructions || WORKSHEET_DEFAULTS.INSTRUCTIONS,
      tips: state.fields.tips || WORKSHEET_DEFAULTS.TIPS,
      sections
    };
  }
}
