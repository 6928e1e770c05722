export const RECOGNIZED_SECTIONS = ['Part A', 'Part B', 'Part C'] as const;
export const OVERFLOW_SECTION = 'Extra Practice' as const;

export type RecognizedSection = typeof RECOGNIZED_SECTIONS[number];
export type SectionName = RecognizedSection | typeof OVERFLOW_SECTION;

export interface WorksheetSection {
  name      : SectionName;
  questions : string[];
}

export interface WorksheetRecord {
  title        : string;
  instructions : string;
  tips         : string;
  /** In order of first appearance in the source text; the overflow section is always last. */
  sections     : WorksheetSection[];
}

/** Who a rendered sheet is for and the date line printed on it. */
export interface WorksheetMeta {
  child : string;
  date  : string;
}

export function countQuestions(record: Pick<WorksheetRecord, 'sections'>): number {
  return record.sections.reduce((total, section) => total + section.questions.length, 0);
}
