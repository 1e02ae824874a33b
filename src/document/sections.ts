/**
 * Section scanning over a line array.
 *
 * Pure functions. A section header is a level-2 markdown heading (`## `);
 * a rule is a line of three or more dashes and nothing else. Neither is
 * modeled separately from the lines — sections are derived on each call.
 */

/** Matches `## Title` but not `### Sub` */
const HEADER_REGEX = /^## \S/;

/** A horizontal rule on its own line. Prose like `---and then` is not a rule. */
const RULE_REGEX = /^-{3,}\s*$/;

export interface SectionBounds {
  header: string;
  /** 1-indexed, inclusive */
  start: number;
  /** 1-indexed, inclusive */
  end: number;
}

export function isHeaderLine(line: string): boolean {
  return HEADER_REGEX.test(line);
}

export function isRuleLine(line: string): boolean {
  return RULE_REGEX.test(line);
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a case-insensitive matcher. Patterns that aren't valid regular
 * expressions are matched as literal substrings instead of throwing.
 */
export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'i');
  } catch {
    return new RegExp(escapeRegex(pattern), 'i');
  }
}

/** 0-based index of the first line matching `pattern`, or -1. */
export function findFirstMatch(lines: readonly string[], pattern: string): number {
  const regex = compilePattern(pattern);
  return lines.findIndex((line) => regex.test(line));
}

/**
 * Locate the section whose header is the first line matching `pattern`.
 * The section runs up to (not including) the next header or rule line.
 */
export function locateSection(lines: readonly string[], pattern: string): SectionBounds | null {
  const headerIdx = findFirstMatch(lines, pattern);
  if (headerIdx < 0) return null;

  let end = lines.length;
  for (let j = headerIdx + 1; j < lines.length; j++) {
    const line = lines[j] ?? '';
    if (isHeaderLine(line) || isRuleLine(line)) {
      end = j;
      break;
    }
  }

  return { header: lines[headerIdx] ?? '', start: headerIdx + 1, end };
}

/** Every `## ` header, each bounded by the next header or end-of-document. */
export function scanSections(lines: readonly string[]): SectionBounds[] {
  const sections: SectionBounds[] = [];
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (!isHeaderLine(line)) continue;
    const previous = sections.at(-1);
    if (previous) previous.end = i;
    sections.push({ header: line, start: i + 1, end: lines.length });
  }
  return sections;
}
