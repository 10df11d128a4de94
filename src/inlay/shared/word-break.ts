import type { TextRange } from "../core/types";
import { wordSegments } from "./segmenter";
import { isWhitespace } from "./whitespace";

/**
 * The word (or non-word segment) containing `offset`. Offsets at or past the
 * end of the text give the collapsed range at the end.
 */
export function wordBoundaryAt(text: string, offset: number): TextRange {
  if (offset >= text.length) {
    return { start: text.length, end: text.length };
  }
  const clampedOffset = Math.max(0, offset);
  for (const segment of wordSegments(text)) {
    const end = segment.index + segment.segment.length;
    if (clampedOffset >= segment.index && clampedOffset < end) {
      return { start: segment.index, end };
    }
  }
  return { start: text.length, end: text.length };
}

export function isWhitespaceRange(text: string, range: TextRange): boolean {
  for (let index = range.start; index < range.end; index += 1) {
    if (!isWhitespace(text.charCodeAt(index))) {
      return false;
    }
  }
  return true;
}

/**
 * Start of the cluster containing `index - 1`. When `includeWhitespace` is
 * false, backs up further to the last cluster that is not whitespace.
 */
export function previousCharacter(
  boundaries: readonly number[],
  text: string,
  index: number,
  includeWhitespace = true,
): number {
  let lastNonWhitespace: number | null = null;
  for (let i = 0; i < boundaries.length - 1; i += 1) {
    const start = boundaries[i] ?? 0;
    const end = boundaries[i + 1] ?? start;
    if (!includeWhitespace && !isWhitespaceRange(text, { start, end })) {
      lastNonWhitespace = start;
    }
    if (end >= index) {
      return includeWhitespace ? start : lastNonWhitespace ?? 0;
    }
  }
  return 0;
}

/**
 * Start of the first cluster after the one containing `index`. When
 * `includeWhitespace` is false, whitespace clusters are skipped as well.
 */
export function nextCharacter(
  boundaries: readonly number[],
  text: string,
  index: number,
  includeWhitespace = true,
): number {
  for (let i = 0; i < boundaries.length - 1; i += 1) {
    const start = boundaries[i] ?? 0;
    const end = boundaries[i + 1] ?? start;
    if (start <= index) {
      continue;
    }
    if (includeWhitespace || !isWhitespaceRange(text, { start, end })) {
      return start;
    }
  }
  return text.length;
}
