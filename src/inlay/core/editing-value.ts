import { ValidationError } from "./errors";
import type {
  Affinity,
  EditingValue,
  TextRange,
  TextSelection,
} from "./types";

export const INVALID_SELECTION: TextSelection = Object.freeze({
  baseOffset: -1,
  extentOffset: -1,
  affinity: "downstream",
  isDirectional: false,
});

export const EMPTY_RANGE: TextRange = Object.freeze({ start: -1, end: -1 });

export function collapsedSelection(
  offset: number,
  affinity: Affinity = "downstream",
): TextSelection {
  return { baseOffset: offset, extentOffset: offset, affinity, isDirectional: false };
}

export function textSelection(
  baseOffset: number,
  extentOffset: number,
  affinity: Affinity = "downstream",
): TextSelection {
  return { baseOffset, extentOffset, affinity, isDirectional: false };
}

export function isCollapsed(selection: TextSelection): boolean {
  return selection.baseOffset === selection.extentOffset;
}

export function isValidSelection(selection: TextSelection): boolean {
  return selection.baseOffset >= 0 && selection.extentOffset >= 0;
}

export function selectionStart(selection: TextSelection): number {
  return Math.min(selection.baseOffset, selection.extentOffset);
}

export function selectionEnd(selection: TextSelection): number {
  return Math.max(selection.baseOffset, selection.extentOffset);
}

export function isValidRange(range: TextRange): boolean {
  return range.start >= 0 && range.end >= 0;
}

export function isRangeCollapsed(range: TextRange): boolean {
  return range.start === range.end;
}

export function textBefore(value: EditingValue): string {
  return value.text.slice(0, selectionStart(value.selection));
}

export function textInside(value: EditingValue): string {
  return value.text.slice(
    selectionStart(value.selection),
    selectionEnd(value.selection),
  );
}

export function textAfter(value: EditingValue): string {
  return value.text.slice(selectionEnd(value.selection));
}

export function selectionsEqual(a: TextSelection, b: TextSelection): boolean {
  return (
    a.baseOffset === b.baseOffset &&
    a.extentOffset === b.extentOffset &&
    a.affinity === b.affinity &&
    a.isDirectional === b.isDirectional
  );
}

export function rangesEqual(a: TextRange, b: TextRange): boolean {
  return a.start === b.start && a.end === b.end;
}

export function valuesEqual(a: EditingValue, b: EditingValue): boolean {
  return (
    a.text === b.text &&
    selectionsEqual(a.selection, b.selection) &&
    rangesEqual(a.composing, b.composing)
  );
}

function isOffset(value: number): boolean {
  return Number.isInteger(value);
}

/** Returns `null` when the value is well formed. */
export function validateEditingValue(
  value: EditingValue,
): ValidationError | null {
  const { text, selection, composing } = value;
  const { baseOffset, extentOffset } = selection;
  if (!isOffset(baseOffset) || !isOffset(extentOffset)) {
    return new ValidationError(
      `selection offsets must be integers, got (${baseOffset}, ${extentOffset})`,
    );
  }
  const selectionInvalid = baseOffset === -1 && extentOffset === -1;
  if (
    !selectionInvalid &&
    (baseOffset < 0 ||
      extentOffset < 0 ||
      baseOffset > text.length ||
      extentOffset > text.length)
  ) {
    return new ValidationError(
      `selection (${baseOffset}, ${extentOffset}) is outside text of length ${text.length}`,
    );
  }

  const { start, end } = composing;
  if (!isOffset(start) || !isOffset(end)) {
    return new ValidationError(
      `composing range must use integers, got (${start}, ${end})`,
    );
  }
  const composingAbsent = start === -1 && end === -1;
  if (
    !composingAbsent &&
    (start < 0 || end < start || end > text.length)
  ) {
    return new ValidationError(
      `composing range (${start}, ${end}) is invalid for text of length ${text.length}`,
    );
  }
  return null;
}

export function createEditingValue(
  init: {
    text?: string;
    selection?: TextSelection;
    composing?: TextRange;
  } = {},
): EditingValue {
  return Object.freeze({
    text: init.text ?? "",
    selection: Object.freeze({ ...(init.selection ?? INVALID_SELECTION) }),
    composing: Object.freeze({ ...(init.composing ?? EMPTY_RANGE) }),
  });
}

export function withSelection(
  value: EditingValue,
  selection: TextSelection,
): EditingValue {
  return createEditingValue({
    text: value.text,
    selection,
    composing: value.composing,
  });
}
