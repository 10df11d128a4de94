import { ChangeSet, Text } from "@codemirror/state";
import {
  LRM,
  RLM,
  directionOf,
  hasOpposingDirection,
  isDirectionalityMarker,
} from "../shared/bidi";
import { isWhitespaceText } from "../shared/whitespace";
import { createEditingValue } from "./editing-value";
import type { EditingValue, TextDirection } from "./types";

type MarkerInsert = { from: number; insert: string };

function collectMarkerInserts(
  text: string,
  baseDirection: TextDirection,
): MarkerInsert[] {
  const inserts: MarkerInsert[] = [];
  let runDirection = baseDirection;
  let previousChar: string | null = null;
  let previousWasWhitespace = false;
  // Marker waiting at the end of the current whitespace run.
  let pending: MarkerInsert | null = null;

  for (let index = 0; index < text.length; ) {
    const codePoint = text.codePointAt(index) ?? 0;
    const char = String.fromCodePoint(codePoint);
    const next = index + char.length;

    if (isWhitespaceText(char)) {
      if (!previousWasWhitespace && previousChar !== null) {
        runDirection = directionOf(previousChar);
      }
      pending = { from: next, insert: runDirection === "rtl" ? RLM : LRM };
      previousWasWhitespace = true;
    } else if (isDirectionalityMarker(char)) {
      pending = null;
      previousWasWhitespace = false;
    } else {
      if (pending) {
        if (directionOf(char) !== runDirection) {
          inserts.push(pending);
        }
        pending = null;
      }
      previousChar = char;
      previousWasWhitespace = false;
    }
    index = next;
  }
  if (pending) {
    inserts.push(pending);
  }
  return inserts;
}

/**
 * Puts a directionality marker after every whitespace run so that the caret
 * around the whitespace follows the text before it. Selection and composing
 * offsets move past markers inserted at their position.
 */
export function normalizeWhitespaceDirectionality(
  value: EditingValue,
  baseDirection: TextDirection,
): EditingValue {
  const inserts = collectMarkerInserts(value.text, baseDirection);
  if (inserts.length === 0) {
    return value;
  }

  const changes = ChangeSet.of(inserts, value.text.length);
  const text = changes.apply(Text.of(value.text.split("\n"))).toString();
  const map = (offset: number) =>
    offset >= 0 && offset <= value.text.length ? changes.mapPos(offset, 1) : offset;

  const { selection, composing } = value;
  return createEditingValue({
    text,
    selection: {
      ...selection,
      baseOffset: map(selection.baseOffset),
      extentOffset: map(selection.extentOffset),
    },
    composing: { start: map(composing.start), end: map(composing.end) },
  });
}

/**
 * Stateful wrapper that stays a no-op until the text first mixes directions
 * and runs on every value after that.
 */
export class WhitespaceDirectionalityNormalizer {
  private hasOpposingDirection = false;

  constructor(readonly baseDirection: TextDirection) {}

  get isActive(): boolean {
    return this.hasOpposingDirection;
  }

  normalize(_oldValue: EditingValue, newValue: EditingValue): EditingValue {
    if (!this.hasOpposingDirection) {
      this.hasOpposingDirection = hasOpposingDirection(
        newValue.text,
        this.baseDirection,
      );
    }
    if (!this.hasOpposingDirection) {
      return newValue;
    }
    return normalizeWhitespaceDirectionality(newValue, this.baseDirection);
  }
}
