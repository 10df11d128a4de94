import { isInlineObjectToken } from "./codec/inline-object-codec";
import { WhitespaceDirectionalityNormalizer } from "./directionality";
import {
  EMPTY_RANGE,
  INVALID_SELECTION,
  collapsedSelection,
  createEditingValue,
  validateEditingValue,
  valuesEqual,
} from "./editing-value";
import { InvalidArgumentError, ValidationError } from "./errors";
import type {
  EditingValue,
  Result,
  TextDirection,
  TextSelection,
} from "./types";

/** Caller formatter; runs when an update changes the text. */
export type TextFormatter = (
  oldValue: EditingValue,
  newValue: EditingValue,
) => EditingValue;

export type EditingValueObserver = (
  value: EditingValue,
  previous: EditingValue,
) => void;

export type EditingControllerOptions = {
  text?: string;
  value?: EditingValue;
  formatters?: TextFormatter[];
  /** Base direction for whitespace normalization; `null` turns it off. */
  textDirection?: TextDirection | null;
};

export type UpdateResult = Result<EditingValue, ValidationError>;

type Notification = { value: EditingValue; previous: EditingValue };

export class EditingController {
  private current: EditingValue;
  private observers = new Set<EditingValueObserver>();
  private queue: Notification[] = [];
  private notifying = false;
  private readonly formatters: TextFormatter[];
  private readonly normalizer: WhitespaceDirectionalityNormalizer | null;

  constructor(options: EditingControllerOptions = {}) {
    this.current = options.value ?? createEditingValue({ text: options.text });
    this.formatters = options.formatters ?? [];
    const direction =
      options.textDirection === undefined ? "ltr" : options.textDirection;
    this.normalizer = direction
      ? new WhitespaceDirectionalityNormalizer(direction)
      : null;
  }

  get value(): EditingValue {
    return this.current;
  }

  get text(): string {
    return this.current.text;
  }

  get selection(): TextSelection {
    return this.current.selection;
  }

  subscribe(observer: EditingValueObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  /**
   * Replaces the whole value. Formatters and whitespace normalization run
   * when the text changes; a malformed value leaves the current one in place.
   */
  replace(next: EditingValue): UpdateResult {
    const invalid = validateEditingValue(next);
    if (invalid) {
      return { ok: false, error: invalid };
    }

    const previous = this.current;
    let value = createEditingValue(next);
    if (value.text !== previous.text) {
      const formatted = this.format(previous, value);
      if (!formatted.ok) {
        return formatted;
      }
      value = formatted.value;
    }

    this.commit(value);
    return { ok: true, value: this.current };
  }

  /**
   * Inserts one reserved code point at the base offset, or at the end when
   * there is no usable base. A selected range is kept, not replaced.
   */
  insertInlineObject(token: string): UpdateResult {
    if (!isInlineObjectToken(token)) {
      throw new InvalidArgumentError(
        "insertInlineObject expects exactly one code point in U+E000..U+F8FF",
      );
    }
    const { text, selection } = this.current;
    const base = selection.baseOffset;
    const index = base >= 0 && base < text.length ? base : text.length;
    return this.replace(
      createEditingValue({
        text: text.slice(0, index) + token + text.slice(index),
        selection: collapsedSelection(index + token.length),
      }),
    );
  }

  addSpan(token: string): UpdateResult {
    return this.insertInlineObject(token);
  }

  setText(text: string): UpdateResult {
    return this.replace(
      createEditingValue({ text, selection: INVALID_SELECTION }),
    );
  }

  setSelection(selection: TextSelection): UpdateResult {
    return this.replace(
      createEditingValue({
        text: this.current.text,
        selection,
        composing: this.current.composing,
      }),
    );
  }

  clearComposing(): void {
    this.commit(
      createEditingValue({
        text: this.current.text,
        selection: this.current.selection,
        composing: EMPTY_RANGE,
      }),
    );
  }

  clear(): UpdateResult {
    return this.replace(
      createEditingValue({ text: "", selection: collapsedSelection(0) }),
    );
  }

  isSelectionWithinTextBounds(selection: TextSelection): boolean {
    const length = this.current.text.length;
    return selection.baseOffset <= length && selection.extentOffset <= length;
  }

  private format(previous: EditingValue, value: EditingValue): UpdateResult {
    let formatted = value;
    try {
      for (const formatter of this.formatters) {
        formatted = formatter(previous, formatted);
      }
    } catch (error) {
      console.warn("[inlay] formatter rejected the update", error);
      return {
        ok: false,
        error: new ValidationError(
          error instanceof Error ? error.message : String(error),
        ),
      };
    }
    const invalid = validateEditingValue(formatted);
    if (invalid) {
      return { ok: false, error: invalid };
    }
    if (this.normalizer) {
      formatted = this.normalizer.normalize(previous, formatted);
    }
    return { ok: true, value: createEditingValue(formatted) };
  }

  private commit(value: EditingValue): void {
    const previous = this.current;
    if (valuesEqual(previous, value)) {
      return;
    }
    this.current = value;
    this.queue.push({ value, previous });
    if (this.notifying) {
      return;
    }

    this.notifying = true;
    try {
      let notification = this.queue.shift();
      while (notification) {
        for (const observer of Array.from(this.observers)) {
          try {
            observer(notification.value, notification.previous);
          } catch (error) {
            console.error("[inlay] editing value observer failed", error);
          }
        }
        notification = this.queue.shift();
      }
    } finally {
      this.notifying = false;
    }
  }
}
