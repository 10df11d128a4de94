import { isSelectionEnabled, type EditorConfig } from "../../core/config";
import { cursorMapForText } from "../../core/mapping/cursor-map";
import {
  collapsedSelection,
  createEditingValue,
  isCollapsed,
  isValidSelection,
  selectionEnd,
  selectionStart,
  selectionsEqual,
  textAfter,
  textBefore,
  textInside,
  textSelection,
} from "../../core/editing-value";
import type {
  Point,
  SelectionChangedCause,
  TextPosition,
  TextSelection,
} from "../../core/types";
import type { EditableLayout } from "../../engine/layout/editable-layout";
import { platformModifiers } from "../../shared/platform";
import { isWhitespace } from "../../shared/whitespace";
import { nextCharacter, previousCharacter } from "../../shared/word-break";
import type { ClipboardService, TextSelectionDelegate } from "../types";
import {
  classifyKey,
  type DeleteKey,
  type EditorKeyEvent,
  type MovementKey,
  type ShortcutKey,
} from "./keyboard";

export type SelectionHost<TContent> = {
  readonly config: EditorConfig;
  readonly hasFocus: boolean;
  /** Returns the layout, laid out against the latest constraints. */
  ensureLayout(): EditableLayout<TContent>;
  onSelectionChanged(selection: TextSelection, cause: SelectionChangedCause): void;
};

export type SelectionControllerOptions<TContent> = {
  host: SelectionHost<TContent>;
  delegate: TextSelectionDelegate;
  clipboard: ClipboardService;
};

export type GestureState = { kind: "idle" } | { kind: "dragging"; origin: Point };

type Modifiers = { word: boolean; line: boolean; shift: boolean };

/**
 * Turns pointer gestures and key presses into selection changes. Every change
 * goes through `handleSelectionChange`.
 */
export class SelectionController<TContent> {
  private readonly host: SelectionHost<TContent>;
  private readonly delegate: TextSelectionDelegate;
  private readonly clipboard: ClipboardService;
  private gesture: GestureState = { kind: "idle" };
  private lastTapDown: Point | null = null;
  private lastSecondaryTapDown: Point | null = null;
  // Extent to return to after selecting vertically past the first or last line.
  private cursorResetLocation = -1;
  private wasSelectingVertically = false;
  private goalX: number | null = null;

  constructor(options: SelectionControllerOptions<TContent>) {
    this.host = options.host;
    this.delegate = options.delegate;
    this.clipboard = options.clipboard;
  }

  get state(): GestureState {
    return this.gesture;
  }

  private get selection(): TextSelection {
    return this.delegate.textEditingValue.selection;
  }

  handleSelectionChange(next: TextSelection, cause: SelectionChangedCause): void {
    const focusingEmpty =
      next.baseOffset === 0 && next.extentOffset === 0 && !this.host.hasFocus;
    if (selectionsEqual(next, this.selection) && cause !== "keyboard" && !focusingEmpty) {
      return;
    }
    this.host.onSelectionChanged(next, cause);
  }

  // Pointer gestures. Points are relative to the field's top-left corner.

  handleTapDown(point: Point): void {
    this.lastTapDown = point;
  }

  handleSecondaryTapDown(point: Point): void {
    this.lastTapDown = point;
    this.lastSecondaryTapDown = point;
  }

  /** Selects the word under the last secondary tap unless it lands inside the selection. */
  handleSecondaryTap(): void {
    const point = this.lastSecondaryTapDown;
    if (!point) {
      return;
    }
    const offset = this.host.ensureLayout().getPositionForPoint(point).offset;
    const selection = this.selection;
    if (
      isValidSelection(selection) &&
      !isCollapsed(selection) &&
      offset >= selectionStart(selection) &&
      offset <= selectionEnd(selection)
    ) {
      return;
    }
    this.selectWordsInRange(point, null, "tap");
  }

  handleTap(): void {
    if (this.lastTapDown) {
      this.selectPositionAt(this.lastTapDown, null, "tap");
    }
  }

  handleDoubleTap(): void {
    if (this.lastTapDown) {
      this.selectWordsInRange(this.lastTapDown, null, "doubleTap");
    }
  }

  handleLongPress(): void {
    if (this.lastTapDown) {
      this.selectWordsInRange(this.lastTapDown, null, "longPress");
    }
  }

  handleDragStart(point: Point): void {
    this.gesture = { kind: "dragging", origin: point };
    this.lastTapDown = point;
    this.selectPositionAt(point, null, "drag");
  }

  handleDragUpdate(point: Point): void {
    if (this.gesture.kind !== "dragging") {
      return;
    }
    this.selectWordsInRange(this.gesture.origin, point, "drag");
  }

  handleDragEnd(): void {
    this.gesture = { kind: "idle" };
  }

  selectPositionAt(from: Point, to: Point | null, cause: SelectionChangedCause): void {
    const layout = this.host.ensureLayout();
    const fromPosition = layout.getPositionForPoint(from);
    const toPosition = to ? layout.getPositionForPoint(to) : null;
    this.handleSelectionChange(
      textSelection(
        fromPosition.offset,
        toPosition?.offset ?? fromPosition.offset,
        fromPosition.affinity,
      ),
      cause,
    );
  }

  /** Selects from the start of the word at `from` to the end of the word at `to`. */
  selectWordsInRange(from: Point, to: Point | null, cause: SelectionChangedCause): void {
    const layout = this.host.ensureLayout();
    const firstWord = this.selectWordAtOffset(layout.getPositionForPoint(from));
    const lastWord = to
      ? this.selectWordAtOffset(layout.getPositionForPoint(to))
      : firstWord;
    this.handleSelectionChange(
      textSelection(firstWord.baseOffset, lastWord.extentOffset, firstWord.affinity),
      cause,
    );
  }

  /** Moves the caret to the nearer edge of the word under the last tap. */
  selectWordEdge(cause: SelectionChangedCause): void {
    if (!this.lastTapDown) {
      return;
    }
    const layout = this.host.ensureLayout();
    const position = layout.getPositionForPoint(this.lastTapDown);
    const word = layout.getWordBoundary(position);
    if (position.offset - word.start <= 1) {
      this.handleSelectionChange(collapsedSelection(word.start, "downstream"), cause);
    } else {
      this.handleSelectionChange(collapsedSelection(word.end, "upstream"), cause);
    }
  }

  // Keyboard.

  async handleKeyEvent(event: EditorKeyEvent): Promise<boolean> {
    if (event.type !== "keydown") {
      return false;
    }
    const key = classifyKey(event.key);
    if (!key) {
      return false;
    }
    const { word, line, shortcut } = platformModifiers(this.host.config.platform, event);
    switch (key.kind) {
      case "movement":
        this.handleMovement(key.key, { word, line, shift: event.shiftKey });
        return true;
      case "shortcut":
        if (!shortcut) {
          return false;
        }
        await this.handleShortcut(key.key);
        return true;
      case "delete":
        this.handleDelete(key.key);
        return true;
    }
  }

  moveCursorForwardByCharacter(extendSelection: boolean): void {
    const extent = this.host.ensureLayout().paragraph.getOffsetAfter(
      this.selection.extentOffset,
    );
    if (extent === null) {
      return;
    }
    const base = extendSelection ? this.selection.baseOffset : extent;
    this.handleSelectionChange(textSelection(base, extent), "keyboard");
  }

  moveCursorBackwardByCharacter(extendSelection: boolean): void {
    const extent = this.host.ensureLayout().paragraph.getOffsetBefore(
      this.selection.extentOffset,
    );
    if (extent === null) {
      return;
    }
    const base = extendSelection ? this.selection.baseOffset : extent;
    this.handleSelectionChange(textSelection(base, extent), "keyboard");
  }

  moveCursorForwardByWord(extendSelection: boolean): void {
    const layout = this.host.ensureLayout();
    const currentWord = layout.getWordBoundary(this.extentPosition());
    const nextWord = layout.getNextWord(currentWord.end);
    if (!nextWord) {
      return;
    }
    const base = extendSelection ? this.selection.baseOffset : nextWord.start;
    this.handleSelectionChange(textSelection(base, nextWord.start), "keyboard");
  }

  moveCursorBackwardByWord(extendSelection: boolean): void {
    const layout = this.host.ensureLayout();
    const currentWord = layout.getWordBoundary(this.extentPosition());
    const previousWord = layout.getPreviousWord(currentWord.start - 1);
    if (!previousWord) {
      return;
    }
    const base = extendSelection ? this.selection.baseOffset : previousWord.start;
    this.handleSelectionChange(textSelection(base, previousWord.start), "keyboard");
  }

  private extentPosition(): TextPosition {
    return { offset: this.selection.extentOffset, affinity: this.selection.affinity };
  }

  private selectWordAtOffset(position: TextPosition): TextSelection {
    const layout = this.host.ensureLayout();
    const word = layout.getWordBoundary(position);
    if (position.offset >= word.end) {
      return collapsedSelection(position.offset, position.affinity);
    }
    if (this.host.config.obscureText) {
      return textSelection(0, layout.text.length);
    }
    if (
      position.offset > 0 &&
      isWhitespace(layout.text.charCodeAt(position.offset)) &&
      this.prefersPreviousWord()
    ) {
      const previousWord = layout.getPreviousWord(word.start);
      if (previousWord) {
        return textSelection(previousWord.start, position.offset);
      }
    }
    return textSelection(word.start, word.end);
  }

  private prefersPreviousWord(): boolean {
    switch (this.host.config.wordSelectionFallback) {
      case "always":
        return true;
      case "readOnly":
        return this.host.config.readOnly;
      case "never":
        return false;
    }
  }

  private selectLineAtOffset(position: TextPosition): TextSelection {
    const layout = this.host.ensureLayout();
    const line = layout.getLineBoundary(position);
    if (position.offset >= line.end) {
      return collapsedSelection(position.offset, position.affinity);
    }
    if (this.host.config.obscureText) {
      return textSelection(0, layout.text.length);
    }
    return textSelection(line.start, line.end);
  }

  private handleMovement(key: MovementKey, modifiers: Modifiers): void {
    const { word, line, shift } = modifiers;
    if (word && line) {
      return;
    }
    const current = this.selection;
    if (!isValidSelection(current)) {
      return;
    }

    const layout = this.host.ensureLayout();
    const text = layout.text;
    const boundaries = layout.cursorMap.boundaries;
    let next = current;
    const withExtent = (extentOffset: number): TextSelection => ({ ...next, extentOffset });

    if (key === "left" || key === "right") {
      this.goalX = null;
      const extentPosition = (offset: number): TextPosition => ({
        offset,
        affinity: "downstream",
      });
      if (word) {
        if (key === "left") {
          const start = previousCharacter(boundaries, text, next.extentOffset, false);
          next = withExtent(this.selectWordAtOffset(extentPosition(start)).baseOffset);
        } else {
          const start = nextCharacter(boundaries, text, next.extentOffset, false);
          next = withExtent(this.selectWordAtOffset(extentPosition(start)).extentOffset);
        }
      } else if (line) {
        if (key === "left") {
          const start = previousCharacter(boundaries, text, next.extentOffset, false);
          next = withExtent(this.selectLineAtOffset(extentPosition(start)).baseOffset);
        } else {
          const start = nextCharacter(boundaries, text, next.extentOffset, false);
          next = withExtent(this.selectLineAtOffset(extentPosition(start)).extentOffset);
        }
      } else if (key === "right" && next.extentOffset < text.length) {
        const nextExtent =
          !shift && !isCollapsed(next)
            ? selectionEnd(next)
            : nextCharacter(boundaries, text, next.extentOffset);
        const distance = nextExtent - next.extentOffset;
        next = withExtent(nextExtent);
        if (shift) {
          this.cursorResetLocation += distance;
        }
      } else if (key === "left" && next.extentOffset > 0) {
        const previousExtent =
          !shift && !isCollapsed(next)
            ? selectionStart(next)
            : previousCharacter(boundaries, text, next.extentOffset);
        const distance = next.extentOffset - previousExtent;
        next = withExtent(previousExtent);
        if (shift) {
          this.cursorResetLocation -= distance;
        }
      }
    }

    if (key === "up" || key === "down") {
      if (line) {
        if (key === "up") {
          const upper = Math.max(0, next.baseOffset, next.extentOffset);
          next = textSelection(shift ? upper : 0, 0);
        } else {
          const lower = Math.max(0, Math.min(next.baseOffset, next.extentOffset));
          next = textSelection(shift ? lower : text.length, text.length);
        }
      } else {
        const lineHeight = layout.preferredLineHeight;
        // The caret offset is its top edge, so the middle of the line above
        // is half a line up and the line below is 1.5 lines down.
        const verticalOffset = key === "up" ? -0.5 * lineHeight : 1.5 * lineHeight;
        const caret = layout.getOffsetForCaret({
          offset: next.extentOffset,
          affinity: next.affinity,
        });
        const x = this.goalX ?? caret.x;
        const position = layout.getPositionForOffset({ x, y: caret.y + verticalOffset });
        this.goalX = x;

        if (position.offset === next.extentOffset) {
          next = withExtent(key === "down" ? text.length : 0);
          this.wasSelectingVertically = shift;
        } else if (this.wasSelectingVertically && shift) {
          next = withExtent(this.cursorResetLocation);
          this.wasSelectingVertically = false;
        } else {
          next = { ...withExtent(position.offset), affinity: position.affinity };
          this.cursorResetLocation = next.extentOffset;
        }
      }
    }

    if (!shift || !isSelectionEnabled(this.host.config)) {
      let offset = next.extentOffset;
      if (!isCollapsed(current)) {
        if (key === "left") {
          offset = Math.min(next.baseOffset, next.extentOffset);
        } else if (key === "right") {
          offset = Math.max(next.baseOffset, next.extentOffset);
        }
      }
      next = collapsedSelection(offset, next.affinity);
    }

    this.handleSelectionChange(next, "keyboard");
  }

  private async handleShortcut(key: ShortcutKey): Promise<void> {
    const value = this.delegate.textEditingValue;
    const { selection, text } = value;
    switch (key) {
      case "copy":
        if (this.delegate.copyEnabled && isValidSelection(selection) && !isCollapsed(selection)) {
          await this.clipboard.write(textInside(value));
        }
        return;
      case "cut":
        if (
          this.delegate.cutEnabled &&
          !this.host.config.readOnly &&
          isValidSelection(selection) &&
          !isCollapsed(selection)
        ) {
          await this.clipboard.write(textInside(value));
          this.applyValue(
            textBefore(value) + textAfter(value),
            collapsedSelection(selectionStart(selection)),
          );
        }
        return;
      case "paste": {
        if (!this.delegate.pasteEnabled || this.host.config.readOnly) {
          return;
        }
        let data: string | null;
        try {
          data = await this.clipboard.read();
        } catch (error) {
          console.warn("[inlay] clipboard read failed", error);
          return;
        }
        // The value may have changed while the clipboard was read.
        const live = this.delegate.textEditingValue;
        if (data === null || !isValidSelection(live.selection)) {
          return;
        }
        this.applyValue(
          textBefore(live) + data + textAfter(live),
          collapsedSelection(selectionStart(live.selection) + data.length),
        );
        return;
      }
      case "selectAll":
        if (this.delegate.selectAllEnabled) {
          this.handleSelectionChange(
            { ...selection, baseOffset: 0, extentOffset: text.length },
            "keyboard",
          );
        }
        return;
    }
  }

  private handleDelete(key: DeleteKey): void {
    const value = this.delegate.textEditingValue;
    if (this.host.config.readOnly || !isValidSelection(value.selection)) {
      return;
    }
    let before = textBefore(value);
    let after = textAfter(value);
    let cursor = selectionStart(value.selection);
    if (isCollapsed(value.selection)) {
      if (key === "backspace" && before.length > 0) {
        const boundary = previousCharacter(
          cursorMapForText(before).boundaries,
          before,
          before.length,
        );
        before = before.slice(0, boundary);
        cursor = boundary;
      }
      if (key === "delete" && after.length > 0) {
        const count = nextCharacter(cursorMapForText(after).boundaries, after, 0);
        after = after.slice(count);
      }
    }
    this.applyValue(before + after, collapsedSelection(cursor));
  }

  private applyValue(text: string, selection: TextSelection): void {
    const value = this.delegate.textEditingValue;
    if (text !== value.text || !selectionsEqual(selection, value.selection)) {
      this.delegate.userUpdateTextEditingValue(
        createEditingValue({ text, selection }),
        "keyboard",
      );
    }
    // Normalization may have moved the caret past an inserted marker.
    this.handleSelectionChange(this.delegate.textEditingValue.selection, "keyboard");
  }
}
