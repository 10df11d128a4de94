import {
  isCollapsed,
  isValidSelection,
  selectionEnd,
  selectionStart,
  textSelection,
} from "../../core/editing-value";
import type { Rect, TextPosition, TextRange, TextSelection } from "../../core/types";
import type { EditableLayout } from "../layout/editable-layout";
import { boxToRect, rectsEqual } from "../selection/selection-geometry";

export const FLOATING_CARET_RADIUS = 1;
export const FLOATING_CARET_OPACITY = 0.75;

export type DrawCommandKind = "promptRect" | "selection" | "caret" | "floatingCaret";

/** One filled rect in viewport coordinates. */
export type DrawCommand = {
  kind: DrawCommandKind;
  rect: Rect;
  /** Any CSS color; `opacity` multiplies its alpha. */
  color: string;
  opacity: number;
  /** Corner radius, `0` for a sharp rect. */
  radius: number;
};

/** `background` is drawn under the text, `foreground` over it. */
export type PaintLayers = {
  background: DrawCommand[];
  foreground: DrawCommand[];
};

export type PaintStyle = {
  cursorColor: string | null;
  /** Regular caret color while the floating cursor is shown. */
  backgroundCursorColor: string | null;
  cursorRadius: number | null;
  selectionColor: string | null;
  promptRectColor: string | null;
  promptRectRange: TextRange | null;
  paintCursorAboveText: boolean;
  showCursor: boolean;
};

export const DEFAULT_PAINT_STYLE: PaintStyle = {
  cursorColor: "#000000",
  backgroundCursorColor: "#8e8e93",
  cursorRadius: null,
  selectionColor: "rgba(0, 120, 215, 0.3)",
  promptRectColor: null,
  promptRectRange: null,
  paintCursorAboveText: false,
  showCursor: true,
};

export type CaretPaintState = {
  selection: TextSelection;
  /** Blink opacity of the regular caret. */
  opacity: number;
  floatingCaretRect: Rect | null;
  /** Whether the regular caret stays visible under the floating one. */
  showRegularCaret: boolean;
  floatingTextPosition: TextPosition | null;
};

type LayoutGeometry = Pick<
  EditableLayout<unknown>,
  "getBoxesForSelection" | "getCaretPaintRect"
>;

export function paintHighlight(
  layout: LayoutGeometry,
  kind: "promptRect" | "selection",
  range: TextRange | null,
  color: string | null,
): DrawCommand[] {
  if (!range || color === null || range.start === range.end) {
    return [];
  }
  return layout
    .getBoxesForSelection(textSelection(range.start, range.end))
    .map((box) => ({ kind, rect: boxToRect(box), color, opacity: 1, radius: 0 }));
}

/**
 * Commands for the regular and floating caret. `caretRect` is where the
 * regular caret sits, even when it is fully transparent.
 */
export function paintCaret(
  layout: LayoutGeometry,
  style: PaintStyle,
  state: CaretPaintState,
): { commands: DrawCommand[]; caretRect: Rect | null } {
  const { selection, floatingCaretRect } = state;
  if (!style.showCursor || !isValidSelection(selection) || !isCollapsed(selection)) {
    return { commands: [], caretRect: null };
  }

  const commands: DrawCommand[] = [];
  let caretRect: Rect | null = null;
  const color =
    floatingCaretRect === null
      ? style.cursorColor
      : state.showRegularCaret
        ? style.backgroundCursorColor
        : null;
  const position =
    floatingCaretRect === null
      ? { offset: selection.extentOffset, affinity: selection.affinity }
      : state.floatingTextPosition;

  if (color !== null && position) {
    caretRect = layout.getCaretPaintRect(position);
    const opacity = floatingCaretRect === null ? state.opacity : 1;
    if (opacity > 0) {
      commands.push({
        kind: "caret",
        rect: caretRect,
        color,
        opacity,
        radius: style.cursorRadius ?? 0,
      });
    }
  }

  if (floatingCaretRect !== null && style.cursorColor !== null) {
    commands.push({
      kind: "floatingCaret",
      rect: floatingCaretRect,
      color: style.cursorColor,
      opacity: FLOATING_CARET_OPACITY,
      radius: FLOATING_CARET_RADIUS,
    });
  }
  return { commands, caretRect };
}

export type EditablePainterOptions = {
  /** Called when the painted caret moves; repeated rects are dropped. */
  onCaretChanged?: (rect: Rect) => void;
};

/**
 * Composes the highlight and caret painters into draw layers. The prompt
 * rect goes under the selection, and the caret goes over the text only with
 * `paintCursorAboveText`.
 */
export class EditablePainter {
  private readonly onCaretChanged: ((rect: Rect) => void) | undefined;
  private lastCaretRect: Rect | null = null;

  constructor(options: EditablePainterOptions = {}) {
    this.onCaretChanged = options.onCaretChanged;
  }

  paint(layout: LayoutGeometry, style: PaintStyle, state: CaretPaintState): PaintLayers {
    const selection = state.selection;
    const selectionRange =
      isValidSelection(selection) && !isCollapsed(selection)
        ? { start: selectionStart(selection), end: selectionEnd(selection) }
        : null;
    const highlights = [
      ...paintHighlight(layout, "promptRect", style.promptRectRange, style.promptRectColor),
      ...paintHighlight(layout, "selection", selectionRange, style.selectionColor),
    ];

    const caret = paintCaret(layout, style, state);
    if (caret.caretRect) {
      this.reportCaret(caret.caretRect);
    }

    return style.paintCursorAboveText
      ? { background: highlights, foreground: caret.commands }
      : { background: [...highlights, ...caret.commands], foreground: [] };
  }

  private reportCaret(rect: Rect): void {
    if (!rectsEqual(this.lastCaretRect, rect)) {
      this.onCaretChanged?.(rect);
    }
    this.lastCaretRect = this.onCaretChanged ? rect : null;
  }
}
