import {
  isMultiline,
  type EditorConfig,
} from "../../core/config";
import { UnavailableError } from "../../core/errors";
import {
  isCollapsed,
  isValidRange,
  isValidSelection,
  selectionEnd,
  selectionStart,
} from "../../core/editing-value";
import {
  buildCursorMap,
  codeUnitCursorMap,
  snapToBoundary,
  type CursorMap,
} from "../../core/mapping/cursor-map";
import type { InlineObjectSpan, Span } from "../../core/spans/span-builder";
import type {
  BoxConstraints,
  EdgeInsets,
  Point,
  Rect,
  Result,
  Size,
  TextBox,
  TextDirection,
  TextPosition,
  TextRange,
  TextSelection,
} from "../../core/types";
import { isWhitespaceRange } from "../../shared/word-break";
import {
  boxToRect,
  rectContains,
  shiftBox,
  snapRectToPixels,
  unionRects,
} from "../selection/selection-geometry";
import { caretMargin, computeCaretPrototype } from "./caret-prototype";
import {
  canComputeIntrinsics,
  dryLayoutPlaceholders,
  intrinsicPlaceholders,
  layoutPlaceholders,
  type InlineContentAdapter,
  type IntrinsicQuery,
  type PlaceholderLayout,
} from "./placeholders";
import type {
  BoxStyles,
  PlaceholderDimensions,
  ShapedParagraph,
  ShaperParagraph,
  ShaperRun,
  TextShaper,
} from "./text-shaper";

export type LayoutConfig = Pick<
  EditorConfig,
  | "obscureText"
  | "obscuringCharacter"
  | "textDirection"
  | "maxLines"
  | "minLines"
  | "expands"
  | "forceLine"
  | "cursorWidth"
  | "cursorHeight"
  | "cursorOffset"
  | "platform"
  | "selectionHeightStyle"
  | "selectionWidthStyle"
  | "textScaleFactor"
  | "devicePixelRatio"
>;

export type EditableLayoutOptions<TContent> = {
  shaper: TextShaper;
  inlineContent: InlineContentAdapter<TContent>;
  config: LayoutConfig;
};

export type SelectionPoint = {
  point: Point;
  direction: TextDirection | null;
};

export type InlineContentHit<TContent> = {
  span: InlineObjectSpan<TContent>;
  /** Point relative to the content, in unscaled units. */
  localPoint: Point;
  hit: boolean;
};

export type FloatingCursorBounds = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

type LayoutPass<TContent> = {
  constraints: BoxConstraints;
  paragraph: ShapedParagraph;
  placeholders: PlaceholderLayout<TContent>[];
  size: Size;
  contentSize: Size;
};

function constrain(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Lays out the span list of an editable paragraph and answers geometry
 * queries against the last layout. Any change to spans or configuration
 * drops the cached geometry.
 */
export class EditableLayout<TContent> {
  private readonly shaper: TextShaper;
  private readonly adapter: InlineContentAdapter<TContent>;
  private config: LayoutConfig;
  private spanList: readonly Span<TContent>[] = [];
  private plainText = "";
  private scrollOffsetValue = 0;
  private obscureShowIndex: number | null = null;
  private cursorMapValue: CursorMap | null = null;
  private pass: LayoutPass<TContent> | null = null;
  private boxCache = new Map<string, TextBox[]>();
  private caretCache = new Map<string, Point>();

  constructor(options: EditableLayoutOptions<TContent>) {
    this.shaper = options.shaper;
    this.adapter = options.inlineContent;
    this.config = options.config;
  }

  get spans(): readonly Span<TContent>[] {
    return this.spanList;
  }

  get text(): string {
    return this.plainText;
  }

  get needsLayout(): boolean {
    return this.pass === null;
  }

  get isMultiline(): boolean {
    return isMultiline(this.config);
  }

  setSpans(spans: readonly Span<TContent>[]): void {
    if (spans === this.spanList) {
      return;
    }
    this.spanList = spans;
    this.plainText = spans.map((span) => span.text).join("");
    this.cursorMapValue = null;
    this.invalidate();
  }

  setConfig(config: LayoutConfig): void {
    this.config = config;
    this.cursorMapValue = null;
    this.invalidate();
  }

  /** Reveals the character at `index` of obscured text, or hides it again with `null`. */
  setObscureShowIndex(index: number | null): void {
    if (index === this.obscureShowIndex) {
      return;
    }
    this.obscureShowIndex = index;
    this.invalidate();
  }

  get scrollOffset(): number {
    return this.scrollOffsetValue;
  }

  setScrollOffset(offset: number): void {
    this.scrollOffsetValue = offset;
  }

  /** Translation from content coordinates to viewport coordinates. */
  get paintOffset(): Point {
    return this.isMultiline
      ? { x: 0, y: -this.scrollOffsetValue }
      : { x: -this.scrollOffsetValue, y: 0 };
  }

  get cursorMap(): CursorMap {
    if (!this.cursorMapValue) {
      this.cursorMapValue = this.config.obscureText
        ? codeUnitCursorMap(this.plainText.length)
        : buildCursorMap(this.spanList);
    }
    return this.cursorMapValue;
  }

  get preferredLineHeight(): number {
    return this.shaper.preferredLineHeight(this.config.textScaleFactor);
  }

  get cursorHeight(): number {
    return this.config.cursorHeight ?? this.preferredLineHeight;
  }

  get caretPrototype(): Rect {
    return computeCaretPrototype(
      this.config.platform,
      this.config.cursorWidth,
      this.cursorHeight,
    );
  }

  invalidate(): void {
    this.pass = null;
    this.boxCache.clear();
    this.caretCache.clear();
  }

  layout(constraints: BoxConstraints): Size {
    const placeholders = this.config.obscureText
      ? []
      : layoutPlaceholders(this.spanList, {
          maxWidth: constraints.maxWidth,
          textScaleFactor: this.config.textScaleFactor,
          adapter: this.adapter,
        });
    const paragraph = this.layoutText(
      constraints.minWidth,
      constraints.maxWidth,
      placeholders.map((placeholder) => placeholder.dimensions),
    );
    const size = this.sizeFor(constraints, paragraph);
    this.boxCache.clear();
    this.caretCache.clear();
    this.pass = {
      constraints,
      paragraph,
      placeholders,
      size,
      contentSize: {
        width: paragraph.width + caretMargin(this.config.cursorWidth),
        height: paragraph.height,
      },
    };
    return size;
  }

  computeDryLayout(constraints: BoxConstraints): Result<Size, UnavailableError> {
    let dimensions: PlaceholderDimensions[] = [];
    if (!this.config.obscureText) {
      const dry = dryLayoutPlaceholders(this.spanList, {
        maxWidth: constraints.maxWidth,
        textScaleFactor: this.config.textScaleFactor,
        adapter: this.adapter,
      });
      if (!dry.ok) {
        return dry;
      }
      dimensions = dry.value;
    }
    const paragraph = this.layoutText(
      constraints.minWidth,
      constraints.maxWidth,
      dimensions,
    );
    return { ok: true, value: this.sizeFor(constraints, paragraph) };
  }

  computeMinIntrinsicWidth(height: number): number {
    if (!this.canComputeIntrinsics()) {
      return 0;
    }
    return this.layoutText(0, Infinity, this.intrinsicDimensions({ kind: "minWidth", height }))
      .minIntrinsicWidth;
  }

  computeMaxIntrinsicWidth(height: number): number {
    if (!this.canComputeIntrinsics()) {
      return 0;
    }
    return (
      this.layoutText(0, Infinity, this.intrinsicDimensions({ kind: "maxWidth", height }))
        .maxIntrinsicWidth + this.config.cursorWidth
    );
  }

  computeMinIntrinsicHeight(width: number): number {
    if (!this.canComputeIntrinsics()) {
      return 0;
    }
    const dimensions = this.intrinsicDimensions({ kind: "height", width });
    return this.preferredHeight(width, () => this.layoutText(0, width, dimensions));
  }

  computeMaxIntrinsicHeight(width: number): number {
    return this.computeMinIntrinsicHeight(width);
  }

  get size(): Size {
    return this.requirePass().size;
  }

  get contentSize(): Size {
    return this.requirePass().contentSize;
  }

  get paragraph(): ShapedParagraph {
    return this.requirePass().paragraph;
  }

  get maxScrollExtent(): number {
    const { size, contentSize } = this.requirePass();
    return this.isMultiline
      ? Math.max(0, contentSize.height - size.height)
      : Math.max(0, contentSize.width - size.width);
  }

  get hasVisualOverflow(): boolean {
    return this.maxScrollExtent > 0;
  }

  /** Text position under a point given in viewport coordinates. */
  getPositionForPoint(point: Point): TextPosition {
    const paint = this.paintOffset;
    return this.getPositionForOffset({ x: point.x - paint.x, y: point.y - paint.y });
  }

  /** Text position under a point given in content coordinates. */
  getPositionForOffset(point: Point): TextPosition {
    const position = this.paragraph.getPositionForOffset(point);
    const offset = snapToBoundary(
      this.cursorMap,
      position.offset,
      position.affinity === "upstream" ? "backward" : "forward",
    );
    return { offset, affinity: position.affinity };
  }

  /** Top-left corner of the caret at `position`, in content coordinates. */
  getOffsetForCaret(position: TextPosition): Point {
    const key = `${position.offset}:${position.affinity}`;
    let offset = this.caretCache.get(key);
    if (!offset) {
      offset = this.paragraph.getOffsetForCaret(position, this.caretPrototype);
      this.caretCache.set(key, offset);
    }
    return offset;
  }

  /** Caret rect in viewport coordinates, snapped to device pixels. */
  getLocalRectForCaret(position: TextPosition): Rect {
    const caret = this.getOffsetForCaret(position);
    const paint = this.paintOffset;
    const { cursorOffset, cursorWidth, devicePixelRatio } = this.config;
    return snapRectToPixels(
      {
        left: caret.x + paint.x + cursorOffset.x,
        top: caret.y + paint.y + cursorOffset.y,
        width: cursorWidth,
        height: this.cursorHeight,
      },
      devicePixelRatio,
    );
  }

  /** The caret prototype placed at `position`, as it would be painted. */
  getCaretPaintRect(position: TextPosition): Rect {
    const caret = this.getOffsetForCaret(position);
    const paint = this.paintOffset;
    const prototype = this.caretPrototype;
    const { cursorOffset, devicePixelRatio } = this.config;
    return snapRectToPixels(
      {
        ...prototype,
        left: prototype.left + caret.x + paint.x + cursorOffset.x,
        top: prototype.top + caret.y + paint.y + cursorOffset.y,
      },
      devicePixelRatio,
    );
  }

  getBoxesForSelection(
    selection: TextSelection,
    styles: Partial<BoxStyles> = {},
  ): TextBox[] {
    if (!isValidSelection(selection) || isCollapsed(selection)) {
      return [];
    }
    const paint = this.paintOffset;
    return this.contentBoxes(selectionStart(selection), selectionEnd(selection), styles).map(
      (box) => shiftBox(box, paint.x, paint.y),
    );
  }

  getEndpointsForSelection(selection: TextSelection): SelectionPoint[] {
    const paint = this.paintOffset;
    if (isCollapsed(selection)) {
      const caret = this.getOffsetForCaret({
        offset: selection.extentOffset,
        affinity: selection.affinity,
      });
      return [
        {
          point: {
            x: caret.x + paint.x,
            y: caret.y + this.preferredLineHeight + paint.y,
          },
          direction: null,
        },
      ];
    }
    const boxes = this.contentBoxes(selectionStart(selection), selectionEnd(selection), {});
    const first = boxes[0];
    const last = boxes[boxes.length - 1];
    if (!first || !last) {
      return [];
    }
    return [
      {
        point: {
          x: (first.direction === "ltr" ? first.left : first.right) + paint.x,
          y: first.bottom + paint.y,
        },
        direction: first.direction,
      },
      {
        point: {
          x: (last.direction === "ltr" ? last.right : last.left) + paint.x,
          y: last.bottom + paint.y,
        },
        direction: last.direction,
      },
    ];
  }

  getRectForComposingRange(range: TextRange): Rect | null {
    if (!isValidRange(range) || range.start === range.end) {
      return null;
    }
    const paint = this.paintOffset;
    const union = unionRects(
      this.contentBoxes(range.start, range.end, { heightStyle: "tight", widthStyle: "tight" })
        .map(boxToRect),
    );
    return union && { ...union, left: union.left + paint.x, top: union.top + paint.y };
  }

  /** Hit tests inline content at a viewport point. */
  hitTestInlineContent(point: Point): InlineContentHit<TContent> | null {
    const { paragraph, placeholders } = this.requirePass();
    const paint = this.paintOffset;
    const content = { x: point.x - paint.x, y: point.y - paint.y };
    const scale = this.config.textScaleFactor;
    for (let index = 0; index < placeholders.length; index += 1) {
      const placeholder = placeholders[index];
      const box = paragraph.placeholderBoxes[index];
      if (!placeholder || !box || !rectContains(boxToRect(box), content)) {
        continue;
      }
      const localPoint = {
        x: (content.x - box.left) / scale,
        y: (content.y - box.top) / scale,
      };
      return {
        span: placeholder.span,
        localPoint,
        hit: placeholder.child.hitTest?.(localPoint) ?? true,
      };
    }
    return null;
  }

  getWordBoundary(position: TextPosition): TextRange {
    if (this.config.obscureText) {
      return { start: 0, end: this.plainText.length };
    }
    return this.paragraph.getWordBoundary(position.offset);
  }

  getLineBoundary(position: TextPosition): TextRange {
    if (this.config.obscureText) {
      return { start: 0, end: this.plainText.length };
    }
    return this.paragraph.getLineBoundary(position);
  }

  /** The first word at or after `offset` that is not only whitespace. */
  getNextWord(offset: number): TextRange | null {
    let current = offset;
    for (;;) {
      const range = this.getWordBoundary({ offset: current, affinity: "downstream" });
      if (range.start === range.end) {
        return null;
      }
      if (!isWhitespaceRange(this.plainText, range)) {
        return range;
      }
      if (range.end <= current) {
        return null;
      }
      current = range.end;
    }
  }

  /** The last word at or before `offset` that is not only whitespace. */
  getPreviousWord(offset: number): TextRange | null {
    let current = offset;
    while (current >= 0) {
      const range = this.getWordBoundary({ offset: current, affinity: "downstream" });
      if (range.start === range.end) {
        return null;
      }
      if (!isWhitespaceRange(this.plainText, range)) {
        return range;
      }
      current = range.start - 1;
    }
    return null;
  }

  floatingCursorBounds(margin: EdgeInsets): FloatingCursorBounds {
    const paragraph = this.paragraph;
    return {
      left: -margin.left,
      top: -margin.top,
      right: paragraph.width + margin.right,
      bottom: paragraph.height - this.preferredLineHeight + margin.bottom,
    };
  }

  /**
   * Scroll offset that brings `caretRect` (viewport coordinates) into view
   * along the scroll axis.
   */
  computeScrollOffsetForCaret(caretRect: Rect): number {
    const { size } = this.requirePass();
    let caretStart: number;
    let caretEnd: number;
    let viewportExtent: number;
    if (this.isMultiline) {
      // Expand the caret to the full line height before revealing it.
      const padding = (this.preferredLineHeight - caretRect.height) / 2;
      caretStart = caretRect.top - padding;
      caretEnd = caretRect.top + caretRect.height + padding;
      viewportExtent = size.height;
    } else {
      caretStart = caretRect.left;
      caretEnd = caretRect.left + caretRect.width;
      viewportExtent = size.width;
    }

    let scrollOffset = this.scrollOffsetValue;
    if (caretStart < 0) {
      scrollOffset += caretStart;
    } else if (caretEnd >= viewportExtent) {
      scrollOffset += caretEnd - viewportExtent;
    }
    if (this.isMultiline) {
      scrollOffset = constrain(scrollOffset, 0, this.maxScrollExtent);
    }
    return scrollOffset;
  }

  private requirePass(): LayoutPass<TContent> {
    if (!this.pass) {
      throw new Error("EditableLayout: layout() must run before geometry queries");
    }
    return this.pass;
  }

  private contentBoxes(
    start: number,
    end: number,
    styles: Partial<BoxStyles>,
  ): TextBox[] {
    const heightStyle = styles.heightStyle ?? this.config.selectionHeightStyle;
    const widthStyle = styles.widthStyle ?? this.config.selectionWidthStyle;
    const key = `${start}:${end}:${heightStyle}:${widthStyle}`;
    let boxes = this.boxCache.get(key);
    if (!boxes) {
      boxes = this.paragraph.getBoxesForRange(start, end, { heightStyle, widthStyle });
      this.boxCache.set(key, boxes);
    }
    return boxes;
  }

  private canComputeIntrinsics(): boolean {
    return this.config.obscureText || canComputeIntrinsics(this.spanList);
  }

  private intrinsicDimensions(query: IntrinsicQuery): PlaceholderDimensions[] {
    if (this.config.obscureText) {
      return [];
    }
    return intrinsicPlaceholders(this.spanList, this.adapter, query);
  }

  private displayText(): string {
    const text = this.plainText;
    const character = this.config.obscuringCharacter;
    const index = this.obscureShowIndex;
    if (index === null || index < 0 || index >= text.length) {
      return character.repeat(text.length);
    }
    const code = text.charCodeAt(index);
    const shown = code >= 0xd800 && code <= 0xdbff ? 2 : 1;
    const end = Math.min(text.length, index + shown);
    return (
      character.repeat(index) +
      text.slice(index, end) +
      character.repeat(text.length - end)
    );
  }

  private buildParagraph(dimensions: readonly PlaceholderDimensions[]): ShaperParagraph {
    const { textDirection, textScaleFactor } = this.config;
    if (this.config.obscureText) {
      return {
        runs: [{ kind: "text", start: 0, text: this.displayText(), style: this.spanList[0]?.style ?? {} }],
        textDirection,
        textScaleFactor,
      };
    }
    const runs: ShaperRun[] = [];
    let placeholderIndex = 0;
    for (const span of this.spanList) {
      const placeholder =
        span.kind === "inline-object" ? dimensions[placeholderIndex++] : undefined;
      if (span.kind === "inline-object" && placeholder) {
        runs.push({ kind: "placeholder", start: span.start, text: span.text, dimensions: placeholder });
      } else {
        runs.push({ kind: "text", start: span.start, text: span.text, style: span.style });
      }
    }
    return { runs, textDirection, textScaleFactor };
  }

  private layoutText(
    minWidth: number,
    maxWidth: number,
    dimensions: readonly PlaceholderDimensions[],
  ): ShapedParagraph {
    const availableMaxWidth = Math.max(0, maxWidth - caretMargin(this.config.cursorWidth));
    const availableMinWidth = Math.min(minWidth, availableMaxWidth);
    const textMaxWidth = this.isMultiline ? availableMaxWidth : Infinity;
    const textMinWidth = this.config.forceLine ? availableMaxWidth : availableMinWidth;
    return this.shaper.layout(this.buildParagraph(dimensions), {
      minWidth: Number.isFinite(textMinWidth) ? textMinWidth : 0,
      maxWidth: textMaxWidth,
    });
  }

  private sizeFor(constraints: BoxConstraints, paragraph: ShapedParagraph): Size {
    const width = this.config.forceLine
      ? constraints.maxWidth
      : constrain(
          paragraph.width + caretMargin(this.config.cursorWidth),
          constraints.minWidth,
          constraints.maxWidth,
        );
    const height =
      this.config.expands && Number.isFinite(constraints.maxHeight)
        ? constraints.maxHeight
        : constrain(
            this.preferredHeight(constraints.maxWidth, () => paragraph),
            constraints.minHeight,
            constraints.maxHeight,
          );
    return { width, height };
  }

  /**
   * Height of the field for `width`: fixed for single-line and locked line
   * counts, otherwise the text height clamped to the line limits.
   */
  private preferredHeight(width: number, measure: () => ShapedParagraph): number {
    const lineHeight = this.preferredLineHeight;
    const { minLines, maxLines } = this.config;
    if (maxLines !== null && (maxLines === 1 || minLines === null || minLines === maxLines)) {
      return lineHeight * maxLines;
    }

    if ((minLines !== null && minLines > 1) || maxLines !== null) {
      const height = measure().height;
      if (minLines !== null && minLines > 1 && height < lineHeight * minLines) {
        return lineHeight * minLines;
      }
      if (maxLines !== null && height > lineHeight * maxLines) {
        return lineHeight * maxLines;
      }
    }

    if (!Number.isFinite(width)) {
      return lineHeight * this.plainText.split("\n").length;
    }
    return Math.max(lineHeight, measure().height);
  }
}
