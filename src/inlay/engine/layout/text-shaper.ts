import type { BoxHeightStyle, BoxWidthStyle } from "../../core/config";
import type {
  PlaceholderAlignment,
  Point,
  Rect,
  TextBaseline,
  TextBox,
  TextDirection,
  TextPosition,
  TextRange,
  TextStyle,
} from "../../core/types";

export type PlaceholderDimensions = {
  width: number;
  height: number;
  alignment: PlaceholderAlignment;
  baseline: TextBaseline | null;
  /** Distance from the top of the content to its baseline, for `baseline` alignment. */
  baselineOffset: number | null;
};

export type ShaperTextRun = {
  kind: "text";
  start: number;
  text: string;
  style: TextStyle;
};

export type ShaperPlaceholderRun = {
  kind: "placeholder";
  start: number;
  text: string;
  dimensions: PlaceholderDimensions;
};

export type ShaperRun = ShaperTextRun | ShaperPlaceholderRun;

export type ShaperParagraph = {
  runs: readonly ShaperRun[];
  textDirection: TextDirection;
  textScaleFactor: number;
};

export type ShaperConstraints = {
  minWidth: number;
  maxWidth: number;
};

export type LineMetrics = {
  lineNumber: number;
  start: number;
  /** End of the line's content, before any hard break. */
  end: number;
  /** Offset where the following line starts. */
  next: number;
  hardBreak: boolean;
  left: number;
  width: number;
  top: number;
  height: number;
  ascent: number;
  descent: number;
  baseline: number;
};

export type BoxStyles = {
  heightStyle: BoxHeightStyle;
  widthStyle: BoxWidthStyle;
};

/** A paragraph shaped for one set of constraints. Coordinates are content-local. */
export interface ShapedParagraph {
  readonly text: string;
  readonly width: number;
  readonly height: number;
  readonly minIntrinsicWidth: number;
  readonly maxIntrinsicWidth: number;
  readonly preferredLineHeight: number;
  readonly lines: readonly LineMetrics[];
  /** One box per placeholder run, in run order. */
  readonly placeholderBoxes: readonly TextBox[];
  getOffsetForCaret(position: TextPosition, caretPrototype: Rect): Point;
  getPositionForOffset(point: Point): TextPosition;
  getBoxesForRange(start: number, end: number, styles: BoxStyles): TextBox[];
  getWordBoundary(offset: number): TextRange;
  getLineBoundary(position: TextPosition): TextRange;
  getOffsetBefore(offset: number): number | null;
  getOffsetAfter(offset: number): number | null;
  computeDistanceToBaseline(baseline: TextBaseline): number;
}

/** Text shaping primitive the layout engine is built on. */
export interface TextShaper {
  /** Line height for the base style, available without a layout. */
  preferredLineHeight(textScaleFactor: number): number;
  layout(paragraph: ShaperParagraph, constraints: ShaperConstraints): ShapedParagraph;
}
