import type {
  Point,
  Rect,
  TextBaseline,
  TextBox,
  TextDirection,
  TextPosition,
  TextRange,
} from "../../core/types";
import { strongDirectionOf } from "../../shared/bidi";
import { graphemeSegments } from "../../shared/segmenter";
import { isWhitespaceText } from "../../shared/whitespace";
import { wordBoundaryAt } from "../../shared/word-break";
import {
  computeSelectionBoxes,
  type LayoutCluster,
  type LayoutLine,
} from "../selection/selection-geometry";
import type {
  BoxStyles,
  LineMetrics,
  PlaceholderDimensions,
  ShapedParagraph,
  ShaperConstraints,
  ShaperParagraph,
  TextShaper,
} from "./text-shaper";

export type MonospaceShaperOptions = {
  /** Advance of every grapheme cluster at scale 1. */
  charWidth?: number;
  lineHeight?: number;
  /** Distance from the top of a text line to its alphabetic baseline. */
  ascent?: number;
};

type Cluster = {
  start: number;
  end: number;
  kind: "text" | "placeholder" | "newline";
  width: number;
  whitespace: boolean;
  direction: TextDirection;
  /** Extent above and below the baseline. */
  above: number;
  below: number;
};

type ShapedLine = LineMetrics & LayoutLine;

type Metrics = {
  charWidth: number;
  ascent: number;
  descent: number;
  lineHeight: number;
};

function isNewline(segment: string): boolean {
  return segment === "\n" || segment === "\r" || segment === "\r\n";
}

function placeholderExtent(
  dimensions: PlaceholderDimensions,
  scale: number,
  metrics: Metrics,
): { above: number; below: number } {
  const height = dimensions.height * scale;
  const { ascent, descent } = metrics;
  switch (dimensions.alignment) {
    case "baseline": {
      const above =
        dimensions.baselineOffset === null ? height : dimensions.baselineOffset * scale;
      return { above, below: height - above };
    }
    case "aboveBaseline":
      return { above: height, below: 0 };
    case "belowBaseline":
      return { above: 0, below: height };
    case "top":
      return { above: ascent, below: height - ascent };
    case "bottom":
      return { above: height - descent, below: descent };
    case "middle": {
      const middle = (ascent - descent) / 2;
      return { above: middle + height / 2, below: height / 2 - middle };
    }
  }
}

function buildClusters(paragraph: ShaperParagraph, metrics: Metrics): Cluster[] {
  const clusters: Cluster[] = [];
  const direction = paragraph.textDirection;
  for (const run of paragraph.runs) {
    if (run.kind === "placeholder") {
      clusters.push({
        start: run.start,
        end: run.start + run.text.length,
        kind: "placeholder",
        width: run.dimensions.width * paragraph.textScaleFactor,
        whitespace: false,
        direction,
        ...placeholderExtent(run.dimensions, paragraph.textScaleFactor, metrics),
      });
      continue;
    }
    for (const { segment, index } of graphemeSegments(run.text)) {
      const start = run.start + index;
      const newline = isNewline(segment);
      clusters.push({
        start,
        end: start + segment.length,
        kind: newline ? "newline" : "text",
        width: newline ? 0 : metrics.charWidth,
        whitespace: newline || isWhitespaceText(segment),
        direction: strongDirectionOf(segment) ?? direction,
        above: metrics.ascent,
        below: metrics.descent,
      });
    }
  }
  return clusters;
}

function canBreakBefore(clusters: readonly Cluster[], index: number): boolean {
  const previous = clusters[index - 1];
  const current = clusters[index];
  if (!previous || !current) {
    return false;
  }
  if (previous.kind === "placeholder" || current.kind === "placeholder") {
    return true;
  }
  return previous.whitespace && !current.whitespace;
}

type LineRange = { from: number; to: number; newline: Cluster | null };

function breakLines(clusters: readonly Cluster[], maxWidth: number): LineRange[] {
  const ranges: LineRange[] = [];
  const wrap = Number.isFinite(maxWidth);
  let from = 0;
  let width = 0;
  for (let index = 0; index < clusters.length; index += 1) {
    const cluster = clusters[index];
    if (!cluster) {
      continue;
    }
    if (cluster.kind === "newline") {
      ranges.push({ from, to: index, newline: cluster });
      from = index + 1;
      width = 0;
      continue;
    }
    // Whitespace hangs past the edge instead of wrapping.
    if (wrap && index > from && !cluster.whitespace && width + cluster.width > maxWidth) {
      let breakAt = index;
      while (breakAt > from && !canBreakBefore(clusters, breakAt)) {
        breakAt -= 1;
      }
      if (breakAt === from) {
        breakAt = index;
      }
      ranges.push({ from, to: breakAt, newline: null });
      from = breakAt;
      width = 0;
      for (let carried = from; carried < index; carried += 1) {
        width += clusters[carried]?.width ?? 0;
      }
    }
    width += cluster.width;
  }
  ranges.push({ from, to: clusters.length, newline: null });
  return ranges;
}

function intrinsicWidths(clusters: readonly Cluster[]): { min: number; max: number } {
  let min = 0;
  let max = 0;
  let word = 0;
  let line = 0;
  for (const cluster of clusters) {
    if (cluster.kind === "newline") {
      max = Math.max(max, line);
      line = 0;
      word = 0;
      continue;
    }
    line += cluster.width;
    if (cluster.kind === "placeholder") {
      min = Math.max(min, cluster.width);
      word = 0;
    } else if (cluster.whitespace) {
      word = 0;
    } else {
      word += cluster.width;
      min = Math.max(min, word);
    }
  }
  return { min, max: Math.max(max, line) };
}

class MonospaceParagraph implements ShapedParagraph {
  readonly text: string;
  readonly width: number;
  readonly height: number;
  readonly minIntrinsicWidth: number;
  readonly maxIntrinsicWidth: number;
  readonly preferredLineHeight: number;
  readonly lines: readonly ShapedLine[];
  readonly placeholderBoxes: readonly TextBox[];
  private readonly boundaries: number[];
  private readonly direction: TextDirection;

  constructor(
    paragraph: ShaperParagraph,
    constraints: ShaperConstraints,
    private readonly metrics: Metrics,
  ) {
    this.direction = paragraph.textDirection;
    this.text = paragraph.runs.map((run) => run.text).join("");
    this.preferredLineHeight = metrics.lineHeight;

    const clusters = buildClusters(paragraph, metrics);
    const intrinsic = intrinsicWidths(clusters);
    this.minIntrinsicWidth = intrinsic.min;
    this.maxIntrinsicWidth = intrinsic.max;

    const minWidth = Number.isFinite(constraints.minWidth) ? constraints.minWidth : 0;
    this.width = Math.max(minWidth, Math.min(intrinsic.max, constraints.maxWidth));

    const lines: ShapedLine[] = [];
    const placeholderBoxes: TextBox[] = [];
    let top = 0;
    let lineStart = 0;
    for (const range of breakLines(clusters, constraints.maxWidth)) {
      const content = clusters.slice(range.from, range.to);
      let ascent = metrics.ascent;
      let descent = metrics.descent;
      let lineWidth = 0;
      for (const cluster of content) {
        ascent = Math.max(ascent, cluster.above);
        descent = Math.max(descent, cluster.below);
        lineWidth += cluster.width;
      }
      const baseline = top + ascent;
      const left =
        this.direction === "rtl" && Number.isFinite(this.width)
          ? this.width - lineWidth
          : 0;

      const positioned: LayoutCluster[] = [];
      let x = left;
      for (const cluster of content) {
        const box = {
          start: cluster.start,
          end: cluster.end,
          left: x,
          width: cluster.width,
          top: baseline - cluster.above,
          bottom: baseline + cluster.below,
          direction: cluster.direction,
        };
        positioned.push(box);
        if (cluster.kind === "placeholder") {
          placeholderBoxes.push({
            left: box.left,
            top: box.top,
            right: box.left + box.width,
            bottom: box.bottom,
            direction: box.direction,
          });
        }
        x += cluster.width;
      }

      const end = content[content.length - 1]?.end ?? lineStart;
      const next = range.newline ? range.newline.end : end;
      lines.push({
        lineNumber: lines.length,
        lineIndex: lines.length,
        start: lineStart,
        end,
        next,
        hardBreak: range.newline !== null,
        left,
        width: lineWidth,
        top,
        height: ascent + descent,
        ascent,
        descent,
        baseline,
        clusters: positioned,
      });
      top += ascent + descent;
      lineStart = next;
    }

    this.lines = lines;
    this.placeholderBoxes = placeholderBoxes;
    this.height = top;
    this.boundaries = [0, ...clusters.map((cluster) => cluster.end)];
  }

  private lineIndexFor(offset: number, affinity: TextPosition["affinity"]): number {
    const last = this.lines.length - 1;
    for (let index = 0; index <= last; index += 1) {
      const line = this.lines[index];
      if (!line) {
        break;
      }
      if (offset <= line.end) {
        const following = this.lines[index + 1];
        if (
          offset === line.end &&
          !line.hardBreak &&
          affinity === "downstream" &&
          following?.start === offset
        ) {
          return index + 1;
        }
        return index;
      }
      if (offset < line.next) {
        return index;
      }
    }
    return last;
  }

  private lineAt(index: number): ShapedLine {
    const line = this.lines[index];
    if (!line) {
      throw new Error(`Line index out of bounds: ${index}`);
    }
    return line;
  }

  getOffsetForCaret(position: TextPosition, caretPrototype: Rect): Point {
    const line = this.lineAt(this.lineIndexFor(position.offset, position.affinity));
    const y = line.baseline - this.metrics.ascent;
    if (line.clusters.length === 0 && this.direction === "rtl") {
      return { x: Math.max(0, line.left - caretPrototype.width), y };
    }
    let x = line.left;
    for (const cluster of line.clusters) {
      if (cluster.end > position.offset) {
        break;
      }
      x += cluster.width;
    }
    return { x, y };
  }

  getPositionForOffset(point: Point): TextPosition {
    const last = this.lines.length - 1;
    let index = this.lines.findIndex((line) => point.y < line.top + line.height);
    if (index === -1) {
      index = last;
    }
    const line = this.lineAt(index);
    for (const cluster of line.clusters) {
      if (point.x < cluster.left + cluster.width / 2) {
        return { offset: cluster.start, affinity: "downstream" };
      }
    }
    if (!line.hardBreak && index < last) {
      return { offset: line.end, affinity: "upstream" };
    }
    return { offset: line.end, affinity: "downstream" };
  }

  getBoxesForRange(start: number, end: number, styles: BoxStyles): TextBox[] {
    return computeSelectionBoxes(this.lines, start, end, styles);
  }

  getWordBoundary(offset: number): TextRange {
    return wordBoundaryAt(this.text, offset);
  }

  getLineBoundary(position: TextPosition): TextRange {
    const line = this.lineAt(this.lineIndexFor(position.offset, position.affinity));
    return { start: line.start, end: line.end };
  }

  getOffsetBefore(offset: number): number | null {
    let result: number | null = null;
    for (const boundary of this.boundaries) {
      if (boundary >= offset) {
        break;
      }
      result = boundary;
    }
    return result;
  }

  getOffsetAfter(offset: number): number | null {
    return this.boundaries.find((boundary) => boundary > offset) ?? null;
  }

  computeDistanceToBaseline(baseline: TextBaseline): number {
    const first = this.lineAt(0);
    return baseline === "ideographic"
      ? first.baseline + this.metrics.descent
      : first.baseline;
  }
}

export function createMonospaceShaper(
  options: MonospaceShaperOptions = {},
): TextShaper {
  const charWidth = options.charWidth ?? 10;
  const lineHeight = options.lineHeight ?? 20;
  const ascent = options.ascent ?? lineHeight * 0.8;

  return {
    preferredLineHeight(textScaleFactor) {
      return lineHeight * textScaleFactor;
    },
    layout(paragraph, constraints) {
      const scale = paragraph.textScaleFactor;
      return new MonospaceParagraph(paragraph, constraints, {
        charWidth: charWidth * scale,
        ascent: ascent * scale,
        descent: (lineHeight - ascent) * scale,
        lineHeight: lineHeight * scale,
      });
    },
  };
}
