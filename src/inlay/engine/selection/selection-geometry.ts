import type { Point, Rect, TextBox, TextDirection } from "../../core/types";
import type { BoxStyles } from "../layout/text-shaper";

export type LayoutCluster = {
  start: number;
  end: number;
  left: number;
  width: number;
  /** Tight vertical extent of the glyphs or placeholder. */
  top: number;
  bottom: number;
  direction: TextDirection;
};

export type LayoutLine = {
  lineIndex: number;
  start: number;
  end: number;
  left: number;
  width: number;
  top: number;
  height: number;
  clusters: readonly LayoutCluster[];
};

function lineRight(line: LayoutLine): number {
  return line.left + line.width;
}

/**
 * Boxes covering every cluster fully inside [start, end). Neighbouring
 * clusters with the same direction and vertical extent share a box.
 */
export function computeSelectionBoxes(
  lines: readonly LayoutLine[],
  start: number,
  end: number,
  styles: BoxStyles,
): TextBox[] {
  if (start >= end) {
    return [];
  }

  let widestLeft = Infinity;
  let widestRight = -Infinity;
  for (const line of lines) {
    widestLeft = Math.min(widestLeft, line.left);
    widestRight = Math.max(widestRight, lineRight(line));
  }

  const boxes: TextBox[] = [];
  for (const line of lines) {
    if (line.end < start) {
      continue;
    }
    if (line.start >= end) {
      break;
    }

    const lineTop = line.top;
    const lineBottom = line.top + line.height;
    const lineBoxes: TextBox[] = [];
    for (const cluster of line.clusters) {
      if (cluster.start < start || cluster.end > end || cluster.width <= 0) {
        continue;
      }
      const top = styles.heightStyle === "max" ? lineTop : cluster.top;
      const bottom = styles.heightStyle === "max" ? lineBottom : cluster.bottom;
      const right = cluster.left + cluster.width;
      const last = lineBoxes[lineBoxes.length - 1];
      if (
        last &&
        last.direction === cluster.direction &&
        last.top === top &&
        last.bottom === bottom &&
        last.right === cluster.left
      ) {
        last.right = right;
        continue;
      }
      lineBoxes.push({ left: cluster.left, top, right, bottom, direction: cluster.direction });
    }

    const first = lineBoxes[0];
    const last = lineBoxes[lineBoxes.length - 1];
    if (styles.widthStyle === "max" && first && last) {
      if (first.left === line.left && line.left > widestLeft) {
        lineBoxes.unshift({
          left: widestLeft,
          top: lineTop,
          right: line.left,
          bottom: lineBottom,
          direction: first.direction,
        });
      }
      if (last.right === lineRight(line) && lineRight(line) < widestRight) {
        lineBoxes.push({
          left: lineRight(line),
          top: lineTop,
          right: widestRight,
          bottom: lineBottom,
          direction: last.direction,
        });
      }
    }
    boxes.push(...lineBoxes);
  }
  return boxes;
}

export function shiftBox(box: TextBox, dx: number, dy: number): TextBox {
  return {
    left: box.left + dx,
    top: box.top + dy,
    right: box.right + dx,
    bottom: box.bottom + dy,
    direction: box.direction,
  };
}

export function boxToRect(box: TextBox): Rect {
  return {
    left: box.left,
    top: box.top,
    width: box.right - box.left,
    height: box.bottom - box.top,
  };
}

export function shiftRect(rect: Rect, dx: number, dy: number): Rect {
  return { ...rect, left: rect.left + dx, top: rect.top + dy };
}

export function rectCenter(rect: Rect): Point {
  return { x: rect.left + rect.width / 2, y: rect.top + rect.height / 2 };
}

export function rectCenterLeft(rect: Rect): Point {
  return { x: rect.left, y: rect.top + rect.height / 2 };
}

export function inflateRect(rect: Rect, dx: number, dy: number): Rect {
  return {
    left: rect.left - dx,
    top: rect.top - dy,
    width: rect.width + dx * 2,
    height: rect.height + dy * 2,
  };
}

export function unionRects(rects: readonly Rect[]): Rect | null {
  const [first, ...rest] = rects;
  if (!first) {
    return null;
  }
  let left = first.left;
  let top = first.top;
  let right = first.left + first.width;
  let bottom = first.top + first.height;
  for (const rect of rest) {
    left = Math.min(left, rect.left);
    top = Math.min(top, rect.top);
    right = Math.max(right, rect.left + rect.width);
    bottom = Math.max(bottom, rect.top + rect.height);
  }
  return { left, top, width: right - left, height: bottom - top };
}

export function rectContains(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.left &&
    point.x < rect.left + rect.width &&
    point.y >= rect.top &&
    point.y < rect.top + rect.height
  );
}

export function rectsEqual(a: Rect | null, b: Rect | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return (
    a.left === b.left &&
    a.top === b.top &&
    a.width === b.width &&
    a.height === b.height
  );
}

/** Moves the rect's origin onto the physical pixel grid. */
export function snapRectToPixels(rect: Rect, devicePixelRatio: number): Rect {
  const snap = (value: number) =>
    Math.round(value * devicePixelRatio) / devicePixelRatio;
  return { ...rect, left: snap(rect.left), top: snap(rect.top) };
}

export function lerp(from: number, to: number, t: number): number {
  return from + (to - from) * t;
}
