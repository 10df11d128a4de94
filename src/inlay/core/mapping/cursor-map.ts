import { graphemeSegments } from "../../shared/segmenter";
import { isReserved } from "../codec/inline-object-codec";
import type { Span } from "../spans/span-builder";

export type CursorBias = "backward" | "forward";

/**
 * Maps cursor units (one per grapheme cluster, one per inline object) to
 * UTF-16 offsets in the stored text. `boundaries[i]` is the code-unit offset
 * of cursor position `i`.
 */
export type CursorMap = {
  cursorLength: number;
  sourceLength: number;
  boundaries: readonly number[];
  cursorToSource(cursorOffset: number): number;
  sourceToCursor(sourceOffset: number, bias: CursorBias): number;
};

// Index of the last boundary <= sourceOffset.
function floorIndex(boundaries: readonly number[], sourceOffset: number): number {
  let low = 0;
  let high = boundaries.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((boundaries[mid] ?? 0) <= sourceOffset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
}

export function createCursorMap(boundaries: readonly number[]): CursorMap {
  const cursorLength = boundaries.length - 1;
  const sourceLength = boundaries[cursorLength] ?? 0;
  return {
    cursorLength,
    sourceLength,
    boundaries,
    cursorToSource(cursorOffset) {
      const source = boundaries[cursorOffset];
      if (source === undefined) {
        throw new Error(`Cursor offset out of bounds: ${cursorOffset}`);
      }
      return source;
    },
    sourceToCursor(sourceOffset, bias) {
      if (sourceOffset <= 0) {
        return 0;
      }
      if (sourceOffset >= sourceLength) {
        return cursorLength;
      }
      const index = floorIndex(boundaries, sourceOffset);
      if (boundaries[index] === sourceOffset || bias === "backward") {
        return index;
      }
      return index + 1;
    },
  };
}

export class CursorMapBuilder {
  private boundaries: number[] = [0];
  private sourceLength = 0;

  appendText(text: string): void {
    for (const segment of graphemeSegments(text)) {
      this.sourceLength += segment.segment.length;
      this.boundaries.push(this.sourceLength);
    }
  }

  appendAtom(sourceText: string): void {
    if (!sourceText) {
      return;
    }
    this.sourceLength += sourceText.length;
    this.boundaries.push(this.sourceLength);
  }

  appendCodeUnits(length: number): void {
    for (let i = 0; i < length; i += 1) {
      this.sourceLength += 1;
      this.boundaries.push(this.sourceLength);
    }
  }

  build(): CursorMap {
    return createCursorMap(this.boundaries);
  }
}

export function buildCursorMap<TContent>(spans: readonly Span<TContent>[]): CursorMap {
  const builder = new CursorMapBuilder();
  for (const span of spans) {
    if (span.kind === "inline-object") {
      builder.appendAtom(span.text);
    } else {
      builder.appendText(span.text);
    }
  }
  return builder.build();
}

/**
 * Cursor map for raw text: every reserved code point is its own unit whether
 * or not a resolver maps it.
 */
export function cursorMapForText(text: string): CursorMap {
  const builder = new CursorMapBuilder();
  let runStart = 0;
  for (let index = 0; index < text.length; index += 1) {
    if (isReserved(text.charCodeAt(index))) {
      builder.appendText(text.slice(runStart, index));
      builder.appendAtom(text[index] ?? "");
      runStart = index + 1;
    }
  }
  builder.appendText(text.slice(runStart));
  return builder.build();
}

export function codeUnitCursorMap(length: number): CursorMap {
  const builder = new CursorMapBuilder();
  builder.appendCodeUnits(length);
  return builder.build();
}

export function nextBoundary(map: CursorMap, offset: number): number | null {
  if (offset >= map.sourceLength) {
    return null;
  }
  const index = floorIndex(map.boundaries, Math.max(0, offset));
  return map.boundaries[index + 1] ?? null;
}

export function previousBoundary(map: CursorMap, offset: number): number | null {
  if (offset <= 0) {
    return null;
  }
  const clamped = Math.min(offset, map.sourceLength);
  const index = floorIndex(map.boundaries, clamped);
  const boundary = map.boundaries[index] ?? 0;
  if (boundary < clamped) {
    return boundary;
  }
  return map.boundaries[index - 1] ?? null;
}

export function isBoundary(map: CursorMap, offset: number): boolean {
  if (offset < 0 || offset > map.sourceLength) {
    return false;
  }
  return map.boundaries[floorIndex(map.boundaries, offset)] === offset;
}

export function snapToBoundary(
  map: CursorMap,
  offset: number,
  bias: CursorBias,
): number {
  return map.cursorToSource(map.sourceToCursor(offset, bias));
}
