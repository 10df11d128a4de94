import { collapsedSelection } from "../../core/editing-value";
import type {
  EdgeInsets,
  Point,
  Rect,
  SelectionChangedCause,
  TextPosition,
  TextSelection,
} from "../../core/types";
import type { EditableLayout } from "../../engine/layout/editable-layout";
import {
  inflateRect,
  lerp,
  rectCenter,
  rectCenterLeft,
  shiftRect,
} from "../../engine/selection/selection-geometry";

export const FLOATING_CURSOR_RESET_DURATION = 125;
export const FRAME_INTERVAL = 16;

// Growth of the floating caret over the regular caret, per side.
const FLOATING_CARET_SIZE_INCREASE = { x: 0.5, y: 1 };

/** Calls `onFrame` once per frame until the returned function is called. */
export type FrameScheduler = (onFrame: () => void) => () => void;

export const intervalFrameScheduler: FrameScheduler = (onFrame) => {
  const timer = setInterval(onFrame, FRAME_INTERVAL);
  return () => clearInterval(timer);
};

export function decelerate(t: number): number {
  const inverse = 1 - t;
  return 1 - inverse * inverse;
}

export type FloatingCursorHost<TContent> = {
  readonly selection: TextSelection;
  readonly addedMargin: EdgeInsets;
  ensureLayout(): EditableLayout<TContent>;
  onSelectionChanged(selection: TextSelection, cause: SelectionChangedCause): void;
};

type Phase = "start" | "update" | "end";

type ResetAnimation = { elapsed: number; cancel: () => void };

/**
 * Drives the caret that follows a trackpad-style drag and animates it back
 * onto the text when the drag ends.
 */
export class FloatingCursorAnimator<TContent> {
  private readonly host: FloatingCursorHost<TContent>;
  private readonly scheduleFrames: FrameScheduler;
  private listeners = new Set<() => void>();

  private startCaretRect: Rect | null = null;
  private lastTextPosition: TextPosition | null = null;
  private pointOffsetOrigin: Point | null = null;
  private lastBoundedOffset: Point | null = null;
  private reset: ResetAnimation | null = null;

  private relativeOrigin: Point = { x: 0, y: 0 };
  private previousOffset: Point | null = null;
  private resetOriginOnLeft = false;
  private resetOriginOnRight = false;
  private resetOriginOnTop = false;
  private resetOriginOnBottom = false;

  floatingCaretRect: Rect | null = null;
  showRegularCaret = true;
  textPosition: TextPosition | null = null;

  constructor(
    host: FloatingCursorHost<TContent>,
    scheduleFrames: FrameScheduler = intervalFrameScheduler,
  ) {
    this.host = host;
    this.scheduleFrames = scheduleFrames;
  }

  get isActive(): boolean {
    return this.floatingCaretRect !== null;
  }

  get isResetting(): boolean {
    return this.reset !== null;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): void {
    if (this.reset) {
      this.finishReset();
    }
    const layout = this.host.ensureLayout();
    const position: TextPosition = {
      offset: this.host.selection.baseOffset,
      affinity: "downstream",
    };
    this.startCaretRect = layout.getLocalRectForCaret(position);
    const center = rectCenter(this.startCaretRect);
    const offset = this.centerOffset(layout);
    this.setFloatingCursor("start", { x: center.x, y: center.y - offset }, position);
  }

  /** `point` is the drag position; the first update only records the origin. */
  update(point: Point): void {
    if (!this.startCaretRect) {
      return;
    }
    if (!this.pointOffsetOrigin) {
      this.pointOffsetOrigin = point;
      return;
    }
    const layout = this.host.ensureLayout();
    const center = rectCenter(this.startCaretRect);
    const offset = this.centerOffset(layout);
    const raw = {
      x: center.x + point.x - this.pointOffsetOrigin.x,
      y: center.y + point.y - this.pointOffsetOrigin.y - offset,
    };
    const bounded = this.boundOffset(layout, raw);
    this.lastBoundedOffset = bounded;
    this.lastTextPosition = layout.getPositionForPoint({ x: bounded.x, y: bounded.y + offset });
    this.setFloatingCursor("update", bounded, this.lastTextPosition);
  }

  end(): void {
    if (!this.lastTextPosition || !this.lastBoundedOffset) {
      this.clearDrag();
      this.setFloatingCursor("end", { x: 0, y: 0 }, this.textPosition);
      return;
    }
    this.reset?.cancel();
    const reset: ResetAnimation = {
      elapsed: 0,
      cancel: this.scheduleFrames(() => {
        reset.elapsed += FRAME_INTERVAL;
        if (reset.elapsed >= FLOATING_CURSOR_RESET_DURATION) {
          this.finishReset();
        } else {
          this.resetTick(decelerate(reset.elapsed / FLOATING_CURSOR_RESET_DURATION));
        }
      }),
    };
    this.reset = reset;
  }

  dispose(): void {
    this.reset?.cancel();
    this.reset = null;
    this.listeners.clear();
  }

  private centerOffset(layout: EditableLayout<TContent>): number {
    return layout.preferredLineHeight / 2;
  }

  private finalPosition(layout: EditableLayout<TContent>, position: TextPosition): Point {
    const centerLeft = rectCenterLeft(layout.getLocalRectForCaret(position));
    return { x: centerLeft.x, y: centerLeft.y - this.centerOffset(layout) };
  }

  private resetTick(value: number): void {
    const position = this.lastTextPosition;
    const from = this.lastBoundedOffset;
    if (!position || !from) {
      return;
    }
    const target = this.finalPosition(this.host.ensureLayout(), position);
    this.setFloatingCursor(
      "update",
      { x: lerp(from.x, target.x, value), y: lerp(from.y, target.y, value) },
      position,
      value,
    );
  }

  private finishReset(): void {
    this.reset?.cancel();
    this.reset = null;
    const position = this.lastTextPosition;
    if (position) {
      const target = this.finalPosition(this.host.ensureLayout(), position);
      this.setFloatingCursor("end", target, position);
      if (position.offset !== this.host.selection.baseOffset) {
        this.host.onSelectionChanged(collapsedSelection(position.offset), "forcePress");
      }
    }
    this.clearDrag();
  }

  private clearDrag(): void {
    this.startCaretRect = null;
    this.lastTextPosition = null;
    this.pointOffsetOrigin = null;
    this.lastBoundedOffset = null;
  }

  /** Clamps `raw` to the text bounds, re-anchoring after the drag leaves an edge. */
  private boundOffset(layout: EditableLayout<TContent>, raw: Point): Point {
    const bounds = layout.floatingCursorBounds(this.host.addedMargin);
    const delta = this.previousOffset
      ? { x: raw.x - this.previousOffset.x, y: raw.y - this.previousOffset.y }
      : { x: 0, y: 0 };

    if (this.resetOriginOnLeft && delta.x > 0) {
      this.relativeOrigin = { x: raw.x - bounds.left, y: this.relativeOrigin.y };
      this.resetOriginOnLeft = false;
    } else if (this.resetOriginOnRight && delta.x < 0) {
      this.relativeOrigin = { x: raw.x - bounds.right, y: this.relativeOrigin.y };
      this.resetOriginOnRight = false;
    }
    if (this.resetOriginOnTop && delta.y > 0) {
      this.relativeOrigin = { x: this.relativeOrigin.x, y: raw.y - bounds.top };
      this.resetOriginOnTop = false;
    } else if (this.resetOriginOnBottom && delta.y < 0) {
      this.relativeOrigin = { x: this.relativeOrigin.x, y: raw.y - bounds.bottom };
      this.resetOriginOnBottom = false;
    }

    const currentX = raw.x - this.relativeOrigin.x;
    const currentY = raw.y - this.relativeOrigin.y;
    const adjusted = {
      x: Math.min(Math.max(currentX, bounds.left), bounds.right),
      y: Math.min(Math.max(currentY, bounds.top), bounds.bottom),
    };

    if (currentX < bounds.left && delta.x < 0) {
      this.resetOriginOnLeft = true;
    } else if (currentX > bounds.right && delta.x > 0) {
      this.resetOriginOnRight = true;
    }
    if (currentY < bounds.top && delta.y < 0) {
      this.resetOriginOnTop = true;
    } else if (currentY > bounds.bottom && delta.y > 0) {
      this.resetOriginOnBottom = true;
    }

    this.previousOffset = raw;
    return adjusted;
  }

  private setFloatingCursor(
    phase: Phase,
    boundedOffset: Point,
    position: TextPosition | null,
    resetValue: number | null = null,
  ): void {
    if (phase === "start") {
      this.relativeOrigin = { x: 0, y: 0 };
      this.previousOffset = null;
      this.resetOriginOnLeft = false;
      this.resetOriginOnRight = false;
      this.resetOriginOnTop = false;
      this.resetOriginOnBottom = false;
    }
    if (phase !== "end" && position) {
      this.textPosition = position;
      const growth = resetValue === null ? 1 : lerp(1, 0, resetValue);
      const prototype = this.host.ensureLayout().caretPrototype;
      this.floatingCaretRect = shiftRect(
        inflateRect(
          prototype,
          FLOATING_CARET_SIZE_INCREASE.x * growth,
          FLOATING_CARET_SIZE_INCREASE.y * growth,
        ),
        boundedOffset.x,
        boundedOffset.y,
      );
    } else {
      this.floatingCaretRect = null;
    }
    this.showRegularCaret = resetValue === null;
    for (const listener of Array.from(this.listeners)) {
      listener();
    }
  }
}
