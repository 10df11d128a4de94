import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createInlineObjectCodec } from "../../core/codec/inline-object-codec";
import { DEFAULT_FLOATING_CURSOR_MARGIN, resolveEditorConfig } from "../../core/config";
import { collapsedSelection } from "../../core/editing-value";
import { buildSpans } from "../../core/spans/span-builder";
import type { SelectionChangedCause, TextSelection } from "../../core/types";
import { EditableLayout } from "../../engine/layout/editable-layout";
import { createMonospaceShaper } from "../../engine/layout/monospace-shaper";
import { FloatingCursorAnimator, decelerate } from "./floating-cursor";

function setup(text: string) {
  const layout = new EditableLayout<never>({
    shaper: createMonospaceShaper(),
    inlineContent: () => ({ layout: () => ({ width: 0, height: 0 }) }),
    config: resolveEditorConfig({ platform: "other" }),
  });
  layout.setSpans(buildSpans(text, { codec: createInlineObjectCodec<never>(() => null) }));
  layout.layout({ minWidth: 0, maxWidth: 200, minHeight: 0, maxHeight: Infinity });
  const commits: [TextSelection, SelectionChangedCause][] = [];
  const host = {
    selection: collapsedSelection(0),
    addedMargin: DEFAULT_FLOATING_CURSOR_MARGIN,
    ensureLayout: () => layout,
    onSelectionChanged(selection: TextSelection, cause: SelectionChangedCause) {
      commits.push([selection, cause]);
      host.selection = selection;
    },
  };
  return { animator: new FloatingCursorAnimator<never>(host), commits, host };
}

describe("floating-cursor: decelerate", () => {
  it("eases out", () => {
    expect(decelerate(0)).toBe(0);
    expect(decelerate(0.5)).toBe(0.75);
    expect(decelerate(1)).toBe(1);
  });
});

describe("floating-cursor: FloatingCursorAnimator", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts over the caret with an enlarged rect", () => {
    const { animator } = setup("abc");
    animator.start();
    expect(animator.floatingCaretRect).toEqual({ left: 0.5, top: 1, width: 3, height: 18 });
    expect(animator.showRegularCaret).toBe(true);
  });

  it("follows the drag relative to the first update", () => {
    const { animator } = setup("abc");
    animator.start();
    animator.update({ x: 0, y: 0 });
    animator.update({ x: 20, y: 0 });
    expect(animator.floatingCaretRect).toEqual({ left: 20.5, top: 1, width: 3, height: 18 });
    expect(animator.textPosition).toEqual({ offset: 2, affinity: "downstream" });
  });

  it("re-anchors after the drag comes back from past the right edge", () => {
    const { animator } = setup("abc");
    animator.start();
    animator.update({ x: 0, y: 0 });
    animator.update({ x: 300, y: 0 });
    animator.update({ x: 310, y: 0 });
    animator.update({ x: 305, y: 0 });
    expect(animator.floatingCaretRect?.left).toBe(200.5);
    animator.update({ x: 295, y: 0 });
    expect(animator.floatingCaretRect?.left).toBe(190.5);
  });

  it("animates back and commits the new position", () => {
    const { animator, commits } = setup("abc");
    animator.start();
    animator.update({ x: 0, y: 0 });
    animator.update({ x: 20, y: 0 });
    animator.end();
    expect(animator.isResetting).toBe(true);

    vi.advanceTimersByTime(16);
    expect(animator.showRegularCaret).toBe(false);
    expect(animator.floatingCaretRect?.left).toBeCloseTo(20.380192, 5);

    vi.advanceTimersByTime(112);
    expect(animator.isResetting).toBe(false);
    expect(animator.floatingCaretRect).toBeNull();
    expect(animator.showRegularCaret).toBe(true);
    expect(commits).toEqual([[collapsedSelection(2), "forcePress"]]);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("does not commit when the drag ends where it started", () => {
    const { animator, commits } = setup("abc");
    animator.start();
    animator.update({ x: 0, y: 0 });
    animator.update({ x: 2, y: 0 });
    animator.end();
    vi.advanceTimersByTime(200);
    expect(commits).toEqual([]);
  });

  it("finishes a running reset before starting again", () => {
    const { animator, commits, host } = setup("abc");
    animator.start();
    animator.update({ x: 0, y: 0 });
    animator.update({ x: 20, y: 0 });
    animator.end();
    vi.advanceTimersByTime(32);
    animator.start();
    expect(commits).toEqual([[collapsedSelection(2), "forcePress"]]);
    expect(host.selection).toEqual(collapsedSelection(2));
    expect(animator.isResetting).toBe(false);
    expect(animator.floatingCaretRect).toEqual({ left: 20.5, top: 1, width: 3, height: 18 });
  });
});
