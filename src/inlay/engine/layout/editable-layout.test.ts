import { describe, expect, it } from "vitest";
import { createInlineObjectCodec } from "../../core/codec/inline-object-codec";
import { resolveEditorConfig, type EditorConfigInput } from "../../core/config";
import { textSelection } from "../../core/editing-value";
import { UnavailableError } from "../../core/errors";
import { buildSpans } from "../../core/spans/span-builder";
import type { PlaceholderAlignment } from "../../core/types";
import { EditableLayout } from "./editable-layout";
import { createMonospaceShaper } from "./monospace-shaper";

type Box = { width: number; height: number };

const IMAGE = "\uE001";

const codec = createInlineObjectCodec<Box>((codePoint) =>
  codePoint === 0xe001 ? { width: 24, height: 24 } : null,
);

function createLayout(
  text: string,
  input: EditorConfigInput = {},
  alignment: PlaceholderAlignment = "bottom",
): EditableLayout<Box> {
  const layout = new EditableLayout<Box>({
    shaper: createMonospaceShaper(),
    inlineContent: (content) => ({
      layout: () => ({ width: content.width, height: content.height }),
    }),
    config: resolveEditorConfig({ platform: "other", ...input }),
  });
  layout.setSpans(buildSpans(text, { codec, alignment }));
  return layout;
}

const BOUNDED = { minWidth: 0, maxWidth: 200, minHeight: 0, maxHeight: Infinity };

describe("editable-layout: sizing", () => {
  it("fills the width and locks a single line to the line height", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    expect(layout.layout(BOUNDED)).toEqual({ width: 200, height: 20 });
    expect(layout.paragraph.width).toBe(197);
  });

  it("throws on geometry queries before the first layout", () => {
    const layout = createLayout("abc");
    expect(() => layout.size).toThrow(
      "EditableLayout: layout() must run before geometry queries",
    );
  });

  it("grows with the text when lines are unbounded", () => {
    const layout = createLayout("a\nb\nc", { maxLines: null });
    expect(layout.layout({ ...BOUNDED, maxWidth: 100 }).height).toBe(60);
  });

  it("locks the height when only maxLines is set", () => {
    const layout = createLayout("a", { maxLines: 2 });
    expect(layout.layout(BOUNDED).height).toBe(40);
  });

  it("clamps the height between minLines and maxLines", () => {
    expect(createLayout("a", { minLines: 2, maxLines: 4 }).layout(BOUNDED).height).toBe(40);
    expect(
      createLayout("a\nb\nc", { minLines: 2, maxLines: 4 }).layout(BOUNDED).height,
    ).toBe(60);
    expect(
      createLayout("a\nb\nc\nd\ne", { minLines: 2, maxLines: 4 }).layout(BOUNDED).height,
    ).toBe(80);
  });

  it("takes the full height when expanding", () => {
    const layout = createLayout("a", { maxLines: null, expands: true });
    expect(layout.layout({ ...BOUNDED, maxHeight: 300 }).height).toBe(300);
  });

  it("answers dry layout without touching the cached pass", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    expect(layout.computeDryLayout(BOUNDED)).toEqual({
      ok: true,
      value: { width: 200, height: 20 },
    });
    expect(layout.needsLayout).toBe(true);
  });

  it("reports dry layout as unavailable for baseline-aligned content", () => {
    const layout = createLayout(`AB${IMAGE}CD`, {}, "baseline");
    const result = layout.computeDryLayout(BOUNDED);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnavailableError);
    }
  });

  it("measures intrinsic width with the cursor included", () => {
    expect(createLayout(`AB${IMAGE}CD`).computeMaxIntrinsicWidth(Infinity)).toBe(66);
    expect(
      createLayout(`AB${IMAGE}CD`, {}, "baseline").computeMaxIntrinsicWidth(Infinity),
    ).toBe(0);
  });

  it("measures the minimum height with the inline content's height", () => {
    const layout = new EditableLayout<Box>({
      shaper: createMonospaceShaper(),
      inlineContent: (content) => ({
        layout: () => ({ width: content.width, height: content.height }),
      }),
      config: resolveEditorConfig({ platform: "other", maxLines: null }),
    });
    const tall = createInlineObjectCodec<Box>((codePoint) =>
      codePoint === 0xe001 ? { width: 24, height: 60 } : null,
    );
    layout.setSpans(buildSpans(`ab${IMAGE}cd`, { codec: tall, alignment: "bottom" }));

    expect(layout.computeMinIntrinsicHeight(200)).toBe(60);
    expect(layout.computeMaxIntrinsicHeight(200)).toBe(60);
    expect(layout.layout(BOUNDED).height).toBe(60);
  });

  it("prefers the inline content's own minimum height", () => {
    const layout = new EditableLayout<Box>({
      shaper: createMonospaceShaper(),
      inlineContent: (content) => ({
        layout: () => ({ width: content.width, height: content.height }),
        minIntrinsicHeight: () => 40,
      }),
      config: resolveEditorConfig({ platform: "other", maxLines: null }),
    });
    layout.setSpans(buildSpans(`ab${IMAGE}`, { codec, alignment: "bottom" }));

    expect(layout.computeMinIntrinsicHeight(200)).toBe(40);
  });
});

describe("editable-layout: hit testing", () => {
  it("maps a tap on either half of an inline object to its edges", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    layout.layout(BOUNDED);
    expect(layout.getPositionForPoint({ x: 25, y: 10 })).toEqual({
      offset: 2,
      affinity: "downstream",
    });
    expect(layout.getPositionForPoint({ x: 40, y: 10 })).toEqual({
      offset: 3,
      affinity: "downstream",
    });
  });

  it("finds the inline content under a point", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    layout.layout(BOUNDED);
    const hit = layout.hitTestInlineContent({ x: 30, y: 10 });
    expect(hit?.span.start).toBe(2);
    expect(hit?.localPoint).toEqual({ x: 10, y: 10 });
    expect(hit?.hit).toBe(true);
    expect(layout.hitTestInlineContent({ x: 5, y: 10 })).toBeNull();
  });
});

describe("editable-layout: caret and selection geometry", () => {
  it("places the caret after an inline object", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    layout.layout(BOUNDED);
    const position = { offset: 3, affinity: "downstream" } as const;
    expect(layout.getLocalRectForCaret(position)).toEqual({
      left: 44,
      top: 4,
      width: 2,
      height: 20,
    });
    expect(layout.getCaretPaintRect(position)).toEqual({
      left: 44,
      top: 6,
      width: 2,
      height: 16,
    });
  });

  it("shifts the caret by the scroll offset", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    layout.layout(BOUNDED);
    layout.setScrollOffset(30);
    expect(layout.getLocalRectForCaret({ offset: 3, affinity: "downstream" }).left).toBe(14);
  });

  it("keeps boxes of different heights apart in tight mode", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    layout.layout(BOUNDED);
    expect(layout.getBoxesForSelection(textSelection(1, 4))).toEqual([
      { left: 10, top: 4, right: 20, bottom: 24, direction: "ltr" },
      { left: 20, top: 0, right: 44, bottom: 24, direction: "ltr" },
      { left: 44, top: 4, right: 54, bottom: 24, direction: "ltr" },
    ]);
  });

  it("merges boxes to the line height in max mode", () => {
    const layout = createLayout(`AB${IMAGE}CD`, { selectionHeightStyle: "max" });
    layout.layout(BOUNDED);
    expect(layout.getBoxesForSelection(textSelection(1, 4))).toEqual([
      { left: 10, top: 0, right: 54, bottom: 24, direction: "ltr" },
    ]);
  });

  it("returns the caret bottom as the endpoint of a collapsed selection", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    layout.layout(BOUNDED);
    expect(layout.getEndpointsForSelection(textSelection(3, 3))).toEqual([
      { point: { x: 44, y: 24 }, direction: null },
    ]);
    expect(layout.getEndpointsForSelection(textSelection(0, 2))).toEqual([
      { point: { x: 0, y: 24 }, direction: "ltr" },
      { point: { x: 20, y: 24 }, direction: "ltr" },
    ]);
  });

  it("bounds the composing range", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    layout.layout(BOUNDED);
    expect(layout.getRectForComposingRange({ start: 0, end: 2 })).toEqual({
      left: 0,
      top: 4,
      width: 20,
      height: 20,
    });
    expect(layout.getRectForComposingRange({ start: 1, end: 1 })).toBeNull();
  });

  it("computes floating cursor bounds from the text size", () => {
    const layout = createLayout(`AB${IMAGE}CD`);
    layout.layout(BOUNDED);
    expect(
      layout.floatingCursorBounds({ left: 4, top: 4, right: 4, bottom: 5 }),
    ).toEqual({ left: -4, top: -4, right: 201, bottom: 9 });
  });
});

describe("editable-layout: scrolling", () => {
  it("scrolls a single line so the caret at the end is visible", () => {
    const layout = createLayout("abcdefghijklmnopqrst");
    layout.layout({ ...BOUNDED, maxWidth: 100 });
    expect(layout.maxScrollExtent).toBe(103);
    const caret = layout.getLocalRectForCaret({ offset: 20, affinity: "downstream" });
    expect(layout.computeScrollOffsetForCaret(caret)).toBe(102);
  });

  it("does not scroll when the caret is already visible", () => {
    const layout = createLayout("abcdefghijklmnopqrst");
    layout.layout({ ...BOUNDED, maxWidth: 100 });
    const caret = layout.getLocalRectForCaret({ offset: 2, affinity: "downstream" });
    expect(layout.computeScrollOffsetForCaret(caret)).toBe(0);
  });
});

describe("editable-layout: words", () => {
  it("skips whitespace when looking for the next and previous word", () => {
    const layout = createLayout("hello world", { maxLines: null });
    layout.layout(BOUNDED);
    expect(layout.getNextWord(5)).toEqual({ start: 6, end: 11 });
    expect(layout.getPreviousWord(5)).toEqual({ start: 0, end: 5 });
    expect(layout.getNextWord(11)).toBeNull();
  });
});

describe("editable-layout: obscured text", () => {
  it("replaces every code unit and reveals only the chosen one", () => {
    const layout = createLayout("abc", { obscureText: true });
    layout.setObscureShowIndex(1);
    layout.layout(BOUNDED);
    expect(layout.paragraph.text).toBe("•b•");
  });

  it("reveals both halves of a surrogate pair", () => {
    const layout = createLayout("a😀", { obscureText: true });
    layout.setObscureShowIndex(1);
    layout.layout(BOUNDED);
    expect(layout.paragraph.text).toBe("•😀");
  });

  it("treats the whole text as one word and steps by code unit", () => {
    const layout = createLayout("a😀", { obscureText: true });
    layout.layout(BOUNDED);
    expect(layout.getWordBoundary({ offset: 1, affinity: "downstream" })).toEqual({
      start: 0,
      end: 3,
    });
    expect(layout.cursorMap.boundaries).toEqual([0, 1, 2, 3]);
  });
});
