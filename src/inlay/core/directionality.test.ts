import { describe, expect, it } from "vitest";
import {
  WhitespaceDirectionalityNormalizer,
  normalizeWhitespaceDirectionality,
} from "./directionality";
import { collapsedSelection, createEditingValue } from "./editing-value";

const HEBREW = "שלום";
const LRM = "\u200E";
const RLM = "\u200F";

describe("directionality: normalizeWhitespaceDirectionality", () => {
  it("marks whitespace between runs of opposite direction", () => {
    const value = createEditingValue({
      text: `hello ${HEBREW} world`,
      selection: collapsedSelection(16),
    });
    const result = normalizeWhitespaceDirectionality(value, "ltr");
    expect(result.text).toBe(`hello ${LRM}${HEBREW} ${RLM}world`);
    expect(result.selection.baseOffset).toBe(18);
    expect(result.selection.extentOffset).toBe(18);
  });

  it("moves an offset at the insertion point past the marker", () => {
    const value = createEditingValue({
      text: `a ${HEBREW}`,
      selection: collapsedSelection(2),
      composing: { start: 0, end: 2 },
    });
    const result = normalizeWhitespaceDirectionality(value, "ltr");
    expect(result.text).toBe(`a ${LRM}${HEBREW}`);
    expect(result.selection.baseOffset).toBe(3);
    expect(result.composing).toEqual({ start: 0, end: 3 });
  });

  it("drops the marker when the next character has the same direction", () => {
    const value = createEditingValue({ text: "ab cd" });
    expect(normalizeWhitespaceDirectionality(value, "ltr").text).toBe("ab cd");
  });

  it("keeps a marker after trailing whitespace", () => {
    const value = createEditingValue({ text: `${HEBREW} ` });
    expect(normalizeWhitespaceDirectionality(value, "ltr").text).toBe(
      `${HEBREW} ${RLM}`,
    );
  });

  it("uses one marker per whitespace run", () => {
    const value = createEditingValue({ text: `a   ${HEBREW}` });
    expect(normalizeWhitespaceDirectionality(value, "ltr").text).toBe(
      `a   ${LRM}${HEBREW}`,
    );
  });

  it("reuses a marker already after the run", () => {
    const value = createEditingValue({ text: `a ${RLM}${HEBREW}` });
    expect(normalizeWhitespaceDirectionality(value, "ltr").text).toBe(
      `a ${RLM}${HEBREW}`,
    );
  });

  it("does not treat a zero-width no-break space as whitespace", () => {
    const value = createEditingValue({ text: `a\uFEFF${HEBREW}` });
    expect(normalizeWhitespaceDirectionality(value, "ltr").text).toBe(
      `a\uFEFF${HEBREW}`,
    );
  });

  it("is idempotent", () => {
    const inputs = [
      `hello ${HEBREW} world`,
      `${HEBREW}  abc \n ${HEBREW}`,
      ` ${HEBREW} `,
    ];
    for (const text of inputs) {
      const once = normalizeWhitespaceDirectionality(
        createEditingValue({ text, selection: collapsedSelection(text.length) }),
        "ltr",
      );
      const twice = normalizeWhitespaceDirectionality(once, "ltr");
      expect(twice.text).toBe(once.text);
      expect(twice.selection).toEqual(once.selection);
    }
  });
});

describe("directionality: WhitespaceDirectionalityNormalizer", () => {
  it("stays inactive until opposing content shows up", () => {
    const normalizer = new WhitespaceDirectionalityNormalizer("ltr");
    const previous = createEditingValue();
    const plain = createEditingValue({ text: "a b" });
    expect(normalizer.normalize(previous, plain)).toBe(plain);
    expect(normalizer.isActive).toBe(false);

    const mixed = createEditingValue({ text: `a ${HEBREW}` });
    expect(normalizer.normalize(plain, mixed).text).toBe(`a ${LRM}${HEBREW}`);
    expect(normalizer.isActive).toBe(true);

    const latin = createEditingValue({ text: "a b" });
    expect(normalizer.normalize(mixed, latin).text).toBe("a b");
    expect(normalizer.isActive).toBe(true);
  });
});
