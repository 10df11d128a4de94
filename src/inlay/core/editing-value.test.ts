import { describe, expect, it } from "vitest";
import {
  EMPTY_RANGE,
  INVALID_SELECTION,
  collapsedSelection,
  createEditingValue,
  isCollapsed,
  isValidSelection,
  selectionsEqual,
  textAfter,
  textBefore,
  textInside,
  textSelection,
  validateEditingValue,
  valuesEqual,
} from "./editing-value";

describe("editing-value: createEditingValue", () => {
  it("defaults to an empty value without selection", () => {
    const value = createEditingValue();
    expect(value.text).toBe("");
    expect(value.selection).toEqual(INVALID_SELECTION);
    expect(value.composing).toEqual(EMPTY_RANGE);
    expect(isValidSelection(value.selection)).toBe(false);
  });

  it("freezes the value", () => {
    const value = createEditingValue({ text: "abc" });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.selection)).toBe(true);
  });
});

describe("editing-value: text slices", () => {
  it("splits around a backwards selection", () => {
    const value = createEditingValue({
      text: "hello world",
      selection: textSelection(8, 2),
    });
    expect(textBefore(value)).toBe("he");
    expect(textInside(value)).toBe("llo wo");
    expect(textAfter(value)).toBe("rld");
  });
});

describe("editing-value: equality", () => {
  it("compares every field", () => {
    const a = createEditingValue({ text: "ab", selection: collapsedSelection(1) });
    const b = createEditingValue({ text: "ab", selection: collapsedSelection(1) });
    const c = createEditingValue({
      text: "ab",
      selection: collapsedSelection(1, "upstream"),
    });
    expect(valuesEqual(a, b)).toBe(true);
    expect(valuesEqual(a, c)).toBe(false);
    expect(selectionsEqual(a.selection, c.selection)).toBe(false);
    expect(isCollapsed(a.selection)).toBe(true);
  });
});

describe("editing-value: validateEditingValue", () => {
  it("accepts the invalid-selection sentinel", () => {
    expect(validateEditingValue(createEditingValue({ text: "x" }))).toBeNull();
  });

  it("rejects a selection past the end", () => {
    const error = validateEditingValue(
      createEditingValue({ text: "abc", selection: collapsedSelection(4) }),
    );
    expect(error?.code).toBe("validation");
    expect(error?.message).toBe(
      "selection (4, 4) is outside text of length 3",
    );
  });

  it("rejects a reversed composing range", () => {
    const error = validateEditingValue(
      createEditingValue({ text: "abc", composing: { start: 2, end: 1 } }),
    );
    expect(error?.message).toBe(
      "composing range (2, 1) is invalid for text of length 3",
    );
  });
});
