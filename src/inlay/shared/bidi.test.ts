import { describe, expect, it } from "vitest";
import {
  directionOf,
  hasOpposingDirection,
  isDirectionalityMarker,
  strongDirectionOf,
} from "./bidi";

describe("bidi", () => {
  it("classifies Latin and Hebrew", () => {
    expect(directionOf("a")).toBe("ltr");
    expect(directionOf("ש")).toBe("rtl");
    expect(strongDirectionOf("ا")).toBe("rtl");
    expect(strongDirectionOf("1")).toBeNull();
    expect(directionOf("1")).toBe("rtl");
  });

  it("detects opposing content for either base", () => {
    expect(hasOpposingDirection("abc", "ltr")).toBe(false);
    expect(hasOpposingDirection("abש", "ltr")).toBe(true);
    expect(hasOpposingDirection("ש", "rtl")).toBe(false);
    expect(hasOpposingDirection("שa", "rtl")).toBe(true);
  });

  it("recognises the two marks", () => {
    expect(isDirectionalityMarker("\u200E")).toBe(true);
    expect(isDirectionalityMarker("\u200F")).toBe(true);
    expect(isDirectionalityMarker("\u200B")).toBe(false);
  });
});
