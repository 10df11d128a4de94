import type { TextDirection } from "../core/types";

// Latin, ideographic, Cyrillic, Indic, SE Asian and most symbols.
export const LTR_PATTERN =
  /[A-Za-z\u00C0-\u00D6\u00D8-\u00F6\u00F8-\u02B8\u0300-\u0590\u0800-\u1FFF\u2C00-\uFB1C\uFDFE-\uFE6F\uFEFD-\uFFFF]/;

// Hebrew, Arabic, Syriac, Thaana, NKo and their presentation forms.
export const RTL_PATTERN = /[\u0591-\u07FF\uFB1D-\uFDFD\uFE70-\uFEFC]/;

export const LRM = "\u200E";
export const RLM = "\u200F";

export function isDirectionalityMarker(char: string): boolean {
  return char === LRM || char === RLM;
}

/** Anything that is not LTR counts as RTL. */
export function directionOf(char: string): TextDirection {
  return LTR_PATTERN.test(char) ? "ltr" : "rtl";
}

export function strongDirectionOf(char: string): TextDirection | null {
  if (RTL_PATTERN.test(char)) {
    return "rtl";
  }
  if (LTR_PATTERN.test(char)) {
    return "ltr";
  }
  return null;
}

export function hasOpposingDirection(
  text: string,
  baseDirection: TextDirection,
): boolean {
  return baseDirection === "ltr" ? RTL_PATTERN.test(text) : LTR_PATTERN.test(text);
}
