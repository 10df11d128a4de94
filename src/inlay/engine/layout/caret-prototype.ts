import type { Rect } from "../../core/types";
import type { PlatformFlavor } from "../../shared/platform";

/** Space kept after the text so the caret fits at the end of a line. */
export const CARET_GAP = 1;

export function caretMargin(cursorWidth: number): number {
  return CARET_GAP + cursorWidth;
}

// Apple carets are 2px taller than the line; elsewhere they are inset by 2px
// at the top and bottom.
export function computeCaretPrototype(
  platform: PlatformFlavor,
  cursorWidth: number,
  cursorHeight: number,
): Rect {
  if (platform === "apple") {
    return { left: 0, top: 0, width: cursorWidth, height: cursorHeight + 2 };
  }
  return { left: 0, top: 2, width: cursorWidth, height: cursorHeight - 4 };
}
