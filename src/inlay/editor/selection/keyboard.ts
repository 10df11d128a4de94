import type { ModifierState } from "../../shared/platform";

export type EditorKeyEvent = ModifierState & {
  type: "keydown" | "keyup";
  /** `KeyboardEvent.key` value. */
  key: string;
};

export type MovementKey = "left" | "right" | "up" | "down";
export type ShortcutKey = "selectAll" | "copy" | "paste" | "cut";
export type DeleteKey = "delete" | "backspace";

export type EditorKey =
  | { kind: "movement"; key: MovementKey }
  | { kind: "shortcut"; key: ShortcutKey }
  | { kind: "delete"; key: DeleteKey };

const MOVEMENT_KEYS: Record<string, MovementKey> = {
  ArrowLeft: "left",
  ArrowRight: "right",
  ArrowUp: "up",
  ArrowDown: "down",
};

const SHORTCUT_KEYS: Record<string, ShortcutKey> = {
  a: "selectAll",
  c: "copy",
  v: "paste",
  x: "cut",
};

export function classifyKey(key: string): EditorKey | null {
  const movement = MOVEMENT_KEYS[key];
  if (movement) {
    return { kind: "movement", key: movement };
  }
  const shortcut = SHORTCUT_KEYS[key.toLowerCase()];
  if (shortcut && key.length === 1) {
    return { kind: "shortcut", key: shortcut };
  }
  if (key === "Delete") {
    return { kind: "delete", key: "delete" };
  }
  if (key === "Backspace") {
    return { kind: "delete", key: "backspace" };
  }
  return null;
}
