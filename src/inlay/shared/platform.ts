export type PlatformFlavor = "apple" | "other";

export function detectPlatform(): PlatformFlavor {
  if (typeof navigator === "undefined") {
    return "other";
  }
  if (/Mac|iPhone|iPad|iPod/.test(navigator.platform)) {
    return "apple";
  }
  return "other";
}

export type ModifierState = {
  shiftKey: boolean;
  ctrlKey: boolean;
  altKey: boolean;
  metaKey: boolean;
};

// Word, line and shortcut modifiers differ between the two families.
export function platformModifiers(
  platform: PlatformFlavor,
  event: ModifierState,
): { word: boolean; line: boolean; shortcut: boolean } {
  if (platform === "apple") {
    return { word: event.altKey, line: event.metaKey, shortcut: event.metaKey };
  }
  return { word: event.ctrlKey, line: event.altKey, shortcut: event.ctrlKey };
}
