import { InvalidArgumentError } from "./errors";
import type { EdgeInsets, Point, TextDirection } from "./types";
import { detectPlatform, type PlatformFlavor } from "../shared/platform";

export type BoxHeightStyle = "tight" | "max";
export type BoxWidthStyle = "tight" | "max";

/**
 * When a word is selected on whitespace, whether the selection falls back to
 * the word before it.
 */
export type WordSelectionFallback = "always" | "readOnly" | "never";

export type ToolbarOptions = {
  copy: boolean;
  cut: boolean;
  paste: boolean;
  selectAll: boolean;
};

export type EditorConfig = {
  readOnly: boolean;
  obscureText: boolean;
  obscuringCharacter: string;
  textDirection: TextDirection;
  maxLines: number | null;
  minLines: number | null;
  expands: boolean;
  forceLine: boolean;
  cursorWidth: number;
  /** `null` uses the preferred line height. */
  cursorHeight: number | null;
  cursorOffset: Point;
  cursorOpacityAnimates: boolean;
  platform: PlatformFlavor;
  selectionHeightStyle: BoxHeightStyle;
  selectionWidthStyle: BoxWidthStyle;
  floatingCursorAddedMargin: EdgeInsets;
  wordSelectionFallback: WordSelectionFallback;
  /** `null` enables selection unless the text is obscured. */
  enableInteractiveSelection: boolean | null;
  deterministicCursor: boolean;
  textScaleFactor: number;
  devicePixelRatio: number;
  toolbarOptions: ToolbarOptions;
  scrollPadding: EdgeInsets;
};

export type EditorConfigInput = Partial<EditorConfig>;

export const DEFAULT_FLOATING_CURSOR_MARGIN: EdgeInsets = {
  left: 4,
  top: 4,
  right: 4,
  bottom: 5,
};

function fail(message: string): never {
  throw new InvalidArgumentError(message);
}

function checkPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    fail(`${name} must be a positive number, got ${value}`);
  }
}

export function resolveEditorConfig(input: EditorConfigInput = {}): EditorConfig {
  const platform = input.platform ?? detectPlatform();
  const maxLines = input.maxLines === undefined ? 1 : input.maxLines;
  const minLines = input.minLines ?? null;
  const expands = input.expands ?? false;
  const obscuringCharacter = input.obscuringCharacter ?? "•";

  if (maxLines !== null && (!Number.isInteger(maxLines) || maxLines < 1)) {
    fail(`maxLines must be a positive integer or null, got ${maxLines}`);
  }
  if (minLines !== null && (!Number.isInteger(minLines) || minLines < 1)) {
    fail(`minLines must be a positive integer or null, got ${minLines}`);
  }
  if (minLines !== null && maxLines !== null && minLines > maxLines) {
    fail(`minLines (${minLines}) can't be greater than maxLines (${maxLines})`);
  }
  if (expands && (maxLines !== null || minLines !== null)) {
    fail("expands requires both maxLines and minLines to be null");
  }
  if (obscuringCharacter.length !== 1) {
    fail(
      `obscuringCharacter must be a single character, got "${obscuringCharacter}"`,
    );
  }

  const config: EditorConfig = {
    readOnly: input.readOnly ?? false,
    obscureText: input.obscureText ?? false,
    obscuringCharacter,
    textDirection: input.textDirection ?? "ltr",
    maxLines,
    minLines,
    expands,
    forceLine: input.forceLine ?? true,
    cursorWidth: input.cursorWidth ?? 2,
    cursorHeight: input.cursorHeight ?? null,
    cursorOffset: input.cursorOffset ?? { x: 0, y: 0 },
    cursorOpacityAnimates:
      input.cursorOpacityAnimates ?? platform === "apple",
    platform,
    selectionHeightStyle: input.selectionHeightStyle ?? "tight",
    selectionWidthStyle: input.selectionWidthStyle ?? "tight",
    floatingCursorAddedMargin:
      input.floatingCursorAddedMargin ?? DEFAULT_FLOATING_CURSOR_MARGIN,
    wordSelectionFallback:
      input.wordSelectionFallback ??
      (platform === "apple" ? "always" : "readOnly"),
    enableInteractiveSelection: input.enableInteractiveSelection ?? null,
    deterministicCursor: input.deterministicCursor ?? false,
    textScaleFactor: input.textScaleFactor ?? 1,
    devicePixelRatio: input.devicePixelRatio ?? 1,
    toolbarOptions: input.toolbarOptions ?? {
      copy: true,
      cut: true,
      paste: true,
      selectAll: true,
    },
    scrollPadding: input.scrollPadding ?? {
      left: 20,
      top: 20,
      right: 20,
      bottom: 20,
    },
  };

  if (config.cursorWidth < 0 || !Number.isFinite(config.cursorWidth)) {
    fail(`cursorWidth must be a non-negative number, got ${config.cursorWidth}`);
  }
  if (config.cursorHeight !== null) {
    checkPositive("cursorHeight", config.cursorHeight);
  }
  checkPositive("textScaleFactor", config.textScaleFactor);
  checkPositive("devicePixelRatio", config.devicePixelRatio);

  return config;
}

export function isMultiline(config: Pick<EditorConfig, "maxLines">): boolean {
  return config.maxLines !== 1;
}

export function isSelectionEnabled(
  config: Pick<EditorConfig, "enableInteractiveSelection" | "obscureText">,
): boolean {
  return config.enableInteractiveSelection ?? !config.obscureText;
}
