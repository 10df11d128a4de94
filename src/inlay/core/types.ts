export type Affinity = "upstream" | "downstream";

export type TextDirection = "ltr" | "rtl";

export type TextSelection = {
  baseOffset: number;
  extentOffset: number;
  affinity: Affinity;
  isDirectional: boolean;
};

export type TextRange = {
  start: number;
  end: number;
};

export type TextPosition = {
  offset: number;
  affinity: Affinity;
};

export type EditingValue = {
  readonly text: string;
  readonly selection: TextSelection;
  readonly composing: TextRange;
};

export type TextStyle = {
  fontFamily?: string;
  fontSize?: number;
  color?: string;
  decoration?: "none" | "underline";
};

export type PlaceholderAlignment =
  | "baseline"
  | "aboveBaseline"
  | "belowBaseline"
  | "top"
  | "bottom"
  | "middle";

export type TextBaseline = "alphabetic" | "ideographic";

export type Point = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

export type Rect = {
  left: number;
  top: number;
  width: number;
  height: number;
};

export type TextBox = {
  left: number;
  top: number;
  right: number;
  bottom: number;
  direction: TextDirection;
};

export type EdgeInsets = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export type BoxConstraints = {
  minWidth: number;
  maxWidth: number;
  minHeight: number;
  maxHeight: number;
};

export type SelectionChangedCause =
  | "tap"
  | "doubleTap"
  | "longPress"
  | "forcePress"
  | "keyboard"
  | "toolbar"
  | "drag";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
