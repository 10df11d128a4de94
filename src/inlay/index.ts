export { InlineEditor } from "./editor/inline-editor";
export type { InlineEditorOptions } from "./editor/inline-editor";

export {
  EditingController,
  type EditingControllerOptions,
  type EditingValueObserver,
  type TextFormatter,
  type UpdateResult,
} from "./core/controller";
export {
  DEFAULT_FLOATING_CURSOR_MARGIN,
  isMultiline,
  isSelectionEnabled,
  resolveEditorConfig,
  type BoxHeightStyle,
  type BoxWidthStyle,
  type EditorConfig,
  type EditorConfigInput,
  type ToolbarOptions,
  type WordSelectionFallback,
} from "./core/config";
export {
  EMPTY_RANGE,
  INVALID_SELECTION,
  collapsedSelection,
  createEditingValue,
  isCollapsed,
  isValidSelection,
  selectionEnd,
  selectionStart,
  textAfter,
  textBefore,
  textInside,
  textSelection,
  validateEditingValue,
  valuesEqual,
  withSelection,
} from "./core/editing-value";
export {
  InlayError,
  InvalidArgumentError,
  UnavailableError,
  ValidationError,
  type InlayErrorCode,
} from "./core/errors";
export {
  RESERVED_END,
  RESERVED_START,
  createInlineObjectCodec,
  createInlineObjectRegistry,
  isInlineObjectToken,
  isReserved,
  type InlineObjectCodec,
  type InlineObjectRegistry,
  type InlineObjectResolver,
} from "./core/codec/inline-object-codec";
export {
  buildSpans,
  spansToText,
  type BuildSpansOptions,
  type InlineObjectSpan,
  type Span,
  type TextSpan,
} from "./core/spans/span-builder";
export {
  WhitespaceDirectionalityNormalizer,
  normalizeWhitespaceDirectionality,
} from "./core/directionality";
export type * from "./core/types";

export { EditableLayout, type LayoutConfig } from "./engine/layout/editable-layout";
export {
  createMonospaceShaper,
  type MonospaceShaperOptions,
} from "./engine/layout/monospace-shaper";
export type { InlineContent, InlineContentAdapter } from "./engine/layout/placeholders";
export type { ShapedParagraph, TextShaper } from "./engine/layout/text-shaper";
export {
  DEFAULT_PAINT_STYLE,
  EditablePainter,
  paintCaret,
  paintHighlight,
  type CaretPaintState,
  type DrawCommand,
  type PaintLayers,
  type PaintStyle,
} from "./engine/paint/painters";

export { SelectionController } from "./editor/selection/selection-controller";
export type { EditorKeyEvent } from "./editor/selection/keyboard";
export { CaretBlinkAnimator } from "./editor/caret/caret-blink";
export { FloatingCursorAnimator } from "./editor/caret/floating-cursor";
export { PostLayoutQueue } from "./editor/post-layout-queue";
export { createMemoryClipboard, type MemoryClipboard } from "./editor/clipboard";
export type * from "./editor/types";

export {
  createEmojiRegistry,
  createEmojiResolver,
  emojiInlineContent,
  emojiTable,
  type Emoji,
  type EmojiEntry,
  type EmojiRegistry,
} from "./extensions/emoji/emoji";
