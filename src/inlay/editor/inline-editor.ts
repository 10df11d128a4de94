import {
  createInlineObjectCodec,
  type InlineObjectCodec,
  type InlineObjectResolver,
} from "../core/codec/inline-object-codec";
import {
  isMultiline,
  resolveEditorConfig,
  type EditorConfig,
  type EditorConfigInput,
} from "../core/config";
import { EditingController, type TextFormatter } from "../core/controller";
import {
  collapsedSelection,
  createEditingValue,
  isCollapsed,
  isValidSelection,
  rangesEqual,
  selectionsEqual,
  valuesEqual,
} from "../core/editing-value";
import { buildSpans, type Span } from "../core/spans/span-builder";
import type {
  BoxConstraints,
  EditingValue,
  PlaceholderAlignment,
  Rect,
  SelectionChangedCause,
  Size,
  TextBaseline,
  TextSelection,
  TextStyle,
} from "../core/types";
import { EditableLayout } from "../engine/layout/editable-layout";
import { createMonospaceShaper } from "../engine/layout/monospace-shaper";
import type { InlineContentAdapter } from "../engine/layout/placeholders";
import type { TextShaper } from "../engine/layout/text-shaper";
import {
  DEFAULT_PAINT_STYLE,
  EditablePainter,
  type PaintLayers,
  type PaintStyle,
} from "../engine/paint/painters";
import { CaretBlinkAnimator } from "./caret/caret-blink";
import { FloatingCursorAnimator, type FrameScheduler } from "./caret/floating-cursor";
import { createMemoryClipboard } from "./clipboard";
import { PostLayoutQueue } from "./post-layout-queue";
import type { EditorKeyEvent } from "./selection/keyboard";
import { SelectionController } from "./selection/selection-controller";
import type {
  ClipboardService,
  FloatingCursorEvent,
  TextInputAction,
  TextInputBridge,
  TextInputClient,
  TextInputConnection,
  TextSelectionDelegate,
} from "./types";

export type InlineEditorOptions<TContent> = {
  resolver: InlineObjectResolver<TContent>;
  inlineContent: InlineContentAdapter<TContent>;
  /** Shares an existing controller; otherwise one is created from `text`. */
  controller?: EditingController;
  text?: string;
  formatters?: TextFormatter[];
  config?: EditorConfigInput;
  style?: TextStyle;
  alignment?: PlaceholderAlignment;
  baseline?: TextBaseline | null;
  shaper?: TextShaper;
  clipboard?: ClipboardService;
  textInput?: TextInputBridge;
  inputAction?: TextInputAction;
  frameScheduler?: FrameScheduler;
  paintStyle?: Partial<PaintStyle>;
  onChanged?: (text: string) => void;
  onSelectionChanged?: (selection: TextSelection, cause: SelectionChangedCause | null) => void;
  onSubmitted?: (text: string) => void;
  /** Replaces the default of clearing composing (and unfocusing) on submit. */
  onEditingComplete?: () => void;
  /** Caret rect, grown by `scrollPadding`, for an outer scrollable to reveal. */
  onShowOnScreen?: (rect: Rect) => void;
  /** Painted caret rect, reported only when it moves. */
  onCaretChanged?: (rect: Rect) => void;
};

const UNBOUNDED: BoxConstraints = {
  minWidth: 0,
  maxWidth: Infinity,
  minHeight: 0,
  maxHeight: Infinity,
};

/**
 * One editable field: owns the layout, selection, caret animation and
 * text-input connection around an `EditingController`.
 */
export class InlineEditor<TContent> {
  readonly controller: EditingController;
  readonly config: EditorConfig;
  readonly layout: EditableLayout<TContent>;
  readonly selection: SelectionController<TContent>;
  readonly cursorBlink: CaretBlinkAnimator;
  readonly floatingCursor: FloatingCursorAnimator<TContent>;
  readonly textInputClient: TextInputClient;

  private readonly options: InlineEditorOptions<TContent>;
  private readonly codec: InlineObjectCodec<TContent>;
  private readonly queue = new PostLayoutQueue();
  private readonly painter: EditablePainter;
  private readonly listeners = new Set<() => void>();
  private readonly cleanups: (() => void)[] = [];
  private constraints: BoxConstraints = UNBOUNDED;
  private connection: TextInputConnection | null = null;
  private focused = false;
  private applyingInputValue = false;
  private disposed = false;

  constructor(options: InlineEditorOptions<TContent>) {
    const editor = this;
    this.options = options;
    this.config = resolveEditorConfig(options.config);
    this.codec = createInlineObjectCodec(options.resolver);
    this.controller =
      options.controller ??
      new EditingController({
        text: options.text,
        formatters: options.formatters,
        textDirection: this.config.textDirection,
      });
    this.layout = new EditableLayout({
      shaper: options.shaper ?? createMonospaceShaper(),
      inlineContent: options.inlineContent,
      config: this.config,
    });
    this.layout.setSpans(this.buildSpans(this.controller.value));

    const clipboard = options.clipboard ?? createMemoryClipboard();
    this.selection = new SelectionController({
      host: {
        config: this.config,
        get hasFocus() {
          return editor.focused;
        },
        ensureLayout: () => this.ensureLayout(),
        onSelectionChanged: (selection, cause) => this.handleSelectionChanged(selection, cause),
      },
      delegate: this.createSelectionDelegate(),
      clipboard,
    });

    this.cursorBlink = new CaretBlinkAnimator({
      opacityAnimates: this.config.cursorOpacityAnimates,
      deterministic: this.config.deterministicCursor,
      scheduleFrames: options.frameScheduler,
    });
    this.floatingCursor = new FloatingCursorAnimator(
      {
        get selection() {
          return editor.controller.selection;
        },
        addedMargin: this.config.floatingCursorAddedMargin,
        ensureLayout: () => this.ensureLayout(),
        onSelectionChanged: (selection, cause) => this.handleSelectionChanged(selection, cause),
      },
      options.frameScheduler,
    );
    this.painter = new EditablePainter({ onCaretChanged: options.onCaretChanged });
    this.textInputClient = this.createTextInputClient();

    this.cleanups.push(
      this.controller.subscribe((value, previous) => this.handleValueChanged(value, previous)),
      this.cursorBlink.subscribe(() => this.handleBlink()),
      this.floatingCursor.subscribe(() => this.notify()),
    );
  }

  get value(): EditingValue {
    return this.controller.value;
  }

  get spans(): readonly Span<TContent>[] {
    return this.layout.spans;
  }

  get hasFocus(): boolean {
    return this.focused;
  }

  get hasInputConnection(): boolean {
    return this.connection?.attached ?? false;
  }

  get size(): Size {
    return this.ensureLayout().size;
  }

  /** Listens for anything that changes what the field shows. */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Lays the field out and runs callbacks that were waiting for layout. */
  performLayout(constraints: BoxConstraints): Size {
    this.constraints = constraints;
    const size = this.layout.layout(constraints);
    this.queue.flush();
    return size;
  }

  ensureLayout(): EditableLayout<TContent> {
    if (this.layout.needsLayout) {
      this.performLayout(this.constraints);
    }
    return this.layout;
  }

  setFocused(focused: boolean): void {
    if (this.disposed || focused === this.focused) {
      return;
    }
    this.focused = focused;
    if (focused) {
      this.openInputConnection();
      if (!isValidSelection(this.controller.selection)) {
        this.handleSelectionChanged(collapsedSelection(this.controller.text.length), null);
      }
      this.scheduleShowCaretOnScreen();
    } else {
      this.closeInputConnection();
      this.controller.replace(createEditingValue({ text: this.controller.text }));
    }
    this.updateCursorBlink();
    this.notify();
  }

  /** Draw commands for the highlights and caret of the current frame. */
  paint(): PaintLayers {
    const layout = this.ensureLayout();
    const style = { ...DEFAULT_PAINT_STYLE, ...this.options.paintStyle };
    return this.painter.paint(
      layout,
      { ...style, showCursor: style.showCursor && this.focused },
      {
        selection: this.controller.selection,
        opacity: this.cursorBlink.opacity,
        floatingCaretRect: this.floatingCursor.floatingCaretRect,
        showRegularCaret: this.floatingCursor.showRegularCaret,
        floatingTextPosition: this.floatingCursor.textPosition,
      },
    );
  }

  handleKeyEvent(event: EditorKeyEvent): Promise<boolean> {
    return this.selection.handleKeyEvent(event);
  }

  insertInlineObject(token: string): void {
    const result = this.controller.insertInlineObject(token);
    if (result.ok) {
      this.options.onChanged?.(result.value.text);
    }
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.closeInputConnection();
    this.cursorBlink.dispose();
    this.floatingCursor.dispose();
    this.queue.dispose();
    for (const cleanup of this.cleanups.splice(0)) {
      cleanup();
    }
    this.listeners.clear();
  }

  private buildSpans(value: EditingValue): Span<TContent>[] {
    return buildSpans(value.text, {
      codec: this.codec,
      style: this.options.style,
      composing: value.composing,
      alignment: this.options.alignment,
      baseline: this.options.baseline,
    });
  }

  private createSelectionDelegate(): TextSelectionDelegate {
    const editor = this;
    const { toolbarOptions, readOnly, obscureText } = this.config;
    return {
      get textEditingValue() {
        return editor.controller.value;
      },
      userUpdateTextEditingValue(value) {
        editor.applyUserValue(value);
      },
      cutEnabled: toolbarOptions.cut && !readOnly && !obscureText,
      copyEnabled: toolbarOptions.copy && !obscureText,
      pasteEnabled: toolbarOptions.paste && !readOnly,
      selectAllEnabled: toolbarOptions.selectAll,
    };
  }

  private createTextInputClient(): TextInputClient {
    const editor = this;
    return {
      get currentValue() {
        return editor.controller.value;
      },
      updateEditingValue(value) {
        editor.updateEditingValue(value);
      },
      performAction(action) {
        editor.performAction(action);
      },
      updateFloatingCursor(event) {
        editor.updateFloatingCursor(event);
      },
      connectionClosed() {
        editor.connectionClosed();
      },
    };
  }

  private applyUserValue(value: EditingValue): EditingValue | null {
    const previous = this.controller.value;
    const result = this.controller.replace(value);
    if (!result.ok) {
      console.warn("[inlay] rejected editing value", result.error);
      return null;
    }
    if (result.value.text !== previous.text) {
      this.options.onChanged?.(result.value.text);
    }
    return result.value;
  }

  private updateEditingValue(value: EditingValue): void {
    if (this.config.readOnly) {
      return;
    }
    const previous = this.controller.value;
    const revealsLatest =
      this.config.obscureText &&
      value.text.length === previous.text.length + 1 &&
      previous.selection.baseOffset >= 0;
    if (revealsLatest) {
      this.cursorBlink.showLatestObscuredCharacter(previous.selection.baseOffset);
    }

    this.applyingInputValue = true;
    let applied: EditingValue | null;
    try {
      applied = this.applyUserValue(value);
    } finally {
      this.applyingInputValue = false;
    }
    if (!applied) {
      return;
    }
    // Formatters or normalization changed what the input sent.
    if (!valuesEqual(applied, value)) {
      this.connection?.setEditingState(applied);
    }
    if (!selectionsEqual(applied.selection, previous.selection)) {
      this.options.onSelectionChanged?.(applied.selection, "keyboard");
    }
    if (applied.text !== previous.text) {
      this.scheduleShowCaretOnScreen();
    }
    if (this.focused && !revealsLatest) {
      this.cursorBlink.restart();
    }
  }

  private performAction(action: TextInputAction): void {
    switch (action) {
      case "newline":
        if (!isMultiline(this.config)) {
          this.finalizeEditing(true);
        }
        return;
      case "done":
      case "go":
      case "send":
      case "search":
        this.finalizeEditing(true);
        return;
      default:
        this.finalizeEditing(false);
    }
  }

  private finalizeEditing(shouldUnfocus: boolean): void {
    if (this.options.onEditingComplete) {
      this.options.onEditingComplete();
    } else {
      this.controller.clearComposing();
      if (shouldUnfocus) {
        this.setFocused(false);
      }
    }
    this.options.onSubmitted?.(this.controller.text);
  }

  private updateFloatingCursor(event: FloatingCursorEvent): void {
    switch (event.state) {
      case "start":
        this.floatingCursor.start();
        return;
      case "update":
        if (event.offset) {
          this.floatingCursor.update(event.offset);
        }
        return;
      case "end":
        this.floatingCursor.end();
        return;
    }
  }

  private connectionClosed(): void {
    this.connection = null;
    this.finalizeEditing(true);
  }

  private handleSelectionChanged(
    selection: TextSelection,
    cause: SelectionChangedCause | null,
  ): void {
    const result = this.controller.setSelection(selection);
    if (!result.ok) {
      console.warn("[inlay] rejected selection", result.error);
      return;
    }
    this.options.onSelectionChanged?.(selection, cause);
    this.updateCursorBlink();
    this.scheduleShowCaretOnScreen();
  }

  private handleValueChanged(value: EditingValue, previous: EditingValue): void {
    if (value.text !== previous.text || !rangesEqual(value.composing, previous.composing)) {
      this.layout.setSpans(this.buildSpans(value));
    }
    if (!this.applyingInputValue) {
      this.connection?.setEditingState(value);
    }
    this.updateCursorBlink();
    this.notify();
  }

  private handleBlink(): void {
    const index =
      this.cursorBlink.obscureShowCharTicksPending > 0
        ? this.cursorBlink.obscureLatestCharIndex
        : null;
    this.layout.setObscureShowIndex(index);
    this.notify();
  }

  private updateCursorBlink(): void {
    if (this.disposed) {
      return;
    }
    const selection = this.controller.selection;
    this.cursorBlink.update({
      hasFocus: this.focused,
      selectionCollapsed: isValidSelection(selection) && isCollapsed(selection),
    });
  }

  private openInputConnection(): void {
    const bridge = this.options.textInput;
    if (!bridge || this.hasInputConnection) {
      return;
    }
    const connection = bridge.attach(this.textInputClient, {
      obscureText: this.config.obscureText,
      readOnly: this.config.readOnly,
      multiline: isMultiline(this.config),
      inputAction:
        this.options.inputAction ?? (isMultiline(this.config) ? "newline" : "done"),
    });
    connection.setStyle(this.options.style ?? {}, this.config.textDirection);
    connection.setEditingState(this.controller.value);
    connection.show();
    this.connection = connection;
    this.queue.schedule(this, () => this.updateInputGeometry());
  }

  private closeInputConnection(): void {
    if (this.connection) {
      this.connection.close();
      this.connection = null;
    }
  }

  private scheduleShowCaretOnScreen(): void {
    this.queue.cancel(this);
    this.queue.schedule(this, () => {
      this.showCaretOnScreen();
      this.updateInputGeometry();
    });
  }

  private showCaretOnScreen(): void {
    const selection = this.controller.selection;
    if (!isValidSelection(selection)) {
      return;
    }
    const layout = this.layout;
    const position = { offset: selection.extentOffset, affinity: selection.affinity };
    const target = layout.computeScrollOffsetForCaret(layout.getLocalRectForCaret(position));
    const scrollOffset = Math.min(Math.max(0, target), layout.maxScrollExtent);
    if (scrollOffset !== layout.scrollOffset) {
      layout.setScrollOffset(scrollOffset);
      this.notify();
    }
    const caret = layout.getLocalRectForCaret(position);
    const padding = this.config.scrollPadding;
    this.options.onShowOnScreen?.({
      left: caret.left - padding.left,
      top: caret.top - padding.top,
      width: caret.width + padding.left + padding.right,
      height: caret.height + padding.top + padding.bottom,
    });
  }

  private updateInputGeometry(): void {
    const connection = this.connection;
    if (!connection) {
      return;
    }
    const selection = this.controller.selection;
    const caret = isValidSelection(selection)
      ? this.layout.getLocalRectForCaret({
          offset: selection.extentOffset,
          affinity: selection.affinity,
        })
      : null;
    connection.setEditableSizeAndTransform(this.layout.size, caret);
  }

  private notify(): void {
    for (const listener of Array.from(this.listeners)) {
      listener();
    }
  }
}
