import type {
  EditingValue,
  Rect,
  SelectionChangedCause,
  Size,
  TextDirection,
  TextStyle,
} from "../core/types";

/** Access to the live editing value for selection and clipboard operations. */
export interface TextSelectionDelegate {
  readonly textEditingValue: EditingValue;
  userUpdateTextEditingValue(value: EditingValue, cause: SelectionChangedCause): void;
  readonly cutEnabled: boolean;
  readonly copyEnabled: boolean;
  readonly pasteEnabled: boolean;
  readonly selectAllEnabled: boolean;
}

export interface ClipboardService {
  read(): Promise<string | null>;
  write(text: string): Promise<void>;
}

export type TextInputAction =
  | "none"
  | "unspecified"
  | "done"
  | "go"
  | "search"
  | "send"
  | "next"
  | "previous"
  | "newline";

export type FloatingCursorDragState = "start" | "update" | "end";

export type FloatingCursorEvent = {
  state: FloatingCursorDragState;
  /** Offset from the drag origin, present for `update`. */
  offset?: { x: number; y: number };
};

/** Callbacks the platform text input drives. */
export interface TextInputClient {
  readonly currentValue: EditingValue;
  updateEditingValue(value: EditingValue): void;
  performAction(action: TextInputAction): void;
  updateFloatingCursor(event: FloatingCursorEvent): void;
  connectionClosed(): void;
}

export type TextInputConfiguration = {
  obscureText: boolean;
  readOnly: boolean;
  multiline: boolean;
  inputAction: TextInputAction;
};

export interface TextInputConnection {
  readonly attached: boolean;
  setEditingState(value: EditingValue): void;
  setStyle(style: TextStyle, textDirection: TextDirection): void;
  setEditableSizeAndTransform(size: Size, caretRect: Rect | null): void;
  show(): void;
  close(): void;
}

export interface TextInputBridge {
  attach(client: TextInputClient, configuration: TextInputConfiguration): TextInputConnection;
}
