import type {
  EditingValue,
  Rect,
  Size,
  TextDirection,
  TextStyle,
} from "../core/types";
import type {
  TextInputBridge,
  TextInputClient,
  TextInputConfiguration,
  TextInputConnection,
} from "../editor/types";

export type FakeConnection = TextInputConnection & {
  readonly client: TextInputClient;
  readonly configuration: TextInputConfiguration;
  readonly editingStates: EditingValue[];
  readonly geometry: { size: Size; caretRect: Rect | null }[];
  readonly style: { style: TextStyle; textDirection: TextDirection } | null;
  readonly shown: boolean;
  readonly closed: boolean;
};

/** In-process text input that records what the editor sends it. */
export class FakeTextInputBridge implements TextInputBridge {
  readonly connections: FakeConnection[] = [];

  get current(): FakeConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) {
      throw new Error("FakeTextInputBridge: no connection was attached");
    }
    return connection;
  }

  attach(client: TextInputClient, configuration: TextInputConfiguration): FakeConnection {
    const editingStates: EditingValue[] = [];
    const geometry: { size: Size; caretRect: Rect | null }[] = [];
    let style: FakeConnection["style"] = null;
    let shown = false;
    let closed = false;
    const connection: FakeConnection = {
      client,
      configuration,
      editingStates,
      geometry,
      get style() {
        return style;
      },
      get shown() {
        return shown;
      },
      get closed() {
        return closed;
      },
      get attached() {
        return !closed;
      },
      setEditingState(value) {
        editingStates.push(value);
      },
      setStyle(nextStyle, textDirection) {
        style = { style: nextStyle, textDirection };
      },
      setEditableSizeAndTransform(size, caretRect) {
        geometry.push({ size, caretRect });
      },
      show() {
        shown = true;
      },
      close() {
        closed = true;
      },
    };
    this.connections.push(connection);
    return connection;
  }
}
