import { describe, expect, it, vi } from "vitest";
import { EditingController } from "./controller";
import {
  collapsedSelection,
  createEditingValue,
  textSelection,
} from "./editing-value";
import { InvalidArgumentError } from "./errors";
import type { EditingValue } from "./types";

const OBJECT = "\uE001";

describe("controller: insertInlineObject", () => {
  it("inserts at the base offset without removing the selection", () => {
    const controller = new EditingController({
      value: createEditingValue({
        text: "AEBBDDCCDDD",
        selection: textSelection(1, 2),
      }),
    });
    const result = controller.addSpan(OBJECT);
    expect(result.ok).toBe(true);
    expect(controller.text).toBe("A\uE001EBBDDCCDDD");
    expect(controller.selection).toEqual(collapsedSelection(2));
  });

  it("grows the text by one and puts the caret after the object", () => {
    const text = "abcd";
    for (let k = 0; k <= text.length; k += 1) {
      const controller = new EditingController({
        value: createEditingValue({ text, selection: collapsedSelection(k) }),
      });
      controller.insertInlineObject(OBJECT);
      expect(controller.text.length).toBe(text.length + 1);
      expect(controller.text[k]).toBe(OBJECT);
      expect(controller.selection.baseOffset).toBe(k + 1);
      expect(controller.selection.extentOffset).toBe(k + 1);
    }
  });

  it("appends when there is no selection", () => {
    const controller = new EditingController({ text: "ab" });
    controller.insertInlineObject(OBJECT);
    expect(controller.text).toBe("ab\uE001");
    expect(controller.selection).toEqual(collapsedSelection(3));
  });

  it("rejects anything but one reserved code point", () => {
    const controller = new EditingController({ text: "ab" });
    expect(() => controller.insertInlineObject("a")).toThrow(InvalidArgumentError);
    expect(() => controller.insertInlineObject(`${OBJECT}${OBJECT}`)).toThrow(
      InvalidArgumentError,
    );
    expect(controller.text).toBe("ab");
  });
});

describe("controller: replace", () => {
  it("keeps the previous value when the selection is out of bounds", () => {
    const controller = new EditingController({ text: "abc" });
    const observer = vi.fn();
    controller.subscribe(observer);
    const result = controller.replace(
      createEditingValue({ text: "abc", selection: collapsedSelection(9) }),
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("validation");
    }
    expect(controller.selection.baseOffset).toBe(-1);
    expect(observer).not.toHaveBeenCalled();
  });

  it("notifies once per change and not for an equal value", () => {
    const controller = new EditingController({ text: "abc" });
    const observer = vi.fn();
    controller.subscribe(observer);
    const next = createEditingValue({ text: "abc", selection: collapsedSelection(1) });
    controller.replace(next);
    controller.replace(next);
    expect(observer).toHaveBeenCalledTimes(1);
    expect(observer.mock.calls[0]?.[0]).toEqual(next);
  });

  it("runs formatters only when the text changes", () => {
    const formatter = vi.fn((_old: EditingValue, next: EditingValue) =>
      createEditingValue({
        text: next.text.toUpperCase(),
        selection: next.selection,
        composing: next.composing,
      }),
    );
    const controller = new EditingController({ text: "ab", formatters: [formatter] });
    controller.setSelection(collapsedSelection(1));
    expect(formatter).not.toHaveBeenCalled();
    controller.replace(
      createEditingValue({ text: "abc", selection: collapsedSelection(3) }),
    );
    expect(formatter).toHaveBeenCalledTimes(1);
    expect(controller.text).toBe("ABC");
  });

  it("turns a throwing formatter into a validation error", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const controller = new EditingController({
      text: "ab",
      formatters: [
        () => {
          throw new Error("digits only");
        },
      ],
    });
    const result = controller.setText("xyz");
    expect(result).toEqual({ ok: false, error: expect.objectContaining({ message: "digits only" }) });
    expect(controller.text).toBe("ab");
    warn.mockRestore();
  });

  it("normalizes whitespace directionality after the formatters", () => {
    const controller = new EditingController({ text: "" });
    controller.replace(
      createEditingValue({ text: "a שלום", selection: collapsedSelection(6) }),
    );
    expect(controller.text).toBe("a \u200Eשלום");
    expect(controller.selection.baseOffset).toBe(7);
  });

  it("can run without normalization", () => {
    const controller = new EditingController({ textDirection: null });
    controller.setText("a שלום");
    expect(controller.text).toBe("a שלום");
  });
});

describe("controller: notifications", () => {
  it("queues mutations made by an observer until the round ends", () => {
    const controller = new EditingController({ text: "abc" });
    const seen: string[] = [];
    controller.subscribe((value) => {
      seen.push(`first:${value.composing.start}`);
      if (value.composing.start !== -1) {
        controller.clearComposing();
      }
    });
    controller.subscribe((value) => {
      seen.push(`second:${value.composing.start}`);
    });

    controller.replace(
      createEditingValue({
        text: "abc",
        selection: collapsedSelection(3),
        composing: { start: 0, end: 3 },
      }),
    );

    expect(seen).toEqual(["first:0", "second:0", "first:-1", "second:-1"]);
    expect(controller.value.composing).toEqual({ start: -1, end: -1 });
  });

  it("stops notifying after unsubscribe", () => {
    const controller = new EditingController();
    const observer = vi.fn();
    const unsubscribe = controller.subscribe(observer);
    unsubscribe();
    controller.setText("x");
    expect(observer).not.toHaveBeenCalled();
  });
});

describe("controller: helpers", () => {
  it("clears text and checks selection bounds", () => {
    const controller = new EditingController({ text: "hello" });
    expect(controller.isSelectionWithinTextBounds(collapsedSelection(5))).toBe(true);
    expect(controller.isSelectionWithinTextBounds(textSelection(0, 6))).toBe(false);
    controller.clear();
    expect(controller.value).toEqual(
      createEditingValue({ text: "", selection: collapsedSelection(0) }),
    );
  });
});
