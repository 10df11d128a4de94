import { describe, expect, it, vi } from "vitest";
import { InvalidArgumentError } from "../errors";
import {
  createInlineObjectCodec,
  createInlineObjectRegistry,
  isInlineObjectToken,
  isReserved,
} from "./inline-object-codec";

describe("inline-object-codec: isReserved", () => {
  it("covers the private use area inclusively", () => {
    expect(isReserved(0xdfff)).toBe(false);
    expect(isReserved(0xe000)).toBe(true);
    expect(isReserved(0xf8ff)).toBe(true);
    expect(isReserved(0xf900)).toBe(false);
  });
});

describe("inline-object-codec: isInlineObjectToken", () => {
  it("accepts exactly one reserved code point", () => {
    expect(isInlineObjectToken("\uE001")).toBe(true);
    expect(isInlineObjectToken("\uE001\uE002")).toBe(false);
    expect(isInlineObjectToken("a")).toBe(false);
    expect(isInlineObjectToken("")).toBe(false);
  });
});

describe("inline-object-codec: createInlineObjectCodec", () => {
  it("decodes through the resolver", () => {
    const codec = createInlineObjectCodec((codePoint) =>
      codePoint === 0xe001 ? "smile" : null,
    );
    expect(codec.decode(0xe001)).toBe("smile");
    expect(codec.decode(0xe002)).toBeNull();
    expect(codec.decode(0x41)).toBeNull();
  });

  it("treats a throwing resolver as no mapping and warns once", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const codec = createInlineObjectCodec<string>(() => {
      throw new Error("boom");
    });
    expect(codec.decode(0xe005)).toBeNull();
    expect(codec.decode(0xe005)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe(
      "[inlay] resolver failed for U+E005, rendering it as text",
    );
    warn.mockRestore();
  });
});

describe("inline-object-codec: createInlineObjectRegistry", () => {
  it("round-trips tags through tokens", () => {
    const registry = createInlineObjectRegistry([
      ["smile", 0xe001],
      ["heart", 0xe002],
    ] as const);
    for (const tag of registry.tags) {
      expect(registry.decode(registry.encode(tag))).toBe(tag);
    }
    expect(registry.encode("heart")).toBe("\uE002");
    expect(registry.decode("x")).toBeNull();
  });

  it("rejects duplicates and out-of-range code points", () => {
    expect(() =>
      createInlineObjectRegistry([
        ["a", 0xe001],
        ["a", 0xe002],
      ]),
    ).toThrow(InvalidArgumentError);
    expect(() =>
      createInlineObjectRegistry([
        ["a", 0xe001],
        ["b", 0xe001],
      ]),
    ).toThrow('code point U+E001 is already used by "a"');
    expect(() => createInlineObjectRegistry([["a", 0x41]])).toThrow(
      'code point 65 for "a" is outside U+E000..U+F8FF',
    );
  });
});
