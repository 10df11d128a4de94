import { describe, expect, it } from "vitest";
import { cursorMapForText } from "../core/mapping/cursor-map";
import {
  isWhitespaceRange,
  nextCharacter,
  previousCharacter,
  wordBoundaryAt,
} from "./word-break";
import { isWhitespace, isWhitespaceText } from "./whitespace";

describe("word-break: wordBoundaryAt", () => {
  it("returns the segment containing the offset", () => {
    expect(wordBoundaryAt("hello world", 2)).toEqual({ start: 0, end: 5 });
    expect(wordBoundaryAt("hello world", 5)).toEqual({ start: 5, end: 6 });
    expect(wordBoundaryAt("hello world", 6)).toEqual({ start: 6, end: 11 });
  });

  it("collapses at the end of the text", () => {
    expect(wordBoundaryAt("hello", 5)).toEqual({ start: 5, end: 5 });
    expect(wordBoundaryAt("", 0)).toEqual({ start: 0, end: 0 });
  });
});

describe("word-break: character stepping", () => {
  const text = "ab  cd";
  const { boundaries } = cursorMapForText(text);

  it("steps to the next cluster", () => {
    expect(nextCharacter(boundaries, text, 0)).toBe(1);
    expect(nextCharacter(boundaries, text, 6)).toBe(6);
  });

  it("skips whitespace when asked", () => {
    expect(nextCharacter(boundaries, text, 1, false)).toBe(4);
    expect(previousCharacter(boundaries, text, 4)).toBe(3);
    expect(previousCharacter(boundaries, text, 4, false)).toBe(1);
    expect(previousCharacter(boundaries, text, 0)).toBe(0);
  });

  it("keeps surrogate pairs whole", () => {
    const emoji = "a😀b";
    const map = cursorMapForText(emoji);
    expect(nextCharacter(map.boundaries, emoji, 1)).toBe(3);
    expect(previousCharacter(map.boundaries, emoji, 3)).toBe(1);
  });
});

describe("whitespace", () => {
  it("recognises the editing whitespace set", () => {
    expect(isWhitespace(0x20)).toBe(true);
    expect(isWhitespace(0x0a)).toBe(true);
    expect(isWhitespace(0x3000)).toBe(true);
    expect(isWhitespace(0x200b)).toBe(false);
    expect(isWhitespace(0x61)).toBe(false);
    expect(isWhitespaceText(" \t")).toBe(true);
    expect(isWhitespaceRange("a  b", { start: 1, end: 3 })).toBe(true);
    expect(isWhitespaceRange("a  b", { start: 0, end: 3 })).toBe(false);
  });
});
