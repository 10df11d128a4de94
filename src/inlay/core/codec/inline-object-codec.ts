import { InvalidArgumentError } from "../errors";

export const RESERVED_START = 0xe000;
export const RESERVED_END = 0xf8ff;

export function isReserved(codePoint: number): boolean {
  return codePoint >= RESERVED_START && codePoint <= RESERVED_END;
}

/** True iff `token` is exactly one code point and that code point is reserved. */
export function isInlineObjectToken(token: string): boolean {
  const codePoint = token.codePointAt(0);
  if (codePoint === undefined) {
    return false;
  }
  return String.fromCodePoint(codePoint).length === token.length && isReserved(codePoint);
}

export type InlineObjectResolver<TContent> = (
  codePoint: number,
) => TContent | null | undefined;

export type InlineObjectCodec<TContent> = {
  isReserved(codePoint: number): boolean;
  /** `null` means "no mapping": the code point renders as plain text. */
  decode(codePoint: number): TContent | null;
};

export function createInlineObjectCodec<TContent>(
  resolver: InlineObjectResolver<TContent>,
): InlineObjectCodec<TContent> {
  const reportedFailures = new Set<number>();

  return {
    isReserved,
    decode(codePoint) {
      if (!isReserved(codePoint)) {
        return null;
      }
      try {
        return resolver(codePoint) ?? null;
      } catch (error) {
        if (!reportedFailures.has(codePoint)) {
          reportedFailures.add(codePoint);
          console.warn(
            `[inlay] resolver failed for U+${codePoint.toString(16).toUpperCase()}, rendering it as text`,
            error,
          );
        }
        return null;
      }
    },
  };
}

export type InlineObjectRegistry<TTag extends string> = {
  readonly tags: readonly TTag[];
  /** Returns the one-code-point token for a tag. */
  encode(tag: TTag): string;
  decode(token: string): TTag | null;
  codePointOf(tag: TTag): number | null;
  tagOf(codePoint: number): TTag | null;
};

export function createInlineObjectRegistry<TTag extends string>(
  entries: Iterable<readonly [TTag, number]>,
): InlineObjectRegistry<TTag> {
  const byTag = new Map<TTag, number>();
  const byCodePoint = new Map<number, TTag>();

  for (const [tag, codePoint] of entries) {
    if (!Number.isInteger(codePoint) || !isReserved(codePoint)) {
      throw new InvalidArgumentError(
        `code point ${codePoint} for "${tag}" is outside U+E000..U+F8FF`,
      );
    }
    if (byTag.has(tag)) {
      throw new InvalidArgumentError(`duplicate inline object tag "${tag}"`);
    }
    const existing = byCodePoint.get(codePoint);
    if (existing !== undefined) {
      throw new InvalidArgumentError(
        `code point U+${codePoint.toString(16).toUpperCase()} is already used by "${existing}"`,
      );
    }
    byTag.set(tag, codePoint);
    byCodePoint.set(codePoint, tag);
  }

  return {
    tags: Array.from(byTag.keys()),
    encode(tag) {
      const codePoint = byTag.get(tag);
      if (codePoint === undefined) {
        throw new InvalidArgumentError(`unknown inline object tag "${tag}"`);
      }
      return String.fromCodePoint(codePoint);
    },
    decode(token) {
      if (!isInlineObjectToken(token)) {
        return null;
      }
      const codePoint = token.codePointAt(0);
      return codePoint === undefined ? null : byCodePoint.get(codePoint) ?? null;
    },
    codePointOf(tag) {
      return byTag.get(tag) ?? null;
    },
    tagOf(codePoint) {
      return byCodePoint.get(codePoint) ?? null;
    },
  };
}
