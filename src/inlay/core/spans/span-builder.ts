import type { InlineObjectCodec } from "../codec/inline-object-codec";
import { InvalidArgumentError } from "../errors";
import type {
  PlaceholderAlignment,
  TextBaseline,
  TextRange,
  TextStyle,
} from "../types";

export type TextSpan = {
  kind: "text";
  start: number;
  text: string;
  style: TextStyle;
  composing: boolean;
};

export type InlineObjectSpan<TContent> = {
  kind: "inline-object";
  start: number;
  /** The single reserved code point the object is stored as. */
  text: string;
  codePoint: number;
  content: TContent;
  alignment: PlaceholderAlignment;
  baseline: TextBaseline | null;
  style: TextStyle;
};

export type Span<TContent> = TextSpan | InlineObjectSpan<TContent>;

export type BuildSpansOptions<TContent> = {
  codec: InlineObjectCodec<TContent>;
  style?: TextStyle;
  composing?: TextRange;
  alignment?: PlaceholderAlignment;
  baseline?: TextBaseline | null;
};

export function requiresBaseline(alignment: PlaceholderAlignment): boolean {
  return (
    alignment === "baseline" ||
    alignment === "aboveBaseline" ||
    alignment === "belowBaseline"
  );
}

const COMPOSING_DECORATION: TextStyle = { decoration: "underline" };

export function buildSpans<TContent>(
  text: string,
  options: BuildSpansOptions<TContent>,
): Span<TContent>[] {
  const style = options.style ?? {};
  const alignment = options.alignment ?? "bottom";
  const baseline =
    options.baseline === undefined ? "alphabetic" : options.baseline;
  if (baseline === null && requiresBaseline(alignment)) {
    throw new InvalidArgumentError(
      `alignment "${alignment}" requires a text baseline`,
    );
  }

  const composing = options.composing;
  const composingStart = composing ? composing.start : -1;
  const composingEnd = composing ? composing.end : -1;
  const hasComposing = composingStart >= 0 && composingEnd > composingStart;

  const spans: Span<TContent>[] = [];

  const pushText = (start: number, end: number, composing: boolean) => {
    if (end <= start) {
      return;
    }
    spans.push({
      kind: "text",
      start,
      text: text.slice(start, end),
      style: composing ? { ...style, ...COMPOSING_DECORATION } : style,
      composing,
    });
  };

  const emitText = (start: number, end: number) => {
    if (!hasComposing || composingEnd <= start || composingStart >= end) {
      pushText(start, end, false);
      return;
    }
    const from = Math.max(start, composingStart);
    const to = Math.min(end, composingEnd);
    pushText(start, from, false);
    pushText(from, to, true);
    pushText(to, end, false);
  };

  let runStart = 0;
  let index = 0;
  while (index < text.length) {
    const codePoint = text.codePointAt(index) ?? 0;
    const width = codePoint > 0xffff ? 2 : 1;
    if (!options.codec.isReserved(codePoint)) {
      index += width;
      continue;
    }

    emitText(runStart, index);
    const content = options.codec.decode(codePoint);
    if (content === null) {
      emitText(index, index + width);
    } else {
      spans.push({
        kind: "inline-object",
        start: index,
        text: text.slice(index, index + width),
        codePoint,
        content,
        alignment,
        baseline,
        style,
      });
    }
    index += width;
    runStart = index;
  }
  emitText(runStart, text.length);

  return spans;
}

export function spanLength<TContent>(span: Span<TContent>): number {
  return span.text.length;
}

export function spanEnd<TContent>(span: Span<TContent>): number {
  return span.start + span.text.length;
}

export function spansToText<TContent>(spans: readonly Span<TContent>[]): string {
  return spans.map((span) => span.text).join("");
}

export function placeholderSpans<TContent>(
  spans: readonly Span<TContent>[],
): InlineObjectSpan<TContent>[] {
  const result: InlineObjectSpan<TContent>[] = [];
  for (const span of spans) {
    if (span.kind === "inline-object") {
      result.push(span);
    }
  }
  return result;
}

/** The span containing `offset`; an offset on a boundary belongs to the span after it. */
export function spanAtOffset<TContent>(
  spans: readonly Span<TContent>[],
  offset: number,
): Span<TContent> | null {
  for (const span of spans) {
    if (offset >= span.start && offset < spanEnd(span)) {
      return span;
    }
  }
  return null;
}
