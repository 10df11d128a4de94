import type { CSSProperties, ReactNode } from "react";
import type { InlineObjectSpan, Span } from "../core/spans/span-builder";
import type { PlaceholderAlignment, TextStyle } from "../core/types";

export type InlineObjectRenderer<TContent> = (
  content: TContent,
  span: InlineObjectSpan<TContent>,
) => ReactNode;

export interface InlineTextProps<TContent> {
  spans: readonly Span<TContent>[];
  renderInlineObject: InlineObjectRenderer<TContent>;
  className?: string;
  style?: CSSProperties;
}

const VERTICAL_ALIGN: Record<PlaceholderAlignment, CSSProperties["verticalAlign"]> = {
  baseline: "baseline",
  aboveBaseline: "baseline",
  belowBaseline: "text-top",
  top: "top",
  bottom: "bottom",
  middle: "middle",
};

export function verticalAlignFor(
  alignment: PlaceholderAlignment,
): CSSProperties["verticalAlign"] {
  return VERTICAL_ALIGN[alignment];
}

/** CSS for a text run; `undefined` when the run has no styling. */
export function textStyleToCss(
  style: TextStyle,
  composing = false,
): CSSProperties | undefined {
  const css: CSSProperties = {};
  if (style.fontFamily !== undefined) {
    css.fontFamily = style.fontFamily;
  }
  if (style.fontSize !== undefined) {
    css.fontSize = style.fontSize;
  }
  if (style.color !== undefined) {
    css.color = style.color;
  }
  if (composing) {
    css.textDecoration = "underline";
  } else if (style.decoration !== undefined) {
    css.textDecoration = style.decoration;
  }
  return Object.keys(css).length > 0 ? css : undefined;
}

/**
 * Renders a span list as inline HTML. Inline objects are wrapped so the
 * host can find them by their code point.
 */
export function InlineText<TContent>({
  spans,
  renderInlineObject,
  className,
  style,
}: InlineTextProps<TContent>) {
  return (
    <span className={className} style={{ whiteSpace: "pre-wrap", ...style }}>
      {spans.map((span) => {
        if (span.kind === "text") {
          return (
            <span key={span.start} style={textStyleToCss(span.style, span.composing)}>
              {span.text}
            </span>
          );
        }
        return (
          <span
            key={span.start}
            data-inline-object=""
            data-code-point={span.codePoint.toString(16).toUpperCase()}
            style={{
              display: "inline-block",
              verticalAlign: verticalAlignFor(span.alignment),
            }}
          >
            {renderInlineObject(span.content, span)}
          </span>
        );
      })}
    </span>
  );
}
