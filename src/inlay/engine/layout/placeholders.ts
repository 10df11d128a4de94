import { UnavailableError } from "../../core/errors";
import {
  placeholderSpans,
  requiresBaseline,
  type InlineObjectSpan,
  type Span,
} from "../../core/spans/span-builder";
import type { Point, Result, Size, TextBaseline } from "../../core/types";
import type { PlaceholderDimensions } from "./text-shaper";

export type InlineContentConstraints = {
  maxWidth: number;
};

/** Measurement and hit-testing surface of externally rendered inline content. */
export interface InlineContent {
  layout(constraints: InlineContentConstraints): Size;
  /** Size the content would take, without side effects. Falls back to `layout`. */
  dryLayout?(constraints: InlineContentConstraints): Size;
  minIntrinsicWidth?(height: number): number;
  maxIntrinsicWidth?(height: number): number;
  minIntrinsicHeight?(width: number): number;
  distanceToBaseline?(baseline: TextBaseline): number | null;
  /** `point` is relative to the content's own top-left corner. */
  hitTest?(point: Point): boolean;
}

export type InlineContentAdapter<TContent> = (
  content: TContent,
  span: InlineObjectSpan<TContent>,
) => InlineContent;

export type PlaceholderLayout<TContent> = {
  span: InlineObjectSpan<TContent>;
  child: InlineContent;
  dimensions: PlaceholderDimensions;
};

export type PlaceholderLayoutOptions<TContent> = {
  maxWidth: number;
  textScaleFactor: number;
  adapter: InlineContentAdapter<TContent>;
};

export function canComputeIntrinsics<TContent>(
  spans: readonly Span<TContent>[],
): boolean {
  return placeholderSpans(spans).every((span) => !requiresBaseline(span.alignment));
}

export function layoutPlaceholders<TContent>(
  spans: readonly Span<TContent>[],
  options: PlaceholderLayoutOptions<TContent>,
): PlaceholderLayout<TContent>[] {
  const constraints = { maxWidth: options.maxWidth / options.textScaleFactor };
  return placeholderSpans(spans).map((span) => {
    const child = options.adapter(span.content, span);
    const size = child.layout(constraints);
    const baselineOffset =
      span.alignment === "baseline"
        ? child.distanceToBaseline?.(span.baseline ?? "alphabetic") ?? null
        : null;
    return {
      span,
      child,
      dimensions: {
        width: size.width,
        height: size.height,
        alignment: span.alignment,
        baseline: span.baseline,
        baselineOffset,
      },
    };
  });
}

/**
 * Sizes inline content without laying it out. Baseline-dependent alignments
 * have no answer here.
 */
export function dryLayoutPlaceholders<TContent>(
  spans: readonly Span<TContent>[],
  options: PlaceholderLayoutOptions<TContent>,
): Result<PlaceholderDimensions[], UnavailableError> {
  if (!canComputeIntrinsics(spans)) {
    return {
      ok: false,
      error: new UnavailableError(
        "dry layout is unavailable for baseline-aligned inline content",
      ),
    };
  }
  const constraints = { maxWidth: options.maxWidth / options.textScaleFactor };
  return {
    ok: true,
    value: placeholderSpans(spans).map((span) => {
      const child = options.adapter(span.content, span);
      const size = child.dryLayout
        ? child.dryLayout(constraints)
        : child.layout(constraints);
      return {
        width: size.width,
        height: size.height,
        alignment: span.alignment,
        baseline: span.baseline,
        baselineOffset: null,
      };
    }),
  };
}

export type IntrinsicQuery =
  | { kind: "minWidth" | "maxWidth"; height: number }
  | { kind: "height"; width: number };

/**
 * Placeholders for intrinsic measurement. Width queries take the children's
 * intrinsic widths, and every placeholder keeps the child's height.
 */
export function intrinsicPlaceholders<TContent>(
  spans: readonly Span<TContent>[],
  adapter: InlineContentAdapter<TContent>,
  query: IntrinsicQuery,
): PlaceholderDimensions[] {
  const maxWidth = query.kind === "height" ? query.width : Infinity;
  return placeholderSpans(spans).map((span) => {
    const child = adapter(span.content, span);
    const constraints = { maxWidth };
    const size = child.dryLayout ? child.dryLayout(constraints) : child.layout(constraints);
    let width = size.width;
    if (query.kind === "minWidth") {
      width = child.minIntrinsicWidth?.(query.height) ?? width;
    } else if (query.kind === "maxWidth") {
      width = child.maxIntrinsicWidth?.(query.height) ?? width;
    }
    return {
      width,
      height: child.minIntrinsicHeight?.(width) ?? size.height,
      alignment: span.alignment,
      baseline: span.baseline,
      baselineOffset: null,
    };
  });
}
