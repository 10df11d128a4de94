export type GraphemeSegment = {
  segment: string;
  index: number;
};

export type WordSegment = GraphemeSegment & {
  isWordLike: boolean;
};

const graphemeSegmenter = new Intl.Segmenter(undefined, {
  granularity: "grapheme",
});

const wordSegmenters = new Map<string, Intl.Segmenter>();

function isAsciiText(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) > 0x7f) {
      return false;
    }
  }
  return true;
}

export function graphemeSegments(text: string): GraphemeSegment[] {
  // CR LF is the only ASCII pair that forms a single cluster.
  if (isAsciiText(text) && !text.includes("\r\n")) {
    const segments: GraphemeSegment[] = [];
    for (let i = 0; i < text.length; i += 1) {
      segments.push({ segment: text[i] ?? "", index: i });
    }
    return segments;
  }
  return Array.from(graphemeSegmenter.segment(text), ({ segment, index }) => ({
    segment,
    index,
  }));
}

export function graphemeCount(text: string): number {
  return graphemeSegments(text).length;
}

export function wordSegments(text: string, locale = "en"): WordSegment[] {
  let segmenter = wordSegmenters.get(locale);
  if (!segmenter) {
    segmenter = new Intl.Segmenter(locale, { granularity: "word" });
    wordSegmenters.set(locale, segmenter);
  }
  return Array.from(segmenter.segment(text), (segment) => ({
    segment: segment.segment,
    index: segment.index,
    isWordLike: segment.isWordLike ?? false,
  }));
}
