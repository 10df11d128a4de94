import {
  createInlineObjectRegistry,
  type InlineObjectRegistry,
  type InlineObjectResolver,
} from "../../core/codec/inline-object-codec";
import { InvalidArgumentError } from "../../core/errors";
import type { InlineContent } from "../../engine/layout/placeholders";
import table from "./emoji-table.json";

export type EmojiEntry = {
  tag: string;
  codePoint: number;
  label: string;
  /** Image file name, relative to the asset base the resolver is given. */
  asset: string;
};

/** The content an emoji code point decodes to. */
export type Emoji = {
  tag: string;
  label: string;
  src: string;
  size: number;
};

export type EmojiResolverOptions = {
  assetBase?: string;
  /** Edge length of the square image, in logical pixels. */
  size?: number;
};

const DEFAULT_EMOJI_SIZE = 20;

export const emojiTable: readonly EmojiEntry[] = table;

export type EmojiRegistry = InlineObjectRegistry<string> & {
  entry(tag: string): EmojiEntry | null;
};

export function createEmojiRegistry(
  entries: readonly EmojiEntry[] = emojiTable,
): EmojiRegistry {
  const byTag = new Map(entries.map((entry) => [entry.tag, entry] as const));
  const registry = createInlineObjectRegistry(
    entries.map((entry) => [entry.tag, entry.codePoint] as const),
  );
  return {
    ...registry,
    entry(tag) {
      return byTag.get(tag) ?? null;
    },
  };
}

function joinAsset(base: string, asset: string): string {
  if (!base) {
    return asset;
  }
  return base.endsWith("/") ? `${base}${asset}` : `${base}/${asset}`;
}

export function createEmojiResolver(
  registry: EmojiRegistry,
  options: EmojiResolverOptions = {},
): InlineObjectResolver<Emoji> {
  const size = options.size ?? DEFAULT_EMOJI_SIZE;
  if (!(size > 0)) {
    throw new InvalidArgumentError(`emoji size must be positive, got ${size}`);
  }
  const assetBase = options.assetBase ?? "";
  const cache = new Map<number, Emoji>();

  return (codePoint) => {
    const cached = cache.get(codePoint);
    if (cached) {
      return cached;
    }
    const tag = registry.tagOf(codePoint);
    const entry = tag === null ? null : registry.entry(tag);
    if (!entry) {
      return null;
    }
    const emoji: Emoji = {
      tag: entry.tag,
      label: entry.label,
      src: joinAsset(assetBase, entry.asset),
      size,
    };
    cache.set(codePoint, emoji);
    return emoji;
  };
}

/** Square, fixed-size inline content that sits on the text baseline. */
export function emojiInlineContent(emoji: Emoji): InlineContent {
  const { size } = emoji;
  return {
    layout: () => ({ width: size, height: size }),
    minIntrinsicWidth: () => size,
    maxIntrinsicWidth: () => size,
    distanceToBaseline: () => size,
  };
}
