import type { ClipboardService } from "./types";

export type MemoryClipboard = ClipboardService & {
  readonly contents: string | null;
};

/** In-process clipboard, for tests and hosts without a system clipboard. */
export function createMemoryClipboard(initial: string | null = null): MemoryClipboard {
  let contents = initial;
  return {
    get contents() {
      return contents;
    },
    async read() {
      return contents;
    },
    async write(text) {
      contents = text;
    },
  };
}
