/** Whitespace code units used for word and caret movement decisions. */
export function isWhitespace(codeUnit: number): boolean {
  switch (codeUnit) {
    case 0x20: // space
    case 0xa0: // no-break space
    case 0x1680: // ogham space mark
    case 0x202f: // narrow no-break space
    case 0x205f: // medium mathematical space
    case 0x3000: // ideographic space
      return true;
    default:
      return (
        (codeUnit >= 0x09 && codeUnit <= 0x0d) ||
        (codeUnit >= 0x1c && codeUnit <= 0x1f) ||
        (codeUnit >= 0x2000 && codeUnit <= 0x200a)
      );
  }
}

export function isWhitespaceText(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (!isWhitespace(text.charCodeAt(i))) {
      return false;
    }
  }
  return true;
}
