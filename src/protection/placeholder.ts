// Placeholders are built from private-use code points U+E000..U+E01F only, so
// no configured symbol can match inside one.
export const PLACEHOLDER_OPEN = '\uE000';
export const PLACEHOLDER_CLOSE = '\uE001';
const DIGIT_BASE = 0xe010;

const RESERVED_CHAR = /[\uE000-\uE01F]/;
export const PLACEHOLDER_PATTERN = /\uE000([\uE010-\uE019]+)\uE001/g;

export function containsReservedChar(text: string): boolean {
  return RESERVED_CHAR.test(text);
}

export function encodePlaceholder(index: number): string {
  let digits = '';
  for (const digit of String(index)) {
    digits += String.fromCharCode(DIGIT_BASE + Number(digit));
  }
  return `${PLACEHOLDER_OPEN}${digits}${PLACEHOLDER_CLOSE}`;
}

export function decodePlaceholderIndex(encodedDigits: string): number {
  let digits = '';
  for (let i = 0; i < encodedDigits.length; i += 1) {
    digits += String(encodedDigits.charCodeAt(i) - DIGIT_BASE);
  }
  return Number(digits);
}
