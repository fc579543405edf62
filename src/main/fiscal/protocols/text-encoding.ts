/**
 * Windows-1251 text encoding
 *
 * Both protocol families exchange text in the Windows Cyrillic code page.
 * Characters outside ASCII and the Cyrillic block are sent as '?'.
 */

const UNICODE_TO_CP1251: Record<string, number> = {
  'Ё': 0xa8,
  'ё': 0xb8,
  '№': 0xb9,
  '«': 0xab,
  '»': 0xbb,
  '€': 0x88,
  '–': 0x96,
  '—': 0x97,
};

const CP1251_TO_UNICODE: Record<number, string> = Object.fromEntries(
  Object.entries(UNICODE_TO_CP1251).map(([char, byte]) => [byte, char])
);

// А..я are contiguous in both tables
const CYRILLIC_FIRST = 0x0410;
const CYRILLIC_LAST = 0x044f;
const CP1251_CYRILLIC_FIRST = 0xc0;

const FALLBACK = 0x3f; // '?'

export function encodeCp1251(text: string): Buffer {
  const bytes: number[] = [];

  for (const char of text) {
    const code = char.charCodeAt(0);
    if (code < 0x80) {
      bytes.push(code);
    } else if (code >= CYRILLIC_FIRST && code <= CYRILLIC_LAST) {
      bytes.push(code - CYRILLIC_FIRST + CP1251_CYRILLIC_FIRST);
    } else {
      bytes.push(UNICODE_TO_CP1251[char] ?? FALLBACK);
    }
  }

  return Buffer.from(bytes);
}

export function decodeCp1251(bytes: Uint8Array): string {
  let text = '';

  for (const byte of bytes) {
    if (byte < 0x80) {
      text += String.fromCharCode(byte);
    } else if (byte >= CP1251_CYRILLIC_FIRST) {
      text += String.fromCharCode(byte - CP1251_CYRILLIC_FIRST + CYRILLIC_FIRST);
    } else {
      text += CP1251_TO_UNICODE[byte] ?? '?';
    }
  }

  return text;
}
