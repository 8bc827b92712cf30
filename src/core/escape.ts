/**
 * Escaping for double-quoted string literals in generated source
 */

const UNESCAPES: Record<string, string> = {
  '\\': '\\',
  '"': '"',
  n: '\n',
  r: '\r',
};

/**
 * Escape text so it can sit between double quotes in generated code.
 * Backslashes go first so the ones added for quotes and newlines stay single.
 */
export function escapeContent(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
}

/**
 * Escape a file name for a double-quoted literal.
 * Names skip line-ending normalisation, so a carriage return needs its own escape.
 */
export function escapeName(name: string): string {
  return escapeContent(name).replace(/\r/g, '\\r');
}

/**
 * Reverse of escapeContent and escapeName
 */
export function unescapeContent(escaped: string): string {
  return escaped.replace(/\\(["\\nr])/g, (_match, char: string) => UNESCAPES[char] ?? char);
}

// Text-mode reads see every line ending as \n
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}
