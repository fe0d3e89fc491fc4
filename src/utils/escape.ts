const ESCAPES: Record<string, string> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
  '\v': '\\v',
  '\x07': '\\a',
  '\\': '\\\\',
  '\0': '\\0',
};

const UNESCAPES: Record<string, string> = Object.fromEntries(
  Object.entries(ESCAPES).map(([char, escaped]) => [escaped, char]),
);

// Every C0 control, DEL and the backslash itself.
const ESCAPABLE = /[\x00-\x1f\x7f\\]/g;
const ESCAPED = /\\(?:[nrtbfva0\\]|x[0-9a-fA-F]{2})/g;

/**
 * Renders control characters as visible escape sequences so a value fits on
 * one table line or input field. Inverse of {@link unescapeControlChars}.
 */
export function escapeControlChars(text: string): string {
  return text.replace(ESCAPABLE, (char) => {
    const known = ESCAPES[char];
    if (known !== undefined) {
      return known;
    }
    return `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`;
  });
}

export function unescapeControlChars(text: string): string {
  return text.replace(ESCAPED, (sequence) => {
    const known = UNESCAPES[sequence];
    if (known !== undefined) {
      return known;
    }
    return String.fromCharCode(parseInt(sequence.slice(2), 16));
  });
}
