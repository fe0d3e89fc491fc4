/**
 * Compiles a shell-style wildcard pattern into an anchored RegExp.
 *
 * `*` matches any run of characters (slashes and newlines included), `?` a
 * single character, `[...]` a character set and `[!...]` or `[^...]` its
 * negation. An unterminated `[` is taken literally. Matching is
 * case-sensitive.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const char = pattern.charAt(i);
    i++;

    if (char === '*') {
      source += '[\\s\\S]*';
    } else if (char === '?') {
      source += '[\\s\\S]';
    } else if (char === '[') {
      let j = i;
      if (pattern.charAt(j) === '!' || pattern.charAt(j) === '^') j++;
      if (pattern.charAt(j) === ']') j++;
      while (j < pattern.length && pattern.charAt(j) !== ']') j++;

      if (j >= pattern.length) {
        source += '\\[';
        continue;
      }

      let body = pattern.slice(i, j);
      i = j + 1;
      let negate = false;
      if (body.startsWith('!') || body.startsWith('^')) {
        negate = true;
        body = body.slice(1);
      }
      const escapedBody = body.replace(/[\\\]^]/g, '\\$&');
      source += negate ? `[^${escapedBody}]` : `[${escapedBody}]`;
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
    }
  }

  return new RegExp(`^${source}$`);
}

