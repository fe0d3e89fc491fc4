const PLACEHOLDER = /\{[^}]+\}/g;
const NAMED_PLACEHOLDER = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;
const MARK_OPEN = '\uE000';
const MARK_CLOSE = '\uE001';
const HELD_TOKEN = /\uE000(\d+)\uE001/g;

interface Slot {
  index: number;
  length: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Finds where the provider put a placeholder: the next `{...}` token, or,
 * when no braced token is left, the placeholder's bare name
 * (`{name}` -> `NAME`).
 */
function findSlot(text: string, placeholder: string): Slot | undefined {
  const braced = new RegExp(PLACEHOLDER.source).exec(text);
  if (braced) {
    return { index: braced.index, length: braced[0].length };
  }

  const name = NAMED_PLACEHOLDER.exec(placeholder)?.[1];
  if (!name) {
    return undefined;
  }
  const bare = new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(name)}(?![\\p{L}\\p{N}_])`, 'iu').exec(text);
  return bare ? { index: bare.index, length: bare[0].length } : undefined;
}

function stripPlaceholders(text: string): string {
  return text.replace(PLACEHOLDER, '');
}

/**
 * Repairs machine translation output: puts the source placeholders back in
 * their original order and normalizes spacing around punctuation.
 */
export function correctTranslation(msgid: string, translation: string): string {
  const placeholders = msgid.match(PLACEHOLDER) ?? [];
  // restored tokens sit behind markers so the spacing rules leave them alone
  const held: string[] = [];
  const hold = (placeholder: string): string => {
    held.push(placeholder);
    return `${MARK_OPEN}${held.length - 1}${MARK_CLOSE}`;
  };
  let rest = translation;
  let result = '';

  for (const placeholder of placeholders) {
    const slot = findSlot(rest, placeholder);
    if (slot) {
      result += rest.slice(0, slot.index) + hold(placeholder);
      rest = rest.slice(slot.index + slot.length);
    } else {
      result += `${stripPlaceholders(rest)} ${hold(placeholder)}`;
      rest = '';
    }
  }
  result += stripPlaceholders(rest);

  return result
    .replace(/\s+/g, ' ')
    .replace(/\s+([.,;:!?%)])/g, '$1')
    .replace(/\(\s+/g, '(')
    .replace(/\s+-\s*([\p{L}\p{N}_])/gu, '-$1')
    .trim()
    .replace(HELD_TOKEN, (_marker, index: string) => held[Number(index)] ?? '');
}
