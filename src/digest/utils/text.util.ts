const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;

const ENTITY_MAP: Record<string, string> = {
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value
    .replace(
      /&(lt|gt|quot|#39|apos|nbsp);/g,
      (match) => ENTITY_MAP[match] ?? match,
    )
    .replace(/&#(\d+);/g, (match, code: string) => {
      const point = Number(code);
      return Number.isInteger(point) && point > 0 && point <= 0x10ffff
        ? String.fromCodePoint(point)
        : match;
    })
    .replace(/&amp;/g, '&');
}

export function stripCdata(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(/<!\[CDATA\[([\s\S]*?)\]\]>/gi, '$1');
}

/** Removes every `<...>` tag, collapses whitespace runs and trims. */
export function stripMarkup(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(TAG_RE, '').replace(WS_RE, ' ').trim();
}

export function truncate(value: string, maxChars: number): string {
  return value.length > maxChars ? value.slice(0, maxChars) : value;
}

/**
 * Lower-cased, whitespace-split first `count` words of a title, as a set.
 */
export function titlePrefixTokens(title: string, count = 5): Set<string> {
  const words = (title || '')
    .trim()
    .toLowerCase()
    .split(WS_RE)
    .filter(Boolean);
  return new Set(words.slice(0, count));
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export function asText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}
