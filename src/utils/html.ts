/**
 * HTML entity decoding for provider and model text.
 *
 * @module utils/html
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  hellip: '…',
  mdash: '—',
  ndash: '–',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
};

const ENTITY_PATTERN = /&(#\d+|#[xX][0-9a-fA-F]+|[a-zA-Z]+);/g;

/**
 * Decode named and numeric character references in one pass.
 *
 * Unknown names are left as written, so `&amp;lt;` decodes to `&lt;`.
 *
 * @example
 * decodeHtmlEntities('Tom &amp; Jerry &#39;95') // "Tom & Jerry '95"
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(ENTITY_PATTERN, (entity: string, body: string) => {
    if (body.startsWith('#')) {
      const isHex = body[1] === 'x' || body[1] === 'X';
      const codePoint = parseInt(body.slice(isHex ? 2 : 1), isHex ? 16 : 10);
      if (!Number.isFinite(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
        return entity;
      }
      return String.fromCodePoint(codePoint);
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

/**
 * Remove markup tags left in caption text.
 */
export function stripTags(text: string): string {
  return text.replace(/<[^>]*>/g, '');
}
