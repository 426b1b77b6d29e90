/**
 * Minimal HTML extraction helpers for scraped sources
 */

const NAMED_ENTITIES: Record<string, string> = {
  quot: '"',
  apos: "'",
  lt: '<',
  gt: '>',
  nbsp: ' ',
};

/**
 * Decode the entities found in attribute values. `&amp;` goes last so
 * `&amp;quot;` stays `&quot;`.
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&(quot|apos|lt|gt|nbsp);/g, (_, name: string) => NAMED_ENTITIES[name] ?? '')
    .replace(/&amp;/g, '&');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Value of an attribute inside a single start tag
 */
export function readAttribute(tag: string, name: string): string | null {
  const match = new RegExp(`\\s${escapeRegExp(name)}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'i').exec(tag);
  if (!match) return null;
  return decodeHtmlEntities(match[1] ?? match[2] ?? '');
}

/**
 * Start tags of `tagName` carrying `attr="value"`
 */
export function findTags(html: string, tagName: string, attr?: string, value?: string): string[] {
  const tags = html.match(new RegExp(`<${tagName}\\b[^>]*>`, 'gi')) ?? [];
  if (!attr) return tags;
  return tags.filter((tag) => {
    const actual = readAttribute(tag, attr);
    return actual !== null && (value === undefined || actual === value);
  });
}

/**
 * Content of `<meta name="csrf-token" content="...">`
 */
export function extractCsrfToken(html: string): string | null {
  const [tag] = findTags(html, 'meta', 'name', 'csrf-token');
  if (!tag) return null;
  const content = readAttribute(tag, 'content');
  return content ? content : null;
}

/**
 * Absolute, de-duplicated hrefs of anchors whose path matches `pattern`
 */
export function extractLinks(html: string, baseUrl: string, pattern: RegExp): string[] {
  const links = new Set<string>();
  for (const tag of findTags(html, 'a', 'href')) {
    const href = readAttribute(tag, 'href');
    if (!href || !pattern.test(href)) continue;
    links.add(new URL(href, baseUrl).toString());
  }
  return [...links];
}
