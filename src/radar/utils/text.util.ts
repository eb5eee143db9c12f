const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
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
  return value.replace(
    /&(amp|lt|gt|quot|#39|apos|nbsp);/g,
    (match) => ENTITY_MAP[match] ?? match,
  );
}

export function stripCdata(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(/^\s*<!\[CDATA\[([\s\S]*?)\]\]>\s*$/i, '$1');
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  // entities first: feeds often escape the markup they embed
  const decoded = decodeHtmlEntities(stripCdata(value));
  return decoded.replace(TAG_RE, ' ').replace(WS_RE, ' ').trim();
}

/** Keeps the leading `maxChars` characters, cutting back to a word boundary when one is close. */
export function truncateLeading(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }
  const head = value.slice(0, maxChars);
  const lastSpace = head.lastIndexOf(' ');
  if (lastSpace >= maxChars * 0.8) {
    return head.slice(0, lastSpace);
  }
  return head;
}

export function articleText(title: string, body: string): string {
  const cleanTitle = cleanText(title);
  const cleanBody = cleanText(body);
  if (!cleanBody) {
    return cleanTitle;
  }
  if (!cleanTitle) {
    return cleanBody;
  }
  return `${cleanTitle}. ${cleanBody}`;
}
