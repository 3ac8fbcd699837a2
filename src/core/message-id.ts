/**
 * Message-ID helpers. Reference headers arrive in several shapes:
 * `<a@b>`, `a@b`, `<a@b> <c@d>`, `<a@b><c@d>`, comma separated lists.
 */

/** Strip surrounding whitespace and angle brackets from one id. */
export function normalizeMessageId(value: string): string {
  return value.trim().replace(/^<+/, '').replace(/>+$/, '').trim();
}

/** Every id listed in a reference header, in header order. */
export function extractMessageIds(header: string | null | undefined): string[] {
  if (!header) return [];

  if (header.includes('<')) {
    const bracketed = Array.from(header.matchAll(/<([^<>]+)>/g), (match) => normalizeMessageId(match[1] ?? ''));
    const ids = bracketed.filter(Boolean);
    if (ids.length > 0) return ids;
  }

  return header
    .split(/[\s,]+/)
    .map(normalizeMessageId)
    .filter(Boolean);
}

/** The primary reference of a header: its first id. */
export function primaryReference(header: string | null | undefined): string | null {
  return extractMessageIds(header)[0] ?? null;
}

/** True when `header` lists `messageId` among its references. */
export function referencesMessage(header: string | null | undefined, messageId: string): boolean {
  const target = normalizeMessageId(messageId);
  return extractMessageIds(header).includes(target);
}
