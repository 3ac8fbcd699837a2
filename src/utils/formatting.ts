/**
 * Discord markdown helpers + shared utility types.
 *
 * Discord uses a CommonMark-like syntax:
 *   **bold**  *italic*  `inline code`  ```block```  [label](url)
 */

// ── Shared utility types ────────────────────────────────────────────

/**
 * Discriminated union for operations whose failure is an expected outcome
 * rather than an exception.
 *
 * @example
 * ```ts
 * function parseRule(raw: unknown): Result<FilterConditions> {
 *   if (!valid) return { ok: false, error: 'at least one condition is required' };
 *   return { ok: true, value: conditions };
 * }
 * ```
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** Bold text */
export function bold(text: string): string {
  return `**${text}**`;
}

/** Inline code */
export function inlineCode(text: string): string {
  return `\`${text.replace(/`/g, "'")}\``;
}

/** Fenced code block with an optional language tag */
export function codeBlock(text: string, language: string = ''): string {
  return `\`\`\`${language}\n${text}\n\`\`\``;
}

/** Markdown link; square brackets in the label would end it early */
export function link(label: string, url: string | null): string {
  const safeLabel = label.replace(/[[\]]/g, '');
  return url ? `[${safeLabel}](${url})` : safeLabel;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number = 2000): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:mm` in UTC */
export function formatTimestamp(epochMs: number): string {
  const date = new Date(epochMs);
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
    + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}
