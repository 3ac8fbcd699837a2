import type { FeedMessageRepository } from '../utils/db-backend.js';
import type { FeedMessage } from '../utils/db-types.js';

/** One sub-patch line of a series listing. */
export interface SeriesPatchInfo {
  messageIdHeader: string;
  subject: string;
  author: string;
  url: string | null;
  patchIndex: number;
  patchTotal: number | null;
  receivedAt: number;
}

/**
 * Series id for a message that stands for its whole series: a cover letter,
 * or patch 1 of a series posted without one. Null for everything else.
 */
export function seriesRootId(message: FeedMessage): string | null {
  if (!message.seriesMessageId) return null;
  return message.isCoverLetter || message.seriesMessageId === message.messageIdHeader
    ? message.seriesMessageId
    : null;
}

/**
 * Sub-patches among `rows`, ascending by index. Skips the cover letter
 * (index 0), replies and `excludeMessageIdHeader`.
 */
export function selectSubPatches(rows: readonly FeedMessage[], excludeMessageIdHeader: string | null = null): FeedMessage[] {
  const seen = new Set<string>();
  const patches: FeedMessage[] = [];

  for (const row of rows) {
    if (!row.isPatch || row.isReply || row.patchIndex === null || row.patchIndex <= 0) continue;
    if (row.messageIdHeader === excludeMessageIdHeader || seen.has(row.messageIdHeader)) continue;
    seen.add(row.messageIdHeader);
    patches.push(row);
  }

  return patches.sort((a, b) => (a.patchIndex ?? 0) - (b.patchIndex ?? 0) || a.receivedAt - b.receivedAt);
}

export function toSeriesPatchInfo(message: FeedMessage): SeriesPatchInfo {
  return {
    messageIdHeader: message.messageIdHeader,
    subject: message.subject,
    author: message.author,
    url: message.url,
    patchIndex: message.patchIndex ?? 0,
    patchTotal: message.patchTotal,
    receivedAt: message.receivedAt,
  };
}

/** Stored sub-patches of the series `seriesMessageId`, ready for a card. */
export async function listSeriesPatches(
  messages: Pick<FeedMessageRepository, 'findBySeriesId'>,
  seriesMessageId: string,
  excludeMessageIdHeader: string | null = null,
): Promise<SeriesPatchInfo[]> {
  const rows = await messages.findBySeriesId(seriesMessageId);
  return selectSubPatches(rows, excludeMessageIdHeader).map(toSeriesPatchInfo);
}
