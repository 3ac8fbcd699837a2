import { normalizeMessageId, primaryReference } from './message-id.js';
import type { FeedMessage } from '../utils/db-types.js';

/** Parsed `[PATCH …]` subject tag. */
export interface PatchSubjectInfo {
  version: number | null;
  index: number | null;
  total: number | null;
  isRfc: boolean;
  /** Explicit `cover`/`cover-letter` token in the tag. */
  coverLetterMarker: boolean;
}

export interface ClassificationInput {
  subject: string;
  messageIdHeader?: string | null;
  inReplyToHeader?: string | null;
  /** Out-of-band cover-letter marker from the feed source, when it has one. */
  coverLetter?: boolean;
}

export interface MessageClassification {
  isPatch: boolean;
  isReply: boolean;
  isCoverLetter: boolean;
  isSeriesPatch: boolean;
  version: number | null;
  index: number | null;
  total: number | null;
  seriesMessageId: string | null;
}

const NOT_A_PATCH: MessageClassification = {
  isPatch: false,
  isReply: false,
  isCoverLetter: false,
  isSeriesPatch: false,
  version: null,
  index: null,
  total: null,
  seriesMessageId: null,
};

const REPLY_PREFIX = /^\s*(?:re|aw|sv|antw)\s*(?:\[\d+\])?\s*:/i;
const TAG_PATTERN = /\[([^\]]*)\]/g;

export function isReplySubject(subject: string): boolean {
  return REPLY_PREFIX.test(subject);
}

/**
 * Parse the first bracketed tag containing PATCH, eg `[PATCH v2 3/5]`,
 * `[RFC PATCH net-next 0/4]`, `[PATCHv3 1/2]`. Returns null for subjects
 * without one.
 */
export function parsePatchSubject(subject: string): PatchSubjectInfo | null {
  let isRfc = false;
  let found: PatchSubjectInfo | null = null;

  for (const match of subject.matchAll(TAG_PATTERN)) {
    const tokens = (match[1] ?? '').split(/[\s,]+/).filter(Boolean);
    if (tokens.some((token) => /^rfc$/i.test(token))) isRfc = true;
    if (found) continue;

    let hasPatchToken = false;
    const info: PatchSubjectInfo = { version: null, index: null, total: null, isRfc: false, coverLetterMarker: false };

    for (const token of tokens) {
      const patchToken = /^patch(?:v(\d+))?$/i.exec(token);
      if (patchToken) {
        hasPatchToken = true;
        if (patchToken[1]) info.version = Number.parseInt(patchToken[1], 10);
        continue;
      }

      const version = /^v(\d+)$/i.exec(token);
      if (version?.[1]) {
        info.version = Number.parseInt(version[1], 10);
        continue;
      }

      const position = /^(\d+)\/(\d+)$/.exec(token);
      if (position?.[1] && position[2]) {
        const index = Number.parseInt(position[1], 10);
        const total = Number.parseInt(position[2], 10);
        if (total >= 1 && index <= total) {
          info.index = index;
          info.total = total;
        }
        continue;
      }

      if (/^cover(?:-?letter)?$/i.test(token)) info.coverLetterMarker = true;
    }

    if (hasPatchToken) found = info;
  }

  return found ? { ...found, isRfc } : null;
}

/**
 * Classify one message from its subject and reference headers. Pure and
 * total: anything unparsable is a plain, non-patch message.
 */
export function classifyMessage(input: ClassificationInput): MessageClassification {
  const subject = typeof input.subject === 'string' ? input.subject : '';
  const isReply = isReplySubject(subject);
  const info = parsePatchSubject(subject);

  if (!info || isReply) {
    return { ...NOT_A_PATCH, isReply };
  }

  const isCoverLetter = info.index === 0 || info.coverLetterMarker || input.coverLetter === true;
  const isSeriesPatch = (info.total ?? 0) > 1;
  const ownId = input.messageIdHeader ? normalizeMessageId(input.messageIdHeader) : null;

  let seriesMessageId: string | null = null;
  if (isCoverLetter) {
    seriesMessageId = ownId;
  } else if (isSeriesPatch) {
    // git send-email threads every patch of a series under the cover letter,
    // or under patch 1 when there is none.
    seriesMessageId = primaryReference(input.inReplyToHeader) ?? ownId;
  }

  return {
    isPatch: true,
    isReply: false,
    isCoverLetter,
    isSeriesPatch,
    version: info.version,
    index: info.index,
    total: info.total,
    seriesMessageId,
  };
}

/** Copy a classification onto a message record. */
export function applyClassification(message: FeedMessage, classification: MessageClassification): FeedMessage {
  return {
    ...message,
    isPatch: classification.isPatch,
    isReply: classification.isReply,
    isCoverLetter: classification.isCoverLetter,
    isSeriesPatch: classification.isSeriesPatch,
    patchVersion: classification.version,
    patchIndex: classification.index,
    patchTotal: classification.total,
    seriesMessageId: classification.seriesMessageId ?? message.seriesMessageId,
  };
}
