import { vi } from 'vitest';
import { applyClassification, classifyMessage } from '../src/core/message-classifier.js';
import type { CardSender, ThreadSender } from '../src/core/senders.js';
import type { FeedMessage } from '../src/utils/db-types.js';

/** 2026-01-28 12:14 UTC */
export const T0 = Date.UTC(2026, 0, 28, 12, 14);
export const MINUTE = 60_000;

export interface MessageInput {
  id: string;
  subject: string;
  inReplyTo?: string | null;
  at?: number;
  author?: string;
  authorEmail?: string | null;
  subsystem?: string;
}

/** Unclassified message record with archive-style URL. */
export function rawMessage(input: MessageInput): FeedMessage {
  return {
    subsystem: input.subsystem ?? 'netdev',
    messageIdHeader: input.id,
    messageId: null,
    subject: input.subject,
    author: input.author ?? 'Jane Doe',
    authorEmail: input.authorEmail === undefined ? 'jane@example.org' : input.authorEmail,
    inReplyToHeader: input.inReplyTo ?? null,
    content: null,
    url: `https://lore.example.org/netdev/${input.id}/`,
    receivedAt: input.at ?? T0,
    isPatch: false,
    isReply: false,
    isSeriesPatch: false,
    isCoverLetter: false,
    patchVersion: null,
    patchIndex: null,
    patchTotal: null,
    seriesMessageId: null,
    processedAt: null,
  };
}

/** Message record with the classifier's verdict applied. */
export function message(input: MessageInput): FeedMessage {
  const raw = rawMessage(input);
  return applyClassification(raw, classifyMessage({
    subject: raw.subject,
    messageIdHeader: raw.messageIdHeader,
    inReplyToHeader: raw.inReplyToHeader,
  }));
}

export function classificationOf(msg: FeedMessage) {
  return classifyMessage({
    subject: msg.subject,
    messageIdHeader: msg.messageIdHeader,
    inReplyToHeader: msg.inReplyToHeader,
  });
}

/** Senders backed by `vi.fn()`, handing out sequential platform ids. */
export function createFakeSenders() {
  let sequence = 0;
  const next = (prefix: string): string => `${prefix}-${++sequence}`;

  const send = vi.fn<CardSender['send']>(async () => ({ messageId: next('msg'), channelId: 'chan-1' }));
  const sendReplyNotification = vi.fn<CardSender['sendReplyNotification']>(async () => true);
  const createThreadAndSendOverview = vi.fn<ThreadSender['createThreadAndSendOverview']>(
    async () => ({ threadId: next('thread'), subPatchMessages: { 0: next('overview') } }),
  );
  const updateThreadOverview = vi.fn<ThreadSender['updateThreadOverview']>(async () => true);
  const sendThreadUpdateNotification = vi.fn<ThreadSender['sendThreadUpdateNotification']>(async () => true);

  const card: CardSender = { send, sendReplyNotification };
  const thread: ThreadSender = { createThreadAndSendOverview, updateThreadOverview, sendThreadUpdateNotification };

  return {
    card,
    thread,
    send,
    sendReplyNotification,
    createThreadAndSendOverview,
    updateThreadOverview,
    sendThreadUpdateNotification,
  };
}
