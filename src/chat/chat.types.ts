// src/chat/chat.types.ts

export const SYSTEM_USER_ID = '00000000-0000-0000-0000-000000000000';

export const MESSAGE_ROLES = ['user', 'assistant', 'system'] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

export const THREAD_STATUSES = ['active', 'archived', 'deleted'] as const;
export type ThreadStatus = (typeof THREAD_STATUSES)[number];

export type ChatMetadata = Record<string, unknown>;

export interface ChatThread {
  threadId: string;
  userId: string;
  title: string | null;
  status: ThreadStatus;
  metadata: ChatMetadata | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChatMessage {
  messageId: string;
  threadId: string;
  userId: string;
  role: MessageRole;
  content: string;
  type: string;
  metadata: ChatMetadata | null;
  dedupToken: string | null;
  createdAt: Date;
}

export interface InsertThreadInput {
  threadId: string;
  userId: string;
  title: string | null;
  metadata?: ChatMetadata | null;
}

export interface InsertMessageInput {
  threadId: string;
  userId: string;
  role: MessageRole;
  content: string;
  type?: string;
  metadata?: ChatMetadata | null;
  dedupToken?: string | null;
}

/**
 * Result of an append. A dedup hit is a successful no-op, not an error.
 */
export type InsertMessageOutcome =
  | { inserted: true; messageId: string }
  | { inserted: false; duplicateOf: string };

/** Row shapes handed from a backend to the repository base class. */
export interface NewThreadRow {
  threadId: string;
  userId: string;
  title: string | null;
  metadata: ChatMetadata | null;
  createdAt: Date;
}

export interface NewMessageRow {
  messageId: string;
  threadId: string;
  userId: string;
  role: MessageRole;
  content: string;
  type: string;
  metadata: ChatMetadata | null;
  dedupToken: string | null;
  createdAt: Date;
}

export interface HistoryTurn {
  role: MessageRole;
  content: string;
}

/**
 * Slow external call producing the assistant reply. `history` is oldest first.
 */
export type ReplyGenerator = (
  message: string,
  history: HistoryTurn[],
  signal?: AbortSignal,
) => Promise<string>;

export type WorkflowState =
  | 'start'
  | 'user-message-committed'
  | 'external-call-pending'
  | 'reply-committed'
  | 'completed'
  | 'failed';

export interface WorkflowResult {
  threadId: string;
  status: 'completed';
  userMessage: string;
  aiReply: string;
  userMessageOutcome: InsertMessageOutcome;
  replyMessageId: string;
}

export interface ReplyResult {
  threadId: string;
  status: 'completed';
  userMessage: string;
  aiReply: string;
  replyMessageId: string;
}

export interface EmptyThreadResult {
  threadId: string;
  userId: string;
  title: string | null;
  status: 'created';
}

export interface WorkflowOptions {
  signal?: AbortSignal;
}

export interface CreateThreadWithFirstMessageInput {
  threadId: string;
  userId: string;
  title?: string | null;
  firstMessage: string;
  dedupToken?: string | null;
}

export interface AddMessageAndReplyInput {
  threadId: string;
  userId: string;
  content: string;
  dedupToken?: string | null;
}

export interface CreateEmptyThreadInput {
  threadId: string;
  userId: string;
  title?: string | null;
}

export interface AddUserMessageInput {
  threadId: string;
  userId: string;
  content: string;
  metadata?: ChatMetadata | null;
  dedupToken?: string | null;
}
