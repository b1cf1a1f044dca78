// src/chat/chat.mappers.ts
import { isUUID } from 'class-validator';
import {
  ChatMetadata,
  InsertMessageInput,
  MESSAGE_ROLES,
  MessageRole,
  THREAD_STATUSES,
  ThreadStatus,
} from './chat.types';
import { ChatStorageException, InvalidChatInputException } from './chat.errors';

export const MAX_DEDUP_TOKEN_LENGTH = 255;
export const DEFAULT_MESSAGE_TYPE = 'text';

function isMessageRole(value: unknown): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

function isThreadStatus(value: unknown): value is ThreadStatus {
  return THREAD_STATUSES.some((status) => status === value);
}

export function isMetadata(value: unknown): value is ChatMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------
// Row decoding (storage → domain)
// ---------------------------

export function readText(value: unknown, column: string): string {
  if (typeof value !== 'string') {
    throw new ChatStorageException(`Column ${column} is not text`);
  }
  return value;
}

export function readNullableText(value: unknown, column: string): string | null {
  return value === null || value === undefined ? null : readText(value, column);
}

export function parseRole(value: unknown): MessageRole {
  if (!isMessageRole(value)) {
    throw new ChatStorageException(`Unknown message role "${String(value)}"`);
  }
  return value;
}

export function parseStatus(value: unknown): ThreadStatus {
  if (!isThreadStatus(value)) {
    throw new ChatStorageException(`Unknown thread status "${String(value)}"`);
  }
  return value;
}

/** jsonb columns arrive decoded, TEXT columns arrive as a JSON string. */
export function parseMetadata(value: unknown): ChatMetadata | null {
  if (value === null || value === undefined) return null;

  const decoded: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (!isMetadata(decoded)) {
    throw new ChatStorageException('Stored metadata is not a JSON object');
  }
  return decoded;
}

export function encodeMetadata(metadata: ChatMetadata | null): string | null {
  return metadata === null ? null : JSON.stringify(metadata);
}

export function parseTimestamp(value: unknown): Date {
  const date =
    value instanceof Date
      ? value
      : typeof value === 'string' || typeof value === 'number'
        ? new Date(value)
        : null;

  if (!date || Number.isNaN(date.getTime())) {
    throw new ChatStorageException(`Invalid stored timestamp "${String(value)}"`);
  }
  return date;
}

// ---------------------------
// Input validation (caller → repository)
// ---------------------------

export function normalizeId(value: string, field: string): string {
  if (typeof value !== 'string' || !isUUID(value, 'all')) {
    throw new InvalidChatInputException(`${field} must be a UUID`);
  }
  return value.toLowerCase();
}

export function requireContent(value: string, field = 'content'): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidChatInputException(`${field} must be a non-empty string`);
  }
  return value;
}

export function normalizeDedupToken(
  token: string | null | undefined,
): string | null {
  if (token === null || token === undefined) return null;

  if (
    typeof token !== 'string' ||
    token.length === 0 ||
    token.length > MAX_DEDUP_TOKEN_LENGTH
  ) {
    throw new InvalidChatInputException(
      `dedupToken must be between 1 and ${MAX_DEDUP_TOKEN_LENGTH} characters`,
    );
  }
  return token;
}

export function requireLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidChatInputException('limit must be a positive integer');
  }
  return limit;
}

export function requireRole(role: unknown): MessageRole {
  if (!isMessageRole(role)) {
    throw new InvalidChatInputException(
      `role must be one of ${MESSAGE_ROLES.join(', ')}`,
    );
  }
  return role;
}

export function normalizeMetadata(
  metadata: ChatMetadata | null | undefined,
): ChatMetadata | null {
  if (metadata === null || metadata === undefined) return null;
  if (!isMetadata(metadata)) {
    throw new InvalidChatInputException('metadata must be a JSON object');
  }
  return metadata;
}

export function normalizeMessageInput(
  input: InsertMessageInput,
): Required<InsertMessageInput> {
  return {
    threadId: normalizeId(input.threadId, 'threadId'),
    userId: normalizeId(input.userId, 'userId'),
    role: requireRole(input.role),
    content: requireContent(input.content),
    type: input.type ?? DEFAULT_MESSAGE_TYPE,
    metadata: normalizeMetadata(input.metadata),
    dedupToken: normalizeDedupToken(input.dedupToken),
  };
}
