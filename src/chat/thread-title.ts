// src/chat/thread-title.ts

export const DEFAULT_THREAD_TITLE = 'New conversation';

const TITLE_WORDS = 6;
const TITLE_MAX_LENGTH = 50;

/**
 * Title for a thread created without one: the first words of the opening
 * message, capped at 50 characters.
 */
export function deriveThreadTitle(firstMessage: string): string {
  const title = firstMessage.trim().split(/\s+/).slice(0, TITLE_WORDS).join(' ');

  if (!title) return DEFAULT_THREAD_TITLE;
  if (title.length <= TITLE_MAX_LENGTH) return title;

  return `${title.slice(0, TITLE_MAX_LENGTH - 3)}...`;
}

export function resolveThreadTitle(
  title: string | null | undefined,
  firstMessage: string,
): string {
  const trimmed = title?.trim();
  return trimmed ? trimmed : deriveThreadTitle(firstMessage);
}
