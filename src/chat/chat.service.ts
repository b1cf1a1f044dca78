// src/chat/chat.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';

import { ChatRepositoryFactory, withChatRepository } from './chat.repository';
import {
  AddMessageAndReplyInput,
  AddUserMessageInput,
  ChatMessage,
  ChatThread,
  CreateEmptyThreadInput,
  CreateThreadWithFirstMessageInput,
  EmptyThreadResult,
  HistoryTurn,
  InsertMessageOutcome,
  ReplyGenerator,
  ReplyResult,
  SYSTEM_USER_ID,
  WorkflowOptions,
  WorkflowResult,
  WorkflowState,
} from './chat.types';
import {
  ChatStorageException,
  InvalidChatInputException,
  ThreadNotFoundException,
} from './chat.errors';
import {
  normalizeDedupToken,
  normalizeId,
  normalizeMetadata,
  requireContent,
  requireLimit,
} from './chat.mappers';
import { resolveThreadTitle } from './thread-title';
import { CHAT_REPOSITORY_FACTORY } from '../database/database.constants';
import { describeError } from '../shared/types';

export const HISTORY_WINDOW = 10;
export const DEFAULT_MESSAGE_LIMIT = 50;

/**
 * Chat workflows built from short transactions. The reply generator is always
 * awaited with no transaction open: a slow model call never holds a
 * connection or a lock, and a failed call leaves the committed steps in place.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    @Inject(CHAT_REPOSITORY_FACTORY)
    private readonly repositories: ChatRepositoryFactory,
  ) {}

  /**
   * tx1: thread + user message. Then the generator. tx2: assistant reply.
   * A blank title is derived from the first message.
   */
  async createThreadWithFirstMessage(
    input: CreateThreadWithFirstMessageInput,
    generate: ReplyGenerator,
    options: WorkflowOptions = {},
  ): Promise<WorkflowResult> {
    const workflow = 'createThreadWithFirstMessage';
    const threadId = normalizeId(input.threadId, 'threadId');
    const userId = normalizeId(input.userId, 'userId');
    const firstMessage = requireContent(input.firstMessage, 'firstMessage');
    const dedupToken = normalizeDedupToken(input.dedupToken);
    const title = resolveThreadTitle(input.title, firstMessage);

    this.transition(workflow, threadId, 'start');

    const userMessageOutcome = await withChatRepository(
      this.repositories,
      async (repo) => {
        await repo.insertThread({ threadId, userId, title });
        return repo.insertMessage({
          threadId,
          userId,
          role: 'user',
          content: firstMessage,
          dedupToken,
        });
      },
    );
    this.transition(workflow, threadId, 'user-message-committed');

    const aiReply = await this.generateReply(
      workflow,
      threadId,
      generate,
      firstMessage,
      [],
      options.signal,
    );

    const replyMessageId = await this.storeReply(threadId, aiReply);
    this.transition(workflow, threadId, 'reply-committed');
    this.transition(workflow, threadId, 'completed');

    return {
      threadId,
      status: 'completed',
      userMessage: firstMessage,
      aiReply,
      userMessageOutcome,
      replyMessageId,
    };
  }

  /**
   * tx1: thread check + user message. tx2: recent history. Then the
   * generator. tx3: assistant reply. A missing thread fails before any write.
   *
   * A resubmitted dedup token whose message was already answered returns the
   * stored reply without calling the generator. An unanswered one is answered
   * once, using the content of the first submission.
   */
  async addMessageAndReply(
    input: AddMessageAndReplyInput,
    generate: ReplyGenerator,
    options: WorkflowOptions = {},
  ): Promise<WorkflowResult> {
    const workflow = 'addMessageAndReply';
    const threadId = normalizeId(input.threadId, 'threadId');
    const userId = normalizeId(input.userId, 'userId');
    const content = requireContent(input.content);
    const dedupToken = normalizeDedupToken(input.dedupToken);

    this.transition(workflow, threadId, 'start');

    const userMessageOutcome = await withChatRepository(
      this.repositories,
      async (repo) => {
        const thread = await repo.getThread(threadId);
        if (!thread) throw new ThreadNotFoundException(threadId);

        return repo.insertMessage({
          threadId,
          userId,
          role: 'user',
          content,
          dedupToken,
        });
      },
    );
    this.transition(workflow, threadId, 'user-message-committed');

    const recent = await withChatRepository(this.repositories, (repo) =>
      repo.listMessages(threadId, HISTORY_WINDOW),
    );

    let message = content;
    if (!userMessageOutcome.inserted) {
      const previous = findStoredExchange(recent, userMessageOutcome.duplicateOf);
      if (previous?.reply) {
        this.logger.log(
          `[${workflow}] thread=${threadId} token ${userMessageOutcome.duplicateOf} already answered by ${previous.reply.messageId}`,
        );
        this.transition(workflow, threadId, 'completed');
        return {
          threadId,
          status: 'completed',
          userMessage: previous.question.content,
          aiReply: previous.reply.content,
          userMessageOutcome,
          replyMessageId: previous.reply.messageId,
        };
      }
      if (previous) message = previous.question.content;
    }

    const aiReply = await this.generateReply(
      workflow,
      threadId,
      generate,
      message,
      toHistory(recent),
      options.signal,
    );

    const replyMessageId = await this.storeReply(threadId, aiReply);
    this.transition(workflow, threadId, 'reply-committed');
    this.transition(workflow, threadId, 'completed');

    return {
      threadId,
      status: 'completed',
      userMessage: message,
      aiReply,
      userMessageOutcome,
      replyMessageId,
    };
  }

  /**
   * Retry path for a workflow whose generator failed: answers the latest
   * message when it is an unanswered user message.
   */
  async replyToLatestMessage(
    threadId: string,
    generate: ReplyGenerator,
    options: WorkflowOptions = {},
  ): Promise<ReplyResult> {
    const workflow = 'replyToLatestMessage';
    const id = normalizeId(threadId, 'threadId');

    this.transition(workflow, id, 'start');

    const recent = await withChatRepository(this.repositories, async (repo) => {
      const thread = await repo.getThread(id);
      if (!thread) throw new ThreadNotFoundException(id);
      return repo.listMessages(id, HISTORY_WINDOW);
    });

    const latest = recent[0];
    if (!latest || latest.role !== 'user') {
      throw new InvalidChatInputException(
        `Thread ${id} has no unanswered user message`,
      );
    }
    this.transition(workflow, id, 'user-message-committed');

    const aiReply = await this.generateReply(
      workflow,
      id,
      generate,
      latest.content,
      toHistory(recent),
      options.signal,
    );

    const replyMessageId = await this.storeReply(id, aiReply);
    this.transition(workflow, id, 'reply-committed');
    this.transition(workflow, id, 'completed');

    return {
      threadId: id,
      status: 'completed',
      userMessage: latest.content,
      aiReply,
      replyMessageId,
    };
  }

  async createEmptyThread(
    input: CreateEmptyThreadInput,
  ): Promise<EmptyThreadResult> {
    const threadId = normalizeId(input.threadId, 'threadId');
    const userId = normalizeId(input.userId, 'userId');
    const title = input.title ?? null;

    await withChatRepository(this.repositories, (repo) =>
      repo.insertThread({ threadId, userId, title }),
    );
    this.logger.log(`Empty thread ${threadId} created`);

    return { threadId, userId, title, status: 'created' };
  }

  /** Single transaction, no reply. A repeated dedup token is a no-op. */
  async addUserMessage(input: AddUserMessageInput): Promise<InsertMessageOutcome> {
    const threadId = normalizeId(input.threadId, 'threadId');
    const userId = normalizeId(input.userId, 'userId');
    const content = requireContent(input.content);
    const metadata = normalizeMetadata(input.metadata);
    const dedupToken = normalizeDedupToken(input.dedupToken);

    const outcome = await withChatRepository(this.repositories, async (repo) => {
      const thread = await repo.getThread(threadId);
      if (!thread) throw new ThreadNotFoundException(threadId);

      return repo.insertMessage({
        threadId,
        userId,
        role: 'user',
        content,
        metadata,
        dedupToken,
      });
    });

    if (!outcome.inserted) {
      this.logger.log(
        `Duplicate submission ignored for thread ${threadId} (token ${outcome.duplicateOf})`,
      );
    }
    return outcome;
  }

  async getThreadInfo(threadId: string): Promise<ChatThread | null> {
    const id = normalizeId(threadId, 'threadId');
    return withChatRepository(this.repositories, (repo) => repo.getThread(id));
  }

  /** Most recent first. */
  async getThreadMessages(
    threadId: string,
    limit: number = DEFAULT_MESSAGE_LIMIT,
  ): Promise<ChatMessage[]> {
    const id = normalizeId(threadId, 'threadId');
    const max = requireLimit(limit);
    return withChatRepository(this.repositories, (repo) =>
      repo.listMessages(id, max),
    );
  }

  private async generateReply(
    workflow: string,
    threadId: string,
    generate: ReplyGenerator,
    message: string,
    history: HistoryTurn[],
    signal?: AbortSignal,
  ): Promise<string> {
    this.transition(workflow, threadId, 'external-call-pending');

    try {
      signal?.throwIfAborted();
      const reply = await generate(message, history, signal);
      signal?.throwIfAborted();
      return requireContent(reply, 'reply');
    } catch (err) {
      this.transition(workflow, threadId, 'failed', err);
      throw err;
    }
  }

  private async storeReply(threadId: string, aiReply: string): Promise<string> {
    const outcome = await withChatRepository(this.repositories, (repo) =>
      repo.insertMessage({
        threadId,
        userId: SYSTEM_USER_ID,
        role: 'assistant',
        content: aiReply,
      }),
    );

    if (!outcome.inserted) {
      // replies carry no dedup token
      throw new ChatStorageException(
        `Reply for thread ${threadId} was treated as a duplicate`,
      );
    }
    return outcome.messageId;
  }

  private transition(
    workflow: string,
    threadId: string,
    state: WorkflowState,
    error?: unknown,
  ): void {
    const line = `[${workflow}] thread=${threadId} -> ${state}`;

    if (state === 'failed') {
      this.logger.error(
        `${line}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    } else if (state === 'completed') {
      this.logger.log(line);
    } else {
      this.logger.debug(line);
    }
  }
}

interface StoredExchange {
  question: ChatMessage;
  reply: ChatMessage | null;
}

/** The message stored under `dedupToken` and the assistant reply right after it. */
function findStoredExchange(
  recent: ChatMessage[],
  dedupToken: string,
): StoredExchange | null {
  const chronological = [...recent].reverse();
  const index = chronological.findIndex((m) => m.dedupToken === dedupToken);
  if (index < 0) return null;

  const next = chronological[index + 1];
  return {
    question: chronological[index],
    reply: next && next.role === 'assistant' ? next : null,
  };
}

/** Oldest first, as the generator expects. */
function toHistory(recent: ChatMessage[]): HistoryTurn[] {
  return [...recent]
    .reverse()
    .map((m) => ({ role: m.role, content: m.content }));
}
