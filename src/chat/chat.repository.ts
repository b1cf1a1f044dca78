// src/chat/chat.repository.ts
import { v4 as uuidv4 } from 'uuid';
import {
  ChatMessage,
  ChatThread,
  InsertMessageInput,
  InsertMessageOutcome,
  InsertThreadInput,
  NewMessageRow,
  NewThreadRow,
} from './chat.types';
import {
  normalizeId,
  normalizeMessageInput,
  normalizeMetadata,
  requireLimit,
} from './chat.mappers';
import {
  ChatConflictException,
  ChatStorageException,
  InvalidChatInputException,
  RepositoryStateException,
  ThreadNotFoundException,
} from './chat.errors';
import { describeError, LoggerService, toError } from '../shared/types';

export type ScopeOutcome = { ok: true } | { ok: false; error: unknown };

type RepositoryPhase = 'idle' | 'open' | 'closed';

/**
 * Unit of work over one connection and one transaction.
 *
 * Lifecycle is `idle → open → closed`: `enter()` acquires and begins,
 * `exit()` commits or rolls back and always releases. A closed handle is dead.
 * Backends implement the protected primitives; the public surface validates
 * input, enforces the lifecycle and maps driver errors.
 */
export abstract class ChatRepository {
  private phase: RepositoryPhase = 'idle';

  abstract readonly backend: string;

  protected constructor(protected readonly logger: LoggerService) {}

  get isOpen(): boolean {
    return this.phase === 'open';
  }

  async enter(): Promise<this> {
    if (this.phase !== 'idle') {
      throw new RepositoryStateException(
        `Cannot enter a ${this.phase} repository; create a new one per transaction`,
      );
    }
    // dead unless BEGIN succeeds
    this.phase = 'closed';

    try {
      await this.acquireConnection();
    } catch (err) {
      throw this.toStorageError('acquire connection', err);
    }

    try {
      await this.beginTransaction();
    } catch (err) {
      this.releaseConnection(toError(err));
      throw this.toStorageError('begin transaction', err);
    }

    this.phase = 'open';
    return this;
  }

  async exit(outcome: ScopeOutcome): Promise<void> {
    this.assertOpen('exit');
    this.phase = 'closed';

    let failure: Error | undefined;
    try {
      if (outcome.ok) {
        await this.commitTransaction();
      } else {
        await this.rollbackTransaction();
      }
    } catch (err) {
      failure = toError(err);
      const operation = outcome.ok ? 'commit' : 'rollback';
      void this.logger.error(
        `[${this.backend}] ${operation} failed: ${failure.message}`,
        failure.stack,
      );
      throw this.toStorageError(operation, err);
    } finally {
      this.releaseConnection(failure);
    }
  }

  async insertThread(input: InsertThreadInput): Promise<ChatThread> {
    this.assertOpen('insertThread');

    const row: NewThreadRow = {
      threadId: normalizeId(input.threadId, 'threadId'),
      userId: normalizeId(input.userId, 'userId'),
      title: input.title ?? null,
      metadata: normalizeMetadata(input.metadata),
      createdAt: new Date(),
    };

    await this.guard('insertThread', () => this.insertThreadRow(row));

    return {
      threadId: row.threadId,
      userId: row.userId,
      title: row.title,
      status: 'active',
      metadata: row.metadata,
      createdAt: row.createdAt,
      updatedAt: row.createdAt,
    };
  }

  async getThread(threadId: string): Promise<ChatThread | null> {
    this.assertOpen('getThread');
    const id = normalizeId(threadId, 'threadId');
    return this.guard('getThread', () => this.selectThread(id));
  }

  /**
   * Appends a message. A non-null dedup token that is already stored turns the
   * call into a successful no-op and the stored row is left untouched.
   */
  async insertMessage(input: InsertMessageInput): Promise<InsertMessageOutcome> {
    this.assertOpen('insertMessage');

    const normalized = normalizeMessageInput(input);
    const row: NewMessageRow = {
      ...normalized,
      messageId: uuidv4(),
      createdAt: new Date(),
    };

    return this.guard('insertMessage', async () => {
      const inserted = await this.insertMessageRow(row);
      if (!inserted) {
        if (row.dedupToken === null) {
          throw new ChatStorageException(
            'Message insert reported a duplicate without a dedup token',
          );
        }
        return { inserted: false, duplicateOf: row.dedupToken };
      }

      await this.touchThread(row.threadId, row.createdAt);
      return { inserted: true, messageId: row.messageId };
    });
  }

  /** Most recent first; empty when the thread has no messages. */
  async listMessages(threadId: string, limit: number): Promise<ChatMessage[]> {
    this.assertOpen('listMessages');
    const id = normalizeId(threadId, 'threadId');
    const max = requireLimit(limit);
    return this.guard('listMessages', () => this.selectMessages(id, max));
  }

  protected assertOpen(operation: string): void {
    if (this.phase !== 'open') {
      throw new RepositoryStateException(
        `${operation}() called on a ${this.phase} repository`,
      );
    }
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (isChatError(err)) throw err;
      throw this.translateError(operation, err);
    }
  }

  private toStorageError(operation: string, err: unknown): Error {
    if (isChatError(err)) return err;
    return new ChatStorageException(
      `[${this.backend}] ${operation} failed: ${describeError(err)}`,
      err,
    );
  }

  // ---------------------------
  // Backend primitives
  // ---------------------------

  protected abstract acquireConnection(): Promise<void>;
  protected abstract beginTransaction(): Promise<void>;
  protected abstract commitTransaction(): Promise<void>;
  protected abstract rollbackTransaction(): Promise<void>;
  /** Must not throw. `failure` marks the connection as unusable. */
  protected abstract releaseConnection(failure?: Error): void;

  protected abstract insertThreadRow(row: NewThreadRow): Promise<void>;
  protected abstract selectThread(threadId: string): Promise<ChatThread | null>;
  /** Resolves false when the row was skipped because its dedup token exists. */
  protected abstract insertMessageRow(row: NewMessageRow): Promise<boolean>;
  protected abstract touchThread(threadId: string, updatedAt: Date): Promise<void>;
  protected abstract selectMessages(
    threadId: string,
    limit: number,
  ): Promise<ChatMessage[]>;
  /** Maps a driver error to a conflict or storage exception. */
  protected abstract translateError(operation: string, err: unknown): Error;
}

function isChatError(err: unknown): err is Error {
  return (
    err instanceof ChatConflictException ||
    err instanceof ChatStorageException ||
    err instanceof InvalidChatInputException ||
    err instanceof RepositoryStateException ||
    err instanceof ThreadNotFoundException
  );
}

export type ChatRepositoryFactory = () => ChatRepository;

/**
 * Runs `work` inside one freshly entered repository. Commits when `work`
 * resolves, rolls back and rethrows the original error when it rejects.
 */
export async function withChatRepository<T>(
  factory: ChatRepositoryFactory,
  work: (repo: ChatRepository) => Promise<T>,
): Promise<T> {
  const repo = await factory().enter();

  let result: T;
  try {
    result = await work(repo);
  } catch (err) {
    try {
      await repo.exit({ ok: false, error: err });
    } catch (rollbackErr) {
      // exit() has logged the storage failure; the original error wins
      if (!(rollbackErr instanceof ChatStorageException)) throw rollbackErr;
    }
    throw err;
  }

  await repo.exit({ ok: true });
  return result;
}
