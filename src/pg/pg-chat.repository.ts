// src/pg/pg-chat.repository.ts
import { DatabaseError, QueryConfig, QueryResult, QueryResultRow } from 'pg';

import { ChatRepository } from '../chat/chat.repository';
import {
  ChatMessage,
  ChatThread,
  NewMessageRow,
  NewThreadRow,
} from '../chat/chat.types';
import {
  ChatConflictException,
  ChatStorageException,
  RepositoryStateException,
} from '../chat/chat.errors';
import {
  encodeMetadata,
  parseMetadata,
  parseRole,
  parseStatus,
  parseTimestamp,
  readNullableText,
  readText,
} from '../chat/chat.mappers';
import { DatabaseBackend } from '../config/chat.config';
import { describeError, LoggerService } from '../shared/types';
import type { PgClient, PgConnectionSource } from './pg-pool';

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';

const THREAD_COLUMNS = `thread_id, user_id, title, status, metadata, created_at, updated_at`;
const MESSAGE_COLUMNS = `message_id, thread_id, user_id, role, content, type, metadata, dedup_token, created_at`;

export class PgChatRepository extends ChatRepository {
  readonly backend = DatabaseBackend.POSTGRES;
  private client: PgClient | null = null;

  constructor(
    private readonly pool: PgConnectionSource,
    logger: LoggerService,
  ) {
    super(logger);
  }

  protected async acquireConnection(): Promise<void> {
    this.client = await this.pool.connect();
  }

  protected async beginTransaction(): Promise<void> {
    await this.run({ text: 'BEGIN' });
  }

  protected async commitTransaction(): Promise<void> {
    const res = await this.run({ text: 'COMMIT' });
    // the server answers COMMIT with ROLLBACK when the transaction was aborted
    if (res.command === 'ROLLBACK') {
      throw new ChatStorageException(
        '[postgres] commit failed: transaction was aborted by an earlier error and rolled back',
      );
    }
  }

  protected async rollbackTransaction(): Promise<void> {
    await this.run({ text: 'ROLLBACK' });
  }

  protected releaseConnection(failure?: Error): void {
    const client = this.client;
    this.client = null;
    if (!client) return;

    // server-side errors leave the socket usable; anything else does not
    const broken =
      failure !== undefined &&
      !(failure instanceof DatabaseError) &&
      !(failure instanceof ChatStorageException);

    client.release(broken ? failure : undefined);
    if (broken && failure) {
      void this.logger.warn(
        `[PG] discarding connection after failure: ${failure.message}`,
      );
    }
  }

  protected async insertThreadRow(row: NewThreadRow): Promise<void> {
    await this.run({
      name: 'chat.insert-thread',
      text: `
        INSERT INTO chat_thread (${THREAD_COLUMNS})
        VALUES ($1, $2, $3, 'active', $4::jsonb, $5, $5)
      `,
      values: [
        row.threadId,
        row.userId,
        row.title,
        encodeMetadata(row.metadata),
        row.createdAt,
      ],
    });
  }

  protected async selectThread(threadId: string): Promise<ChatThread | null> {
    const res = await this.run({
      name: 'chat.get-thread',
      text: `SELECT ${THREAD_COLUMNS} FROM chat_thread WHERE thread_id = $1`,
      values: [threadId],
    });

    const row = res.rows[0];
    return row ? toThread(row) : null;
  }

  protected async insertMessageRow(row: NewMessageRow): Promise<boolean> {
    // the conflict target only matches the partial dedup index, so primary
    // key and foreign key violations still raise
    const res = await this.run({
      name: 'chat.insert-message',
      text: `
        INSERT INTO chat_message (${MESSAGE_COLUMNS})
        VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8, $9)
        ON CONFLICT (dedup_token) WHERE dedup_token IS NOT NULL DO NOTHING
        RETURNING message_id
      `,
      values: [
        row.messageId,
        row.threadId,
        row.userId,
        row.role,
        row.content,
        row.type,
        encodeMetadata(row.metadata),
        row.dedupToken,
        row.createdAt,
      ],
    });

    return res.rowCount === 1;
  }

  protected async touchThread(threadId: string, updatedAt: Date): Promise<void> {
    await this.run({
      name: 'chat.touch-thread',
      text: `
        UPDATE chat_thread
        SET updated_at = GREATEST(updated_at, $2)
        WHERE thread_id = $1
      `,
      values: [threadId, updatedAt],
    });
  }

  protected async selectMessages(
    threadId: string,
    limit: number,
  ): Promise<ChatMessage[]> {
    const res = await this.run({
      name: 'chat.list-messages',
      text: `
        SELECT ${MESSAGE_COLUMNS}
        FROM chat_message
        WHERE thread_id = $1
        ORDER BY created_at DESC, seq DESC
        LIMIT $2
      `,
      values: [threadId, limit],
    });

    return res.rows.map(toMessage);
  }

  protected translateError(operation: string, err: unknown): Error {
    if (err instanceof DatabaseError) {
      if (err.code === PG_UNIQUE_VIOLATION) {
        return new ChatConflictException(
          `[postgres] ${operation} conflicts with an existing row (${err.constraint ?? 'unknown constraint'})`,
          err,
        );
      }
      return new ChatStorageException(
        `[postgres] ${operation} failed with ${err.code ?? 'unknown code'}: ${err.message}`,
        err,
      );
    }
    return new ChatStorageException(
      `[postgres] ${operation} failed: ${describeError(err)}`,
      err,
    );
  }

  private run(config: QueryConfig): Promise<QueryResult<QueryResultRow>> {
    if (!this.client) {
      throw new RepositoryStateException('No connection is held by this repository');
    }
    return this.client.query(config);
  }
}

function toThread(row: QueryResultRow): ChatThread {
  return {
    threadId: readText(row.thread_id, 'thread_id'),
    userId: readText(row.user_id, 'user_id'),
    title: readNullableText(row.title, 'title'),
    status: parseStatus(row.status),
    metadata: parseMetadata(row.metadata),
    createdAt: parseTimestamp(row.created_at),
    updatedAt: parseTimestamp(row.updated_at),
  };
}

function toMessage(row: QueryResultRow): ChatMessage {
  return {
    messageId: readText(row.message_id, 'message_id'),
    threadId: readText(row.thread_id, 'thread_id'),
    userId: readText(row.user_id, 'user_id'),
    role: parseRole(row.role),
    content: readText(row.content, 'content'),
    type: readText(row.type, 'type'),
    metadata: parseMetadata(row.metadata),
    dedupToken: readNullableText(row.dedup_token, 'dedup_token'),
    createdAt: parseTimestamp(row.created_at),
  };
}
