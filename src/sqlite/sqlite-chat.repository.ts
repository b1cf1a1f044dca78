// src/sqlite/sqlite-chat.repository.ts
import Database from 'better-sqlite3';

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
  isMetadata,
  parseMetadata,
  parseRole,
  parseStatus,
  parseTimestamp,
  readNullableText,
  readText,
} from '../chat/chat.mappers';
import { DatabaseBackend } from '../config/chat.config';
import { describeError, LoggerService } from '../shared/types';
import { SqliteChatConnection } from './sqlite-connection';

type SqliteRow = Record<string, unknown>;

const THREAD_COLUMNS = `thread_id, user_id, title, status, metadata, created_at, updated_at`;
const MESSAGE_COLUMNS = `message_id, thread_id, user_id, role, content, type, metadata, dedup_token, created_at`;

const UNIQUE_CODES = new Set(['SQLITE_CONSTRAINT_PRIMARYKEY', 'SQLITE_CONSTRAINT_UNIQUE']);

export class SqliteChatRepository extends ChatRepository {
  readonly backend = DatabaseBackend.SQLITE;
  private release: (() => void) | null = null;

  constructor(
    private readonly connection: SqliteChatConnection,
    logger: LoggerService,
  ) {
    super(logger);
  }

  protected async acquireConnection(): Promise<void> {
    this.release = await this.connection.acquire();
  }

  protected async beginTransaction(): Promise<void> {
    this.db().exec('BEGIN IMMEDIATE');
  }

  protected async commitTransaction(): Promise<void> {
    this.db().exec('COMMIT');
  }

  protected async rollbackTransaction(): Promise<void> {
    this.db().exec('ROLLBACK');
  }

  protected releaseConnection(failure?: Error): void {
    const release = this.release;
    this.release = null;
    if (!release) return;

    const db = this.connection.db;
    // a failed COMMIT leaves the transaction open; the next scope needs it closed
    if (failure && db.open && db.inTransaction) {
      try {
        db.exec('ROLLBACK');
      } catch (err) {
        void this.logger.error(
          `[SQLITE] rollback after failure did not complete: ${describeError(err)}`,
          err instanceof Error ? err.stack : undefined,
        );
      }
    }
    release();
  }

  protected async insertThreadRow(row: NewThreadRow): Promise<void> {
    const createdAt = row.createdAt.toISOString();
    this.db()
      .prepare(
        `INSERT INTO chat_thread (${THREAD_COLUMNS})
         VALUES (?, ?, ?, 'active', ?, ?, ?)`,
      )
      .run(
        row.threadId,
        row.userId,
        row.title,
        encodeMetadata(row.metadata),
        createdAt,
        createdAt,
      );
  }

  protected async selectThread(threadId: string): Promise<ChatThread | null> {
    const row: unknown = this.db()
      .prepare(`SELECT ${THREAD_COLUMNS} FROM chat_thread WHERE thread_id = ?`)
      .get(threadId);

    return isRow(row) ? toThread(row) : null;
  }

  protected async insertMessageRow(row: NewMessageRow): Promise<boolean> {
    // only the dedup column is a conflict target; other violations raise
    const info = this.db()
      .prepare(
        `INSERT INTO chat_message (${MESSAGE_COLUMNS})
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (dedup_token) DO NOTHING`,
      )
      .run(
        row.messageId,
        row.threadId,
        row.userId,
        row.role,
        row.content,
        row.type,
        encodeMetadata(row.metadata),
        row.dedupToken,
        row.createdAt.toISOString(),
      );

    return info.changes === 1;
  }

  protected async touchThread(threadId: string, updatedAt: Date): Promise<void> {
    this.db()
      .prepare(
        `UPDATE chat_thread
         SET updated_at = MAX(updated_at, ?)
         WHERE thread_id = ?`,
      )
      .run(updatedAt.toISOString(), threadId);
  }

  protected async selectMessages(
    threadId: string,
    limit: number,
  ): Promise<ChatMessage[]> {
    const rows: unknown[] = this.db()
      .prepare(
        `SELECT ${MESSAGE_COLUMNS}
         FROM chat_message
         WHERE thread_id = ?
         ORDER BY created_at DESC, rowid DESC
         LIMIT ?`,
      )
      .all(threadId, limit);

    return rows.filter(isRow).map(toMessage);
  }

  protected translateError(operation: string, err: unknown): Error {
    if (err instanceof Database.SqliteError) {
      if (UNIQUE_CODES.has(err.code)) {
        return new ChatConflictException(
          `[sqlite] ${operation} conflicts with an existing row: ${err.message}`,
          err,
        );
      }
      return new ChatStorageException(
        `[sqlite] ${operation} failed with ${err.code}: ${err.message}`,
        err,
      );
    }
    return new ChatStorageException(
      `[sqlite] ${operation} failed: ${describeError(err)}`,
      err,
    );
  }

  private db(): Database.Database {
    if (!this.release) {
      throw new RepositoryStateException('No connection is held by this repository');
    }
    return this.connection.db;
  }
}

function isRow(value: unknown): value is SqliteRow {
  return isMetadata(value);
}

function toThread(row: SqliteRow): ChatThread {
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

function toMessage(row: SqliteRow): ChatMessage {
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
