// src/sqlite/sqlite-connection.ts
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import type { SqliteSettings } from '../config/chat.config';
import { LoggerService } from '../shared/types';

const SQLITE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS chat_thread (
    thread_id   TEXT PRIMARY KEY,
    user_id     TEXT NOT NULL,
    title       TEXT,
    status      TEXT NOT NULL DEFAULT 'active'
                CHECK (status IN ('active', 'archived', 'deleted')),
    metadata    TEXT,
    created_at  TEXT NOT NULL,
    updated_at  TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS ix_chat_thread_user_recent
    ON chat_thread (user_id, updated_at DESC);

  CREATE TABLE IF NOT EXISTS chat_message (
    message_id   TEXT PRIMARY KEY,
    thread_id    TEXT NOT NULL
                 REFERENCES chat_thread (thread_id) ON DELETE CASCADE,
    user_id      TEXT NOT NULL,
    role         TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
    content      TEXT NOT NULL,
    type         TEXT NOT NULL DEFAULT 'text',
    metadata     TEXT,
    dedup_token  TEXT UNIQUE,
    created_at   TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS ix_chat_message_thread_recent
    ON chat_message (thread_id, created_at DESC);
`;

/**
 * The single embedded connection. Scopes take turns through a FIFO lock, so
 * at most one transaction owns the connection at a time.
 */
export class SqliteChatConnection {
  readonly db: Database.Database;
  private schemaReady = false;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly settings: SqliteSettings,
    private readonly logger: LoggerService,
  ) {
    if (settings.path !== ':memory:') {
      // Ensure data directory exists
      const dataDir = path.dirname(path.resolve(settings.path));
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(settings.path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('busy_timeout = 5000');

    void this.logger.log(`[SQLITE] opened "${settings.path}"`);
  }

  get location(): string {
    return this.settings.path;
  }

  /**
   * Waits for the connection and resolves with its release function. The
   * schema is created by the first caller.
   */
  acquire(): Promise<() => void> {
    const previous = this.tail;

    let releaseNext: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseNext = resolve;
    });
    this.tail = previous.then(() => current);

    let released = false;
    const release = (): void => {
      if (released) return;
      released = true;
      releaseNext();
    };

    return previous.then(() => {
      try {
        this.ensureSchema();
      } catch (err) {
        release();
        throw err;
      }
      return release;
    });
  }

  ensureSchema(): void {
    if (this.schemaReady) return;
    this.db.exec(SQLITE_SCHEMA);
    this.schemaReady = true;
    void this.logger.debug(`[SQLITE] chat schema ready in "${this.settings.path}"`);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      void this.logger.log(`[SQLITE] closed "${this.settings.path}"`);
    }
  }
}
