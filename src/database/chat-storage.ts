// src/database/chat-storage.ts
import { DatabaseBackend, DatabaseConfig } from '../config/chat.config';
import { asConnectionSource, createPgPool, PgConnectionSource } from '../pg/pg-pool';
import { ensurePgChatSchema } from '../pg/pg-chat.schema';
import { SqliteChatConnection } from '../sqlite/sqlite-connection';
import { LoggerService } from '../shared/types';

/** The process-wide storage handle behind the repository factory. */
export type ChatStorage =
  | {
      backend: DatabaseBackend.POSTGRES;
      pool: PgConnectionSource;
      autoMigrate: boolean;
    }
  | {
      backend: DatabaseBackend.SQLITE;
      connection: SqliteChatConnection;
    };

export function openChatStorage(
  config: DatabaseConfig,
  logger: LoggerService,
): ChatStorage {
  switch (config.backend) {
    case DatabaseBackend.POSTGRES:
      return {
        backend: DatabaseBackend.POSTGRES,
        pool: asConnectionSource(createPgPool(config.postgres, logger)),
        autoMigrate: config.postgres.autoMigrate,
      };
    case DatabaseBackend.SQLITE:
      return {
        backend: DatabaseBackend.SQLITE,
        connection: new SqliteChatConnection(config.sqlite, logger),
      };
  }
}

/** Creates the chat tables when they are missing. Safe to repeat. */
export async function migrateChatStorage(
  storage: ChatStorage,
  logger: LoggerService,
): Promise<void> {
  if (storage.backend === DatabaseBackend.POSTGRES) {
    await ensurePgChatSchema(storage.pool, logger);
    return;
  }

  const release = await storage.connection.acquire();
  release();
}

export async function closeChatStorage(storage: ChatStorage): Promise<void> {
  if (storage.backend === DatabaseBackend.POSTGRES) {
    await storage.pool.end();
  } else {
    storage.connection.close();
  }
}
