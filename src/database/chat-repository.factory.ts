// src/database/chat-repository.factory.ts
import { ChatRepositoryFactory } from '../chat/chat.repository';
import { DatabaseBackend } from '../config/chat.config';
import { PgChatRepository } from '../pg/pg-chat.repository';
import { SqliteChatRepository } from '../sqlite/sqlite-chat.repository';
import { LoggerService } from '../shared/types';
import { ChatStorage } from './chat-storage';

/**
 * Every call yields a new, not yet entered repository: one per transaction.
 */
export function createChatRepositoryFactory(
  storage: ChatStorage,
  logger: LoggerService,
): ChatRepositoryFactory {
  switch (storage.backend) {
    case DatabaseBackend.POSTGRES: {
      const pool = storage.pool;
      return () => new PgChatRepository(pool, logger);
    }
    case DatabaseBackend.SQLITE: {
      const connection = storage.connection;
      return () => new SqliteChatRepository(connection, logger);
    }
  }
}
