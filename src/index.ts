// src/index.ts
export * from './chat/chat.types';
export * from './chat/chat.errors';
export { ChatRepository, ChatRepositoryFactory, ScopeOutcome, withChatRepository } from './chat/chat.repository';
export { ChatService, DEFAULT_MESSAGE_LIMIT, HISTORY_WINDOW } from './chat/chat.service';
export { ChatModule } from './chat/chat.module';
export { deriveThreadTitle, DEFAULT_THREAD_TITLE } from './chat/thread-title';
export {
  ChatEnvironment,
  DatabaseBackend,
  DatabaseConfig,
  parseEnvironment,
  resolveDatabaseConfig,
  validateEnvironment,
} from './config/chat.config';
export { ChatStorage, closeChatStorage, migrateChatStorage, openChatStorage } from './database/chat-storage';
export { createChatRepositoryFactory } from './database/chat-repository.factory';
export { DatabaseHealth, DatabaseHealthService } from './database/database-health.service';
export { DatabaseModule } from './database/database.module';
export { CHAT_REPOSITORY_FACTORY, CHAT_STORAGE, DATABASE_CONFIG } from './database/database.constants';
export { PgChatRepository } from './pg/pg-chat.repository';
export { SqliteChatRepository } from './sqlite/sqlite-chat.repository';
export { AiService } from './ai/ai.service';
export { AiModule } from './ai/ai.module';
export { AppModule } from './app.module';
