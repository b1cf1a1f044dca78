// src/database/database.module.ts
import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DatabaseConfig, resolveDatabaseConfig } from '../config/chat.config';
import { LoggingModule } from '../shared/lib/logging/logging.module';
import { LOGGER_SERVICE, LoggerService } from '../shared/types';
import { ChatStorage, openChatStorage } from './chat-storage';
import { createChatRepositoryFactory } from './chat-repository.factory';
import { DatabaseHealthService } from './database-health.service';
import { DatabaseLifecycle } from './database.lifecycle';
import {
  CHAT_REPOSITORY_FACTORY,
  CHAT_STORAGE,
  DATABASE_CONFIG,
} from './database.constants';

@Global()
@Module({
  imports: [LoggingModule],
  providers: [
    {
      provide: DATABASE_CONFIG,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => resolveDatabaseConfig(config),
    },
    {
      provide: CHAT_STORAGE,
      inject: [DATABASE_CONFIG, LOGGER_SERVICE],
      useFactory: (config: DatabaseConfig, logger: LoggerService) =>
        openChatStorage(config, logger),
    },
    {
      provide: CHAT_REPOSITORY_FACTORY,
      inject: [CHAT_STORAGE, LOGGER_SERVICE],
      useFactory: (storage: ChatStorage, logger: LoggerService) =>
        createChatRepositoryFactory(storage, logger),
    },
    DatabaseHealthService,
    DatabaseLifecycle,
  ],
  exports: [
    DATABASE_CONFIG,
    CHAT_STORAGE,
    CHAT_REPOSITORY_FACTORY,
    DatabaseHealthService,
  ],
})
export class DatabaseModule {}
