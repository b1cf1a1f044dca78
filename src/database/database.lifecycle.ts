// src/database/database.lifecycle.ts
import {
  Inject,
  Injectable,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';

import { DatabaseBackend } from '../config/chat.config';
import { LOGGER_SERVICE, LoggerService } from '../shared/types';
import { ChatStorage, closeChatStorage, migrateChatStorage } from './chat-storage';
import { CHAT_STORAGE } from './database.constants';

@Injectable()
export class DatabaseLifecycle implements OnModuleInit, OnApplicationShutdown {
  constructor(
    @Inject(CHAT_STORAGE) private readonly storage: ChatStorage,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  async onModuleInit(): Promise<void> {
    // the embedded schema is created lazily by its first scope
    if (this.storage.backend === DatabaseBackend.POSTGRES && this.storage.autoMigrate) {
      await migrateChatStorage(this.storage, this.logger);
    }
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    await closeChatStorage(this.storage);
    void this.logger.log(
      `[DB] ${this.storage.backend} storage closed${signal ? ` (${signal})` : ''}`,
    );
  }
}
