// src/database/database-health.service.ts
import { Inject, Injectable } from '@nestjs/common';

import { ChatRepositoryFactory, withChatRepository } from '../chat/chat.repository';
import { DatabaseBackend, DatabaseConfig } from '../config/chat.config';
import { describeError, LOGGER_SERVICE, LoggerService } from '../shared/types';
import { CHAT_REPOSITORY_FACTORY, DATABASE_CONFIG } from './database.constants';

export interface DatabaseHealth {
  backend: DatabaseBackend;
  status: 'ok' | 'error';
  latencyMs: number;
  error?: string;
}

@Injectable()
export class DatabaseHealthService {
  constructor(
    @Inject(DATABASE_CONFIG) private readonly config: DatabaseConfig,
    @Inject(CHAT_REPOSITORY_FACTORY)
    private readonly repositories: ChatRepositoryFactory,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  /** Opens and commits an empty transaction. Never throws. */
  async check(): Promise<DatabaseHealth> {
    const startedAt = Date.now();
    try {
      await withChatRepository(this.repositories, async () => undefined);
      return {
        backend: this.config.backend,
        status: 'ok',
        latencyMs: Date.now() - startedAt,
      };
    } catch (err) {
      void this.logger.warn(
        `[DB] health check failed for ${this.config.backend}: ${describeError(err)}`,
      );
      return {
        backend: this.config.backend,
        status: 'error',
        latencyMs: Date.now() - startedAt,
        error: describeError(err),
      };
    }
  }
}
