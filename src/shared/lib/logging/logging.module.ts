import { Module } from '@nestjs/common';
import { LokiLoggerService } from './loki-logger.service';
import { LOGGER_SERVICE } from '../../types';

@Module({
  providers: [
    {
      provide: 'JOB_NAME',
      useValue: process.env.JOB_NAME || 'chat-core',
    },
    {
      provide: 'APP_NAME',
      useValue: process.env.APP_NAME || 'chat',
    },
    {
      provide: 'LOKI_HOST',
      useValue: process.env.LOKI_HOST || null,
    },
    LokiLoggerService,
    {
      provide: LOGGER_SERVICE,
      useExisting: LokiLoggerService,
    },
  ],
  exports: [
    LOGGER_SERVICE, // main abstraction
    LokiLoggerService,
    'JOB_NAME',
    'APP_NAME',
  ],
})
export class LoggingModule {}
