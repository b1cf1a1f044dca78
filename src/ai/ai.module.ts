// src/ai/ai.module.ts
import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OpenAI } from 'openai';

import { AiService } from './ai.service';
import { AI_SETTINGS, OPENAI_CLIENT } from './ai.constants';
import { AiSettings, resolveAiSettings } from '../config/chat.config';

@Module({
  providers: [
    {
      provide: AI_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => resolveAiSettings(config),
    },
    {
      provide: OPENAI_CLIENT,
      inject: [AI_SETTINGS],
      useFactory: (settings: AiSettings) => {
        if (!settings.apiKey) {
          // the app still starts; AiService answers with a fallback reply
          Logger.warn(
            'OPENAI_API_KEY is not set. AiService will use fallback answers.',
            'AiModule',
          );
          return null;
        }

        return new OpenAI({ apiKey: settings.apiKey });
      },
    },
    AiService,
  ],
  exports: [AiService],
})
export class AiModule {}
