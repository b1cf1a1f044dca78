// src/chat/chat.module.ts
import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';

// CHAT_REPOSITORY_FACTORY comes from the global DatabaseModule
@Module({
  providers: [ChatService],
  exports: [ChatService],
})
export class ChatModule {}
