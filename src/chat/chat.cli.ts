// src/chat/chat.cli.ts
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { v4 as uuidv4 } from 'uuid';

import { AppModule } from '../app.module';
import { ChatService } from './chat.service';
import { AiService } from '../ai/ai.service';
import { DatabaseHealthService } from '../database/database-health.service';
import { CHAT_STORAGE } from '../database/database.constants';
import { ChatStorage, migrateChatStorage } from '../database/chat-storage';
import { LOGGER_SERVICE, LoggerService } from '../shared/types';

const COMMANDS = ['migrate', 'health', 'create', 'reply', 'retry', 'show'] as const;
type Command = (typeof COMMANDS)[number];

function getArg(name: string): string | undefined {
  const key = `--${name}=`;
  const hit = process.argv.find((a) => a.startsWith(key));
  return hit ? hit.slice(key.length) : undefined;
}

function requireArg(name: string): string {
  const value = getArg(name);
  if (!value) throw new Error(`Missing --${name}=`);
  return value;
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((cmd) => cmd === value);
}

async function main() {
  const cmd = getArg('cmd');
  if (!isCommand(cmd)) {
    // eslint-disable-next-line no-console
    console.error(`Usage: --cmd=${COMMANDS.join('|')}`);
    process.exit(2);
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });

  try {
    const chat = app.get(ChatService);
    const ai = app.get(AiService);

    let output: unknown;
    switch (cmd) {
      case 'migrate': {
        const storage = app.get<ChatStorage>(CHAT_STORAGE);
        await migrateChatStorage(storage, app.get<LoggerService>(LOGGER_SERVICE));
        output = { backend: storage.backend, migrated: true };
        break;
      }
      case 'health':
        output = await app.get(DatabaseHealthService).check();
        break;
      case 'create':
        output = await chat.createThreadWithFirstMessage(
          {
            threadId: getArg('thread') ?? uuidv4(),
            userId: requireArg('user'),
            title: getArg('title'),
            firstMessage: requireArg('message'),
            dedupToken: getArg('dedup'),
          },
          ai.replyGenerator,
        );
        break;
      case 'reply':
        output = await chat.addMessageAndReply(
          {
            threadId: requireArg('thread'),
            userId: requireArg('user'),
            content: requireArg('message'),
            dedupToken: getArg('dedup'),
          },
          ai.replyGenerator,
        );
        break;
      case 'retry':
        output = await chat.replyToLatestMessage(
          requireArg('thread'),
          ai.replyGenerator,
        );
        break;
      case 'show': {
        const threadId = requireArg('thread');
        const limit = getArg('limit') ? Number(getArg('limit')) : undefined;
        output = {
          thread: await chat.getThreadInfo(threadId),
          messages: await chat.getThreadMessages(threadId, limit),
        };
        break;
      }
    }

    // eslint-disable-next-line no-console
    console.log(JSON.stringify(output, null, 2));

    await app.close();
    process.exit(0);
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(e);
    await app.close();
    process.exit(1);
  }
}

void main();
