// src/ai/ai.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { OpenAI } from 'openai';

import { AI_SETTINGS, OPENAI_CLIENT } from './ai.constants';
import type { AiSettings } from '../config/chat.config';
import type { HistoryTurn, ReplyGenerator } from '../chat/chat.types';
import { describeError } from '../shared/types';

const SYSTEM_PROMPT = `
You are a helpful assistant in a chat application.

Rules:
- Answer in the language the user writes in.
- Keep answers concise and structured; use short paragraphs or lists.
- Use the earlier turns of the conversation as context for follow-up questions.
- If you do not know something, say so instead of guessing.
`.trim();

@Injectable()
export class AiService {
  private readonly logger = new Logger(AiService.name);

  constructor(
    @Inject(OPENAI_CLIENT) private readonly openai: OpenAI | null,
    @Inject(AI_SETTINGS) private readonly settings: AiSettings,
  ) {}

  /** The service bound as a workflow reply generator. */
  readonly replyGenerator: ReplyGenerator = (message, history, signal) =>
    this.generateReply(message, history, signal);

  /**
   * Answers `message` given the conversation so far (oldest first). Failures
   * propagate so the caller can retry the reply on its own.
   */
  async generateReply(
    message: string,
    history: HistoryTurn[],
    signal?: AbortSignal,
  ): Promise<string> {
    if (!this.openai) {
      this.logger.warn(
        'OPENAI_API_KEY is not set. Returning fallback answer in generateReply().',
      );
      return `AI response to: ${message}`;
    }

    const turns = [...history];
    const last = turns[turns.length - 1];
    // the workflow history usually already ends with the message being answered
    if (!last || last.role !== 'user' || last.content !== message) {
      turns.push({ role: 'user', content: message });
    }

    try {
      const res = await this.openai.chat.completions.create(
        {
          model: this.settings.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            ...turns.map(toCompletionMessage),
          ],
          temperature: 0.3,
        },
        { signal },
      );

      const answer = res.choices[0]?.message?.content?.trim();
      if (!answer) {
        throw new Error('The model returned an empty reply');
      }

      this.logger.debug(
        `generateReply(): model=${this.settings.model} tokens=${res.usage?.total_tokens ?? 'n/a'}`,
      );
      return answer;
    } catch (error) {
      this.logger.error(
        `Error while calling OpenAI (generateReply): ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    }
  }
}

function toCompletionMessage(
  turn: HistoryTurn,
): OpenAI.Chat.ChatCompletionMessageParam {
  switch (turn.role) {
    case 'user':
      return { role: 'user', content: turn.content };
    case 'assistant':
      return { role: 'assistant', content: turn.content };
    case 'system':
      return { role: 'system', content: turn.content };
  }
}
