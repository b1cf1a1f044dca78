import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { AiService } from './ai.service';
import { AI_SETTINGS, OPENAI_CLIENT } from './ai.constants';

describe('AiService', () => {
  const create = jest.fn();
  const openaiMock = { chat: { completions: { create } } };

  async function build(client: unknown): Promise<AiService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AiService,
        { provide: OPENAI_CLIENT, useValue: client },
        { provide: AI_SETTINGS, useValue: { apiKey: 'test-secret', model: 'test-model' } },
      ],
    }).compile();

    return module.get<AiService>(AiService);
  }

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should return a fallback reply when no client is configured', async () => {
    const service = await build(null);

    await expect(service.generateReply('hello', [])).resolves.toBe(
      'AI response to: hello',
    );
  });

  it('should send the system prompt, the history and the new message', async () => {
    create.mockResolvedValue({
      choices: [{ message: { content: '  Hi there!  ' } }],
      usage: { total_tokens: 12 },
    });
    const service = await build(openaiMock);

    const reply = await service.generateReply('and now?', [
      { role: 'user', content: 'first question' },
      { role: 'assistant', content: 'first answer' },
    ]);

    expect(reply).toBe('Hi there!');
    const [params] = create.mock.calls[0];
    expect(params.model).toBe('test-model');
    expect(params.messages.map((m: { role: string }) => m.role)).toEqual([
      'system',
      'user',
      'assistant',
      'user',
    ]);
    expect(params.messages[3]).toEqual({ role: 'user', content: 'and now?' });
  });

  it('should not repeat a message the history already ends with', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
    const service = await build(openaiMock);

    await service.generateReply('same', [{ role: 'user', content: 'same' }]);

    const [params] = create.mock.calls[0];
    expect(params.messages).toHaveLength(2);
  });

  it('should forward the abort signal to the client', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
    const service = await build(openaiMock);
    const controller = new AbortController();

    await service.replyGenerator('ping', [], controller.signal);

    expect(create).toHaveBeenCalledWith(expect.any(Object), {
      signal: controller.signal,
    });
  });

  it('should propagate client failures', async () => {
    create.mockRejectedValue(new Error('LLM unavailable'));
    const service = await build(openaiMock);

    await expect(service.generateReply('ping', [])).rejects.toThrow('LLM unavailable');
  });

  it('should reject an empty model reply', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const service = await build(openaiMock);

    await expect(service.generateReply('ping', [])).rejects.toThrow(
      'The model returned an empty reply',
    );
  });
});
