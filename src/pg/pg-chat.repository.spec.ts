import { DatabaseError } from 'pg';

import { PgChatRepository } from './pg-chat.repository';
import { ensurePgChatSchema } from './pg-chat.schema';
import { withChatRepository } from '../chat/chat.repository';
import {
  ChatConflictException,
  ChatStorageException,
} from '../chat/chat.errors';
import { InMemoryPgPool } from '../../test/support/in-memory-pg-pool';
import { createTestLogger } from '../../test/support/test-logger';
import { newId, USER_ID } from '../../test/support/ids';

describe('PgChatRepository', () => {
  let pool: InMemoryPgPool;
  const logger = createTestLogger();
  const factory = () => new PgChatRepository(pool, logger);

  beforeEach(() => {
    pool = new InMemoryPgPool();
  });

  it('should apply the schema under an advisory lock in one transaction', async () => {
    await ensurePgChatSchema(pool, logger);

    expect(pool.statements).toEqual([
      'BEGIN',
      'chat.schema-lock',
      'CREATE',
      'CREATE',
      'CREATE',
      'CREATE',
      'CREATE',
      'COMMIT',
    ]);
    expect(pool.releases).toEqual([undefined]);
  });

  it('should keep the original error and discard a connection that broke during migration', async () => {
    const broken = new Error('Connection terminated unexpectedly');
    pool.failNext('CREATE', broken);
    pool.failNext('ROLLBACK', new Error('Client has encountered a connection error and is not queryable'));

    await expect(ensurePgChatSchema(pool, logger)).rejects.toBe(broken);
    expect(pool.releases).toEqual([broken]);
  });

  it('should roll back and keep the connection when migration fails on the server', async () => {
    pool.failNext('CREATE');

    await expect(ensurePgChatSchema(pool, logger)).rejects.toBeInstanceOf(DatabaseError);
    expect(pool.statements.slice(-1)).toEqual(['ROLLBACK']);
    expect(pool.releases).toEqual([undefined]);
  });

  it('should run each scope as BEGIN … COMMIT with named statements', async () => {
    const threadId = newId();

    await withChatRepository(factory, async (repo) => {
      await repo.insertThread({ threadId, userId: USER_ID, title: 'Hello' });
      await repo.insertMessage({
        threadId,
        userId: USER_ID,
        role: 'user',
        content: 'hi',
      });
    });

    expect(pool.statements).toEqual([
      'BEGIN',
      'chat.insert-thread',
      'chat.insert-message',
      'chat.touch-thread',
      'COMMIT',
    ]);
    expect(pool.releases).toEqual([undefined]);
  });

  it('should round-trip thread fields and jsonb metadata', async () => {
    const threadId = newId();

    const created = await withChatRepository(factory, (repo) =>
      repo.insertThread({
        threadId,
        userId: USER_ID,
        title: 'Hello',
        metadata: { source: 'web', tags: ['a'] },
      }),
    );
    const stored = await withChatRepository(factory, (repo) =>
      repo.getThread(threadId),
    );

    expect(stored).toEqual(created);
    expect(stored?.metadata).toEqual({ source: 'web', tags: ['a'] });
  });

  it('should return null for an unknown thread', async () => {
    await expect(
      withChatRepository(factory, (repo) => repo.getThread(newId())),
    ).resolves.toBeNull();
  });

  it('should treat a repeated dedup token as a no-op and keep the first content', async () => {
    const threadId = newId();

    const [first, second] = await withChatRepository(factory, async (repo) => {
      await repo.insertThread({ threadId, userId: USER_ID, title: null });
      const a = await repo.insertMessage({
        threadId,
        userId: USER_ID,
        role: 'user',
        content: 'first',
        dedupToken: 'client-42',
      });
      const b = await repo.insertMessage({
        threadId,
        userId: USER_ID,
        role: 'user',
        content: 'second',
        dedupToken: 'client-42',
      });
      return [a, b];
    });

    expect(first.inserted).toBe(true);
    expect(second).toEqual({ inserted: false, duplicateOf: 'client-42' });

    const messages = await withChatRepository(factory, (repo) =>
      repo.listMessages(threadId, 10),
    );
    expect(messages.map((m) => m.content)).toEqual(['first']);
  });

  describe('concurrent dedup', () => {
    let threadId: string;

    const submit = (repo: PgChatRepository, content: string) =>
      repo.insertMessage({
        threadId,
        userId: USER_ID,
        role: 'user',
        content,
        dedupToken: 'race-2',
      });

    beforeEach(async () => {
      threadId = newId();
      await withChatRepository(factory, (repo) =>
        repo.insertThread({ threadId, userId: USER_ID, title: null }),
      );
    });

    it('should wait for the open holder of a token and skip once it commits', async () => {
      const first = await factory().enter();
      const second = await factory().enter();
      expect(pool.active).toBe(2);

      await expect(submit(first, 'from first')).resolves.toMatchObject({ inserted: true });

      let settled = false;
      const waiting = submit(second, 'from second').then((outcome) => {
        settled = true;
        return outcome;
      });
      await new Promise((resolve) => setImmediate(resolve));
      expect(settled).toBe(false);

      await first.exit({ ok: true });
      await expect(waiting).resolves.toEqual({ inserted: false, duplicateOf: 'race-2' });
      await second.exit({ ok: true });

      const messages = await withChatRepository(factory, (repo) =>
        repo.listMessages(threadId, 10),
      );
      expect(messages.map((m) => m.content)).toEqual(['from first']);
    });

    it('should insert once the open holder of a token rolls back', async () => {
      const first = await factory().enter();
      const second = await factory().enter();

      await submit(first, 'from first');
      const waiting = submit(second, 'from second');

      await first.exit({ ok: false, error: new Error('client went away') });
      await expect(waiting).resolves.toMatchObject({ inserted: true });
      await second.exit({ ok: true });

      const messages = await withChatRepository(factory, (repo) =>
        repo.listMessages(threadId, 10),
      );
      expect(messages.map((m) => m.content)).toEqual(['from second']);
    });
  });

  it('should raise a conflict for a duplicate thread id', async () => {
    const threadId = newId();
    await withChatRepository(factory, (repo) =>
      repo.insertThread({ threadId, userId: USER_ID, title: null }),
    );

    const failure = withChatRepository(factory, (repo) =>
      repo.insertThread({ threadId, userId: USER_ID, title: 'again' }),
    );

    await expect(failure).rejects.toBeInstanceOf(ChatConflictException);
    await expect(failure).rejects.toThrow(/chat_thread_pkey/);
    expect(pool.statements.slice(-1)).toEqual(['ROLLBACK']);
  });

  it('should surface the foreign key as a storage error', async () => {
    await expect(
      withChatRepository(factory, (repo) =>
        repo.insertMessage({
          threadId: newId(),
          userId: USER_ID,
          role: 'user',
          content: 'orphan',
        }),
      ),
    ).rejects.toThrow(/23503/);
    expect(pool.messageCount).toBe(0);
  });

  it('should report a commit answered by ROLLBACK after a swallowed error', async () => {
    const repo = await factory().enter();
    await expect(
      repo.insertMessage({
        threadId: newId(),
        userId: USER_ID,
        role: 'user',
        content: 'orphan',
      }),
    ).rejects.toBeInstanceOf(ChatStorageException);

    await expect(repo.exit({ ok: true })).rejects.toThrow(
      /transaction was aborted/,
    );
    expect(pool.releases).toEqual([undefined]);
  });

  it('should discard a connection that broke during COMMIT', async () => {
    const broken = new Error('Connection terminated unexpectedly');
    pool.failNext('COMMIT', broken);

    await expect(
      withChatRepository(factory, (repo) =>
        repo.insertThread({ threadId: newId(), userId: USER_ID, title: null }),
      ),
    ).rejects.toThrow('[postgres] commit failed: Connection terminated unexpectedly');

    expect(pool.releases).toEqual([broken]);
    expect(pool.threadCount).toBe(0);
    expect(pool.active).toBe(0);
  });

  it('should keep a connection whose COMMIT failed on the server side', async () => {
    const serverError = new DatabaseError('could not serialize access', 0, 'error');
    serverError.code = '40001';
    pool.failNext('COMMIT', serverError);

    await expect(
      withChatRepository(factory, (repo) =>
        repo.insertThread({ threadId: newId(), userId: USER_ID, title: null }),
      ),
    ).rejects.toBeInstanceOf(ChatStorageException);

    expect(pool.releases).toEqual([undefined]);
  });

  it('should fail enter without releasing when no connection is available', async () => {
    pool.failNextConnect(new Error('timeout exceeded when trying to connect'));

    await expect(factory().enter()).rejects.toThrow(
      '[postgres] acquire connection failed: timeout exceeded when trying to connect',
    );
    expect(pool.releases).toEqual([]);
  });

  it('should release the connection when BEGIN fails', async () => {
    pool.failNext('BEGIN', new Error('Connection terminated'));

    await expect(factory().enter()).rejects.toBeInstanceOf(ChatStorageException);
    expect(pool.releases).toHaveLength(1);
    expect(pool.active).toBe(0);
  });
});
