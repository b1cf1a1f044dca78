// src/pg/pg-chat.schema.ts
import { DatabaseError } from 'pg';

import type { PgConnectionSource } from './pg-pool';
import { describeError, LoggerService, toError } from '../shared/types';

export const CHAT_THREAD_PKEY = 'chat_thread_pkey';
export const CHAT_MESSAGE_PKEY = 'chat_message_pkey';
export const CHAT_MESSAGE_THREAD_FKEY = 'chat_message_thread_id_fkey';
export const CHAT_DEDUP_INDEX = 'ux_chat_message_dedup_token';

// arbitrary but stable key for pg_advisory_xact_lock
const SCHEMA_LOCK_KEY = 7_340_211;

export const CHAT_SCHEMA_STATEMENTS: readonly string[] = [
  `
  CREATE TABLE IF NOT EXISTS chat_thread (
    thread_id   uuid        PRIMARY KEY,
    user_id     uuid        NOT NULL,
    title       text,
    status      text        NOT NULL DEFAULT 'active'
                CHECK (status IN ('active', 'archived', 'deleted')),
    metadata    jsonb,
    created_at  timestamptz NOT NULL DEFAULT now(),
    updated_at  timestamptz NOT NULL DEFAULT now()
  )
  `,
  `
  CREATE INDEX IF NOT EXISTS ix_chat_thread_user_recent
    ON chat_thread (user_id, updated_at DESC)
  `,
  `
  CREATE TABLE IF NOT EXISTS chat_message (
    message_id   uuid         PRIMARY KEY,
    seq          bigint       GENERATED ALWAYS AS IDENTITY,
    thread_id    uuid         NOT NULL
                 REFERENCES chat_thread (thread_id) ON DELETE CASCADE,
    user_id      uuid         NOT NULL,
    role         text         NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
    content      text         NOT NULL,
    type         text         NOT NULL DEFAULT 'text',
    metadata     jsonb,
    dedup_token  varchar(255),
    created_at   timestamptz  NOT NULL DEFAULT now()
  )
  `,
  `
  CREATE UNIQUE INDEX IF NOT EXISTS ${CHAT_DEDUP_INDEX}
    ON chat_message (dedup_token)
    WHERE dedup_token IS NOT NULL
  `,
  `
  CREATE INDEX IF NOT EXISTS ix_chat_message_thread_recent
    ON chat_message (thread_id, created_at DESC, seq DESC)
  `,
];

/**
 * Applies the chat schema. Idempotent; concurrent callers serialize on an
 * advisory lock held until COMMIT.
 */
export async function ensurePgChatSchema(
  pool: PgConnectionSource,
  logger: LoggerService,
): Promise<void> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query({ text: 'BEGIN' });
    await client.query({
      name: 'chat.schema-lock',
      text: 'SELECT pg_advisory_xact_lock($1)',
      values: [SCHEMA_LOCK_KEY],
    });

    for (const statement of CHAT_SCHEMA_STATEMENTS) {
      await client.query({ text: statement });
    }

    await client.query({ text: 'COMMIT' });
    void logger.log(
      `[PG] chat schema ready (${CHAT_SCHEMA_STATEMENTS.length} statements)`,
    );
  } catch (e) {
    if (!(e instanceof DatabaseError)) broken = toError(e);
    try {
      await client.query({ text: 'ROLLBACK' });
    } catch (rollbackErr) {
      broken = broken ?? toError(rollbackErr);
      void logger.error(
        `[PG] rollback after failed schema migration did not complete: ${describeError(rollbackErr)}`,
        broken.stack,
      );
    }
    throw e;
  } finally {
    client.release(broken);
  }
}
