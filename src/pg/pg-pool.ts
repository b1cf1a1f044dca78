// src/pg/pg-pool.ts
import { Pool, QueryConfig, QueryResult, QueryResultRow } from 'pg';

import type { PgSettings } from '../config/chat.config';
import { describeError, LoggerService } from '../shared/types';

/** The slice of a pooled client the chat repository relies on. */
export interface PgClient {
  query(config: QueryConfig): Promise<QueryResult<QueryResultRow>>;
  release(err?: Error | boolean): void;
}

/** Process-wide connection source; never handed out above the factory. */
export interface PgConnectionSource {
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

export function createPgPool(
  settings: PgSettings,
  logger: LoggerService,
): Pool {
  const poolName = logger.app;
  const poolId = `${poolName}-${process.pid}-${Math.random().toString(16).slice(2, 8)}`;

  const pool = new Pool({
    host: settings.host,
    port: settings.port,
    database: settings.database,
    user: settings.user,
    password: settings.password,
    ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,

    // explicit pool behavior
    max: settings.poolMax,
    idleTimeoutMillis: settings.idleTimeoutMillis,
    connectionTimeoutMillis: settings.connectionTimeoutMillis,
    application_name: poolName,
  });

  let connectCount = 0;

  void logger.log(
    `[PG] pool created id="${poolId}" name="${poolName}" pid=${process.pid} max=${settings.poolMax}`,
  );

  pool.on('connect', async (client) => {
    connectCount += 1;
    void logger.log(
      `[PG] connect #${connectCount} id="${poolId}" total=${pool.totalCount} idle=${pool.idleCount} waiting=${pool.waitingCount}`,
    );

    try {
      // a scope left open by a crashed caller must not pin locks forever
      await client.query(`SET idle_in_transaction_session_timeout = 60000`);
      void logger.debug(`[PG] session init ok id="${poolId}"`);
    } catch (e) {
      void logger.error(
        `[PG] failed session init id="${poolId}": ${describeError(e)}`,
        e instanceof Error ? e.stack : undefined,
      );
    }
  });

  pool.on('acquire', () => {
    void logger.debug(
      `[PG] acquire id="${poolId}" total=${pool.totalCount} idle=${pool.idleCount} waiting=${pool.waitingCount}`,
    );
  });

  pool.on('remove', () => {
    void logger.warn(
      `[PG] remove id="${poolId}" total=${pool.totalCount} idle=${pool.idleCount} waiting=${pool.waitingCount}`,
    );
  });

  pool.on('error', (err) => {
    void logger.error(`[PG] pool error id="${poolId}": ${err.message}`, err.stack);
  });

  return pool;
}

export function asConnectionSource(pool: Pool): PgConnectionSource {
  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (config) => client.query(config),
        release: (err) => client.release(err),
      };
    },
    end: () => pool.end(),
  };
}
