import { ConfigService } from '@nestjs/config';
import {
  DatabaseBackend,
  parseEnvironment,
  resolveAiSettings,
  resolveDatabaseConfig,
  validateEnvironment,
} from './chat.config';

describe('chat configuration', () => {
  describe('parseEnvironment', () => {
    it('should apply defaults to an empty environment', () => {
      const env = parseEnvironment({});

      expect(env.CHAT_DB_BACKEND).toBe(DatabaseBackend.POSTGRES);
      expect(env.PG_HOST).toBe('localhost');
      expect(env.PG_PORT).toBe(5432);
      expect(env.PG_SSL).toBe(false);
      expect(env.PG_AUTO_MIGRATE).toBe(false);
      expect(env.SQLITE_PATH).toBe(':memory:');
      expect(env.OPENAI_API_KEY).toBeUndefined();
      expect(env.OPENAI_MODEL).toBe('gpt-4.1-mini');
    });

    it('should convert numeric and boolean strings', () => {
      const env = parseEnvironment({
        CHAT_DB_BACKEND: 'sqlite',
        PG_PORT: '6543',
        PG_POOL_MAX: '3',
        PG_SSL: 'true',
        PG_AUTO_MIGRATE: '1',
      });

      expect(env.CHAT_DB_BACKEND).toBe(DatabaseBackend.SQLITE);
      expect(env.PG_PORT).toBe(6543);
      expect(env.PG_POOL_MAX).toBe(3);
      expect(env.PG_SSL).toBe(true);
      expect(env.PG_AUTO_MIGRATE).toBe(true);
    });

    it('should treat other boolean strings as false', () => {
      expect(parseEnvironment({ PG_SSL: 'false' }).PG_SSL).toBe(false);
      expect(parseEnvironment({ PG_SSL: 'off' }).PG_SSL).toBe(false);
    });

    it('should list every invalid variable', () => {
      expect(() =>
        parseEnvironment({ CHAT_DB_BACKEND: 'mongo', PG_PORT: '0' }),
      ).toThrow(/CHAT_DB_BACKEND: .*; PG_PORT: /);
    });
  });

  it('should hand ConfigModule a plain object', () => {
    const validated = validateEnvironment({ CHAT_DB_BACKEND: 'sqlite' });

    expect(validated.CHAT_DB_BACKEND).toBe('sqlite');
    expect(validated.PG_PORT).toBe(5432);
  });

  describe('resolvers', () => {
    const config = new ConfigService(
      validateEnvironment({
        CHAT_DB_BACKEND: 'sqlite',
        SQLITE_PATH: '/tmp/chat-test.db',
        PG_HOST: 'db.internal',
        PG_PASS: 'test-secret',
      }),
    );

    it('should build the database config', () => {
      const db = resolveDatabaseConfig(config);

      expect(db.backend).toBe(DatabaseBackend.SQLITE);
      expect(db.sqlite).toEqual({ path: '/tmp/chat-test.db' });
      expect(db.postgres).toEqual({
        host: 'db.internal',
        port: 5432,
        database: 'chatapp',
        user: 'postgres',
        password: 'test-secret',
        ssl: false,
        poolMax: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
        autoMigrate: false,
      });
    });

    it('should report a missing API key as null', () => {
      expect(resolveAiSettings(config)).toEqual({
        apiKey: null,
        model: 'gpt-4.1-mini',
      });
    });
  });
});
