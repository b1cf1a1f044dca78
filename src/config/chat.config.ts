// src/config/chat.config.ts
import { ConfigService } from '@nestjs/config';
import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';

export enum DatabaseBackend {
  POSTGRES = 'postgres',
  SQLITE = 'sqlite',
}

const toBoolean = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? ['true', '1', 'yes'].includes(value.toLowerCase()) : value;

/**
 * Environment accepted by the chat core. Every field has a default so a bare
 * environment boots against a local Postgres.
 */
export class ChatEnvironment {
  @IsEnum(DatabaseBackend)
  CHAT_DB_BACKEND: DatabaseBackend = DatabaseBackend.POSTGRES;

  @IsString()
  @MinLength(1)
  PG_HOST: string = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  PG_PORT: number = 5432;

  @IsString()
  @MinLength(1)
  PG_DB: string = 'chatapp';

  @IsString()
  PG_USER: string = 'postgres';

  @IsString()
  PG_PASS: string = 'postgres';

  @Transform(toBoolean)
  @IsBoolean()
  PG_SSL: boolean = false;

  @IsInt()
  @Min(1)
  @Max(200)
  PG_POOL_MAX: number = 10;

  @IsInt()
  @Min(0)
  PG_IDLE_TIMEOUT_MS: number = 30_000;

  @IsInt()
  @Min(0)
  PG_CONN_TIMEOUT_MS: number = 5_000;

  @Transform(toBoolean)
  @IsBoolean()
  PG_AUTO_MIGRATE: boolean = false;

  @IsString()
  @MinLength(1)
  SQLITE_PATH: string = ':memory:';

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsString()
  @MinLength(1)
  OPENAI_MODEL: string = 'gpt-4.1-mini';
}

export function parseEnvironment(
  config: Record<string, unknown>,
): ChatEnvironment {
  const env = plainToInstance(ChatEnvironment, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(env, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map(
        (err) =>
          `${err.property}: ${Object.values(err.constraints ?? {}).join(', ')}`,
      )
      .join('; ');
    throw new Error(`Invalid chat configuration: ${details}`);
  }

  return env;
}

/** `ConfigModule.forRoot({ validate })` hook. */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  return { ...parseEnvironment(config) };
}

export interface PgSettings {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolMax: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  autoMigrate: boolean;
}

export interface SqliteSettings {
  path: string;
}

export interface DatabaseConfig {
  backend: DatabaseBackend;
  postgres: PgSettings;
  sqlite: SqliteSettings;
}

export interface AiSettings {
  apiKey: string | null;
  model: string;
}

export function resolveDatabaseConfig(config: ConfigService): DatabaseConfig {
  return {
    backend: config.getOrThrow<DatabaseBackend>('CHAT_DB_BACKEND'),
    postgres: {
      host: config.getOrThrow<string>('PG_HOST'),
      port: config.getOrThrow<number>('PG_PORT'),
      database: config.getOrThrow<string>('PG_DB'),
      user: config.getOrThrow<string>('PG_USER'),
      password: config.getOrThrow<string>('PG_PASS'),
      ssl: config.getOrThrow<boolean>('PG_SSL'),
      poolMax: config.getOrThrow<number>('PG_POOL_MAX'),
      idleTimeoutMillis: config.getOrThrow<number>('PG_IDLE_TIMEOUT_MS'),
      connectionTimeoutMillis: config.getOrThrow<number>('PG_CONN_TIMEOUT_MS'),
      autoMigrate: config.getOrThrow<boolean>('PG_AUTO_MIGRATE'),
    },
    sqlite: {
      path: config.getOrThrow<string>('SQLITE_PATH'),
    },
  };
}

export function resolveAiSettings(config: ConfigService): AiSettings {
  return {
    apiKey: config.get<string>('OPENAI_API_KEY') || null,
    model: config.getOrThrow<string>('OPENAI_MODEL'),
  };
}
