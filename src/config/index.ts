import * as path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

const ConfigSchema = z.object({
  exchange: z.object({
    restUrl: z.string().url().default('https://test.deribit.com/api/v2'),
    clientId: z.string().default(''),
    clientSecret: z.string().default(''),
    scope: z.string().default('trade:read_write'),
    requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
  }),
  stream: z.object({
    host: z.string().min(1).default('test.deribit.com'),
    port: z.coerce.number().int().min(1).max(65535).default(443),
    path: z.string().startsWith('/').default('/ws/api/v2'),
    secure: booleanFlag.default('true'),
    verifySsl: booleanFlag.default('true'),
    connectTimeoutMs: z.coerce.number().int().positive().default(10_000),
    readTimeoutMs: z.coerce.number().int().nonnegative().default(30_000),
    instrument: z.string().min(1).default('BTC-PERPETUAL'),
    cadence: z.string().min(1).default('100ms'),
  }),
  hub: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.coerce.number().int().min(0).max(65535).default(9002),
  }),
  telegram: z.object({
    botToken: z.string().default(''),
    allowedUsers: z.array(z.string()).default([]),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

/** Empty variables count as unset so the schema default applies. */
function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function list(value: string | undefined): string[] | undefined {
  return value?.split(',').map((item) => item.trim()).filter(Boolean);
}

export function configFromEnv(env: Env): Config {
  return ConfigSchema.parse({
    exchange: {
      restUrl: read(env, 'EXCHANGE_REST_URL'),
      clientId: read(env, 'EXCHANGE_CLIENT_ID'),
      clientSecret: read(env, 'EXCHANGE_CLIENT_SECRET'),
      scope: read(env, 'EXCHANGE_SCOPE'),
      requestTimeoutMs: read(env, 'EXCHANGE_REQUEST_TIMEOUT_MS'),
    },
    stream: {
      host: read(env, 'STREAM_HOST'),
      port: read(env, 'STREAM_PORT'),
      path: read(env, 'STREAM_PATH'),
      secure: read(env, 'STREAM_SECURE'),
      verifySsl: read(env, 'STREAM_VERIFY_SSL'),
      connectTimeoutMs: read(env, 'STREAM_CONNECT_TIMEOUT_MS'),
      readTimeoutMs: read(env, 'STREAM_READ_TIMEOUT_MS'),
      instrument: read(env, 'STREAM_INSTRUMENT'),
      cadence: read(env, 'STREAM_CADENCE'),
    },
    hub: {
      host: read(env, 'HUB_HOST'),
      port: read(env, 'HUB_PORT'),
    },
    telegram: {
      botToken: read(env, 'TELEGRAM_BOT_TOKEN'),
      allowedUsers: list(read(env, 'ALLOWED_USERS')),
    },
  });
}

class ConfigLoader {
  private static instance: Config | null = null;

  static load(): Config {
    if (ConfigLoader.instance) {
      return ConfigLoader.instance;
    }

    dotenv.config({ path: path.resolve(process.cwd(), '.env') });

    ConfigLoader.instance = configFromEnv(process.env);
    return ConfigLoader.instance;
  }
}

export const Config = ConfigLoader;
