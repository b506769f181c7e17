import dotenv from 'dotenv';
import { z } from 'zod';
import type { JsonValue } from '@pushline/shared';
import { LOG_LEVELS, type ILogger, type LogLevel } from '../core/ports/ILogger.js';
import type { ITokenProvider } from '../core/ports/ITokenProvider.js';
import type { TransportFactory } from '../core/ports/ITransport.js';
import type { ICodec } from '../core/ports/ICodec.js';
import type { RandomSource } from '../core/backoff.js';
import { ConfigurationError } from '../core/errors.js';
import { JwtTokenProvider } from '../adapters/services/JwtTokenProvider.js';

const positiveMs = z.number().int().positive();

export const clientSettingsSchema = z
  .object({
    url: z
      .string()
      .url()
      .refine((value) => /^wss?:\/\//.test(value), 'Must be a ws:// or wss:// URL'),
    token: z.string().default(''),
    name: z.string().min(1).default('js'),
    version: z.string().default(''),
    timeoutMs: positiveMs.default(5000),
    minReconnectDelayMs: positiveMs.default(200),
    maxReconnectDelayMs: positiveMs.default(20000),
    minResubscribeDelayMs: positiveMs.default(100),
    maxResubscribeDelayMs: positiveMs.default(10000),
    maxServerPingDelayMs: positiveMs.default(10000),
    maxMalformedFrames: z.number().int().nonnegative().default(10),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  })
  .refine((o) => o.minReconnectDelayMs <= o.maxReconnectDelayMs, {
    message: 'minReconnectDelayMs must not exceed maxReconnectDelayMs',
    path: ['minReconnectDelayMs'],
  })
  .refine((o) => o.minResubscribeDelayMs <= o.maxResubscribeDelayMs, {
    message: 'minResubscribeDelayMs must not exceed maxResubscribeDelayMs',
    path: ['minResubscribeDelayMs'],
  });

export type ClientSettings = z.infer<typeof clientSettingsSchema>;

export type ClientOptions = z.input<typeof clientSettingsSchema> & {
  /** Custom data sent with the connect command */
  data?: JsonValue;
  tokenProvider?: ITokenProvider;
  transport?: TransportFactory;
  codec?: ICodec;
  logger?: ILogger;
  random?: RandomSource;
};

export interface ResolvedClientOptions extends ClientSettings {
  data?: JsonValue;
  tokenProvider?: ITokenProvider;
  transport?: TransportFactory;
  codec?: ICodec;
  logger?: ILogger;
  random?: RandomSource;
}

/**
 * Validates and defaults client options. Collaborators pass through untouched.
 */
export function resolveClientOptions(options: ClientOptions): ResolvedClientOptions {
  const { data, tokenProvider, transport, codec, logger, random, ...settings } = options;
  const parsed = clientSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
      .join(', ');
    throw new ConfigurationError(`Invalid client options: ${details}`);
  }

  return {
    ...parsed.data,
    ...(data !== undefined && { data }),
    ...(tokenProvider && { tokenProvider }),
    ...(transport && { transport }),
    ...(codec && { codec }),
    ...(logger && { logger }),
    ...(random && { random }),
  };
}

function getOptionalEnv(env: NodeJS.ProcessEnv, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getIntEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`Environment variable ${key} must be an integer, got "${raw}"`);
  }
  return value;
}

function getLogLevelEnv(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const raw = env.LOG_LEVEL;
  if (!raw) return undefined;
  const level = LOG_LEVELS.find((candidate) => candidate === raw.toLowerCase());
  if (!level) {
    throw new ConfigurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

/**
 * Builds client options from environment variables. Loads `.env` first when
 * reading the process environment.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientOptions {
  if (env === process.env) {
    dotenv.config();
  }

  const options: ClientOptions = {
    url: getOptionalEnv(env, 'CENTRIFUGO_URL', 'ws://localhost:8000/connection/websocket'),
    token: getOptionalEnv(env, 'CENTRIFUGO_TOKEN', ''),
  };

  const timeoutMs = getIntEnv(env, 'PUSHLINE_TIMEOUT_MS');
  if (timeoutMs !== undefined) options.timeoutMs = timeoutMs;
  const minReconnectDelayMs = getIntEnv(env, 'PUSHLINE_MIN_RECONNECT_DELAY_MS');
  if (minReconnectDelayMs !== undefined) options.minReconnectDelayMs = minReconnectDelayMs;
  const maxReconnectDelayMs = getIntEnv(env, 'PUSHLINE_MAX_RECONNECT_DELAY_MS');
  if (maxReconnectDelayMs !== undefined) options.maxReconnectDelayMs = maxReconnectDelayMs;
  const logLevel = getLogLevelEnv(env);
  if (logLevel) options.logLevel = logLevel;

  const secret = env.CENTRIFUGO_TOKEN_SECRET;
  if (secret) {
    options.tokenProvider = new JwtTokenProvider({
      secret,
      user: getOptionalEnv(env, 'CENTRIFUGO_USER', ''),
    });
  }

  return options;
}
