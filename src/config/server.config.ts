/**
 * src/config/server.config.ts
 * Environment-driven settings for the parser and the connection layer around it.
 */
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  MAX_HEADERS: z.coerce.number().int().positive().default(64),
  MAX_HEAD_BYTES: z.coerce.number().int().positive().default(16 * 1024),
  HEADER_TIMEOUT_MS: z.coerce.number().int().min(0).default(10000),
  ALLOW_MULTIPLE_SPACES: booleanFlag,
  IGNORE_INVALID_HEADERS: booleanFlag,
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_DIR: z.string().optional(),
  LOG_TO_FILE: booleanFlag,
  TIMEZONE: z.string().min(1).default('UTC'),
  DATE_FORMAT: z.string().min(1).default('YYYY-MM-DD HH:mm:ss.SSS'),
});

export type LogLevelName = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  host: string;
  /**
   * Capacity of the header list handed to every parse; a request with more headers is
   * rejected with 431.
   */
  maxHeaders: number;
  /** Largest request head (request line + headers) buffered before giving up. */
  maxHeadBytes: number;
  headerTimeoutMs: number;
  parser: {
    allowMultipleSpacesInRequestLineDelimiters: boolean;
    ignoreInvalidHeaders: boolean;
  };
  logging: {
    level: LogLevelName;
    logDir: string;
    toFile: boolean;
  };
  dateTime: {
    timezone: string;
    format: string;
  };
}

/**
 * Builds the configuration from an environment map. Throws on the first invalid entry,
 * naming every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    maxHeaders: e.MAX_HEADERS,
    maxHeadBytes: e.MAX_HEAD_BYTES,
    headerTimeoutMs: e.HEADER_TIMEOUT_MS,
    parser: {
      allowMultipleSpacesInRequestLineDelimiters: e.ALLOW_MULTIPLE_SPACES,
      ignoreInvalidHeaders: e.IGNORE_INVALID_HEADERS,
    },
    logging: {
      level: e.LOG_LEVEL,
      logDir: e.LOG_DIR ? path.resolve(e.LOG_DIR) : path.join(process.cwd(), 'logs'),
      toFile: e.LOG_TO_FILE,
    },
    dateTime: {
      timezone: e.TIMEZONE,
      format: e.DATE_FORMAT,
    },
  };
}

export const config: AppConfig = loadConfig();
