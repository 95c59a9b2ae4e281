import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, ConfigurationIssue } from '../errors';
import type { LogLevel } from '../utils/logger';
import {
  DEFAULT_FALLBACK_FOLDER,
  DEFAULT_IGNORE_LABELS,
  DEFAULT_IMPORT_ROOT_FOLDER,
  DEFAULT_PRIORITY_ORDER,
} from './labels';

const wholeNumber = (fallback: string) =>
  z.string().regex(/^\d+$/, 'must be a whole number').default(fallback);

// Environment variables schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Labels
  IGNORE_LABELS: z.string().optional(),
  DEFAULT_LABEL_PRIORITY: z.string().optional(),
  FALLBACK_FOLDER: z.string().min(1).default(DEFAULT_FALLBACK_FOLDER),
  IMPORT_ROOT_FOLDER: z.string().default(DEFAULT_IMPORT_ROOT_FOLDER),

  // Upload
  LEDGER_PATH: z.string().min(1).default('./upload-ledger.jsonl'),
  UPLOAD_MAX_ATTEMPTS: wholeNumber('5'),
  UPLOAD_INITIAL_DELAY_MS: wholeNumber('1000'),
  UPLOAD_MAX_DELAY_MS: wholeNumber('30000'),
  UPLOAD_BACKOFF_MULTIPLIER: z.string().regex(/^\d+(\.\d+)?$/, 'must be a number').default('2'),
  UPLOAD_PREFETCH: wholeNumber('4'),
  UPLOAD_RATE_PER_SECOND: wholeNumber('0'),

  // IMAP timeouts
  IMAP_CONNECTION_TIMEOUT_MS: wholeNumber('30000'),
  IMAP_GREETING_TIMEOUT_MS: wholeNumber('30000'),
  IMAP_SOCKET_TIMEOUT_MS: wholeNumber('300000'),
});

export type Environment = z.infer<typeof envSchema>;

export interface LabelSettings {
  ignore: ReadonlySet<string>;
  priority: readonly string[];
  fallbackFolder: string;
  /** Server-side parent folder for every imported folder; null places them at the top level */
  rootFolder: string | null;
}

export interface RetrySettings {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface UploadSettings {
  ledgerPath: string;
  retry: RetrySettings;
  prefetch: number;
  /** Appends per second, null for unthrottled */
  ratePerSecond: number | null;
}

export interface ImapTimeouts {
  connectionTimeoutMs: number;
  greetingTimeoutMs: number;
  socketTimeoutMs: number;
}

export interface MigrationConfig {
  env: Environment['NODE_ENV'];
  logLevel: LogLevel;
  labels: LabelSettings;
  upload: UploadSettings;
  imap: ImapTimeouts;
}

export interface ConfigOverrides {
  priorityOrder?: readonly string[];
  ledgerPath?: string;
}

const parseList = (value?: string) =>
  value
    ?.split(',')
    .map((entry) => entry.trim())
    .filter(Boolean) ?? [];

function toIssues(error: z.ZodError): ConfigurationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: `${issue.path.join('.')}: ${issue.message}`,
  }));
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !(value instanceof Set)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Build the run configuration from environment variables and CLI overrides.
 * The result is constructed once at startup and passed by reference.
 */
export function buildConfig(
  source: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): MigrationConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw ConfigurationError.invalidEnvironment(toIssues(parsed.error));
  }
  const env = parsed.data;

  const ignore = env.IGNORE_LABELS !== undefined ? parseList(env.IGNORE_LABELS) : DEFAULT_IGNORE_LABELS;
  const priority =
    overrides.priorityOrder ??
    (env.DEFAULT_LABEL_PRIORITY !== undefined
      ? parseList(env.DEFAULT_LABEL_PRIORITY)
      : DEFAULT_PRIORITY_ORDER);
  const ratePerSecond = parseInt(env.UPLOAD_RATE_PER_SECOND, 10);
  const rootFolder = env.IMPORT_ROOT_FOLDER.trim();

  return deepFreeze<MigrationConfig>({
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    labels: {
      ignore: new Set(ignore),
      priority: [...priority],
      fallbackFolder: env.FALLBACK_FOLDER,
      rootFolder: rootFolder.length > 0 ? rootFolder : null,
    },
    upload: {
      ledgerPath: overrides.ledgerPath ?? env.LEDGER_PATH,
      retry: {
        maxAttempts: Math.max(1, parseInt(env.UPLOAD_MAX_ATTEMPTS, 10)),
        initialDelayMs: parseInt(env.UPLOAD_INITIAL_DELAY_MS, 10),
        maxDelayMs: parseInt(env.UPLOAD_MAX_DELAY_MS, 10),
        backoffMultiplier: parseFloat(env.UPLOAD_BACKOFF_MULTIPLIER),
      },
      prefetch: Math.max(1, parseInt(env.UPLOAD_PREFETCH, 10)),
      ratePerSecond: ratePerSecond > 0 ? ratePerSecond : null,
    },
    imap: {
      connectionTimeoutMs: parseInt(env.IMAP_CONNECTION_TIMEOUT_MS, 10),
      greetingTimeoutMs: parseInt(env.IMAP_GREETING_TIMEOUT_MS, 10),
      socketTimeoutMs: parseInt(env.IMAP_SOCKET_TIMEOUT_MS, 10),
    },
  });
}

/**
 * Load `.env` into the process environment, then build the configuration.
 */
export function loadConfig(overrides: ConfigOverrides = {}): MigrationConfig {
  dotenv.config();
  return buildConfig(process.env, overrides);
}

// ============================================================================
// IMAP connection parameters
// ============================================================================

export type ImapProvider = 'gmail' | 'custom';

export interface ImapConnectionSettings {
  provider: ImapProvider;
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  allowSelfSigned: boolean;
}

export const GMAIL_IMAP_HOST = 'imap.gmail.com';
export const GMAIL_IMAP_PORT = 993;

const connectionSchema = z.discriminatedUnion('provider', [
  z.object({
    provider: z.literal('gmail'),
    email: z.string({ required_error: '--email is required for Gmail provider' }).email(),
    password: z.string({ required_error: '--password is required' }).min(1),
  }),
  z.object({
    provider: z.literal('custom'),
    server: z.string({ required_error: '--server is required for custom provider' }).min(1),
    port: z.coerce
      .number({ invalid_type_error: '--port is required for custom provider' })
      .int()
      .min(1)
      .max(65535),
    username: z.string({ required_error: '--username is required for custom provider' }).min(1),
    password: z.string({ required_error: '--password is required' }).min(1),
    insecure: z.boolean().default(false),
    allowSelfSigned: z.boolean().default(false),
  }),
]);

export type ConnectionInput = z.input<typeof connectionSchema>;

/**
 * Validate connection options and apply the provider preset.
 */
export function resolveConnection(input: unknown): ImapConnectionSettings {
  const parsed = connectionSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.invalidConnection(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  const options = parsed.data;
  if (options.provider === 'gmail') {
    return {
      provider: 'gmail',
      host: GMAIL_IMAP_HOST,
      port: GMAIL_IMAP_PORT,
      secure: true,
      user: options.email,
      password: options.password,
      allowSelfSigned: false,
    };
  }

  return {
    provider: 'custom',
    host: options.server,
    port: options.port,
    secure: !options.insecure,
    user: options.username,
    password: options.password,
    allowSelfSigned: options.allowSelfSigned,
  };
}
