// Configuration management with environment variable overrides
import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { parse } from 'yaml';
import 'dotenv/config';

const HOUR_MS = 60 * 60 * 1000;

const booleanish = z.preprocess((value) => {
  if (typeof value === 'string') {
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
  }
  return value;
}, z.boolean());

const integer = (min: number) =>
  z.preprocess((value) => (typeof value === 'string' ? Number(value.trim()) : value), z.number().int().min(min));

const stringList = z.preprocess((value) => {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return value;
}, z.array(z.string()));

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: integer(1).default(8080),
    })
    .default({}),
  database: z
    .object({
      url: z.string().default('./data/invoice-inbox-sync.db'),
    })
    .default({}),
  gmail: z
    .object({
      userId: z.string().default('me'),
      credentialsPath: z.string().default('config/google_credentials.json'),
      tokenPath: z.string().default('config/google_token.json'),
      query: z.string().min(1).default('has:attachment filename:zip in:inbox'),
      processedLabelName: z.string().min(1).default('invoice-processed'),
      markAsRead: booleanish.default(true),
    })
    .default({}),
  watch: z
    .object({
      topicName: z.string().optional(),
      labelIds: stringList.default(['INBOX']),
      labelFilterAction: z.enum(['include', 'exclude']).default('include'),
      syncAfterStart: booleanish.default(true),
    })
    .default({}),
  push: z
    .object({
      audience: z.string().optional(),
      serviceAccountEmail: z.string().optional(),
      verificationToken: z.string().optional(),
    })
    .default({}),
  drive: z.object({
    parentFolderId: z.string().min(1, 'drive.parentFolderId is required'),
  }),
  sync: z
    .object({
      maxCycles: integer(1).default(20),
      maxMessagesPerCycle: integer(1).default(20),
      historyPageSize: integer(1).default(500),
    })
    .default({}),
  scheduler: z
    .object({
      enabled: booleanish.default(false),
      watchRenewalIntervalMs: integer(1000).default(24 * HOUR_MS),
      fullSyncIntervalMs: integer(10_000).default(15 * 60 * 1000),
      renewBeforeExpiryMs: integer(0).default(48 * HOUR_MS),
    })
    .default({}),
  admin: z
    .object({
      token: z.string().default(''),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  return {
    server: {
      host: envValue(env, 'HOST'),
      port: envValue(env, 'PORT'),
    },
    database: {
      url: envValue(env, 'DATABASE_URL'),
    },
    gmail: {
      userId: envValue(env, 'GMAIL_USER'),
      credentialsPath: envValue(env, 'GOOGLE_CREDENTIALS_PATH'),
      tokenPath: envValue(env, 'GOOGLE_TOKEN_PATH'),
      query: envValue(env, 'GMAIL_QUERY'),
      processedLabelName: envValue(env, 'PROCESSED_LABEL_NAME'),
      markAsRead: envValue(env, 'MARK_AS_READ'),
    },
    watch: {
      topicName: envValue(env, 'WATCH_TOPIC'),
      labelIds: envValue(env, 'WATCH_LABEL_IDS'),
      labelFilterAction: envValue(env, 'WATCH_LABEL_FILTER_ACTION'),
      syncAfterStart: envValue(env, 'WATCH_SYNC_AFTER_START'),
    },
    push: {
      audience: envValue(env, 'PUSH_AUDIENCE'),
      serviceAccountEmail: envValue(env, 'PUSH_SERVICE_ACCOUNT'),
      verificationToken: envValue(env, 'PUSH_VERIFICATION_TOKEN'),
    },
    drive: {
      parentFolderId: envValue(env, 'DRIVE_PARENT_FOLDER_ID'),
    },
    sync: {
      maxCycles: envValue(env, 'SYNC_MAX_CYCLES'),
      maxMessagesPerCycle: envValue(env, 'MAX_MESSAGES_PER_CYCLE'),
    },
    scheduler: {
      enabled: envValue(env, 'SCHEDULER_ENABLED'),
      fullSyncIntervalMs: envValue(env, 'POLL_INTERVAL_MS'),
    },
    admin: {
      token: envValue(env, 'ADMIN_TOKEN'),
    },
    log: {
      level: envValue(env, 'LOG_LEVEL'),
    },
  };
}

export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const value = source[key];
    const existing = output[key];
    if (isPlainObject(value)) {
      output[key] = deepMerge(isPlainObject(existing) ? existing : {}, value);
    } else {
      output[key] = value;
    }
  }
  return output;
}

export function removeUndefined(value: unknown): unknown {
  if (isPlainObject(value)) {
    const clean: PlainObject = {};
    for (const key of Object.keys(value)) {
      const child = removeUndefined(value[key]);
      if (child !== undefined) {
        clean[key] = child;
      }
    }
    return Object.keys(clean).length > 0 ? clean : undefined;
  }
  return value;
}

function readYamlConfig(path: string): PlainObject {
  if (!existsSync(path)) {
    return {};
  }

  const parsed: unknown = parse(readFileSync(path, 'utf-8'));
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`${path} must contain a YAML mapping`);
  }
  return parsed;
}

/**
 * Load configuration from the YAML file at CONFIG_PATH (default
 * config/app.yml) overlaid with environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const path = envValue(env, 'CONFIG_PATH') ?? 'config/app.yml';
  const fileConfig = readYamlConfig(path);
  const overrides = removeUndefined(envOverrides(env));
  const merged = isPlainObject(overrides) ? deepMerge(fileConfig, overrides) : fileConfig;

  return ConfigSchema.parse(merged);
}
