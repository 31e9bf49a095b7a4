import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { IANAZone } from 'luxon';

dotenv.config();

const ConfigSchema = z.object({
  database: z.object({
    url: z.string().min(1),
  }),
  feed: z.object({
    timezone: z
      .string()
      .refine((zone) => IANAZone.isValidZone(zone), { message: 'Unknown IANA timezone' }),
    timestampFormat: z.string().min(1),
    invalidRecords: z.enum(['fail', 'skip']).default('fail'),
    url: z.string().url().optional(),
  }),
  mail: z.object({
    transport: z.enum(['smtp', 'file']).default('smtp'),
    relay: z.string().optional(),
    port: z.number().int().positive().default(465),
    secure: z.boolean().default(true),
    username: z.string().optional(),
    password: z.string().optional(),
    from: z.string().email().optional(),
    to: z.string().email().optional(),
    subjectPrefix: z.string().min(1).default('Transit incident alert'),
    outboxDir: z.string().min(1).default('./data/outbox'),
    timeoutMs: z.number().int().positive().default(30000),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    json: z.boolean().default(true),
  }),
  metrics: z.object({
    textfilePath: z.string().optional(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  return Number.isNaN(n) ? undefined : n;
}

function envBoolean(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return raw === '1' || raw.toLowerCase() === 'true';
}

function section(fileRaw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = fileRaw[key];
  return value && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

export function loadConfig(configPath = 'transit-alert.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${(e as Error).message}`);
    }
  }
  const username = process.env.SMTP_USERNAME || undefined;
  const merged = {
    database: {
      url: process.env.DATABASE_URL || 'file:./data/incidents.db',
      ...section(fileRaw, 'database'),
    },
    feed: {
      timezone: process.env.FEED_TIMEZONE || 'America/New_York',
      timestampFormat: process.env.FEED_TIMESTAMP_FORMAT || "yyyy-MM-dd'T'HH:mm:ss",
      invalidRecords: process.env.FEED_INVALID_RECORDS || 'fail',
      url: process.env.FEED_URL || undefined,
      ...section(fileRaw, 'feed'),
    },
    mail: {
      transport: process.env.MAIL_TRANSPORT || 'smtp',
      relay: process.env.SMTP_RELAY || undefined,
      port: envNumber('SMTP_PORT') ?? 465,
      secure: envBoolean('SMTP_SECURE') ?? true,
      username,
      password: process.env.SMTP_PASSWORD || undefined,
      from: process.env.MAIL_FROM || undefined,
      to: process.env.MAIL_TO || undefined,
      subjectPrefix: process.env.MAIL_SUBJECT_PREFIX || 'Transit incident alert',
      outboxDir: process.env.MAIL_OUTBOX_DIR || './data/outbox',
      timeoutMs: envNumber('SMTP_TIMEOUT_MS') ?? 30000,
      ...section(fileRaw, 'mail'),
    },
    logging: { level: process.env.LOG_LEVEL || 'info', json: true, ...section(fileRaw, 'logging') },
    metrics: {
      textfilePath: process.env.METRICS_TEXTFILE || undefined,
      ...section(fileRaw, 'metrics'),
    },
  };
  const parsed = ConfigSchema.parse(merged);
  // the relay login doubles as the sender unless one is given
  if (!parsed.mail.from && parsed.mail.username?.includes('@')) {
    parsed.mail.from = parsed.mail.username;
  }
  return parsed;
}
