import { readFileSync, existsSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import path from 'path';
import { config as loadDotenv } from 'dotenv';

// Load .env file
loadDotenv();

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36';

const HttpConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(25000),
  retries: z.number().int().min(1).default(3),
  retryDelayMs: z.number().int().min(0).default(700),
  userAgent: z.string().default(DEFAULT_USER_AGENT),
  acceptLanguage: z.string().default('fr-FR,fr;q=0.9,en-US;q=0.8,en;q=0.7'),
});

const CursorConfigSchema = z.object({
  pageSizes: z.array(z.number().int().positive()).min(1).default([12, 48]),
  transports: z.array(z.enum(['query', 'body'])).min(1).default(['query', 'body']),
});

const ScrollConfigSchema = z.object({
  stableThreshold: z.number().int().min(1).default(3),
  minCycles: z.number().int().min(1).default(5),
  clickTimeoutMs: z.number().int().positive().default(8000),
  quietTimeoutMs: z.number().int().positive().default(3500),
  settleMs: z.number().int().min(0).default(600),
  scrollRetries: z.number().int().min(1).default(3),
  sweepRetries: z.number().int().min(1).default(2),
  headless: z.boolean().default(false),  // headed Chromium is blocked less often
  slowMo: z.number().int().min(0).default(0),
});

const ConfigSchema = z.object({
  stateDir: z.string().default('./data'),
  alertsPath: z.string().default('./alerts.jsonl'),
  defaultPages: z.number().int().min(1).default(2),
  http: HttpConfigSchema.default({}),
  politeness: z.object({
    delayMs: z.number().int().min(0).default(1000),
  }).default({}),
  cursor: CursorConfigSchema.default({}),
  scroll: ScrollConfigSchema.default({}),
  notify: z.object({
    channel: z.enum(['email', 'console']).default('email'),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type ScrollConfig = z.infer<typeof ScrollConfigSchema>;

export const DEFAULT_CONFIG_PATH = './config/config.local.yaml';

let cachedConfig: Config | null = null;

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw ?? {});
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Config {
  if (cachedConfig) return cachedConfig;

  const resolved = path.resolve(configPath);

  if (!existsSync(resolved)) {
    // Every setting has a default; the file only overrides.
    cachedConfig = parseConfig({});
    return cachedConfig;
  }

  const rawConfig = readFileSync(resolved, 'utf-8');
  cachedConfig = parseConfig(parse(rawConfig));
  return cachedConfig;
}

export function getEnv(key: string, required = true): string {
  const value = process.env[key];
  if (!value && required) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  from: string;
}

/**
 * SMTP settings from the environment, or null when any is missing.
 */
export function getSmtpSettings(): SmtpSettings | null {
  const host = getEnv('SMTP_HOST', false);
  const port = parseInt(getEnv('SMTP_PORT', false) || '587', 10);
  const user = getEnv('SMTP_USER', false);
  const password = getEnv('SMTP_PASS', false);
  if (!host || Number.isNaN(port) || !user || !password) return null;
  return { host, port, user, password, from: getEnv('FROM_EMAIL', false) || user };
}

export function isEmailEnabled(): boolean {
  return getEnv('SEND_EMAIL', false) === '1';
}
