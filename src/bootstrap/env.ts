import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

import {
  DEFAULT_DIAGNOSTICS_DIR,
  DEFAULT_LOG_DIR,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_PORTAL_BASE_URL,
  DEFAULT_TIMING,
  type Timing,
} from '../config.js';

const DOTENV_FILES = ['.env', '.env.local'];

export function loadDotenvFiles(rootDir: string = process.cwd()): void {
  for (const filename of DOTENV_FILES) {
    const filepath = path.join(rootDir, filename);
    if (fs.existsSync(filepath)) {
      loadEnv({ path: filepath, override: true });
    }
  }
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const RawEnvSchema = z
  .object({
    PORTAL_EMAIL: optionalText,
    PORTAL_PASSWORD: z.string().optional(),
    PORTAL_BASE_URL: optionalText,
    OUTPUT_PATH: optionalText,
    DIAGNOSTICS_DIR: optionalText,
    LOG_DIR: optionalText,
    HEADLESS: z.string().optional(),
    DEBUG_NETWORK: z.string().optional(),
    DEBUG_CONSOLE: z.string().optional(),
    PAGE_LOAD_TIMEOUT_MS: z.string().optional(),
    SELECTOR_TIMEOUT_MS: z.string().optional(),
    LOGIN_POLL_INTERVAL_MS: z.string().optional(),
    LOGIN_POLL_TIMEOUT_MS: z.string().optional(),
  })
  .passthrough();

export const coerceBoolean = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
};

export const toMilliseconds = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) {
    return Math.trunc(parsed);
  }

  return fallback;
};

export interface Credential {
  readonly identity: string;
  readonly secret: string;
}

export interface Settings {
  readonly credential: Credential | null;
  readonly baseUrl: string;
  readonly outputPath: string;
  readonly diagnosticsDir: string;
  readonly logDir: string;
  readonly headless: boolean;
  readonly debugNetwork: boolean;
  readonly debugConsole: boolean;
  readonly timing: Timing;
}

const BaseUrlSchema = z.string().url('PORTAL_BASE_URL must be an absolute URL.');

export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const raw = RawEnvSchema.parse(env);

  const identity = raw.PORTAL_EMAIL;
  const secret = raw.PORTAL_PASSWORD;
  const credential = identity && secret ? { identity, secret } : null;

  return {
    credential,
    baseUrl: BaseUrlSchema.parse(raw.PORTAL_BASE_URL ?? DEFAULT_PORTAL_BASE_URL),
    outputPath: path.resolve(raw.OUTPUT_PATH ?? DEFAULT_OUTPUT_PATH),
    diagnosticsDir: path.resolve(raw.DIAGNOSTICS_DIR ?? DEFAULT_DIAGNOSTICS_DIR),
    logDir: path.resolve(raw.LOG_DIR ?? DEFAULT_LOG_DIR),
    headless: coerceBoolean(raw.HEADLESS, true),
    debugNetwork: coerceBoolean(raw.DEBUG_NETWORK, false),
    debugConsole: coerceBoolean(raw.DEBUG_CONSOLE, false),
    timing: {
      ...DEFAULT_TIMING,
      pageLoadTimeoutMs: toMilliseconds(raw.PAGE_LOAD_TIMEOUT_MS, DEFAULT_TIMING.pageLoadTimeoutMs),
      selectorTimeoutMs: toMilliseconds(raw.SELECTOR_TIMEOUT_MS, DEFAULT_TIMING.selectorTimeoutMs),
      loginPollIntervalMs: toMilliseconds(raw.LOGIN_POLL_INTERVAL_MS, DEFAULT_TIMING.loginPollIntervalMs),
      loginPollTimeoutMs: toMilliseconds(raw.LOGIN_POLL_TIMEOUT_MS, DEFAULT_TIMING.loginPollTimeoutMs),
    },
  };
}
