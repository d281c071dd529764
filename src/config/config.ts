/**
 * JSM Alerts: Configuration Management
 *
 * Reads settings from environment variables, applies defaults and validates
 * the result against ConfigSchema. Every error names the variable to fix.
 *
 * @module config
 * @version 1.0.0
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../alerts/errors.js';
import { jsmBaseUrl } from '../integrations/jsm/client.js';
import { type Config, ConfigSchema, LOG_LEVELS, type Result, ok, err } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_BASE_DIR = path.join(os.homedir(), '.jsm-alerts');
export const DEFAULT_LOG_FILE = path.join(DEFAULT_BASE_DIR, 'logs', 'jsm-alerts.log');

const DEFAULTS = {
  JSM_PAGE_SIZE: '100',
  JSM_REFRESH_INTERVAL_SECONDS: '30',
  JSM_LOG_LEVEL: 'info',
  JSM_LOG_HTTP_BODY: 'false',
} as const;

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT PARSERS
// ═══════════════════════════════════════════════════════════════════════════

function integer(name: string, min: number, max?: number) {
  const range = max === undefined ? `>= ${min}` : `between ${min} and ${max}`;
  const base = z.coerce
    .number({ invalid_type_error: `${name} must be an integer` })
    .int(`${name} must be an integer`)
    .min(min, `${name} must be ${range}`);
  return max === undefined ? base : base.max(max, `${name} must be ${range}`);
}

function booleanFlag(name: string) {
  return z.string().transform((value, ctx) => {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a boolean (true/false)` });
    return z.NEVER;
  });
}

const LEVEL_ALIASES: Readonly<Record<string, string>> = {
  warning: 'warn',
  critical: 'fatal',
  notset: 'trace',
};

const logLevel = z
  .string()
  .transform((value) => {
    const normalized = value.trim().toLowerCase();
    return LEVEL_ALIASES[normalized] ?? normalized;
  })
  .pipe(
    z.enum(LOG_LEVELS, {
      errorMap: () => ({ message: `JSM_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}` }),
    }),
  );

const EnvSchema = z.object({
  JSM_PAGE_SIZE: integer('JSM_PAGE_SIZE', 1, 500),
  JSM_REFRESH_INTERVAL_SECONDS: integer('JSM_REFRESH_INTERVAL_SECONDS', 1),
  JSM_LOG_LEVEL: logLevel,
  JSM_LOG_HTTP_BODY: booleanFlag('JSM_LOG_HTTP_BODY'),
  JSM_BASE_URL: z.string().url('JSM_BASE_URL must be a URL').optional(),
});

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

export type Environment = Record<string, string | undefined>;

/**
 * Build the configuration from environment variables.
 */
export function loadConfig(env: Environment = process.env): Result<Config, ConfigError> {
  const cloudId = nonEmpty(env.JSM_CLOUD_ID);
  if (!cloudId) {
    return err(new ConfigError('Missing required environment variable: JSM_CLOUD_ID'));
  }

  const apiEmail = nonEmpty(env.JSM_API_EMAIL);
  const apiToken = nonEmpty(env.JSM_API_TOKEN);
  const bearerToken = nonEmpty(env.JSM_BEARER_TOKEN);
  if (!bearerToken && !(apiEmail && apiToken)) {
    return err(
      new ConfigError(
        'Authentication is required. Set JSM_BEARER_TOKEN or JSM_API_EMAIL + JSM_API_TOKEN.',
      ),
    );
  }

  const parsedEnv = EnvSchema.safeParse({
    JSM_PAGE_SIZE: nonEmpty(env.JSM_PAGE_SIZE) ?? DEFAULTS.JSM_PAGE_SIZE,
    JSM_REFRESH_INTERVAL_SECONDS:
      nonEmpty(env.JSM_REFRESH_INTERVAL_SECONDS) ?? DEFAULTS.JSM_REFRESH_INTERVAL_SECONDS,
    JSM_LOG_LEVEL: nonEmpty(env.JSM_LOG_LEVEL) ?? DEFAULTS.JSM_LOG_LEVEL,
    JSM_LOG_HTTP_BODY: nonEmpty(env.JSM_LOG_HTTP_BODY) ?? DEFAULTS.JSM_LOG_HTTP_BODY,
    JSM_BASE_URL: nonEmpty(env.JSM_BASE_URL),
  });
  if (!parsedEnv.success) {
    return err(new ConfigError(parsedEnv.error.issues[0]?.message ?? 'Invalid configuration'));
  }
  const values = parsedEnv.data;

  const result = ConfigSchema.safeParse({
    jsm: {
      cloud_id: cloudId,
      base_url: values.JSM_BASE_URL ?? jsmBaseUrl(cloudId),
      api_email: apiEmail,
      api_token: apiToken,
      bearer_token: bearerToken,
      page_size: values.JSM_PAGE_SIZE,
    },
    refresh: {
      interval_seconds: values.JSM_REFRESH_INTERVAL_SECONDS,
    },
    logging: {
      level: values.JSM_LOG_LEVEL,
      file: expandPath(nonEmpty(env.JSM_LOG_FILE) ?? DEFAULT_LOG_FILE),
      http_body: values.JSM_LOG_HTTP_BODY,
    },
    actor: nonEmpty(env.JSM_ACTOR) ?? apiEmail,
  });
  if (!result.success) {
    return err(new ConfigError(`Invalid configuration: ${result.error.message}`));
  }

  return ok(result.data);
}
