/**
 * JSM Alerts: Core Type Definitions
 *
 * Configuration schema, JSON helpers and the Result type shared by every
 * layer. Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 * @version 1.0.0
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const NotificationLevelSchema = z.enum(['info', 'warning', 'error']);
export type NotificationLevel = z.infer<typeof NotificationLevelSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA
// ═══════════════════════════════════════════════════════════════════════════

export const ConfigSchema = z.object({
  jsm: z.object({
    cloud_id: z.string().min(1),
    base_url: z.string().url(),
    api_email: z.string().min(1).optional(),
    api_token: z.string().min(1).optional(),
    bearer_token: z.string().min(1).optional(),
    page_size: z.number().int().min(1).max(500).default(100),
    timeout_ms: z.number().int().positive().default(20_000),
  }),
  refresh: z.object({
    interval_seconds: z.number().int().min(1).default(30),
  }),
  logging: z.object({
    level: LogLevelSchema.default('info'),
    file: z.string().min(1),
    http_body: z.boolean().default(false),
  }),
  actor: z.string().min(1).optional(),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// JSON HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/** A decoded JSON object of unknown shape. */
export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
