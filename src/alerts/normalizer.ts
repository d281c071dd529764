/**
 * Payload Normalizer
 *
 * Turns the loosely-structured alert objects returned by the JSM Ops API into
 * canonical {@link Alert} records. Every canonical field is read through a
 * fixed, ordered list of candidate source keys; the first present value wins.
 *
 * @module alerts/normalizer
 */

import { type JsonObject, type Result, isJsonObject, ok, err } from '../types/index.js';
import { NormalizationFailure } from './errors.js';
import type { Alert } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// SOURCE KEYS
// ═══════════════════════════════════════════════════════════════════════════

export const ID_KEYS = ['id', 'tinyId'] as const;
export const MESSAGE_KEYS = ['message', 'alias'] as const;
export const DESCRIPTION_KEYS = ['description', 'details'] as const;
export const CREATED_AT_KEYS = ['createdAt', 'created_at', 'insertedAt', 'lastOccurredAt'] as const;
export const ACKNOWLEDGER_KEYS = [
  'acknowledgedBy',
  'acknowledged_by',
  'acknowledgers',
  'acknowledgedByUser',
  'owner',
] as const;
export const PERSON_NAME_KEYS = [
  'fullName',
  'displayName',
  'name',
  'username',
  'email',
  'emailAddress',
] as const;
export const TAG_SOURCE_KEYS = ['tags', 'alertTags', 'labels'] as const;
export const TAG_NAME_KEYS = ['name', 'label', 'value', 'key'] as const;

const NO_MESSAGE = '(no message)';
const NOBODY = '-';

// ═══════════════════════════════════════════════════════════════════════════
// FALLBACK-KEY RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Scalar text for a JSON value. Strings pass through, numbers and booleans are
 * stringified, anything else has no text.
 */
export function scalarText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return String(value);
  return undefined;
}

/** First key whose value has non-empty scalar text. */
export function firstText(source: JsonObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const text = scalarText(source[key]);
    if (text) return text;
  }
  return undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// TIMESTAMPS
// ═══════════════════════════════════════════════════════════════════════════

const RFC3339_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[Tt ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:[Zz]|[+-]\d{2}:?\d{2})?)?$/;

/** Parse an RFC3339 timestamp; anything unparsable yields `null`. */
export function parseTimestamp(raw: unknown): Date | null {
  if (typeof raw !== 'string') return null;
  const value = raw.trim();
  if (!RFC3339_PATTERN.test(value)) return null;

  const millis = Date.parse(value);
  return Number.isNaN(millis) ? null : new Date(millis);
}

export function resolveCreatedAt(source: JsonObject): Date | null {
  for (const key of CREATED_AT_KEYS) {
    const value = source[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return parseTimestamp(value);
    }
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════════════════
// PEOPLE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Display name for a person reference: a plain string, a user object, or a
 * list of either. Lists are resolved element-wise, deduplicated and joined;
 * elements that resolve to `-` are skipped. A user object without any name
 * key resolves to `-`. Anything else resolves to `''`.
 */
export function resolvePersonName(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }

  if (Array.isArray(value)) {
    const names: string[] = [];
    for (const item of value) {
      const name = resolvePersonName(item);
      if (name && name !== '-' && !names.includes(name)) {
        names.push(name);
      }
    }
    return names.join(', ');
  }

  if (isJsonObject(value)) {
    for (const key of PERSON_NAME_KEYS) {
      const text = scalarText(value[key])?.trim();
      if (text) return text;
    }
    return '-';
  }

  return '';
}

/**
 * Collapse each comma-separated name that looks like an email address to its
 * local part. An empty result becomes `-`.
 */
export function formatAcknowledgedBy(value: string): string {
  const names: string[] = [];
  for (const segment of value.split(',')) {
    const part = segment.trim();
    if (!part) continue;

    if (part.includes('@')) {
      const localPart = part.slice(0, part.indexOf('@')).trim();
      names.push(localPart || part);
    } else {
      names.push(part);
    }
  }
  return names.length > 0 ? names.join(', ') : NOBODY;
}

export function resolveAcknowledgedBy(source: JsonObject): string {
  for (const key of ACKNOWLEDGER_KEYS) {
    const name = resolvePersonName(source[key]);
    if (name) return formatAcknowledgedBy(name);
  }
  return NOBODY;
}

// ═══════════════════════════════════════════════════════════════════════════
// TAGS
// ═══════════════════════════════════════════════════════════════════════════

export function resolveTagName(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }

  if (isJsonObject(value)) {
    for (const key of TAG_NAME_KEYS) {
      const candidate = value[key];
      if (typeof candidate === 'string' && candidate.trim()) {
        return candidate.trim();
      }
    }
  }

  return '';
}

/**
 * Tags from the first source key holding a list that yields at least one
 * name. Order is first-seen, duplicates and blanks are dropped.
 */
export function resolveTags(source: JsonObject): string[] {
  for (const key of TAG_SOURCE_KEYS) {
    const raw = source[key];
    if (!Array.isArray(raw)) continue;

    const tags: string[] = [];
    for (const item of raw) {
      const tag = resolveTagName(item);
      if (tag && !tags.includes(tag)) {
        tags.push(tag);
      }
    }
    if (tags.length > 0) return tags;
  }
  return [];
}

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

export function freezeAlert(alert: Alert): Alert {
  return Object.freeze({
    ...alert,
    createdAt: alert.createdAt === null ? null : new Date(alert.createdAt.getTime()),
    tags: Object.freeze([...alert.tags]),
  });
}

/**
 * Build a canonical alert from a raw API object. Missing fields fall back to
 * defaults; an empty `id` is returned as-is for the caller to filter.
 */
export function normalizeAlert(raw: unknown): Result<Alert, NormalizationFailure> {
  if (!isJsonObject(raw)) {
    const kind = Array.isArray(raw) ? 'array' : raw === null ? 'null' : typeof raw;
    return err(new NormalizationFailure(`Expected an alert object, received ${kind}`));
  }

  const message = firstText(raw, MESSAGE_KEYS) ?? NO_MESSAGE;

  return ok(
    freezeAlert({
      id: firstText(raw, ID_KEYS) ?? '',
      priority: (firstText(raw, ['priority']) ?? 'unknown').toUpperCase(),
      status: (firstText(raw, ['status']) ?? 'unknown').toLowerCase(),
      message,
      description: firstText(raw, DESCRIPTION_KEYS) ?? message,
      createdAt: resolveCreatedAt(raw),
      acknowledgedBy: resolveAcknowledgedBy(raw),
      tags: resolveTags(raw),
    })
  );
}
