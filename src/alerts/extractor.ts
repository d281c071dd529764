/**
 * Collection Extractor
 *
 * Locates alert objects inside the response envelopes of the list and detail
 * endpoints, whose wrapping key varies between API versions.
 *
 * @module alerts/extractor
 */

import { type JsonObject, isJsonObject } from '../types/index.js';

export const LIST_ENVELOPE_KEYS = ['data', 'values', 'alerts'] as const;
export const SINGLE_ENVELOPE_KEYS = ['data', 'value', 'alert'] as const;
const ALERT_MARKER_KEYS = ['id', 'tinyId', 'message', 'status'] as const;

/**
 * Candidate alert objects from a list response. The first list-valued
 * envelope key wins; non-object elements are skipped. An envelope without a
 * list is an empty refresh, not an error.
 */
export function extractAlertList(envelope: JsonObject): JsonObject[] {
  for (const key of LIST_ENVELOPE_KEYS) {
    const raw = envelope[key];
    if (Array.isArray(raw)) {
      return raw.filter(isJsonObject);
    }
  }
  return [];
}

export function looksLikeAlert(payload: JsonObject): boolean {
  return ALERT_MARKER_KEYS.some((key) => key in payload);
}

/**
 * The alert object of a detail response, wrapped or top-level.
 * Returns `null` when neither shape is present.
 */
export function extractSingleAlert(envelope: JsonObject): JsonObject | null {
  for (const key of SINGLE_ENVELOPE_KEYS) {
    const raw = envelope[key];
    if (isJsonObject(raw)) {
      return raw;
    }
  }
  return looksLikeAlert(envelope) ? envelope : null;
}
