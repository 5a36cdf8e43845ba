/**
 * Sanitization utilities for scope tags and user feedback
 *
 * - Tag keys: trimmed, max 32 characters
 * - Tag values: primitives only, stringified, max 200 characters
 */

import { TAG_LIMITS } from "./constants";

const MAX_FEEDBACK_COMMENT_LENGTH = 4096;

/**
 * Sanitize a tag key
 *
 * @returns Trimmed key (truncated to 32 chars) or null
 */
export function sanitizeTagKey(key?: string): string | null {
  if (!key || typeof key !== "string") {
    return null;
  }

  const trimmed = key.trim();
  if (trimmed === "") {
    return null;
  }

  return trimmed.length > TAG_LIMITS.MAX_KEY_LENGTH
    ? trimmed.substring(0, TAG_LIMITS.MAX_KEY_LENGTH)
    : trimmed;
}

/**
 * Sanitize a tag value
 *
 * Strings, finite numbers and booleans are stringified; everything else is dropped.
 */
export function sanitizeTagValue(value: unknown): string | null {
  let text: string;
  if (typeof value === "string") {
    text = value;
  } else if (typeof value === "number" && Number.isFinite(value)) {
    text = String(value);
  } else if (typeof value === "boolean") {
    text = value ? "true" : "false";
  } else {
    return null;
  }

  return text.length > TAG_LIMITS.MAX_VALUE_LENGTH
    ? text.substring(0, TAG_LIMITS.MAX_VALUE_LENGTH)
    : text;
}

/**
 * Sanitize a tags object
 *
 * @returns Only the entries whose key and value both survive sanitization
 */
export function sanitizeTags(tags?: unknown): Record<string, string> {
  const sanitized: Record<string, string> = {};
  if (!tags || typeof tags !== "object" || Array.isArray(tags)) {
    return sanitized;
  }

  for (const [key, value] of Object.entries(tags)) {
    const cleanKey = sanitizeTagKey(key);
    const cleanValue = sanitizeTagValue(value);
    if (cleanKey !== null && cleanValue !== null) {
      sanitized[cleanKey] = cleanValue;
    }
  }

  return sanitized;
}

/**
 * Sanitize a user feedback comment
 *
 * @returns Trimmed comment (truncated to 4096 chars) or null when empty
 */
export function sanitizeComment(comment?: string): string | null {
  if (!comment || typeof comment !== "string") {
    return null;
  }

  const trimmed = comment.trim();
  if (trimmed === "") {
    return null;
  }

  return trimmed.length > MAX_FEEDBACK_COMMENT_LENGTH
    ? trimmed.substring(0, MAX_FEEDBACK_COMMENT_LENGTH)
    : trimmed;
}
