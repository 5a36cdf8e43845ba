/**
 * Event ID Utility
 *
 * Event and session identifiers: 32 lowercase hex characters (a UUID v4
 * without dashes) for events, dashed UUID v4 for sessions.
 *
 * @module utils/eventId
 */

const EVENT_ID_PATTERN = /^[0-9a-f]{32}$/;

/**
 * Generate a UUID v4
 * Uses crypto.randomUUID if available, falls back to manual generation
 */
function generateUUID(): string {
  if (typeof crypto !== "undefined" && typeof crypto.randomUUID === "function") {
    return crypto.randomUUID();
  }

  // Fallback: simple UUID v4 generation
  return "xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx".replace(/[xy]/g, (c) => {
    const r = (Math.random() * 16) | 0;
    const v = c === "x" ? r : (r & 0x3) | 0x8;
    return v.toString(16);
  });
}

/**
 * Create a new event ID
 */
export function createEventId(): string {
  return generateUUID().replace(/-/g, "").toLowerCase();
}

/**
 * Create a new session ID (dashed UUID v4)
 */
export function createSessionId(): string {
  return generateUUID();
}

export function isEventId(value: unknown): value is string {
  return typeof value === "string" && EVENT_ID_PATTERN.test(value);
}
