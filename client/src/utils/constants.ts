/**
 * Constants
 *
 * Shared constants used across the SDK.
 *
 * @module utils/constants
 */

export const SDK_NAME = "tripwire.node";
export const SDK_VERSION = "0.4.0";

/**
 * Returned by every capture call that did not produce an event
 */
export const EMPTY_EVENT_ID = "00000000000000000000000000000000";

/**
 * Default configuration values
 */
export const DEFAULTS = {
  // Breadcrumbs
  MAX_BREADCRUMBS: 100,
  MAX_BREADCRUMBS_LIMIT: 100,

  // Sampling
  SAMPLE_RATE: 1.0,

  // Envelope buffers; oldest dropped first
  MAX_BUFFERED_ENVELOPES: 1000,
  MAX_STORED_ENVELOPES: 30,

  // Timeouts
  FLUSH_TIMEOUT_MS: 2000,

  ENVIRONMENT: "production",
} as const;

/**
 * Built-in integration names
 */
export const INTEGRATION_NAMES = {
  CRASH: "CrashIntegration",
  AUTO_SESSION_TRACKING: "AutoSessionTrackingIntegration",
} as const;

/**
 * Tag limits applied by the scope
 */
export const TAG_LIMITS = {
  MAX_KEY_LENGTH: 32,
  MAX_VALUE_LENGTH: 200,
} as const;
