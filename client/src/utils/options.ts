/**
 * Options Normalization
 *
 * Turns caller-supplied start options into ResolvedOptions. Invalid values are
 * logged and replaced with their defaults; normalization never throws.
 *
 * @module utils/options
 */

import { createDefaultOptions, type Options, type ResolvedOptions } from "../types/options";
import { DEFAULTS } from "./constants";
import { isDiagnosticLevel, type Logger } from "./logger";

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  error?: string;
  field?: string;
}

/**
 * Validate a DSN
 *
 * HTTPS is required. Exception: localhost and 127.0.0.1 are allowed with HTTP
 * for local development. The DSN must carry a public key as its username and
 * a project ID as its path.
 */
export function validateDsn(dsn: string): ValidationResult {
  const trimmed = dsn.trim();
  if (!trimmed) {
    return { valid: false, error: "DSN cannot be empty", field: "dsn" };
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch (error) {
    return { valid: false, error: `Invalid DSN format: ${trimmed}`, field: "dsn" };
  }

  const protocol = url.protocol.toLowerCase();
  let hostname = url.hostname.toLowerCase();

  // Handle IPv6 addresses (remove brackets)
  if (hostname.startsWith("[") && hostname.endsWith("]")) {
    hostname = hostname.slice(1, -1);
  }

  const isLocalhost =
    hostname === "localhost" ||
    hostname === "127.0.0.1" ||
    hostname === "::1";

  if (protocol !== "https:" && !(protocol === "http:" && isLocalhost)) {
    return {
      valid: false,
      error: `DSN must use HTTPS protocol: ${trimmed}. Non-HTTPS DSNs are only allowed for localhost.`,
      field: "dsn",
    };
  }

  if (!url.username) {
    return { valid: false, error: `DSN is missing a public key: ${trimmed}`, field: "dsn" };
  }

  const projectId = url.pathname.split("/").filter(Boolean).pop();
  if (!projectId) {
    return { valid: false, error: `DSN is missing a project ID: ${trimmed}`, field: "dsn" };
  }

  return { valid: true };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

/**
 * Normalize start options
 *
 * @param input - Options as given by the host app (may be partial or malformed)
 * @param logger - Receives one warning per rejected field
 */
export function normalizeOptions(input: Options | undefined, logger: Logger): ResolvedOptions {
  const resolved = createDefaultOptions();
  if (!input || typeof input !== "object") {
    return resolved;
  }

  const reject = (field: string, reason: string): void => {
    logger.logWarn(`Ignoring option '${field}': ${reason}`);
  };

  if (input.dsn !== undefined) {
    const dsnValidation = typeof input.dsn === "string"
      ? validateDsn(input.dsn)
      : { valid: false, error: "DSN must be a string" };
    if (dsnValidation.valid && typeof input.dsn === "string") {
      resolved.dsn = input.dsn.trim();
    } else {
      reject("dsn", dsnValidation.error ?? "invalid");
    }
  }

  if (input.debug !== undefined) {
    resolved.debug = input.debug === true;
  }

  if (input.diagnosticLevel !== undefined) {
    if (isDiagnosticLevel(input.diagnosticLevel)) {
      resolved.diagnosticLevel = input.diagnosticLevel;
    } else {
      reject("diagnosticLevel", `unknown level ${String(input.diagnosticLevel)}`);
    }
  }

  if (input.integrations !== undefined) {
    if (isStringArray(input.integrations)) {
      resolved.integrations = [...input.integrations];
    } else {
      reject("integrations", "must be an array of integration names");
    }
  }

  if (input.initialScope !== undefined) {
    if (typeof input.initialScope === "function") {
      resolved.initialScope = input.initialScope;
    } else {
      reject("initialScope", "must be a function");
    }
  }

  if (input.maxBreadcrumbs !== undefined) {
    const value = input.maxBreadcrumbs;
    if (typeof value === "number" && Number.isFinite(value)) {
      resolved.maxBreadcrumbs = Math.min(
        Math.max(Math.floor(value), 0),
        DEFAULTS.MAX_BREADCRUMBS_LIMIT
      );
    } else {
      reject("maxBreadcrumbs", "must be a finite number");
    }
  }

  if (input.sampleRate !== undefined) {
    const value = input.sampleRate;
    if (typeof value === "number" && value >= 0 && value <= 1) {
      resolved.sampleRate = value;
    } else {
      reject("sampleRate", "must be between 0.0 and 1.0");
    }
  }

  if (input.release !== undefined) {
    if (typeof input.release === "string" && input.release.trim() !== "") {
      resolved.release = input.release.trim();
    } else {
      reject("release", "must be a non-empty string");
    }
  }

  if (input.environment !== undefined) {
    if (typeof input.environment === "string" && input.environment.trim() !== "") {
      resolved.environment = input.environment.trim();
    } else {
      reject("environment", "must be a non-empty string");
    }
  }

  if (input.beforeSend !== undefined) {
    if (typeof input.beforeSend === "function") {
      resolved.beforeSend = input.beforeSend;
    } else {
      reject("beforeSend", "must be a function");
    }
  }

  if (input.beforeBreadcrumb !== undefined) {
    if (typeof input.beforeBreadcrumb === "function") {
      resolved.beforeBreadcrumb = input.beforeBreadcrumb;
    } else {
      reject("beforeBreadcrumb", "must be a function");
    }
  }

  if (input.transport !== undefined) {
    if (input.transport && typeof input.transport.send === "function") {
      resolved.transport = input.transport;
    } else {
      reject("transport", "must implement send()");
    }
  }

  if (input.enableCrashHandler !== undefined) {
    resolved.enableCrashHandler = input.enableCrashHandler !== false;
  }
  if (input.enableAutoSessionTracking !== undefined) {
    resolved.enableAutoSessionTracking = input.enableAutoSessionTracking !== false;
  }
  if (input.enableLaunchProfiling !== undefined) {
    resolved.enableLaunchProfiling = input.enableLaunchProfiling === true;
  }

  return resolved;
}
