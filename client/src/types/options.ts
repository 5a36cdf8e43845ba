/**
 * Options Types
 *
 * Type definitions for start options.
 *
 * @module types/options
 */

import type { Scope } from "../core/scope";
import type { Transport } from "../modules/transport";
import type { DiagnosticLevel } from "../utils/logger";
import { DEFAULTS, INTEGRATION_NAMES } from "../utils/constants";
import type { Breadcrumb, MonitorEvent } from "./events";

export type BeforeSendHook = (event: MonitorEvent) => MonitorEvent | null;
export type BeforeBreadcrumbHook = (breadcrumb: Breadcrumb) => Breadcrumb | null;
export type InitialScopeHook = (scope: Scope) => Scope;

/**
 * Options accepted by `start`
 */
export interface Options {
  dsn?: string;
  debug?: boolean;
  diagnosticLevel?: DiagnosticLevel;
  /** Integration names, installed in order */
  integrations?: string[];
  initialScope?: InitialScopeHook;
  maxBreadcrumbs?: number; // Default: 100, max 100
  sampleRate?: number; // 0.0 to 1.0
  release?: string;
  environment?: string;
  beforeSend?: BeforeSendHook;
  beforeBreadcrumb?: BeforeBreadcrumbHook;
  transport?: Transport;
  enableCrashHandler?: boolean; // Default: true
  enableAutoSessionTracking?: boolean; // Default: true
  enableLaunchProfiling?: boolean; // Default: false
}

/**
 * Options after normalization; every field has a value
 */
export interface ResolvedOptions {
  dsn: string | null;
  debug: boolean;
  diagnosticLevel: DiagnosticLevel;
  integrations: readonly string[];
  initialScope: InitialScopeHook;
  maxBreadcrumbs: number;
  sampleRate: number;
  release: string | null;
  environment: string;
  beforeSend: BeforeSendHook | null;
  beforeBreadcrumb: BeforeBreadcrumbHook | null;
  transport: Transport | null;
  enableCrashHandler: boolean;
  enableAutoSessionTracking: boolean;
  enableLaunchProfiling: boolean;
}

/**
 * Integrations installed when `integrations` is not set
 */
export const DEFAULT_INTEGRATIONS: readonly string[] = [
  INTEGRATION_NAMES.CRASH,
  INTEGRATION_NAMES.AUTO_SESSION_TRACKING,
];

/**
 * Safe defaults for every option
 */
export function createDefaultOptions(): ResolvedOptions {
  return {
    dsn: null,
    debug: false,
    diagnosticLevel: "debug",
    integrations: DEFAULT_INTEGRATIONS,
    initialScope: (scope) => scope,
    maxBreadcrumbs: DEFAULTS.MAX_BREADCRUMBS,
    sampleRate: DEFAULTS.SAMPLE_RATE,
    release: null,
    environment: DEFAULTS.ENVIRONMENT,
    beforeSend: null,
    beforeBreadcrumb: null,
    transport: null,
    enableCrashHandler: true,
    enableAutoSessionTracking: true,
    enableLaunchProfiling: false,
  };
}
