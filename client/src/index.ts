/**
 * Tripwire SDK
 *
 * Main entry point for the Tripwire SDK.
 * Provides the public API surface for host applications.
 *
 * @module index
 */

import {
  addBreadcrumb,
  captureCrashEvent,
  captureEnvelope,
  captureError,
  captureEvent,
  captureException,
  captureMessage,
  captureUserFeedback,
  close,
  configureScope,
  crashedLastRun,
  endSession,
  flush,
  getAppStartMeasurement,
  getCurrentHub,
  getLifecycleState,
  getOptions,
  isEnabled,
  onAppStartMeasurementAvailable,
  setUser,
  span,
  start,
  startInvocations,
  startSession,
  startTimestamp,
  startTransaction,
  startTransactionWithContext,
  startWithConfigureOptions,
  storeEnvelope,
} from "./core/entryPoint";

// Re-export types
export * from "./types";
export type { LifecycleState, ScopeArgument } from "./core/entryPoint";
export type { BreadcrumbInput } from "./core/hub";
export type { Client } from "./core/client";
export type { Transport, InMemoryTransport } from "./modules/transport";
export type { DependencyContainer, DependencyFactory } from "./modules/dependencyContainer";

// Re-export building blocks for custom integrations and hybrid bridges
export { Hub } from "./core/hub";
export { Scope } from "./core/scope";
export { Transaction } from "./core/transaction";
export { createClient } from "./core/client";
export { createInMemoryTransport } from "./modules/transport";
export { registerIntegration, unregisterIntegration } from "./core/integrationLoader";
export { setDependencyFactory } from "./modules/dependencyContainer";
export { publishAppStartMeasurement } from "./core/entryPoint";
export { setStartInvocations } from "./core/globalState";
export { EMPTY_EVENT_ID, SDK_VERSION } from "./utils/constants";

// Public API
export const Tripwire = {
  start,
  startWithConfigureOptions,
  close,
  captureEvent,
  captureError,
  captureException,
  captureMessage,
  captureCrashEvent,
  captureEnvelope,
  storeEnvelope,
  captureUserFeedback,
  addBreadcrumb,
  configureScope,
  setUser,
  startSession,
  endSession,
  startTransaction,
  startTransactionWithContext,
  span,
  flush,
  crashedLastRun,
  isEnabled,
  startInvocations,
  startTimestamp,
  getOptions,
  getCurrentHub,
  getLifecycleState,
  getAppStartMeasurement,
  onAppStartMeasurementAvailable,
};
