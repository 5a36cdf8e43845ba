/**
 * EntryPoint Module
 *
 * The lifecycle controller and public API surface of the Tripwire SDK.
 *
 * Responsibilities:
 * - start: build client, scope and hub synchronously, install integrations,
 *   then hand platform-bound startup to the main thread scheduler
 * - close: uninstall integrations, stop platform services, drop the hub
 * - Facade: route every capture/session/scope call to the hub that is
 *   current at the time of the call
 *
 * Lifecycle: uninitialized -> started -> closed -> started -> ...
 * Calling start while started is a regular transition (started -> started):
 * the new hub replaces the old one and integrations are reinstalled for the
 * new epoch. Nothing here throws into the host app.
 *
 * @module core/entryPoint
 */

import { onAppStartMeasurementAvailable } from "../internal/appStartMeasurement";
import { getDependencyContainer, resetDependencyContainer, type DependencyContainer } from "../modules/dependencyContainer";
import { eventFromInput } from "../modules/eventBuilder";
import type { AppStartMeasurement } from "../types/appStart";
import type { Envelope, MonitorEvent, TransactionContext, User, UserFeedback } from "../types/events";
import type { Options, ResolvedOptions } from "../types/options";
import { DEFAULTS, EMPTY_EVENT_ID, SDK_VERSION } from "../utils/constants";
import { configureLogger, getLogger, isDiagnosticLevel, type Logger } from "../utils/logger";
import { normalizeOptions } from "../utils/options";
import { sanitizeComment } from "../utils/sanitize";
import { safeTry, safeTryAsync } from "../utils/safe";
import { createClient } from "./client";
import {
  getAppStartMeasurement,
  getCrashedLastRunCalled,
  getCurrentHub,
  getStartInvocations,
  getStartTimestamp,
  incrementStartInvocations,
  isEnabled,
  peekCurrentHub,
  setAppStartMeasurement,
  setCrashedLastRunCalled,
  setCurrentHub,
  setStartTimestamp,
} from "./globalState";
import { Hub, type BreadcrumbInput } from "./hub";
import { installIntegrations, removeAllIntegrations } from "./integrationLoader";
import { Scope } from "./scope";
import { Transaction } from "./transaction";

export type LifecycleState = "uninitialized" | "started" | "closed";

/**
 * A scope to capture with, or a callback that edits a private copy of the
 * current scope
 */
export type ScopeArgument = Scope | ((scope: Scope) => void);

let lifecycleState: LifecycleState = "uninitialized";

// ──────────────────────────────────────────────────────────────────────
// LIFECYCLE
// ──────────────────────────────────────────────────────────────────────

/**
 * Start the SDK
 *
 * Platform-bound subsystems come up asynchronously on the main thread
 * scheduler; they may not be active yet when this returns.
 */
export function start(options: Options = {}): void {
  safeTry(() => startSdk(options), getLogger(), "Tripwire.start");
}

/**
 * Start the SDK with options filled in by a callback
 */
export function startWithConfigureOptions(configure: (options: Options) => void): void {
  const options: Options = {};
  safeTry(() => configure(options), getLogger(), "Tripwire.startWithConfigureOptions");
  start(options);
}

function startSdk(input: Options): void {
  const logger = configureLogger(
    input.debug === true,
    isDiagnosticLevel(input.diagnosticLevel) ? input.diagnosticLevel : "debug"
  );

  // We accept that the SDK might not be fully initialized directly after
  // start returns: running the platform steps synchronously on the main
  // thread could deadlock against host startup code waiting on it.
  logger.logDebug("Starting SDK...");

  const options = normalizeOptions(input, logger);
  logger.logDebug("Configured options", {
    integrations: options.integrations,
    maxBreadcrumbs: options.maxBreadcrumbs,
    sampleRate: options.sampleRate,
    environment: options.environment,
  });

  if (lifecycleState === "started") {
    logger.logDebug("SDK already started; replacing the current hub");
  }

  const invocation = incrementStartInvocations();
  const container = getDependencyContainer();
  const sdkStartTimestamp = container.dateProvider.now();
  setStartTimestamp(sdkStartTimestamp);

  // Close the previous epoch's integrations before its app state is rotated,
  // so a re-start records it as terminated the same way close does.
  // Its client keeps running.
  removeAllIntegrations(peekCurrentHub(), logger);

  const client = createClient(options, { logger });
  client.fileManager.moveAppStateToPreviousAppState();
  client.fileManager.moveBreadcrumbsToPreviousBreadcrumbs();

  const scope = safeTry(
    () => options.initialScope(new Scope(options.maxBreadcrumbs)),
    logger,
    "initialScope"
  ) ?? new Scope(options.maxBreadcrumbs);

  // The hub needs a client so that closing a session can happen
  const hub = new Hub(client, scope, logger);
  setCurrentHub(hub);
  lifecycleState = "started";
  logger.logDebug(`SDK initialized! Version: ${SDK_VERSION}`, { invocation });

  installIntegrations(hub, logger);

  logger.logDebug("Dispatching init work required to run on main thread.");
  container.mainThreadScheduler.dispatch(() => {
    runDeferredStart({ hub, options, container, sdkStartTimestamp, logger });
  });
}

interface DeferredStartContext {
  hub: Hub;
  options: ResolvedOptions;
  container: DependencyContainer;
  sdkStartTimestamp: Date;
  logger: Logger;
}

function runDeferredStart(context: DeferredStartContext): void {
  const { hub, options, container, sdkStartTimestamp, logger } = context;

  if (peekCurrentHub() !== hub) {
    // A close or another start ran first; its hub owns the platform services now
    logger.logDebug("Skipping main thread init for a hub that is no longer current.");
    return;
  }

  logger.logDebug("SDK main thread init started...");

  safeTry(() => container.binaryImageCache.start(), logger, "binaryImageCache.start");
  safeTry(() => container.deviceStateObserver.start(), logger, "deviceStateObserver.start");

  safeTry(() => {
    setAppStartMeasurement(container.appStartTracker.measure(sdkStartTimestamp));
  }, logger, "appStartTracker.measure");

  safeTry(() => {
    container.launchProfiler.stop(hub);
    container.launchProfiler.configure(options);
  }, logger, "launchProfiler");
}

/**
 * Close the SDK and uninstall all integrations
 *
 * Safe to call when the SDK was never started.
 */
export function close(): void {
  safeTry(() => closeSdk(), getLogger(), "Tripwire.close");
}

function closeSdk(): void {
  const logger = getLogger();
  logger.logDebug("Starting to close SDK.");

  setStartTimestamp(null);

  const hub = peekCurrentHub();
  removeAllIntegrations(hub, logger);
  logger.logDebug("Uninstalled all integrations.");

  const container = getDependencyContainer();
  // Force the app state manager to unsubscribe, whatever its subscriber count
  safeTry(() => container.appStateManager.stop(true), logger, "appStateManager.stop");

  if (hub !== null) {
    safeTry(() => hub.close(), logger, "hub.close");
    hub.bindClient(null);
  }
  setCurrentHub(null);

  safeTry(() => container.binaryImageCache.stop(), logger, "binaryImageCache.stop");
  safeTry(() => container.deviceStateObserver.stop(), logger, "deviceStateObserver.stop");

  resetDependencyContainer();
  if (lifecycleState === "started") {
    lifecycleState = "closed";
  }
  logger.logDebug("SDK closed!");
}

export function getLifecycleState(): LifecycleState {
  return lifecycleState;
}

/**
 * Reset the lifecycle state (for testing)
 * @internal
 */
export function __TEST_ONLY__resetLifecycleState(): void {
  lifecycleState = "uninitialized";
}

// ──────────────────────────────────────────────────────────────────────
// FACADE
// ──────────────────────────────────────────────────────────────────────

function resolveScope(hub: Hub, scope: ScopeArgument | undefined): Scope {
  if (scope === undefined) {
    return hub.getScope();
  }
  if (scope instanceof Scope) {
    return scope;
  }
  const copy = hub.getScope().clone();
  safeTry(() => scope(copy), getLogger(), "scopeCallback");
  return copy;
}

function capture(run: (hub: Hub) => string | undefined): string {
  return safeTry(() => run(getCurrentHub()), getLogger(), "capture") ?? EMPTY_EVENT_ID;
}

export function captureEvent(event: Partial<MonitorEvent>, scope?: ScopeArgument): string {
  return capture((hub) => hub.captureEvent(eventFromInput(event), resolveScope(hub, scope)));
}

export function captureError(error: Error, scope?: ScopeArgument): string {
  return capture((hub) => hub.captureError(error, resolveScope(hub, scope)));
}

export function captureException(exception: unknown, scope?: ScopeArgument): string {
  return capture((hub) => hub.captureException(exception, resolveScope(hub, scope)));
}

export function captureMessage(message: string, scope?: ScopeArgument): string {
  return capture((hub) => hub.captureMessage(message, resolveScope(hub, scope)));
}

export function captureCrashEvent(event: Partial<MonitorEvent>, scope?: Scope): string {
  return capture((hub) => hub.captureCrashEvent(eventFromInput(event), scope ?? hub.getScope()));
}

/**
 * Send a prebuilt envelope (hybrid SDKs)
 */
export function captureEnvelope(envelope: Envelope): void {
  safeTry(() => getCurrentHub().captureEnvelope(envelope), getLogger(), "captureEnvelope");
}

/**
 * Store a prebuilt envelope without sending it (hybrid SDKs)
 */
export function storeEnvelope(envelope: Envelope): void {
  safeTry(() => {
    const client = getCurrentHub().getClient();
    if (client !== null) {
      client.storeEnvelope(envelope);
    }
  }, getLogger(), "storeEnvelope");
}

/**
 * Start a transaction on the current hub
 *
 * Before start, or after close, returns a transaction that is never sent.
 * With `bindToScope` the transaction becomes the scope's span until it finishes.
 */
export function startTransaction(name: string, operation: string, bindToScope = false): Transaction {
  return safeTry(
    () => getCurrentHub().startTransaction(name, operation, bindToScope),
    getLogger(),
    "startTransaction"
  ) ?? new Transaction(name, operation, null);
}

export function startTransactionWithContext(context: TransactionContext, bindToScope = false): Transaction {
  return startTransaction(context.name, context.operation, bindToScope);
}

/**
 * The transaction bound to the current scope, or null
 */
export function span(): Transaction | null {
  return safeTry(() => getCurrentHub().getScope().getSpan(), getLogger(), "span") ?? null;
}

export function captureUserFeedback(feedback: UserFeedback): void {
  const comments = sanitizeComment(feedback.comments);
  if (comments === null) {
    getLogger().logWarn("Ignoring user feedback without comments", { eventId: feedback.eventId });
    return;
  }
  safeTry(
    () => getCurrentHub().captureUserFeedback({ ...feedback, comments }),
    getLogger(),
    "captureUserFeedback"
  );
}

export function addBreadcrumb(breadcrumb: BreadcrumbInput): void {
  safeTry(() => getCurrentHub().addBreadcrumb(breadcrumb), getLogger(), "addBreadcrumb");
}

export function configureScope(callback: (scope: Scope) => void): void {
  safeTry(() => getCurrentHub().configureScope(callback), getLogger(), "configureScope");
}

export function setUser(user: User | null): void {
  safeTry(() => getCurrentHub().setUser(user), getLogger(), "setUser");
}

export function startSession(): void {
  safeTry(() => getCurrentHub().startSession(), getLogger(), "startSession");
}

export function endSession(): void {
  safeTry(() => getCurrentHub().endSession(), getLogger(), "endSession");
}

/**
 * Wait for queued envelopes, up to `timeoutMs`
 *
 * @returns true if everything was sent within the timeout
 */
export async function flush(timeoutMs: number = DEFAULTS.FLUSH_TIMEOUT_MS): Promise<boolean> {
  const result = await safeTryAsync(() => getCurrentHub().flush(timeoutMs), getLogger(), "flush");
  return result ?? false;
}

/**
 * Whether the previous launch ended in a crash
 */
export function crashedLastRun(): boolean {
  setCrashedLastRunCalled(true);
  return safeTry(
    () => getDependencyContainer().crashReporter.crashedLastLaunch,
    getLogger(),
    "crashedLastRun"
  ) ?? false;
}

/**
 * Options of the current client, or null when not started
 */
export function getOptions(): ResolvedOptions | null {
  return peekCurrentHub()?.getClient()?.options ?? null;
}

export {
  getAppStartMeasurement,
  getCrashedLastRunCalled,
  getCurrentHub,
  getStartInvocations as startInvocations,
  getStartTimestamp as startTimestamp,
  isEnabled,
  onAppStartMeasurementAvailable,
};

/**
 * Publish an app start measurement produced outside the SDK (hybrid SDKs)
 */
export function publishAppStartMeasurement(measurement: AppStartMeasurement | null): void {
  safeTry(() => setAppStartMeasurement(measurement), getLogger(), "publishAppStartMeasurement");
}
