/**
 * Global State Cell
 *
 * The SDK's only process-wide mutable state: the current hub, the start
 * counters, and the cached app start measurement. Nothing outside this module
 * touches the variables; every read and write goes through an accessor.
 *
 * Serialization: each accessor runs to completion without yielding, so the
 * event loop orders every swap against every read and no caller can see a
 * half-updated reference. The hub and the measurement sit in separate cells
 * with separate accessors; a measurement write from the deferred start phase
 * never goes through the hub accessors and vice versa.
 *
 * @module core/globalState
 */

import { emitAppStartMeasurement } from "../internal/appStartMeasurement";
import type { AppStartMeasurement } from "../types/appStart";
import { Hub } from "./hub";

// Hub cell
let currentHub: Hub | null = null;

// Counters
let startInvocations = 0;
let startTimestamp: Date | null = null;
let crashedLastRunCalled = false;

// Measurement cell
let appStartMeasurement: AppStartMeasurement | null = null;

/**
 * Current hub; creates a hub without a client on first access so facade calls
 * made before start are no-ops rather than failures
 */
export function getCurrentHub(): Hub {
  if (currentHub === null) {
    currentHub = new Hub(null, null);
  }
  return currentHub;
}

/**
 * Current hub without the lazy default
 */
export function peekCurrentHub(): Hub | null {
  return currentHub;
}

/**
 * @returns The hub that was current before the swap
 */
export function setCurrentHub(hub: Hub | null): Hub | null {
  const previous = currentHub;
  currentHub = hub;
  return previous;
}

/**
 * True iff a current hub exists and has a client bound
 */
export function isEnabled(): boolean {
  const hub = currentHub;
  return hub !== null && hub.getClient() !== null;
}

export function getAppStartMeasurement(): AppStartMeasurement | null {
  return appStartMeasurement;
}

/**
 * Write the measurement, then tell subscribers about it
 */
export function setAppStartMeasurement(value: AppStartMeasurement | null): void {
  appStartMeasurement = value === null ? null : Object.freeze({ ...value });
  emitAppStartMeasurement(appStartMeasurement);
}

export function getStartInvocations(): number {
  return startInvocations;
}

/**
 * @returns The counter after incrementing
 */
export function incrementStartInvocations(): number {
  startInvocations += 1;
  return startInvocations;
}

/**
 * Hybrid bridges that start the SDK from another runtime carry the count over
 */
export function setStartInvocations(value: number): void {
  startInvocations = value;
}

export function getStartTimestamp(): Date | null {
  return startTimestamp;
}

export function setStartTimestamp(value: Date | null): void {
  startTimestamp = value;
}

export function getCrashedLastRunCalled(): boolean {
  return crashedLastRunCalled;
}

export function setCrashedLastRunCalled(value: boolean): void {
  crashedLastRunCalled = value;
}

/**
 * Reset every cell (for testing)
 * @internal
 */
export function __TEST_ONLY__resetGlobalState(): void {
  currentHub = null;
  startInvocations = 0;
  startTimestamp = null;
  crashedLastRunCalled = false;
  appStartMeasurement = null;
}
