/**
 * Internal App Start Measurement Notifications
 *
 * Shared notification system for hybrid SDK bridges that want the app start
 * measurement as soon as the deferred start phase produces it.
 *
 * This module avoids circular dependencies between globalState and the
 * public entry point.
 */

import type { AppStartMeasurement, AppStartMeasurementHandler } from "../types/appStart";
import { getLogger } from "../utils/logger";

/**
 * Subscriber list (shared state)
 */
let measurementSubscribers: AppStartMeasurementHandler[] = [];

/**
 * Notify all subscribers of a new (or cleared) measurement
 *
 * Called by setAppStartMeasurement after the value is written.
 */
export function emitAppStartMeasurement(measurement: AppStartMeasurement | null): void {
  for (const handler of measurementSubscribers) {
    try {
      handler(measurement);
    } catch (error) {
      // Subscriber errors shouldn't crash the SDK
      getLogger().logError("onAppStartMeasurementAvailable handler error", error);
    }
  }
}

/**
 * Subscribe to app start measurements
 *
 * @returns Unsubscribe function
 */
export function onAppStartMeasurementAvailable(handler: AppStartMeasurementHandler): () => void {
  measurementSubscribers.push(handler);

  return () => {
    measurementSubscribers = measurementSubscribers.filter((h) => h !== handler);
  };
}

/**
 * Reset subscribers (for testing)
 * @internal
 */
export function __TEST_ONLY__resetMeasurementSubscribers(): void {
  measurementSubscribers = [];
}
