/**
 * Shared test helpers
 */

import { vi } from "vitest";
import { __TEST_ONLY__resetLifecycleState } from "../core/entryPoint";
import { __TEST_ONLY__resetGlobalState } from "../core/globalState";
import { __TEST_ONLY__resetIntegrationRegistry } from "../core/integrationLoader";
import { __TEST_ONLY__resetMeasurementSubscribers } from "../internal/appStartMeasurement";
import {
  resetDependencyContainer,
  setDependencyFactory,
  type DependencyContainer,
} from "../modules/dependencyContainer";
import { __TEST_ONLY__resetSharedFileStore } from "../modules/fileManager";
import {
  __TEST_ONLY__resetColdStart,
  createAppStartTracker,
  createAppStateManager,
  createBinaryImageCache,
  createCrashReporter,
  createDeviceStateObserver,
  createLaunchProfiler,
  type DateProvider,
  type MainThreadScheduler,
} from "../modules/platformServices";
import type { Logger } from "../utils/logger";

export const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");
export const PROCESS_STARTED_AT = FIXED_NOW.getTime() - 1500;

/**
 * Scheduler that queues tasks until runAll() is called
 */
export interface ManualScheduler extends MainThreadScheduler {
  pending(): number;
  runAll(): void;
}

export function createManualScheduler(): ManualScheduler {
  let tasks: Array<() => void> = [];
  return {
    dispatch: (task) => {
      tasks.push(task);
    },
    pending: () => tasks.length,
    runAll: () => {
      const current = tasks;
      tasks = [];
      for (const task of current) {
        task();
      }
    },
  };
}

export function createFixedDateProvider(now: Date = FIXED_NOW): DateProvider {
  return { now: () => new Date(now.getTime()) };
}

export interface TestDependencies {
  /** Every container the factory built, oldest first */
  built: DependencyContainer[];
  scheduler: ManualScheduler;
  latest(): DependencyContainer;
}

/**
 * Install a dependency factory whose containers share one manual scheduler
 */
export function installTestDependencies(overrides: Partial<DependencyContainer> = {}): TestDependencies {
  const scheduler = createManualScheduler();
  const built: DependencyContainer[] = [];
  setDependencyFactory(() => {
    const dateProvider = createFixedDateProvider();
    const container: DependencyContainer = {
      dateProvider,
      binaryImageCache: createBinaryImageCache(),
      deviceStateObserver: createDeviceStateObserver(() => ({
        platform: "test",
        arch: "x64",
        totalMemoryBytes: 1024,
        freeMemoryBytes: 512,
        processRssBytes: 256,
        observedAt: 0,
      })),
      crashReporter: createCrashReporter(),
      appStateManager: createAppStateManager(),
      mainThreadScheduler: scheduler,
      launchProfiler: createLaunchProfiler(),
      appStartTracker: createAppStartTracker(PROCESS_STARTED_AT, dateProvider),
      ...overrides,
    };
    built.push(container);
    return container;
  });
  return {
    built,
    scheduler,
    latest: () => {
      const container = built[built.length - 1];
      if (container === undefined) {
        throw new Error("no container built yet");
      }
      return container;
    },
  };
}

/**
 * Reset every piece of process-wide SDK state
 */
export function resetSdk(): void {
  __TEST_ONLY__resetGlobalState();
  __TEST_ONLY__resetLifecycleState();
  __TEST_ONLY__resetIntegrationRegistry();
  __TEST_ONLY__resetMeasurementSubscribers();
  __TEST_ONLY__resetSharedFileStore();
  __TEST_ONLY__resetColdStart();
  resetDependencyContainer();
  setDependencyFactory(null);
}

export function createMockLogger() {
  return {
    logDebug: vi.fn(),
    logInfo: vi.fn(),
    logWarn: vi.fn(),
    logError: vi.fn(),
  } satisfies Logger;
}
