/**
 * Dependency Container
 *
 * Process-wide platform singletons used by the deferred start phase. Built
 * lazily on first access and dropped as a group by `resetDependencyContainer`,
 * so the start after a close rebuilds every one of them.
 *
 * @module modules/dependencyContainer
 */

import { getLogger } from "../utils/logger";
import {
  createAppStartTracker,
  createAppStateManager,
  createBinaryImageCache,
  createCrashReporter,
  createDateProvider,
  createDeviceStateObserver,
  createLaunchProfiler,
  createMainThreadScheduler,
  type AppStartTracker,
  type AppStateManager,
  type BinaryImageCache,
  type CrashReporter,
  type DateProvider,
  type DeviceStateObserver,
  type LaunchProfiler,
  type MainThreadScheduler,
} from "./platformServices";

export interface DependencyContainer {
  dateProvider: DateProvider;
  binaryImageCache: BinaryImageCache;
  deviceStateObserver: DeviceStateObserver;
  crashReporter: CrashReporter;
  appStateManager: AppStateManager;
  mainThreadScheduler: MainThreadScheduler;
  launchProfiler: LaunchProfiler;
  appStartTracker: AppStartTracker;
}

export type DependencyFactory = () => DependencyContainer;

export function createDefaultDependencies(): DependencyContainer {
  const logger = getLogger();
  const dateProvider = createDateProvider();
  return {
    dateProvider,
    binaryImageCache: createBinaryImageCache(),
    deviceStateObserver: createDeviceStateObserver(),
    crashReporter: createCrashReporter(),
    appStateManager: createAppStateManager(logger),
    mainThreadScheduler: createMainThreadScheduler(logger),
    launchProfiler: createLaunchProfiler(logger),
    appStartTracker: createAppStartTracker(undefined, dateProvider),
  };
}

let container: DependencyContainer | null = null;
let factory: DependencyFactory = createDefaultDependencies;

export function getDependencyContainer(): DependencyContainer {
  if (container === null) {
    container = factory();
  }
  return container;
}

/**
 * Drop every singleton; the next access builds fresh ones
 */
export function resetDependencyContainer(): void {
  container = null;
}

/**
 * Replace how the container is built (hybrid hosts, tests)
 *
 * Pass null to restore the defaults. Takes effect on the next build.
 */
export function setDependencyFactory(next: DependencyFactory | null): void {
  factory = next ?? createDefaultDependencies;
}
