/**
 * Platform Services
 *
 * Default implementations of the platform-bound singletons the lifecycle
 * starts after `start` returns and stops on `close`.
 *
 * @module modules/platformServices
 */

import * as os from "node:os";
import type { Hub } from "../core/hub";
import type { AppStartMeasurement } from "../types/appStart";
import type { ResolvedOptions } from "../types/options";
import type { Logger } from "../utils/logger";
import { safeTry } from "../utils/safe";
import type { FileManager } from "./fileManager";

export interface DateProvider {
  now(): Date;
}

export function createDateProvider(): DateProvider {
  return { now: () => new Date() };
}

// ──────────────────────────────────────────────────────────────────────
// Binary image cache
// ──────────────────────────────────────────────────────────────────────

export interface BinaryImage {
  name: string;
}

export interface BinaryImageCache {
  start(): void;
  stop(): void;
  isStarted(): boolean;
  getImages(): readonly BinaryImage[];
}

/**
 * Cache of loaded images used to symbolicate crash frames
 *
 * @param listImages - Snapshot source, read once per start
 */
export function createBinaryImageCache(listImages: () => BinaryImage[] = () => []): BinaryImageCache {
  let images: BinaryImage[] = [];
  let started = false;

  return {
    start: () => {
      if (started) {
        return;
      }
      images = listImages();
      started = true;
    },
    stop: () => {
      images = [];
      started = false;
    },
    isStarted: () => started,
    getImages: () => images,
  };
}

// ──────────────────────────────────────────────────────────────────────
// Device state observer
// ──────────────────────────────────────────────────────────────────────

export interface DeviceState {
  platform: string;
  arch: string;
  totalMemoryBytes: number;
  freeMemoryBytes: number;
  processRssBytes: number;
  observedAt: number;
}

export interface DeviceStateObserver {
  start(): void;
  stop(): void;
  isObserving(): boolean;
  getState(): DeviceState | null;
}

function readDeviceState(): DeviceState {
  return {
    platform: os.platform(),
    arch: os.arch(),
    totalMemoryBytes: os.totalmem(),
    freeMemoryBytes: os.freemem(),
    processRssBytes: process.memoryUsage().rss,
    observedAt: Date.now(),
  };
}

export function createDeviceStateObserver(read: () => DeviceState = readDeviceState): DeviceStateObserver {
  let state: DeviceState | null = null;
  let observing = false;

  return {
    start: () => {
      observing = true;
      state = read();
    },
    stop: () => {
      observing = false;
    },
    isObserving: () => observing,
    getState: () => state,
  };
}

// ──────────────────────────────────────────────────────────────────────
// Crash reporter
// ──────────────────────────────────────────────────────────────────────

export interface CrashReporter {
  readonly crashedLastLaunch: boolean;
}

export function createCrashReporter(crashedLastLaunch = false): CrashReporter {
  return { crashedLastLaunch };
}

// ──────────────────────────────────────────────────────────────────────
// App state manager
// ──────────────────────────────────────────────────────────────────────

/**
 * Writes the app state while anyone subscribes to it
 *
 * Subscriptions are reference counted; `stop(true)` drops all of them.
 */
export interface AppStateManager {
  start(fileManager: FileManager, options: ResolvedOptions): void;
  stop(force?: boolean): void;
  isRunning(): boolean;
}

export function createAppStateManager(logger?: Logger): AppStateManager {
  let subscribers = 0;
  let fileManager: FileManager | null = null;

  return {
    start: (target, options) => {
      subscribers += 1;
      if (subscribers > 1) {
        return;
      }
      fileManager = target;
      target.storeAppState({
        releaseName: options.release,
        sdkStartedAt: Date.now(),
        isActive: true,
        wasTerminated: false,
      });
      logger?.logDebug("AppStateManager started");
    },
    stop: (force = false) => {
      if (subscribers === 0) {
        return;
      }
      subscribers = force ? 0 : subscribers - 1;
      if (subscribers > 0 || fileManager === null) {
        return;
      }
      const current = fileManager.readAppState();
      if (current !== null) {
        fileManager.storeAppState({ ...current, isActive: false, wasTerminated: true });
      }
      fileManager = null;
      logger?.logDebug("AppStateManager stopped", { force });
    },
    isRunning: () => subscribers > 0,
  };
}

// ──────────────────────────────────────────────────────────────────────
// Main thread scheduler
// ──────────────────────────────────────────────────────────────────────

/**
 * Runs tasks on the host's main execution context, after the caller returns
 */
export interface MainThreadScheduler {
  dispatch(task: () => void): void;
}

export function createMainThreadScheduler(logger?: Logger): MainThreadScheduler {
  return {
    dispatch: (task) => {
      setImmediate(() => {
        safeTry(task, logger, "mainThreadTask");
      });
    },
  };
}

// ──────────────────────────────────────────────────────────────────────
// Launch profiling
// ──────────────────────────────────────────────────────────────────────

export interface LaunchProfiler {
  /** Finalize the profile of the current launch, if one is running */
  stop(hub: Hub): void;
  /** Arm or disarm profiling of the next launch */
  configure(options: ResolvedOptions): void;
  isRunning(): boolean;
  isArmed(): boolean;
}

export function createLaunchProfiler(logger?: Logger, runningAtLaunch = false): LaunchProfiler {
  let running = runningAtLaunch;
  let armed = false;

  return {
    stop: (hub) => {
      if (!running) {
        return;
      }
      running = false;
      hub.addBreadcrumb({ category: "profiling", message: "Launch profile finalized" });
      logger?.logDebug("Launch profile finalized");
    },
    configure: (options) => {
      armed = options.enableLaunchProfiling;
      logger?.logDebug("Launch profiling configured", { armed });
    },
    isRunning: () => running,
    isArmed: () => armed,
  };
}

// ──────────────────────────────────────────────────────────────────────
// App start tracker
// ──────────────────────────────────────────────────────────────────────

export interface AppStartTracker {
  /** Produce the measurement for an SDK start that began at `sdkStartTimestamp` */
  measure(sdkStartTimestamp: Date): AppStartMeasurement;
}

// The first measurement of the process is the cold start
let coldStartReported = false;

/**
 * Reset cold start bookkeeping (for testing)
 * @internal
 */
export function __TEST_ONLY__resetColdStart(): void {
  coldStartReported = false;
}

/**
 * @param processStartedAt - Epoch milliseconds of process start
 * @param dateProvider - Clock for the finish timestamp
 */
export function createAppStartTracker(
  processStartedAt: number = performance.timeOrigin,
  dateProvider: DateProvider = createDateProvider()
): AppStartTracker {
  return {
    measure: (sdkStartTimestamp) => {
      const finishedAt = dateProvider.now();
      const isCold = !coldStartReported;
      coldStartReported = true;

      const appStartTimestamp = isCold ? new Date(processStartedAt) : sdkStartTimestamp;
      const measurement: AppStartMeasurement = {
        type: isCold ? "cold" : "warm",
        appStartTimestamp,
        duration: Math.max(finishedAt.getTime() - appStartTimestamp.getTime(), 0),
        sdkStartTimestamp,
        didFinishLaunchingTimestamp: finishedAt,
      };
      return Object.freeze(measurement);
    },
  };
}
