/**
 * Unit Tests - Platform Services
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { createClient } from "../../core/client";
import { Hub } from "../../core/hub";
import { createFileManager, createFileStore } from "../../modules/fileManager";
import {
  __TEST_ONLY__resetColdStart,
  createAppStartTracker,
  createAppStateManager,
  createBinaryImageCache,
  createDeviceStateObserver,
  createLaunchProfiler,
  createMainThreadScheduler,
} from "../../modules/platformServices";
import { createInMemoryTransport } from "../../modules/transport";
import { createDefaultOptions } from "../../types/options";
import { createFixedDateProvider, createMockLogger, FIXED_NOW } from "../helpers";

describe("platformServices", () => {
  describe("binaryImageCache", () => {
    it("should read images once per start and drop them on stop", () => {
      const listImages = vi.fn(() => [{ name: "libapp.so" }]);
      const cache = createBinaryImageCache(listImages);

      cache.start();
      cache.start();
      expect(listImages).toHaveBeenCalledOnce();
      expect(cache.getImages()).toEqual([{ name: "libapp.so" }]);

      cache.stop();
      expect(cache.isStarted()).toBe(false);
      expect(cache.getImages()).toEqual([]);
    });
  });

  describe("deviceStateObserver", () => {
    it("should read the device state when started", () => {
      const state = {
        platform: "linux",
        arch: "arm64",
        totalMemoryBytes: 8,
        freeMemoryBytes: 4,
        processRssBytes: 2,
        observedAt: 1,
      };
      const observer = createDeviceStateObserver(() => state);

      expect(observer.getState()).toBeNull();
      observer.start();
      expect(observer.isObserving()).toBe(true);
      expect(observer.getState()).toEqual(state);

      observer.stop();
      expect(observer.isObserving()).toBe(false);
    });
  });

  describe("appStateManager", () => {
    const options = { ...createDefaultOptions(), release: "app@1.0.0" };

    it("should write an active app state on the first start", () => {
      const fileManager = createFileManager({ maxBreadcrumbs: 10, store: createFileStore() });
      const manager = createAppStateManager();

      manager.start(fileManager, options);

      expect(manager.isRunning()).toBe(true);
      expect(fileManager.readAppState()).toMatchObject({
        releaseName: "app@1.0.0",
        isActive: true,
        wasTerminated: false,
      });
    });

    it("should keep running until every subscriber stopped", () => {
      const fileManager = createFileManager({ maxBreadcrumbs: 10, store: createFileStore() });
      const manager = createAppStateManager();
      manager.start(fileManager, options);
      manager.start(fileManager, options);

      manager.stop();
      expect(manager.isRunning()).toBe(true);
      expect(fileManager.readAppState()?.isActive).toBe(true);

      manager.stop();
      expect(manager.isRunning()).toBe(false);
      expect(fileManager.readAppState()).toMatchObject({ isActive: false, wasTerminated: true });
    });

    it("should drop every subscriber on a forced stop", () => {
      const fileManager = createFileManager({ maxBreadcrumbs: 10, store: createFileStore() });
      const manager = createAppStateManager();
      manager.start(fileManager, options);
      manager.start(fileManager, options);

      manager.stop(true);

      expect(manager.isRunning()).toBe(false);
      expect(fileManager.readAppState()?.wasTerminated).toBe(true);
    });

    it("should ignore stop when not running", () => {
      const manager = createAppStateManager();

      expect(() => manager.stop(true)).not.toThrow();
      expect(manager.isRunning()).toBe(false);
    });
  });

  describe("mainThreadScheduler", () => {
    it("should run tasks after the caller returns", async () => {
      const scheduler = createMainThreadScheduler(createMockLogger());
      const task = vi.fn();

      scheduler.dispatch(task);
      expect(task).not.toHaveBeenCalled();

      await new Promise((resolve) => setImmediate(resolve));
      expect(task).toHaveBeenCalledOnce();
    });

    it("should log a throwing task", async () => {
      const logger = createMockLogger();
      const scheduler = createMainThreadScheduler(logger);

      scheduler.dispatch(() => {
        throw new Error("task failed");
      });
      await new Promise((resolve) => setImmediate(resolve));

      expect(logger.logError).toHaveBeenCalledWith("mainThreadTask failed: task failed", expect.any(Error));
    });
  });

  describe("launchProfiler", () => {
    it("should finalize a running launch profile once", () => {
      const transport = createInMemoryTransport();
      const client = createClient(
        { ...createDefaultOptions(), transport },
        { fileManager: createFileManager({ maxBreadcrumbs: 10, store: createFileStore() }) }
      );
      const hub = new Hub(client, null, createMockLogger());
      const profiler = createLaunchProfiler(createMockLogger(), true);

      profiler.stop(hub);
      profiler.stop(hub);

      expect(profiler.isRunning()).toBe(false);
      expect(hub.getScope().getBreadcrumbs().map((b) => b.message)).toEqual(["Launch profile finalized"]);
    });

    it("should do nothing when no profile is running", () => {
      const hub = new Hub(null, null, createMockLogger());
      const profiler = createLaunchProfiler();

      profiler.stop(hub);

      expect(hub.getScope().getBreadcrumbs()).toEqual([]);
    });

    it("should arm from the options", () => {
      const profiler = createLaunchProfiler();

      profiler.configure({ ...createDefaultOptions(), enableLaunchProfiling: true });
      expect(profiler.isArmed()).toBe(true);

      profiler.configure(createDefaultOptions());
      expect(profiler.isArmed()).toBe(false);
    });
  });

  describe("appStartTracker", () => {
    beforeEach(() => {
      __TEST_ONLY__resetColdStart();
    });

    it("should measure a cold start from process start, then warm starts from SDK start", () => {
      const processStartedAt = FIXED_NOW.getTime() - 800;
      const sdkStart = new Date(FIXED_NOW.getTime() - 300);
      const tracker = createAppStartTracker(processStartedAt, createFixedDateProvider());

      const cold = tracker.measure(sdkStart);
      const warm = tracker.measure(sdkStart);

      expect(cold).toEqual({
        type: "cold",
        appStartTimestamp: new Date(processStartedAt),
        duration: 800,
        sdkStartTimestamp: sdkStart,
        didFinishLaunchingTimestamp: FIXED_NOW,
      });
      expect(warm.type).toBe("warm");
      expect(warm.appStartTimestamp).toBe(sdkStart);
      expect(warm.duration).toBe(300);
    });

    it("should freeze measurements and never report a negative duration", () => {
      const tracker = createAppStartTracker(FIXED_NOW.getTime() + 1000, createFixedDateProvider());

      const measurement = tracker.measure(FIXED_NOW);

      expect(Object.isFrozen(measurement)).toBe(true);
      expect(measurement.duration).toBe(0);
    });
  });
});
