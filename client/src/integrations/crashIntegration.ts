/**
 * Crash Integration
 *
 * Reports errors that are about to terminate the process as fatal crash
 * events. Listens on `uncaughtExceptionMonitor`, which observes the error
 * without changing how Node.js handles it.
 *
 * While installed it also keeps the app state manager running, so the app
 * state written at start stays marked active until a clean close.
 *
 * @module integrations/crashIntegration
 */

import { getCurrentHub } from "../core/globalState";
import { eventFromCrash } from "../modules/eventBuilder";
import { getDependencyContainer } from "../modules/dependencyContainer";
import type { Integration } from "../types/integration";
import { INTEGRATION_NAMES } from "../utils/constants";
import { getLogger } from "../utils/logger";
import { safeTry } from "../utils/safe";

/**
 * The part of `process` the integration subscribes to
 */
export interface CrashEventSource {
  on(event: "uncaughtExceptionMonitor", listener: NodeJS.UncaughtExceptionListener): unknown;
  off(event: "uncaughtExceptionMonitor", listener: NodeJS.UncaughtExceptionListener): unknown;
}

export function createCrashIntegration(source: CrashEventSource = process): Integration {
  let listener: NodeJS.UncaughtExceptionListener | null = null;
  let stateManagerStarted = false;

  return {
    name: INTEGRATION_NAMES.CRASH,
    install: (options) => {
      if (!options.enableCrashHandler) {
        return false;
      }

      const handler: NodeJS.UncaughtExceptionListener = (error, origin) => {
        safeTry(() => {
          const event = eventFromCrash(error);
          event.tags = { "crash.origin": origin };
          getCurrentHub().captureCrashEvent(event);
        }, getLogger(), "CrashIntegration.handler");
      };
      source.on("uncaughtExceptionMonitor", handler);
      listener = handler;

      const client = getCurrentHub().getClient();
      if (client !== null) {
        getDependencyContainer().appStateManager.start(client.fileManager, options);
        stateManagerStarted = true;
      }
      return true;
    },
    uninstall: () => {
      if (listener !== null) {
        source.off("uncaughtExceptionMonitor", listener);
        listener = null;
      }
      if (stateManagerStarted) {
        getDependencyContainer().appStateManager.stop();
        stateManagerStarted = false;
      }
    },
  };
}
