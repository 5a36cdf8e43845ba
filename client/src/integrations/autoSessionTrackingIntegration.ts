/**
 * Auto Session Tracking Integration
 *
 * Starts a session when installed and ends it when uninstalled.
 *
 * @module integrations/autoSessionTrackingIntegration
 */

import { getCurrentHub } from "../core/globalState";
import type { Hub } from "../core/hub";
import type { Integration } from "../types/integration";
import { INTEGRATION_NAMES } from "../utils/constants";

export function createAutoSessionTrackingIntegration(): Integration {
  // The hub of the epoch this instance was installed into
  let hub: Hub | null = null;

  return {
    name: INTEGRATION_NAMES.AUTO_SESSION_TRACKING,
    install: (options) => {
      if (!options.enableAutoSessionTracking) {
        return false;
      }
      hub = getCurrentHub();
      hub.startSession();
      return true;
    },
    uninstall: () => {
      hub?.endSession();
      hub = null;
    },
  };
}
