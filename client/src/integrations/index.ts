/**
 * Built-in integrations, by the name used in `options.integrations`
 *
 * @module integrations
 */

import type { IntegrationFactory } from "../types/integration";
import { INTEGRATION_NAMES } from "../utils/constants";
import { createAutoSessionTrackingIntegration } from "./autoSessionTrackingIntegration";
import { createCrashIntegration } from "./crashIntegration";

export const BUILT_IN_INTEGRATIONS: Readonly<Record<string, IntegrationFactory>> = {
  [INTEGRATION_NAMES.CRASH]: () => createCrashIntegration(),
  [INTEGRATION_NAMES.AUTO_SESSION_TRACKING]: createAutoSessionTrackingIntegration,
};

export { createCrashIntegration, type CrashEventSource } from "./crashIntegration";
export { createAutoSessionTrackingIntegration } from "./autoSessionTrackingIntegration";
