/**
 * Integration Loader
 *
 * Resolves configured integration names through an explicit registry of
 * factories and installs each at most once per hub. Every failure here is
 * local: it is logged and the remaining integrations still install.
 *
 * @module core/integrationLoader
 */

import { BUILT_IN_INTEGRATIONS } from "../integrations";
import type { IntegrationFactory } from "../types/integration";
import { getLogger, type Logger } from "../utils/logger";
import { safeTry } from "../utils/safe";
import type { Hub } from "./hub";

const factories = new Map<string, IntegrationFactory>(Object.entries(BUILT_IN_INTEGRATIONS));

/**
 * Make an integration available under `name`; replaces any earlier factory
 */
export function registerIntegration(name: string, factory: IntegrationFactory): void {
  factories.set(name, factory);
}

export function unregisterIntegration(name: string): boolean {
  return factories.delete(name);
}

export function resolveIntegration(name: string): IntegrationFactory | undefined {
  return factories.get(name);
}

export function registeredIntegrationNames(): string[] {
  return [...factories.keys()];
}

/**
 * Restore the built-in registry (for testing)
 * @internal
 */
export function __TEST_ONLY__resetIntegrationRegistry(): void {
  factories.clear();
  for (const [name, factory] of Object.entries(BUILT_IN_INTEGRATIONS)) {
    factories.set(name, factory);
  }
}

/**
 * Install the integrations named in the hub's client options, in order
 *
 * @returns Names of the integrations that were installed
 */
export function installIntegrations(hub: Hub, logger: Logger = getLogger()): string[] {
  const client = hub.getClient();
  if (client === null) {
    // Gatekeeper
    return [];
  }

  const options = client.options;
  const installed: string[] = [];

  for (const name of options.integrations) {
    const factory = factories.get(name);
    if (factory === undefined) {
      logger.logError(`[installIntegrations] couldn't find "${name}" -> skipping.`);
      continue;
    }
    if (hub.isIntegrationInstalled(name)) {
      logger.logError(`[installIntegrations] already installed "${name}" -> skipping.`);
      continue;
    }

    const integration = safeTry(factory, logger, `createIntegration:${name}`);
    if (integration === undefined) {
      continue;
    }
    const shouldInstall = safeTry(() => integration.install(options), logger, `install:${name}`);
    if (shouldInstall !== true) {
      logger.logDebug(`Integration not installed: ${name}`);
      continue;
    }

    hub.addInstalledIntegration(integration, name);
    installed.push(name);
    logger.logDebug(`Integration installed: ${name}`);
  }

  return installed;
}

/**
 * Uninstall every integration of the hub and clear its registry
 */
export function removeAllIntegrations(hub: Hub | null, logger: Logger = getLogger()): void {
  if (hub === null) {
    return;
  }
  const names = hub.installedIntegrationNames();
  hub.removeAllIntegrations();
  if (names.length > 0) {
    logger.logDebug("Uninstalled integrations", { names });
  }
}
