/**
 * Integration Types
 *
 * @module types/integration
 */

import type { ResolvedOptions } from "./options";

/**
 * Optional plugin installed at start time
 *
 * `install` returns false when the integration decides not to run with the
 * given options; such an instance is discarded without being registered.
 */
export interface Integration {
  readonly name: string;
  install(options: ResolvedOptions): boolean;
  uninstall?(): void;
}

/**
 * Creates a fresh integration instance for one epoch
 */
export type IntegrationFactory = () => Integration;
