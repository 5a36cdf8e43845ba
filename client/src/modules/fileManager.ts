/**
 * FileManager Module
 *
 * Persistence collaborator of the client. Keeps the app state and breadcrumbs
 * of the current launch next to the ones of the previous launch, so a crash
 * check on the next start can read what was true right before it.
 *
 * Storage is in memory; the slots survive for the lifetime of the store
 * instance handed to each client (see `getSharedFileStore`).
 *
 * @module modules/fileManager
 */

import type { Breadcrumb, Envelope } from "../types/events";
import { DEFAULTS } from "../utils/constants";
import type { Logger } from "../utils/logger";

/**
 * Snapshot of the host app written while the SDK runs
 */
export interface AppState {
  releaseName: string | null;
  sdkStartedAt: number;
  isActive: boolean;
  wasTerminated: boolean;
}

/**
 * Backing slots shared by every FileManager of the process
 */
export interface FileStore {
  appState: AppState | null;
  previousAppState: AppState | null;
  breadcrumbs: Breadcrumb[];
  previousBreadcrumbs: Breadcrumb[];
  envelopes: Envelope[];
}

export interface FileManager {
  storeAppState(state: AppState): void;
  readAppState(): AppState | null;
  readPreviousAppState(): AppState | null;
  moveAppStateToPreviousAppState(): void;
  storeBreadcrumb(breadcrumb: Breadcrumb): void;
  readBreadcrumbs(): readonly Breadcrumb[];
  readPreviousBreadcrumbs(): readonly Breadcrumb[];
  moveBreadcrumbsToPreviousBreadcrumbs(): void;
  storeEnvelope(envelope: Envelope): void;
  getEnvelopes(): readonly Envelope[];
  deleteAllEnvelopes(): void;
}

export interface FileManagerOptions {
  maxBreadcrumbs: number;
  /** Oldest stored envelopes are deleted past this many (default: 30) */
  maxEnvelopes?: number;
  store?: FileStore;
  logger?: Logger;
}

export function createFileStore(): FileStore {
  return {
    appState: null,
    previousAppState: null,
    breadcrumbs: [],
    previousBreadcrumbs: [],
    envelopes: [],
  };
}

let sharedStore: FileStore | null = null;

/**
 * Process-wide store standing in for the on-disk cache directory
 */
export function getSharedFileStore(): FileStore {
  if (sharedStore === null) {
    sharedStore = createFileStore();
  }
  return sharedStore;
}

/**
 * Reset the shared store (for testing)
 * @internal
 */
export function __TEST_ONLY__resetSharedFileStore(): void {
  sharedStore = null;
}

/**
 * Create a FileManager over a store
 */
export function createFileManager(options: FileManagerOptions): FileManager {
  const { maxBreadcrumbs, logger, maxEnvelopes = DEFAULTS.MAX_STORED_ENVELOPES } = options;
  const store = options.store ?? getSharedFileStore();

  return {
    storeAppState: (state) => {
      store.appState = { ...state };
    },
    readAppState: () => store.appState,
    readPreviousAppState: () => store.previousAppState,
    moveAppStateToPreviousAppState: () => {
      // Keep the last known previous state when nothing was written since
      if (store.appState === null) {
        return;
      }
      store.previousAppState = store.appState;
      store.appState = null;
      logger?.logDebug("Moved app state to previous app state");
    },
    storeBreadcrumb: (breadcrumb) => {
      if (maxBreadcrumbs <= 0) {
        return;
      }
      store.breadcrumbs.push(breadcrumb);
      if (store.breadcrumbs.length > maxBreadcrumbs) {
        store.breadcrumbs.splice(0, store.breadcrumbs.length - maxBreadcrumbs);
      }
    },
    readBreadcrumbs: () => store.breadcrumbs,
    readPreviousBreadcrumbs: () => store.previousBreadcrumbs,
    moveBreadcrumbsToPreviousBreadcrumbs: () => {
      store.previousBreadcrumbs = store.breadcrumbs;
      store.breadcrumbs = [];
      logger?.logDebug("Moved breadcrumbs to previous breadcrumbs", {
        count: store.previousBreadcrumbs.length,
      });
    },
    storeEnvelope: (envelope) => {
      store.envelopes.push(envelope);
      if (store.envelopes.length > maxEnvelopes) {
        const dropped = store.envelopes.splice(0, store.envelopes.length - maxEnvelopes);
        logger?.logDebug("Envelope cache full, deleted oldest envelopes", { count: dropped.length });
      }
    },
    getEnvelopes: () => store.envelopes,
    deleteAllEnvelopes: () => {
      store.envelopes = [];
    },
  };
}
