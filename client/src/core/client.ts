/**
 * Client
 *
 * Turns captured events into envelopes and hands them to the transport.
 *
 * Responsibilities:
 * - Apply scope, sampling, release/environment and beforeSend to events
 * - Wrap events, transactions, sessions and user feedback into envelopes
 * - Own the persistence collaborator (FileManager) and the transport
 *
 * @module core/client
 */

import type {
  Envelope,
  EnvelopeItem,
  MonitorEvent,
  Session,
  TransactionEvent,
  UserFeedback,
} from "../types/events";
import type { ResolvedOptions } from "../types/options";
import { createFileManager, type FileManager } from "../modules/fileManager";
import { createInMemoryTransport, type Transport } from "../modules/transport";
import { EMPTY_EVENT_ID, SDK_NAME, SDK_VERSION } from "../utils/constants";
import { getLogger, type Logger } from "../utils/logger";
import { safeTry } from "../utils/safe";
import type { Scope } from "./scope";

/**
 * Client options beyond the start options
 */
export interface ClientDependencies {
  fileManager?: FileManager;
  logger?: Logger;
  random?: () => number;
}

export interface Client {
  readonly options: ResolvedOptions;
  readonly fileManager: FileManager;
  readonly transport: Transport;
  /** Returns the event ID, or EMPTY_EVENT_ID if the event was dropped */
  captureEvent(event: MonitorEvent, scope: Scope): string;
  captureSession(session: Session): void;
  /** Returns the event ID, or EMPTY_EVENT_ID once closed */
  captureTransaction(transaction: TransactionEvent): string;
  captureEnvelope(envelope: Envelope): void;
  /** Writes the envelope to the persistence collaborator without sending it */
  storeEnvelope(envelope: Envelope): void;
  captureUserFeedback(feedback: UserFeedback): void;
  flush(timeoutMs: number): Promise<boolean>;
  close(): void;
  isClosed(): boolean;
}

export function createEnvelope(items: EnvelopeItem[], eventId?: string): Envelope {
  const envelope: Envelope = {
    header: {
      sentAt: new Date().toISOString(),
      sdk: { name: SDK_NAME, version: SDK_VERSION },
    },
    items,
  };
  if (eventId !== undefined) {
    envelope.header.eventId = eventId;
  }
  return envelope;
}

/**
 * Create a new Client
 */
export function createClient(options: ResolvedOptions, deps: ClientDependencies = {}): Client {
  const logger = deps.logger ?? getLogger();
  const random = deps.random ?? Math.random;
  const fileManager = deps.fileManager
    ?? createFileManager({ maxBreadcrumbs: options.maxBreadcrumbs, logger });
  const transport = options.transport ?? createInMemoryTransport({ logger });
  let closed = false;

  function send(envelope: Envelope): void {
    transport.send(envelope).catch((error: unknown) => {
      logger.logError("Transport failed to send envelope", error);
    });
  }

  function prepareEvent(event: MonitorEvent, scope: Scope): MonitorEvent | null {
    if (random() >= options.sampleRate) {
      logger.logDebug("Event dropped by sampleRate", { eventId: event.eventId });
      return null;
    }

    const prepared = scope.applyToEvent(event);
    if (prepared.release === undefined && options.release !== null) {
      prepared.release = options.release;
    }
    if (prepared.environment === undefined) {
      prepared.environment = options.environment;
    }

    const beforeSend = options.beforeSend;
    if (beforeSend === null) {
      return prepared;
    }
    // A throwing beforeSend keeps the event unchanged
    const result = safeTry(() => beforeSend(prepared), logger, "beforeSend");
    if (result === null) {
      logger.logDebug("Event dropped by beforeSend", { eventId: event.eventId });
      return null;
    }
    return result ?? prepared;
  }

  return {
    options,
    fileManager,
    transport,
    captureEvent: (event, scope) => {
      if (closed) {
        return EMPTY_EVENT_ID;
      }
      const prepared = prepareEvent(event, scope);
      if (prepared === null) {
        return EMPTY_EVENT_ID;
      }
      const envelope = createEnvelope([{ type: "event", payload: prepared }], prepared.eventId);
      if (prepared.isCrash) {
        // The process may not live long enough for the transport
        fileManager.storeEnvelope(envelope);
      }
      send(envelope);
      return prepared.eventId;
    },
    captureSession: (session) => {
      if (closed) {
        return;
      }
      send(createEnvelope([{ type: "session", payload: { ...session } }]));
    },
    captureTransaction: (transaction) => {
      if (closed) {
        return EMPTY_EVENT_ID;
      }
      const payload: TransactionEvent = { ...transaction };
      if (payload.release === undefined && options.release !== null) {
        payload.release = options.release;
      }
      if (payload.environment === undefined) {
        payload.environment = options.environment;
      }
      send(createEnvelope([{ type: "transaction", payload }], payload.eventId));
      return payload.eventId;
    },
    captureEnvelope: (envelope) => {
      if (closed) {
        return;
      }
      send(envelope);
    },
    storeEnvelope: (envelope) => {
      fileManager.storeEnvelope(envelope);
    },
    captureUserFeedback: (feedback) => {
      if (closed) {
        return;
      }
      send(createEnvelope([{ type: "user_report", payload: feedback }], feedback.eventId));
    },
    flush: (timeoutMs) => transport.flush(timeoutMs),
    close: () => {
      if (closed) {
        return;
      }
      closed = true;
      transport.close();
      logger.logDebug("Client closed");
    },
    isClosed: () => closed,
  };
}
