/**
 * Transport Module
 *
 * Hands envelopes to their destination. The default transport keeps them in
 * memory; hosts that ship events elsewhere pass their own via `options.transport`.
 *
 * Responsibilities:
 * - Accept envelopes without blocking the caller
 * - Track in-flight sends so flush() can wait for them, bounded by a timeout
 * - Keep at most maxBufferSize envelopes
 * - Refuse new envelopes once closed
 *
 * Note: This module does NOT serialize events or decide what to send.
 *
 * @module modules/transport
 */

import type { Envelope } from "../types/events";
import { DEFAULTS } from "../utils/constants";
import type { Logger } from "../utils/logger";

/**
 * Transport interface
 */
export interface Transport {
  send(envelope: Envelope): Promise<void>;
  /** Resolves true if every in-flight send settled within the timeout */
  flush(timeoutMs: number): Promise<boolean>;
  close(): void;
}

/**
 * In-memory transport options
 */
export interface InMemoryTransportOptions {
  logger?: Logger;
  /** Oldest envelopes are dropped past this many (default: 1000) */
  maxBufferSize?: number;
  onSend?: (envelope: Envelope) => void;
}

export interface InMemoryTransport extends Transport {
  getEnvelopes(): readonly Envelope[];
  isClosed(): boolean;
}

/**
 * Create a transport that records envelopes in memory
 */
export function createInMemoryTransport(options: InMemoryTransportOptions = {}): InMemoryTransport {
  const { logger, onSend, maxBufferSize = DEFAULTS.MAX_BUFFERED_ENVELOPES } = options;
  const envelopes: Envelope[] = [];
  const inFlight = new Set<Promise<void>>();
  let closed = false;

  function send(envelope: Envelope): Promise<void> {
    if (closed) {
      logger?.logDebug("Transport closed, dropping envelope", { eventId: envelope.header.eventId });
      return Promise.resolve();
    }

    const pending = Promise.resolve().then(() => {
      envelopes.push(envelope);
      if (envelopes.length > maxBufferSize) {
        const dropped = envelopes.splice(0, envelopes.length - maxBufferSize);
        logger?.logDebug("Transport buffer full, dropped oldest envelopes", { count: dropped.length });
      }
      onSend?.(envelope);
    });
    const tracked = pending
      .catch((error: unknown) => {
        logger?.logError("Transport onSend callback failed", error);
      })
      .finally(() => {
        inFlight.delete(tracked);
      });
    inFlight.add(tracked);
    return tracked;
  }

  async function flush(timeoutMs: number): Promise<boolean> {
    if (inFlight.size === 0) {
      return true;
    }

    let cancelTimer = (): void => undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), Math.max(timeoutMs, 0));
      cancelTimer = () => clearTimeout(timer);
    });
    const drained = Promise.all([...inFlight]).then(() => true);

    const result = await Promise.race([drained, timedOut]);
    cancelTimer();
    return result;
  }

  return {
    send,
    flush,
    close: () => {
      closed = true;
    },
    getEnvelopes: () => envelopes,
    isClosed: () => closed,
  };
}
