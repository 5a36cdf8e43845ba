/**
 * Transaction
 *
 * A named, timed unit of work. Finishing it sends a `transaction` envelope
 * item through the hub it was started on; a transaction started on a hub
 * without a client records nothing.
 *
 * @module core/transaction
 */

import type { SpanStatus, TransactionEvent } from "../types/events";
import { EMPTY_EVENT_ID } from "../utils/constants";
import { createEventId } from "../utils/eventId";
import { sanitizeTagKey, sanitizeTagValue } from "../utils/sanitize";
import type { Hub } from "./hub";

export class Transaction {
  readonly traceId: string = createEventId();
  readonly spanId: string = createEventId().slice(0, 16);
  readonly startTimestamp: number = Date.now();
  private endTimestamp: number | null = null;
  private status: SpanStatus = "ok";
  private tags: Record<string, string> = {};

  constructor(
    readonly name: string,
    readonly operation: string,
    private readonly hub: Hub | null
  ) {}

  /**
   * False for transactions that will never be sent
   */
  isSampled(): boolean {
    return this.hub !== null;
  }

  isFinished(): boolean {
    return this.endTimestamp !== null;
  }

  setTag(key: string, value: unknown): this {
    const cleanKey = sanitizeTagKey(key);
    const cleanValue = sanitizeTagValue(value);
    if (cleanKey !== null && cleanValue !== null) {
      this.tags[cleanKey] = cleanValue;
    }
    return this;
  }

  setStatus(status: SpanStatus): this {
    this.status = status;
    return this;
  }

  getStatus(): SpanStatus {
    return this.status;
  }

  /**
   * Send the transaction and unbind it from the hub's scope
   *
   * @returns The event ID, or EMPTY_EVENT_ID when nothing was sent
   */
  finish(status?: SpanStatus): string {
    if (this.endTimestamp !== null) {
      return EMPTY_EVENT_ID;
    }
    this.endTimestamp = Date.now();
    if (status !== undefined) {
      this.status = status;
    }

    const hub = this.hub;
    if (hub === null) {
      return EMPTY_EVENT_ID;
    }
    const scope = hub.getScope();
    if (scope.getSpan() === this) {
      scope.setSpan(null);
    }
    return hub.captureTransaction(this.toEvent(this.endTimestamp));
  }

  private toEvent(timestamp: number): TransactionEvent {
    const event: TransactionEvent = {
      eventId: createEventId(),
      traceId: this.traceId,
      spanId: this.spanId,
      name: this.name,
      operation: this.operation,
      status: this.status,
      startTimestamp: this.startTimestamp,
      timestamp,
    };
    if (Object.keys(this.tags).length > 0) {
      event.tags = { ...this.tags };
    }
    return event;
  }
}
