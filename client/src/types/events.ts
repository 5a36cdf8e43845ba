/**
 * Event Types
 *
 * Type definitions for captured events, breadcrumbs, sessions and envelopes.
 *
 * @module types/events
 */

/**
 * Event severity
 */
export type SeverityLevel = "debug" | "info" | "warning" | "error" | "fatal";

export interface User {
  id?: string;
  email?: string;
  username?: string;
  ipAddress?: string;
  data?: Record<string, unknown>;
}

export interface Breadcrumb {
  timestamp: number; // milliseconds since epoch
  level: SeverityLevel;
  category: string;
  message?: string;
  type?: string;
  data?: Record<string, unknown>;
}

export interface StackFrame {
  function?: string;
  filename?: string;
  lineno?: number;
  colno?: number;
}

export interface ExceptionValue {
  type: string;
  value: string;
  stacktrace?: { frames: StackFrame[] };
  mechanism?: { type: string; handled: boolean };
}

/**
 * Event as handed to the client
 *
 * @property {string} eventId - 32 lowercase hex chars
 * @property {number} timestamp - milliseconds since epoch
 * @property {boolean} [isCrash] - true for events reported by the crash integration
 */
export interface MonitorEvent {
  eventId: string;
  timestamp: number;
  level: SeverityLevel;
  message?: string;
  exception?: ExceptionValue;
  tags?: Record<string, string>;
  extra?: Record<string, unknown>;
  user?: User;
  breadcrumbs?: Breadcrumb[];
  release?: string;
  environment?: string;
  isCrash?: boolean;
}

export type SessionStatus = "ok" | "exited" | "crashed";

export interface Session {
  sid: string;
  status: SessionStatus;
  started: number;
  errors: number;
  duration?: number;
  release?: string;
  environment?: string;
}

export interface UserFeedback {
  eventId: string;
  name?: string;
  email?: string;
  comments: string;
}

export type SpanStatus = "ok" | "cancelled" | "deadline_exceeded" | "internal_error" | "unknown_error";

export interface TransactionContext {
  name: string;
  operation: string;
}

/**
 * Finished transaction as sent in an envelope
 *
 * @property {string} traceId - 32 lowercase hex chars
 * @property {string} spanId - 16 lowercase hex chars
 * @property {number} timestamp - end of the transaction, milliseconds since epoch
 */
export interface TransactionEvent {
  eventId: string;
  traceId: string;
  spanId: string;
  name: string;
  operation: string;
  status: SpanStatus;
  startTimestamp: number;
  timestamp: number;
  tags?: Record<string, string>;
  release?: string;
  environment?: string;
}

export type EnvelopeItemType = "event" | "session" | "user_report" | "transaction";

export type EnvelopeItem =
  | { type: "event"; payload: MonitorEvent }
  | { type: "session"; payload: Session }
  | { type: "user_report"; payload: UserFeedback }
  | { type: "transaction"; payload: TransactionEvent };

export interface Envelope {
  header: {
    eventId?: string;
    sentAt: string; // ISO string
    sdk: { name: string; version: string };
  };
  items: EnvelopeItem[];
}
