/**
 * Event Builder Module
 *
 * Builds MonitorEvents from what the host app hands to the facade.
 *
 * Responsibilities:
 * - Generate event IDs and timestamps
 * - Convert Error objects and arbitrary thrown values to exception values
 * - Parse V8 stack traces into frames
 *
 * @module modules/eventBuilder
 */

import type { ExceptionValue, MonitorEvent, SeverityLevel, StackFrame } from "../types/events";
import { createEventId } from "../utils/eventId";

// "    at fn (/path/file.js:10:5)" or "    at /path/file.js:10:5"
const V8_FRAME = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;

/**
 * Parse a V8 stack trace
 *
 * Frames are returned oldest first; lines that are not frames are skipped.
 */
export function parseStackFrames(stack: string | undefined): StackFrame[] {
  if (!stack) {
    return [];
  }

  const frames: StackFrame[] = [];
  for (const line of stack.split("\n")) {
    const match = V8_FRAME.exec(line);
    if (!match) {
      continue;
    }
    const [, fn, filename, lineno, colno] = match;
    const frame: StackFrame = {
      filename,
      lineno: Number(lineno),
      colno: Number(colno),
    };
    if (fn) {
      frame.function = fn;
    }
    frames.push(frame);
  }
  return frames.reverse();
}

function exceptionFromError(error: Error, handled: boolean): ExceptionValue {
  const frames = parseStackFrames(error.stack);
  const value: ExceptionValue = {
    type: error.name || "Error",
    value: error.message,
    mechanism: { type: handled ? "generic" : "onuncaughtexception", handled },
  };
  if (frames.length > 0) {
    value.stacktrace = { frames };
  }
  return value;
}

function describeThrown(thrown: unknown): string {
  if (typeof thrown === "string") {
    return thrown;
  }
  if (thrown && typeof thrown === "object") {
    try {
      return JSON.stringify(thrown);
    } catch (error) {
      return Object.prototype.toString.call(thrown);
    }
  }
  return String(thrown);
}

export function createBaseEvent(level: SeverityLevel): MonitorEvent {
  return {
    eventId: createEventId(),
    timestamp: Date.now(),
    level,
  };
}

/**
 * Complete a caller-built event; missing ID, timestamp and level are filled in
 */
export function eventFromInput(input: Partial<MonitorEvent>): MonitorEvent {
  const base = createBaseEvent(input.level ?? "info");
  return {
    ...base,
    ...input,
    eventId: input.eventId ?? base.eventId,
    timestamp: input.timestamp ?? base.timestamp,
    level: input.level ?? base.level,
  };
}

export function eventFromMessage(message: string, level: SeverityLevel = "info"): MonitorEvent {
  return { ...createBaseEvent(level), message };
}

export function eventFromError(error: Error): MonitorEvent {
  return { ...createBaseEvent("error"), exception: exceptionFromError(error, true) };
}

/**
 * Build an event from anything that was thrown
 *
 * Non-Error values become an exception of type "Error" whose value describes
 * the thrown value.
 */
export function eventFromException(thrown: unknown): MonitorEvent {
  if (thrown instanceof Error) {
    return eventFromError(thrown);
  }
  return {
    ...createBaseEvent("error"),
    exception: {
      type: "Error",
      value: describeThrown(thrown),
      mechanism: { type: "generic", handled: true },
    },
  };
}

/**
 * Build a fatal event for an error that is about to take the process down
 */
export function eventFromCrash(thrown: unknown): MonitorEvent {
  const exception = thrown instanceof Error
    ? exceptionFromError(thrown, false)
    : {
      type: "Error",
      value: describeThrown(thrown),
      mechanism: { type: "onuncaughtexception", handled: false },
    };
  return { ...createBaseEvent("fatal"), exception, isCrash: true };
}
