/**
 * Unit Tests - Scope
 */

import { describe, it, expect } from "vitest";
import { Scope } from "../../core/scope";
import { Transaction } from "../../core/transaction";
import type { Breadcrumb, MonitorEvent } from "../../types/events";

function crumb(message: string): Breadcrumb {
  return { timestamp: 1, level: "info", category: "test", message };
}

function baseEvent(overrides: Partial<MonitorEvent> = {}): MonitorEvent {
  return { eventId: "e".repeat(32), timestamp: 1, level: "info", ...overrides };
}

describe("Scope", () => {
  describe("tags", () => {
    it("should sanitize tags as they are set", () => {
      const scope = new Scope()
        .setTag("  region ", "eu")
        .setTag("count", 3)
        .setTag("", "dropped")
        .setTag("object", { a: 1 });

      expect(scope.getTags()).toEqual({ region: "eu", count: "3" });
    });

    it("should merge setTags and remove single tags", () => {
      const scope = new Scope().setTags({ a: "1", b: "2" }).setTags({ b: "3" }).removeTag("a");

      expect(scope.getTags()).toEqual({ b: "3" });
    });
  });

  describe("clone", () => {
    it("should produce an independent copy", () => {
      const original = new Scope(5)
        .setTag("team", "core")
        .setExtra("attempt", 1)
        .setUser({ id: "user-1" })
        .setLevel("warning")
        .addBreadcrumb(crumb("first"));

      const copy = original.clone();
      copy.setTag("team", "payments").setExtra("attempt", 2).addBreadcrumb(crumb("second"));

      expect(copy.getMaxBreadcrumbs()).toBe(5);
      expect(copy.getUser()).toEqual({ id: "user-1" });
      expect(copy.getUser()).not.toBe(original.getUser());
      expect(copy.getLevel()).toBe("warning");
      expect(original.getTags()).toEqual({ team: "core" });
      expect(original.getExtras()).toEqual({ attempt: 1 });
      expect(original.getBreadcrumbs()).toEqual([crumb("first")]);
    });
  });

  describe("span", () => {
    it("should share the bound transaction with copies", () => {
      const transaction = new Transaction("load", "ui.load", null);
      const scope = new Scope().setSpan(transaction);

      expect(scope.clone().getSpan()).toBe(transaction);
    });

    it("should drop the span on clear", () => {
      const scope = new Scope().setSpan(new Transaction("load", "ui.load", null));

      expect(scope.clear().getSpan()).toBeNull();
    });
  });

  describe("breadcrumbs", () => {
    it("should drop the oldest breadcrumbs past the limit", () => {
      const scope = new Scope(2)
        .addBreadcrumb(crumb("one"))
        .addBreadcrumb(crumb("two"))
        .addBreadcrumb(crumb("three"));

      expect(scope.getBreadcrumbs().map((b) => b.message)).toEqual(["two", "three"]);
    });

    it("should keep no breadcrumbs with a limit of 0", () => {
      expect(new Scope(0).addBreadcrumb(crumb("one")).getBreadcrumbs()).toEqual([]);
    });

    it("should clear breadcrumbs", () => {
      expect(new Scope().addBreadcrumb(crumb("one")).clearBreadcrumbs().getBreadcrumbs()).toEqual([]);
    });
  });

  describe("applyToEvent", () => {
    it("should let event tags and extras win over the scope's", () => {
      const scope = new Scope().setTags({ a: "1", b: "2" }).setExtras({ x: 1 });

      const applied = scope.applyToEvent(baseEvent({ tags: { b: "event" }, extra: { y: 2 } }));

      expect(applied.tags).toEqual({ a: "1", b: "event" });
      expect(applied.extra).toEqual({ x: 1, y: 2 });
    });

    it("should override the event level with the scope level", () => {
      const applied = new Scope().setLevel("warning").applyToEvent(baseEvent({ level: "error" }));

      expect(applied.level).toBe("warning");
    });

    it("should keep the event user and fill in the scope user otherwise", () => {
      const scope = new Scope().setUser({ id: "scope-user" });

      expect(scope.applyToEvent(baseEvent()).user).toEqual({ id: "scope-user" });
      expect(scope.applyToEvent(baseEvent({ user: { id: "event-user" } })).user).toEqual({
        id: "event-user",
      });
    });

    it("should attach scope breadcrumbs only when the event has none", () => {
      const scope = new Scope().addBreadcrumb(crumb("scope"));

      expect(scope.applyToEvent(baseEvent()).breadcrumbs).toEqual([crumb("scope")]);
      expect(scope.applyToEvent(baseEvent({ breadcrumbs: [crumb("event")] })).breadcrumbs).toEqual([
        crumb("event"),
      ]);
    });

    it("should not modify the event passed in", () => {
      const event = baseEvent();
      new Scope().setTag("a", "1").applyToEvent(event);

      expect(event.tags).toBeUndefined();
    });
  });

  it("should reset everything on clear", () => {
    const scope = new Scope()
      .setTag("a", "1")
      .setExtra("b", 2)
      .setUser({ id: "u" })
      .setLevel("error")
      .addBreadcrumb(crumb("x"))
      .clear();

    expect(scope.getTags()).toEqual({});
    expect(scope.getExtras()).toEqual({});
    expect(scope.getUser()).toBeNull();
    expect(scope.getLevel()).toBeNull();
    expect(scope.getBreadcrumbs()).toEqual([]);
  });
});
