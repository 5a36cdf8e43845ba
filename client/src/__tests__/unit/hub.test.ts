/**
 * Unit Tests - Hub
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { createClient, type Client } from "../../core/client";
import { Hub } from "../../core/hub";
import { createFileManager, createFileStore, type FileStore } from "../../modules/fileManager";
import { createInMemoryTransport, type InMemoryTransport } from "../../modules/transport";
import type { Session } from "../../types/events";
import { createDefaultOptions, type ResolvedOptions } from "../../types/options";
import { EMPTY_EVENT_ID } from "../../utils/constants";
import { createMockLogger } from "../helpers";

describe("Hub", () => {
  let transport: InMemoryTransport;
  let store: FileStore;
  let logger: ReturnType<typeof createMockLogger>;

  function clientWith(overrides: Partial<ResolvedOptions> = {}): Client {
    const options: ResolvedOptions = { ...createDefaultOptions(), transport, ...overrides };
    return createClient(options, {
      logger,
      fileManager: createFileManager({ maxBreadcrumbs: options.maxBreadcrumbs, store }),
    });
  }

  async function sentSessions(): Promise<Session[]> {
    await transport.flush(100);
    return transport.getEnvelopes().flatMap((envelope) =>
      envelope.items.flatMap((item): Session[] => (item.type === "session" ? [item.payload] : []))
    );
  }

  beforeEach(() => {
    transport = createInMemoryTransport();
    store = createFileStore();
    logger = createMockLogger();
  });

  describe("without a client", () => {
    it("should accept every call and do nothing", async () => {
      const hub = new Hub(null, null, logger);
      const callback = vi.fn();

      expect(hub.captureMessage("hello")).toBe(EMPTY_EVENT_ID);
      expect(hub.captureError(new Error("boom"))).toBe(EMPTY_EVENT_ID);
      expect(hub.captureException("bad")).toBe(EMPTY_EVENT_ID);
      hub.addBreadcrumb({ category: "nav" });
      hub.configureScope(callback);
      hub.setUser({ id: "u" });
      hub.startSession();

      expect(callback).not.toHaveBeenCalled();
      expect(hub.getScope().getBreadcrumbs()).toEqual([]);
      expect(hub.getScope().getUser()).toBeNull();
      expect(hub.getSession()).toBeNull();
      await expect(hub.flush(10)).resolves.toBe(false);
    });
  });

  describe("scope", () => {
    it("should size a default scope from the client options", () => {
      const hub = new Hub(clientWith({ maxBreadcrumbs: 3 }), null, logger);

      expect(hub.getScope().getMaxBreadcrumbs()).toBe(3);
    });

    it("should log a throwing configureScope callback", () => {
      const hub = new Hub(clientWith(), null, logger);

      hub.configureScope(() => {
        throw new Error("callback failed");
      });

      expect(logger.logError).toHaveBeenCalledWith(
        "configureScope failed: callback failed",
        expect.any(Error)
      );
    });
  });

  describe("addBreadcrumb", () => {
    it("should fill in timestamp and level", () => {
      const hub = new Hub(clientWith(), null, logger);
      const before = Date.now();

      hub.addBreadcrumb({ category: "nav", message: "home" });

      const [breadcrumb] = hub.getScope().getBreadcrumbs();
      expect(breadcrumb?.level).toBe("info");
      expect(breadcrumb?.timestamp).toBeGreaterThanOrEqual(before);
      expect(store.breadcrumbs).toHaveLength(1);
    });

    it("should do nothing with maxBreadcrumbs 0", () => {
      const hub = new Hub(clientWith({ maxBreadcrumbs: 0 }), null, logger);

      hub.addBreadcrumb({ category: "nav" });

      expect(store.breadcrumbs).toEqual([]);
    });

    it("should drop breadcrumbs rejected by beforeBreadcrumb", () => {
      const hub = new Hub(clientWith({ beforeBreadcrumb: () => null }), null, logger);

      hub.addBreadcrumb({ category: "nav" });

      expect(hub.getScope().getBreadcrumbs()).toEqual([]);
      expect(store.breadcrumbs).toEqual([]);
    });

    it("should store what beforeBreadcrumb returns", () => {
      const hub = new Hub(
        clientWith({ beforeBreadcrumb: (b) => ({ ...b, message: "redacted" }) }),
        null,
        logger
      );

      hub.addBreadcrumb({ category: "http", message: "GET /users/42", timestamp: 5 });

      expect(hub.getScope().getBreadcrumbs()).toEqual([
        { category: "http", message: "redacted", timestamp: 5, level: "info" },
      ]);
    });

    it("should keep the breadcrumb when beforeBreadcrumb throws", () => {
      const hub = new Hub(
        clientWith({
          beforeBreadcrumb: () => {
            throw new Error("hook failed");
          },
        }),
        null,
        logger
      );

      hub.addBreadcrumb({ category: "nav", timestamp: 5 });

      expect(hub.getScope().getBreadcrumbs()).toEqual([{ category: "nav", timestamp: 5, level: "info" }]);
    });
  });

  describe("sessions", () => {
    it("should end a running session before starting a new one", async () => {
      const hub = new Hub(clientWith({ release: "app@1.0.0" }), null, logger);

      hub.startSession();
      hub.startSession();

      const sessions = await sentSessions();
      expect(sessions.map((s) => s.status)).toEqual(["ok", "exited", "ok"]);
      expect(sessions[0]?.release).toBe("app@1.0.0");
      expect(sessions[2]?.sid).not.toBe(sessions[0]?.sid);
    });

    it("should count errors but not messages", () => {
      const hub = new Hub(clientWith(), null, logger);
      hub.startSession();

      hub.captureMessage("note");
      hub.captureError(new Error("one"));
      hub.captureException("two");

      expect(hub.getSession()?.errors).toBe(2);
    });

    it("should end the session as crashed on a crash event", async () => {
      const hub = new Hub(clientWith(), null, logger);
      hub.startSession();

      hub.captureCrashEvent({ eventId: "d".repeat(32), timestamp: 1, level: "error" });

      const sessions = await sentSessions();
      expect(sessions.map((s) => `${s.status}:${s.errors}`)).toEqual(["ok:0", "crashed:1"]);
      expect(hub.getSession()).toBeNull();
      const crash = transport.getEnvelopes()[2]?.items[0];
      expect(crash?.type === "event" ? crash.payload.level : null).toBe("fatal");
    });

    it("should ignore endSession without a running session", async () => {
      const hub = new Hub(clientWith(), null, logger);

      hub.endSession();

      expect(await sentSessions()).toEqual([]);
    });
  });

  describe("integrations", () => {
    it("should keep installed integrations by name", () => {
      const hub = new Hub(clientWith(), null, logger);
      const integration = { name: "Custom", install: () => true };

      hub.addInstalledIntegration(integration, "Custom");

      expect(hub.isIntegrationInstalled("Custom")).toBe(true);
      expect(hub.getInstalledIntegration("Custom")).toBe(integration);
      expect(hub.installedIntegrationNames()).toEqual(["Custom"]);
    });

    it("should log a throwing uninstall and keep going", () => {
      const hub = new Hub(clientWith(), null, logger);
      const uninstall = vi.fn();
      hub.addInstalledIntegration(
        {
          name: "Broken",
          install: () => true,
          uninstall: () => {
            throw new Error("still busy");
          },
        },
        "Broken"
      );
      hub.addInstalledIntegration({ name: "Fine", install: () => true, uninstall }, "Fine");

      hub.removeAllIntegrations();

      expect(uninstall).toHaveBeenCalledOnce();
      expect(logger.logError).toHaveBeenCalledWith("uninstall:Broken failed: still busy", expect.any(Error));
      expect(hub.installedIntegrationNames()).toEqual([]);
    });
  });

  it("should close its client", () => {
    const client = clientWith();
    const hub = new Hub(client, null, logger);

    hub.close();

    expect(client.isClosed()).toBe(true);
  });
});
