/**
 * Hub
 *
 * The live pairing of a Client and a Scope that every capture is routed
 * through. A hub without a client accepts every call and does nothing.
 *
 * Also holds the integrations installed during its epoch.
 *
 * @module core/hub
 */

import type {
  Breadcrumb,
  Envelope,
  MonitorEvent,
  Session,
  TransactionEvent,
  User,
  UserFeedback,
} from "../types/events";
import type { Integration } from "../types/integration";
import { eventFromError, eventFromException, eventFromMessage } from "../modules/eventBuilder";
import { EMPTY_EVENT_ID } from "../utils/constants";
import { createSessionId } from "../utils/eventId";
import { getLogger, type Logger } from "../utils/logger";
import { safeTry } from "../utils/safe";
import type { Client } from "./client";
import { Scope } from "./scope";
import { Transaction } from "./transaction";

/**
 * Breadcrumb as accepted from callers; timestamp and level are filled in
 */
export type BreadcrumbInput = Omit<Breadcrumb, "timestamp" | "level"> &
  Partial<Pick<Breadcrumb, "timestamp" | "level">>;

export class Hub {
  private client: Client | null;
  private readonly scope: Scope;
  private session: Session | null = null;
  private readonly integrations = new Map<string, Integration>();

  constructor(client: Client | null, scope?: Scope | null, private readonly logger: Logger = getLogger()) {
    this.client = client;
    this.scope = scope ?? new Scope(client?.options.maxBreadcrumbs);
  }

  getClient(): Client | null {
    return this.client;
  }

  bindClient(client: Client | null): void {
    this.client = client;
  }

  getScope(): Scope {
    return this.scope;
  }

  captureEvent(event: MonitorEvent, scope: Scope = this.scope): string {
    const client = this.client;
    if (client === null) {
      return EMPTY_EVENT_ID;
    }
    if (event.exception && (event.level === "error" || event.level === "fatal")) {
      this.recordSessionError();
    }
    return client.captureEvent(event, scope);
  }

  captureError(error: Error, scope: Scope = this.scope): string {
    if (this.client === null) {
      return EMPTY_EVENT_ID;
    }
    return this.captureEvent(eventFromError(error), scope);
  }

  captureException(exception: unknown, scope: Scope = this.scope): string {
    if (this.client === null) {
      return EMPTY_EVENT_ID;
    }
    return this.captureEvent(eventFromException(exception), scope);
  }

  captureMessage(message: string, scope: Scope = this.scope): string {
    if (this.client === null) {
      return EMPTY_EVENT_ID;
    }
    return this.captureEvent(eventFromMessage(message), scope);
  }

  /**
   * Capture an event for a crash; the running session ends as crashed
   */
  captureCrashEvent(event: MonitorEvent, scope: Scope = this.scope): string {
    const client = this.client;
    if (client === null) {
      return EMPTY_EVENT_ID;
    }
    const crashEvent: MonitorEvent = { ...event, level: "fatal", isCrash: true };
    const session = this.session;
    if (session !== null) {
      session.status = "crashed";
      session.errors += 1;
      session.duration = Date.now() - session.started;
      client.captureSession(session);
      this.session = null;
    }
    return client.captureEvent(crashEvent, scope);
  }

  captureEnvelope(envelope: Envelope): void {
    this.client?.captureEnvelope(envelope);
  }

  /**
   * Without a client the transaction is never sent and never bound
   */
  startTransaction(name: string, operation: string, bindToScope = false): Transaction {
    if (this.client === null) {
      return new Transaction(name, operation, null);
    }
    const transaction = new Transaction(name, operation, this);
    if (bindToScope) {
      this.scope.setSpan(transaction);
    }
    return transaction;
  }

  captureTransaction(transaction: TransactionEvent): string {
    return this.client?.captureTransaction(transaction) ?? EMPTY_EVENT_ID;
  }

  captureUserFeedback(feedback: UserFeedback): void {
    this.client?.captureUserFeedback(feedback);
  }

  addBreadcrumb(input: BreadcrumbInput): void {
    const client = this.client;
    if (client === null || client.options.maxBreadcrumbs <= 0) {
      return;
    }

    let breadcrumb: Breadcrumb | null = {
      ...input,
      timestamp: input.timestamp ?? Date.now(),
      level: input.level ?? "info",
    };
    const beforeBreadcrumb = client.options.beforeBreadcrumb;
    if (beforeBreadcrumb !== null) {
      const candidate: Breadcrumb = breadcrumb;
      const result = safeTry(() => beforeBreadcrumb(candidate), this.logger, "beforeBreadcrumb");
      breadcrumb = result === undefined ? candidate : result;
    }
    if (breadcrumb === null) {
      this.logger.logDebug("Breadcrumb dropped by beforeBreadcrumb");
      return;
    }

    this.scope.addBreadcrumb(breadcrumb);
    client.fileManager.storeBreadcrumb(breadcrumb);
  }

  configureScope(callback: (scope: Scope) => void): void {
    if (this.client === null) {
      return;
    }
    safeTry(() => callback(this.scope), this.logger, "configureScope");
  }

  setUser(user: User | null): void {
    if (this.client === null) {
      return;
    }
    this.scope.setUser(user);
  }

  startSession(): void {
    const client = this.client;
    if (client === null) {
      return;
    }
    this.endSession();

    const session: Session = {
      sid: createSessionId(),
      status: "ok",
      started: Date.now(),
      errors: 0,
      environment: client.options.environment,
    };
    if (client.options.release !== null) {
      session.release = client.options.release;
    }
    this.session = session;
    client.captureSession(session);
  }

  endSession(): void {
    const session = this.session;
    if (session === null) {
      return;
    }
    this.session = null;
    session.status = "exited";
    session.duration = Date.now() - session.started;
    this.client?.captureSession(session);
  }

  getSession(): Readonly<Session> | null {
    return this.session;
  }

  /**
   * Resolves false when there is no client to flush
   */
  flush(timeoutMs: number): Promise<boolean> {
    if (this.client === null) {
      return Promise.resolve(false);
    }
    return this.client.flush(timeoutMs);
  }

  close(): void {
    this.client?.close();
  }

  addInstalledIntegration(integration: Integration, name: string): void {
    this.integrations.set(name, integration);
  }

  isIntegrationInstalled(name: string): boolean {
    return this.integrations.has(name);
  }

  getInstalledIntegration(name: string): Integration | undefined {
    return this.integrations.get(name);
  }

  installedIntegrationNames(): string[] {
    return [...this.integrations.keys()];
  }

  /**
   * Uninstall every registered integration and clear the registry
   *
   * A throwing uninstall is logged; the remaining integrations still run theirs.
   */
  removeAllIntegrations(): void {
    for (const [name, integration] of this.integrations) {
      if (typeof integration.uninstall === "function") {
        safeTry(() => integration.uninstall?.(), this.logger, `uninstall:${name}`);
      }
    }
    this.integrations.clear();
  }

  private recordSessionError(): void {
    if (this.session !== null) {
      this.session.errors += 1;
    }
  }
}
