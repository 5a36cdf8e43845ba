/**
 * Scope
 *
 * Contextual data (tags, extras, user, breadcrumbs) attached to every event
 * captured through the hub that holds it.
 *
 * @module core/scope
 */

import type { Breadcrumb, MonitorEvent, SeverityLevel, User } from "../types/events";
import { DEFAULTS } from "../utils/constants";
import { sanitizeTagKey, sanitizeTags, sanitizeTagValue } from "../utils/sanitize";
import type { Transaction } from "./transaction";

export class Scope {
  private tags: Record<string, string> = {};
  private extras: Record<string, unknown> = {};
  private user: User | null = null;
  private level: SeverityLevel | null = null;
  private breadcrumbs: Breadcrumb[] = [];
  private span: Transaction | null = null;

  constructor(private readonly maxBreadcrumbs: number = DEFAULTS.MAX_BREADCRUMBS) {}

  /**
   * Independent copy; later changes to either scope do not affect the other
   */
  clone(): Scope {
    const copy = new Scope(this.maxBreadcrumbs);
    copy.tags = { ...this.tags };
    copy.extras = { ...this.extras };
    copy.user = this.user ? { ...this.user } : null;
    copy.level = this.level;
    copy.breadcrumbs = [...this.breadcrumbs];
    copy.span = this.span;
    return copy;
  }

  getMaxBreadcrumbs(): number {
    return this.maxBreadcrumbs;
  }

  setTag(key: string, value: unknown): this {
    const cleanKey = sanitizeTagKey(key);
    const cleanValue = sanitizeTagValue(value);
    if (cleanKey !== null && cleanValue !== null) {
      this.tags[cleanKey] = cleanValue;
    }
    return this;
  }

  setTags(tags: Record<string, unknown>): this {
    this.tags = { ...this.tags, ...sanitizeTags(tags) };
    return this;
  }

  removeTag(key: string): this {
    delete this.tags[key];
    return this;
  }

  getTags(): Readonly<Record<string, string>> {
    return this.tags;
  }

  setExtra(key: string, value: unknown): this {
    this.extras[key] = value;
    return this;
  }

  setExtras(extras: Record<string, unknown>): this {
    this.extras = { ...this.extras, ...extras };
    return this;
  }

  getExtras(): Readonly<Record<string, unknown>> {
    return this.extras;
  }

  setUser(user: User | null): this {
    this.user = user ? { ...user } : null;
    return this;
  }

  getUser(): User | null {
    return this.user;
  }

  setLevel(level: SeverityLevel | null): this {
    this.level = level;
    return this;
  }

  getLevel(): SeverityLevel | null {
    return this.level;
  }

  /**
   * Transaction bound to this scope, if any
   */
  setSpan(span: Transaction | null): this {
    this.span = span;
    return this;
  }

  getSpan(): Transaction | null {
    return this.span;
  }

  /**
   * Oldest breadcrumbs are dropped once maxBreadcrumbs is reached
   */
  addBreadcrumb(breadcrumb: Breadcrumb): this {
    if (this.maxBreadcrumbs <= 0) {
      return this;
    }
    this.breadcrumbs.push(breadcrumb);
    if (this.breadcrumbs.length > this.maxBreadcrumbs) {
      this.breadcrumbs.splice(0, this.breadcrumbs.length - this.maxBreadcrumbs);
    }
    return this;
  }

  getBreadcrumbs(): readonly Breadcrumb[] {
    return this.breadcrumbs;
  }

  clearBreadcrumbs(): this {
    this.breadcrumbs = [];
    return this;
  }

  clear(): this {
    this.tags = {};
    this.extras = {};
    this.user = null;
    this.level = null;
    this.breadcrumbs = [];
    this.span = null;
    return this;
  }

  /**
   * Returns a new event with scope data merged in. Tags, extras and user set
   * on the event win over the scope's; a scope level overrides the event's.
   */
  applyToEvent(event: MonitorEvent): MonitorEvent {
    const applied: MonitorEvent = {
      ...event,
      tags: { ...this.tags, ...event.tags },
      extra: { ...this.extras, ...event.extra },
    };
    if (this.level !== null) {
      applied.level = this.level;
    }
    if (!applied.user && this.user) {
      applied.user = { ...this.user };
    }
    if ((!applied.breadcrumbs || applied.breadcrumbs.length === 0) && this.breadcrumbs.length > 0) {
      applied.breadcrumbs = [...this.breadcrumbs];
    }
    return applied;
  }
}
