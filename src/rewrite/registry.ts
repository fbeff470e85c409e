import { ConfigurationError } from "../core/errors";
import type { RewriteRule } from "./rule";

export type RegistrationKey = {
  pass: string;
  priority: number;
  tags: readonly string[];
};

export type RegistryEntry = RegistrationKey & {
  rule: RewriteRule;
  /** Registration order, used to break priority ties. */
  order: number;
};

export type RuleQuery = {
  /** Keep rules carrying at least one of these tags (all rules when omitted). */
  include?: readonly string[];
  /** Drop rules carrying any of these tags. */
  exclude?: readonly string[];
};

/**
 * Explicit rule table, built once and sealed before any driver reads it.
 * Lower priority runs first; equal priorities run in registration order.
 */
export class RuleRegistry {
  private entries: RegistryEntry[] = [];
  private sealed = false;

  register(rule: RewriteRule, key: RegistrationKey): this {
    if (this.sealed) {
      throw new ConfigurationError(
        `cannot register "${rule.name}": the registry is sealed`,
      );
    }
    if (!Number.isFinite(key.priority)) {
      throw new ConfigurationError(
        `rule "${rule.name}" has a non-finite priority`,
      );
    }
    if (this.entries.some((e) => e.pass === key.pass && e.rule.name === rule.name)) {
      throw new ConfigurationError(
        `rule "${rule.name}" is already registered in pass "${key.pass}"`,
      );
    }
    this.entries.push({
      rule,
      pass: key.pass,
      priority: key.priority,
      tags: key.tags.slice(),
      order: this.entries.length,
    });
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  passes(): string[] {
    return Array.from(new Set(this.entries.map((e) => e.pass)));
  }

  entriesFor(pass: string, query: RuleQuery = {}): RegistryEntry[] {
    const { include, exclude } = query;
    return this.entries
      .filter((e) => e.pass === pass)
      .filter((e) => !include || e.tags.some((tag) => include.includes(tag)))
      .filter((e) => !exclude || !e.tags.some((tag) => exclude.includes(tag)))
      .sort((a, b) => a.priority - b.priority || a.order - b.order);
  }

  query(pass: string, query: RuleQuery = {}): RewriteRule[] {
    return this.entriesFor(pass, query).map((e) => e.rule);
  }
}
