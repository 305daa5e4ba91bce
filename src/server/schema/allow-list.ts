/**
 * Allow-List Registry.
 *
 * The set of schema-qualified objects generated SQL may read. Built once at
 * start-up and never mutated; names are case-folded so lookups match the
 * validator's folding of unquoted identifiers.
 */

import type { AllowListEntry, ObjectKind } from '../../shared/types';
import { ConfigurationError } from '../errors';

export class AllowListRegistry {
  private readonly byName: ReadonlyMap<string, AllowListEntry>;

  constructor(entries: readonly AllowListEntry[]) {
    const issues: string[] = [];
    const byName = new Map<string, AllowListEntry>();

    if (entries.length === 0) {
      issues.push('allow-list is empty');
    }
    for (const entry of entries) {
      const name = entry.name.trim().toLowerCase();
      if (!/^[a-z_][a-z0-9_$]*\.[a-z_][a-z0-9_$]*$/.test(name)) {
        issues.push(`allow-list entry "${entry.name}" must be a schema-qualified name`);
        continue;
      }
      if (byName.has(name)) {
        issues.push(`allow-list entry "${name}" is listed more than once`);
        continue;
      }
      byName.set(name, Object.freeze({ name, kind: entry.kind }));
    }

    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }
    this.byName = byName;
    Object.freeze(this);
  }

  /** Exact match: callers pass names already folded the way the database folds them. */
  has(name: string): boolean {
    return this.byName.has(name);
  }

  kindOf(name: string): ObjectKind | undefined {
    return this.byName.get(name)?.kind;
  }

  entries(): readonly AllowListEntry[] {
    return [...this.byName.values()];
  }

  names(): readonly string[] {
    return [...this.byName.keys()];
  }

  get size(): number {
    return this.byName.size;
  }
}

/**
 * Parse the `SQL_ALLOWLIST` override: comma-separated `schema.name` entries,
 * each optionally suffixed with `:view`.
 */
export function parseAllowListOverride(raw: string): AllowListEntry[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part): AllowListEntry => {
      const [name, kind] = part.split(':');
      return { name: name.trim(), kind: kind?.trim().toLowerCase() === 'view' ? 'view' : 'table' };
    });
}
