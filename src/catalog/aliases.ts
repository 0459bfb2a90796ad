/**
 * Canonical names for stars whose designation varies between catalog revisions.
 *
 * The Grouper renames through {@link resolveAlias} exactly once per star; the
 * Assembler reads {@link forcedCompanions} to re-assert fixed memberships.
 * Neither renames a second time.
 *
 * @packageDocumentation
 */

/**
 * One alias rule.
 */
export interface AliasEntry {
  /** Any match renames the star. */
  readonly patterns: readonly RegExp[];
  readonly canonicalName: string;
  /** When set, the star is always a companion of this primary. */
  readonly primary?: string;
}

/**
 * Alias rules, first match wins.
 */
export const CANONICAL_ALIASES: readonly AliasEntry[] = [
  { patterns: [/^Sun$/i, /^Sol\b/], canonicalName: 'Sol' },
  { patterns: [/Rigil Kentaurus/i], canonicalName: 'Alpha Centauri A' },
  {
    patterns: [/Toliman/i],
    canonicalName: 'Alpha Centauri B',
    primary: 'Alpha Centauri A',
  },
  {
    patterns: [/Proxima.*Centauri/i, /V645 Cen/i, /^GJ 551$/i],
    canonicalName: 'Proxima Centauri',
    primary: 'Alpha Centauri A',
  },
];

/**
 * Result of looking a name up in the alias table.
 */
export interface AliasResolution {
  readonly name: string;
  /** Forced primary, when the alias fixes one. */
  readonly primary: string | undefined;
  /** True when a rule matched. */
  readonly aliased: boolean;
}

/**
 * Resolves a cleaned star name to its canonical form.
 *
 * @param name - Cleaned star name.
 * @param table - Alias rules.
 * @returns The canonical name and forced primary, if any.
 *
 * @example
 * ```typescript
 * resolveAlias('Rigil Kentaurus (A)').name; // "Alpha Centauri A"
 * resolveAlias('Proxima Centauri (C, V645 Centauri)').primary; // "Alpha Centauri A"
 * resolveAlias('Wolf 359').aliased; // false
 * ```
 */
export function resolveAlias(
  name: string,
  table: readonly AliasEntry[] = CANONICAL_ALIASES
): AliasResolution {
  for (const entry of table) {
    if (entry.patterns.some((pattern) => pattern.test(name))) {
      return { name: entry.canonicalName, primary: entry.primary, aliased: true };
    }
  }
  return { name, primary: undefined, aliased: false };
}

/**
 * Companion memberships fixed by the alias table.
 *
 * @param table - Alias rules.
 * @returns Canonical companion name to primary name.
 */
export function forcedCompanions(
  table: readonly AliasEntry[] = CANONICAL_ALIASES
): ReadonlyMap<string, string> {
  const forced = new Map<string, string>();
  for (const entry of table) {
    if (entry.primary !== undefined && entry.primary !== entry.canonicalName) {
      forced.set(entry.canonicalName, entry.primary);
    }
  }
  return forced;
}
