/**
 * Groups catalog rows into systems and derives companion-to-primary mappings.
 *
 * Rows arrive in file order. A row with a system name opens a new system and
 * closes the previous one; the open system's stars are mapped to its primary
 * when it closes or when {@link SystemGrouper.finish} is called.
 *
 * @packageDocumentation
 */

import { silentLogger, type LogSink } from '../utils/logger.js';
import { CANONICAL_ALIASES, resolveAlias, type AliasEntry } from './aliases.js';

/**
 * Bare component letters such as `A`, `B`, `Ab`, `Ca`.
 */
const LETTERED_DESIGNATION = /^[A-D][a-d]?$/;

/**
 * Values a system header supplies to member rows that leave them blank.
 */
export interface SystemFallbacks {
  /** Light-years, or `null` when the header had no usable distance. */
  readonly distance: number | null;
  /** Cleaned spectral class; empty when the header had none. */
  readonly spectralClass: string;
}

/**
 * State of the currently open system.
 */
export interface SystemContext extends SystemFallbacks {
  readonly systemName: string;
  /** Name of the current primary, once one has been seen. */
  primary: string | null;
  /** Accepted member star names in encounter order. */
  readonly members: string[];
}

/**
 * A star name after letter expansion and alias resolution.
 */
export interface ResolvedStarName {
  readonly name: string;
  /** Cleaned name as it appeared in the row. */
  readonly original: string;
  /** True when the row named a bare component letter. */
  readonly lettered: boolean;
  /** Forced primary from the alias table. */
  readonly forcedPrimary: string | undefined;
}

/**
 * Options for {@link SystemGrouper}.
 */
export interface SystemGrouperOptions {
  readonly aliases?: readonly AliasEntry[];
  readonly logger?: LogSink;
}

/**
 * Reports whether a cleaned name is a bare component letter.
 */
export function isLetteredDesignation(name: string): boolean {
  return LETTERED_DESIGNATION.test(name);
}

/**
 * State machine tracking the open system and accumulating companion mappings.
 *
 * @example
 * ```typescript
 * const grouper = new SystemGrouper();
 * grouper.openSystem('Alpha Centauri', { distance: 4.37, spectralClass: '' });
 * grouper.recordStar(grouper.resolveName('Alpha Centauri A'));
 * grouper.recordStar(grouper.resolveName('B'));
 * grouper.finish().get('Alpha Centauri B'); // "Alpha Centauri A"
 * ```
 */
export class SystemGrouper {
  private readonly aliases: readonly AliasEntry[];
  private readonly logger: LogSink;
  private readonly mapping = new Map<string, string>();
  private readonly forced = new Map<string, string>();
  private current: SystemContext | null = null;

  constructor(options: SystemGrouperOptions = {}) {
    this.aliases = options.aliases ?? CANONICAL_ALIASES;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * The open system, or `null` before the first header.
   */
  get context(): Readonly<SystemContext> | null {
    return this.current;
  }

  /**
   * Closes the open system, if any, and opens a new one.
   *
   * @param systemName - Cleaned, non-empty system name.
   * @param fallbacks - Values inherited by member rows.
   */
  openSystem(systemName: string, fallbacks: SystemFallbacks): void {
    this.closeSystem();
    this.current = {
      systemName,
      distance: fallbacks.distance,
      spectralClass: fallbacks.spectralClass,
      primary: null,
      members: [],
    };
  }

  /**
   * Expands component letters against the open system and applies aliases.
   *
   * @param cleanedName - Star name after text normalization; must be non-empty.
   * @returns The resolved name.
   */
  resolveName(cleanedName: string): ResolvedStarName {
    const lettered = isLetteredDesignation(cleanedName);
    const expanded =
      lettered && this.current !== null
        ? `${this.current.systemName} ${cleanedName}`
        : cleanedName;
    const alias = resolveAlias(expanded, this.aliases);

    if (alias.aliased) {
      this.logger.debug('star_alias_applied', { from: expanded, to: alias.name });
    }

    return {
      name: alias.name,
      original: cleanedName,
      lettered,
      forcedPrimary: alias.primary,
    };
  }

  /**
   * Records a star accepted into the catalog as a member of the open system.
   *
   * The first non-lettered star becomes the primary; a bare `A`, or any name
   * ending in ` A`, takes over as primary.
   *
   * @param star - Resolved name from {@link resolveName}.
   */
  recordStar(star: ResolvedStarName): void {
    if (star.forcedPrimary !== undefined && star.forcedPrimary !== star.name) {
      this.forced.set(star.name, star.forcedPrimary);
    }

    const system = this.current;
    if (system === null) {
      return;
    }

    system.members.push(star.name);

    const namesComponentA = star.original === 'A' || star.name.endsWith(' A');
    if (namesComponentA || (system.primary === null && !star.lettered)) {
      system.primary = star.name;
    }
  }

  /**
   * Closes the open system and returns every mapping collected so far.
   *
   * Alias-forced memberships override the per-system rule.
   *
   * @returns Companion name to primary name.
   */
  finish(): Map<string, string> {
    this.closeSystem();

    const result = new Map(this.mapping);
    for (const [companion, primary] of this.forced) {
      result.set(companion, primary);
    }
    return result;
  }

  private closeSystem(): void {
    const system = this.current;
    this.current = null;
    if (system === null || system.members.length === 0) {
      return;
    }

    const { primary } = system;
    if (primary === null) {
      this.logger.debug('system_without_primary', {
        system: system.systemName,
        members: system.members,
      });
      return;
    }

    for (const member of system.members) {
      if (member !== primary) {
        this.mapping.set(member, primary);
      }
    }
  }
}
