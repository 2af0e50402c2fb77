/**
 * deriver-config.ts
 * Immutable per-scan configuration for ActionRouteDeriver.
 *
 * One DeriverConfig is built per controller scan and passed into every
 * derivation call; nothing mutates it afterwards.
 */

import type { RouteSettings } from '../models/scan-config.js';

export interface DeriverConfig {
  readonly routePrefix: string;
  readonly namePrefix: string;
  readonly version: string | null;
  /** `false` disables the inflector; `true` and `null` both pluralize. */
  readonly pluralize: boolean | null;
  /** Ancestor resource names for nested routing, outermost first. */
  readonly parents: readonly string[];
  readonly includeFormat: boolean;
  readonly formats: Readonly<Record<string, string>>;
}

export interface DeriverConfigInput {
  routePrefix?: string | null;
  namePrefix?: string | null;
  version?: string | null;
  pluralize?: boolean | null;
  parents?: readonly string[];
  includeFormat?: boolean;
  formats?: Readonly<Record<string, string>>;
}

/** Fill defaults and freeze. Parents are copied, not aliased. */
export function createDeriverConfig(input: DeriverConfigInput = {}): DeriverConfig {
  return Object.freeze({
    routePrefix: input.routePrefix ?? '',
    namePrefix: input.namePrefix ?? '',
    version: input.version ?? null,
    pluralize: input.pluralize ?? null,
    parents: Object.freeze([...(input.parents ?? [])]),
    includeFormat: input.includeFormat ?? false,
    formats: Object.freeze({ ...(input.formats ?? {}) }),
  });
}

/** Project-wide scan settings to deriver input. */
export function fromRouteSettings(settings: RouteSettings = {}): DeriverConfigInput {
  return {
    routePrefix: settings.routePrefix ?? null,
    namePrefix: settings.namePrefix ?? null,
    version: settings.version ?? null,
    pluralize: settings.pluralize ?? null,
    includeFormat: settings.includeFormat ?? false,
    formats: settings.formats ?? {},
  };
}

/**
 * Every parent must be non-empty and must not end in "/".
 * Throws ConfigurationError on the first offender.
 */
export function assertValidParents(parents: readonly string[]): void {
  for (const parent of parents) {
    if (parent === '' || parent.endsWith('/')) {
      throw new ConfigurationError(
        'Every parent controller must have a `get{SINGULAR}Action(id)` method\n' +
        'where {SINGULAR} is a singular form of the associated object ' +
        `(got parent "${parent}").`,
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
