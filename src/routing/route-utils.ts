/**
 * route-utils.ts
 * Pure helpers for route naming, URL part generation, custom-verb resolution,
 * format suffixes and condition composition. Used by ActionRouteDeriver.
 *
 * All functions are deterministic and side-effect-free.
 */

import type { ParameterDescriptor } from '../models/controllers.js';

// ---------------------------------------------------------------------------
// Verb tables
// ---------------------------------------------------------------------------

export const HTTP_METHODS: readonly string[] = [
  'get', 'post', 'put', 'patch', 'delete', 'link', 'unlink', 'head', 'options',
] as const;

/** Navigation affordances dispatched as GET. */
export const CONVENTIONAL_ACTIONS: readonly string[] = ['new', 'edit', 'remove'] as const;

/** Marks collection actions (`cget`) and collection alias route names. */
export const COLLECTION_ROUTE_PREFIX = 'c';

/** Reserved placeholder carrying the response format. */
export const FORMAT_PLACEHOLDER = '_format';

export function isHttpMethod(verb: string): boolean {
  return HTTP_METHODS.includes(verb);
}

export function isConventionalAction(verb: string): boolean {
  return CONVENTIONAL_ACTIONS.includes(verb);
}

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

/**
 * Last "/"-delimited component of a resource name. Trailing slashes are
 * ignored: "blog/post/" → "post".
 */
export function basename(resource: string): string {
  const trimmed = resource.replace(/\/+$/, '');
  const slash = trimmed.lastIndexOf('/');
  return slash === -1 ? trimmed : trimmed.slice(slash + 1);
}

/**
 * Route name suffix: "_" + basename for every named resource.
 * ["post", null, "comment"] → "_post_comment"
 */
export function buildRouteName(resources: ReadonlyArray<string | null>): string {
  let name = '';
  for (const resource of resources) {
    if (resource !== null) name += `_${basename(resource)}`;
  }
  return name;
}

// ---------------------------------------------------------------------------
// URL parts
// ---------------------------------------------------------------------------

export interface UrlPartOptions {
  routePrefix: string;
  parentCount: number;
  pluralize: (resource: string) => string;
}

/**
 * One path segment per resource, placeholders in argument order.
 *
 * - The route prefix is emitted as its own segment once the parent chain has
 *   been walked.
 * - A resource with an argument at the same index becomes "resource/{arg}".
 * - A resource without one is pluralized for creation and custom collection
 *   actions, and kept singular otherwise.
 */
export function buildUrlParts(
  resources: ReadonlyArray<string | null>,
  args: readonly ParameterDescriptor[],
  httpMethod: string,
  options: UrlPartOptions,
): string[] {
  const parts: string[] = [];

  resources.forEach((resource, i) => {
    if (options.routePrefix !== '' && i === options.parentCount) {
      parts.push(options.routePrefix);
    }

    const arg = args[i];
    if (arg !== undefined) {
      parts.push(resource !== null ? `${resource.toLowerCase()}/{${arg.name}}` : `{${arg.name}}`);
      return;
    }
    if (resource === null) return;

    if (
      (args.length === 0 && !isHttpMethod(httpMethod)) ||
      httpMethod === 'new' ||
      httpMethod === 'post'
    ) {
      parts.push(options.pluralize(resource.toLowerCase()));
    } else {
      parts.push(resource.toLowerCase());
    }
  });

  return parts;
}

/**
 * Extract `{placeholder}` names from a path template, in order of appearance.
 * "posts/{slug}/comments/{id}.{_format}" → ["slug", "id", "_format"]
 */
export function extractPlaceholders(path: string): string[] {
  const names: string[] = [];
  for (const match of path.matchAll(/\{([^}]+)\}/g)) {
    if (match[1] !== undefined) names.push(match[1]);
  }
  return names;
}

// ---------------------------------------------------------------------------
// Custom verbs
// ---------------------------------------------------------------------------

/**
 * Dispatch verb for a custom action:
 * conventional actions and collection actions are read-only (`get`);
 * a custom action on an identified member is a partial update (`patch`).
 */
export function resolveCustomVerb(
  verb: string,
  resources: ReadonlyArray<string | null>,
  args: readonly ParameterDescriptor[],
): string {
  if (isConventionalAction(verb)) return 'get';
  if (args.length < resources.length) return 'get';
  return 'patch';
}

// ---------------------------------------------------------------------------
// Format suffix
// ---------------------------------------------------------------------------

/**
 * Append ".{_format}" and, when formats are known and no requirement was
 * given, constrain the placeholder to the format keys.
 * Returns new values; inputs are not modified.
 */
export function applyFormatSuffix(
  path: string,
  requirements: Readonly<Record<string, string>>,
  includeFormat: boolean,
  formats: Readonly<Record<string, string>>,
): { path: string; requirements: Record<string, string> } {
  if (!includeFormat) return { path, requirements: { ...requirements } };

  const next = { ...requirements };
  const keys = Object.keys(formats);
  if (next[FORMAT_PLACEHOLDER] === undefined && keys.length > 0) {
    next[FORMAT_PLACEHOLDER] = keys.join('|');
  }
  return { path: `${path}.{${FORMAT_PLACEHOLDER}}`, requirements: next };
}

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

/** Expression matching the `version` request attribute. */
export function versionCondition(version: string): string {
  return `request.attributes.get('version') == '${version}'`;
}

/**
 * AND an annotation condition with the version predicate.
 * Without a version the condition is returned untouched.
 */
export function composeCondition(condition: string | null, version: string | null): string | null {
  if (version === null) return condition;
  const predicate = versionCondition(version);
  return condition !== null && condition !== '' ? `(${condition}) and ${predicate}` : predicate;
}
