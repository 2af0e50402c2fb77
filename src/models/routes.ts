/**
 * routes.ts
 * Route shapes produced by the deriver.
 *
 * Path templates are slash-joined segments with `{name}` placeholders and no
 * leading slash, e.g. "posts/{slug}/comments".
 * Ordering: a RouteManifest keeps collection insertion order.
 */

import type { RouteValue } from './annotations.js';

// ---------------------------------------------------------------------------
// Transient derivation result
// ---------------------------------------------------------------------------

/** Verb and resource list read from an action method name. */
export interface ParsedAction {
  /** Lowercase verb token, e.g. "get", "new", or a custom verb. */
  httpMethod: string;
  /** Resource names; a single leading null stands for an anonymous root. */
  resources: Array<string | null>;
  isCollection: boolean;
  /** False when pluralizing the terminal seed resource left it unchanged. */
  isInflectable: boolean;
}

// ---------------------------------------------------------------------------
// Route draft
// ---------------------------------------------------------------------------

/** One fully assembled route, ready to be registered under a name. */
export interface RouteDraft {
  path: string;
  /** Always carries `_controller`. */
  defaults: Record<string, RouteValue>;
  requirements: Record<string, string>;
  options: Record<string, RouteValue>;
  host: string;
  schemes: string[];
  /** Upper-case HTTP methods. */
  methods: string[];
  condition: string | null;
}

// ---------------------------------------------------------------------------
// Manifest (scan output)
// ---------------------------------------------------------------------------

export interface NamedRoute extends RouteDraft {
  name: string;
}

export interface RouteManifest {
  routes: NamedRoute[];
  /** Singular names recorded per controller id. */
  singularNames: Record<string, string>;
  stats: {
    controllerCount: number;
    methodCount: number;
    routeCount: number;
  };
}
