/**
 * route-collection.ts
 * Named, insertion-ordered route storage written by ActionRouteDeriver.
 *
 * Names are unique: adding a name twice throws DuplicateRouteError.
 * Callers that want "add if absent" check `get()` first.
 */

import type { NamedRoute, RouteDraft } from '../models/routes.js';

export interface RouteCollection {
  add(name: string, route: RouteDraft): void;
  get(name: string): RouteDraft | null;
  /** Record the singular resource name of the controller being scanned. */
  setSingularName(name: string): void;
}

export class RestRouteCollection implements RouteCollection {
  private readonly _routes = new Map<string, RouteDraft>();
  private _singularName: string | null = null;

  add(name: string, route: RouteDraft): void {
    if (this._routes.has(name)) {
      throw new DuplicateRouteError(name, route.path);
    }
    this._routes.set(name, route);
  }

  get(name: string): RouteDraft | null {
    return this._routes.get(name) ?? null;
  }

  has(name: string): boolean {
    return this._routes.has(name);
  }

  setSingularName(name: string): void {
    this._singularName = name;
  }

  getSingularName(): string | null {
    return this._singularName;
  }

  get size(): number {
    return this._routes.size;
  }

  /** Route names in insertion order. */
  names(): string[] {
    return [...this._routes.keys()];
  }

  /** Named copies of every route, in insertion order. */
  routes(): NamedRoute[] {
    return [...this._routes].map(([name, route]) => ({ name, ...cloneRoute(route) }));
  }

  /** Append every route of `other`; fails on the first name clash. */
  addCollection(other: RestRouteCollection): void {
    for (const name of other.names()) {
      const route = other.get(name);
      if (route !== null) this.add(name, route);
    }
  }
}

/** Deep copy of a draft; maps and arrays are never shared. */
export function cloneRoute(route: RouteDraft): RouteDraft {
  return {
    path: route.path,
    defaults: { ...route.defaults },
    requirements: { ...route.requirements },
    options: { ...route.options },
    host: route.host,
    schemes: [...route.schemes],
    methods: [...route.methods],
    condition: route.condition,
  };
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class DuplicateRouteError extends Error {
  readonly routeName: string;

  constructor(routeName: string, path: string) {
    super(`Route "${routeName}" is already registered (while adding path "${path}").`);
    this.name = 'DuplicateRouteError';
    this.routeName = routeName;
  }
}
