/**
 * annotations.ts
 * Declarative route annotations attached to controller methods and classes.
 *
 * The route family is a single tagged shape: the `kind` tag says which
 * decorator produced it, the payload is shared. `NoRoute` is part of the
 * family so one lookup API serves both exclusion and route declaration.
 */

// ---------------------------------------------------------------------------
// Shared value types
// ---------------------------------------------------------------------------

/** Scalar stored in route defaults and options. */
export type RouteValue = string | number | boolean | null;

// ---------------------------------------------------------------------------
// Route family
// ---------------------------------------------------------------------------

export type VerbAnnotationKind =
  | 'Get'
  | 'Post'
  | 'Put'
  | 'Patch'
  | 'Delete'
  | 'Link'
  | 'Unlink'
  | 'Head'
  | 'Options';

export type RouteAnnotationKind = 'Route' | VerbAnnotationKind | 'NoRoute';

/**
 * Collection order of route-declaring tags. `NoRoute` is absent: it never
 * declares a route.
 */
export const ROUTE_ANNOTATION_ORDER: readonly Exclude<RouteAnnotationKind, 'NoRoute'>[] = [
  'Route',
  'Get',
  'Post',
  'Put',
  'Patch',
  'Delete',
  'Link',
  'Unlink',
  'Head',
  'Options',
] as const;

/** HTTP method implied by each verb tag. */
export const ANNOTATION_VERBS: Readonly<Record<VerbAnnotationKind, string>> = {
  Get: 'GET',
  Post: 'POST',
  Put: 'PUT',
  Patch: 'PATCH',
  Delete: 'DELETE',
  Link: 'LINK',
  Unlink: 'UNLINK',
  Head: 'HEAD',
  Options: 'OPTIONS',
};

export interface RouteAnnotation {
  kind: RouteAnnotationKind;
  /** Explicit path; replaces the convention path when set. */
  path: string | null;
  host: string | null;
  schemes: string[];
  /** Explicit methods; only meaningful on the generic `Route` tag. */
  methods: string[];
  requirements: Record<string, string>;
  options: Record<string, RouteValue>;
  defaults: Record<string, RouteValue>;
  condition: string | null;
  /** Explicit name; appended to, or replacing, the convention name. */
  name: string | null;
}

// ---------------------------------------------------------------------------
// Parameter bindings
// ---------------------------------------------------------------------------

export type ParamBindingKind = 'QueryParam' | 'RequestParam';

/** A method parameter read from the query string or the request body. */
export interface ParamBinding {
  kind: ParamBindingKind;
  /** Name of the bound method parameter. */
  parameter: string;
  /** Request key, when it differs from the parameter name. */
  key: string | null;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build a route annotation with empty payload fields. */
export function createRouteAnnotation(
  kind: RouteAnnotationKind,
  fields: Partial<Omit<RouteAnnotation, 'kind'>> = {},
): RouteAnnotation {
  return {
    kind,
    path: fields.path ?? null,
    host: fields.host ?? null,
    schemes: fields.schemes ?? [],
    methods: fields.methods ?? [],
    requirements: fields.requirements ?? {},
    options: fields.options ?? {},
    defaults: fields.defaults ?? {},
    condition: fields.condition ?? null,
    name: fields.name ?? null,
  };
}

export function isVerbAnnotationKind(kind: RouteAnnotationKind): kind is VerbAnnotationKind {
  return kind !== 'Route' && kind !== 'NoRoute';
}
