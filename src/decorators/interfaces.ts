/**
 * interfaces.ts
 * Option shapes accepted by the route decorators.
 *
 * Only literal values are read by the scanner; computed values are ignored.
 */

export type RouteOptionValue = string | number | boolean | null;

export interface RouteDecoratorOptions {
  path?: string;
  host?: string;
  schemes?: string | string[];
  /** Generic `@Route` only; verb decorators imply their own method. */
  methods?: string | string[];
  requirements?: Record<string, string>;
  /** `method_prefix: false` makes `name` replace the convention name. */
  options?: Record<string, RouteOptionValue>;
  defaults?: Record<string, RouteOptionValue>;
  condition?: string;
  name?: string;
}

export interface RouteResourceOptions {
  /** `false` keeps collection resources singular. */
  pluralize?: boolean;
}

export interface ParamBindingOptions {
  /** Request key, when it differs from the parameter name. */
  name?: string;
}

/**
 * Marker interface: a controller implementing it takes its resource name
 * from its class name ("BlogPostController" → "BlogPost").
 */
export interface ClassResource {}
