/**
 * scan-config.ts
 * Configuration for one scan of a TypeScript controller project.
 */

/**
 * Project-wide route settings. Controller class decorators override
 * `routePrefix`, `namePrefix` and `version` per controller.
 */
export interface RouteSettings {
  /** Path segment inserted after the parent chain, e.g. "api". */
  routePrefix?: string;
  /** Prepended to every route name, e.g. "api_". */
  namePrefix?: string;
  /** API version matched against the `version` request attribute. */
  version?: string;
  /** `false` disables pluralization; `true` and unset both use the inflector. */
  pluralize?: boolean;
  /** Append `.{_format}` to every path. */
  includeFormat?: boolean;
  /** Known formats: key → media type, e.g. { json: 'application/json' }. */
  formats?: Record<string, string>;
}

/**
 * Scan configuration passed to the RouteScanOrchestrator.
 * All paths should be absolute or resolvable from `projectRoot`.
 */
export interface ScanConfig {
  /** Repository root directory. */
  projectRoot: string;
  /** Path to the tsconfig.json used by the TypeScript parser. */
  tsConfigPath: string;
  routes?: RouteSettings;
  /**
   * Parameter type names treated as framework-injected and never mapped to
   * path segments. Replaces the default list when set.
   */
  injectedTypes?: string[];
}
