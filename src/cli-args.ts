/**
 * cli-args.ts
 * Parses the convention-routes command line into a ScanConfig.
 *
 * Positional: <projectRoot> <tsConfigPath> [outputFile]
 * Flags:
 *   --route-prefix=<segment>   path segment after the parent chain
 *   --name-prefix=<prefix>     prepended to every route name
 *   --api-version=<version>    version matched by route conditions
 *   --include-format           append ".{_format}" to every path
 *   --formats=json,xml         format keys constraining {_format}
 *   --no-pluralize             keep collection resources singular
 *   --debug                    debug-level logs, mirrored to a log file
 */

import * as path from 'node:path';
import type { RouteSettings, ScanConfig } from './models/scan-config.js';

const MEDIA_TYPES: Readonly<Record<string, string>> = {
  json: 'application/json',
  xml: 'text/xml',
  html: 'text/html',
  csv: 'text/csv',
  yaml: 'application/x-yaml',
};

export interface CliArgs {
  cfg: ScanConfig;
  /** Absolute path of the JSON manifest, when requested. */
  outputFile: string | null;
  debug: boolean;
}

/**
 * Parse `process.argv.slice(2)`. Returns null when a required positional
 * argument is missing.
 *
 * @throws Error on an unknown flag.
 */
export function parseCliArgs(rawArgs: readonly string[]): CliArgs | null {
  const positional = rawArgs.filter((a) => !a.startsWith('--'));
  const [projectRoot, tsConfigPath, outputFile] = positional;
  if (projectRoot === undefined || tsConfigPath === undefined) return null;

  const routes: RouteSettings = {};
  let debug = false;

  for (const arg of rawArgs.filter((a) => a.startsWith('--'))) {
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? '' : arg.slice(eq + 1);

    switch (flag) {
      case '--route-prefix':
        routes.routePrefix = value;
        break;
      case '--name-prefix':
        routes.namePrefix = value;
        break;
      case '--api-version':
        routes.version = value;
        break;
      case '--include-format':
        routes.includeFormat = true;
        break;
      case '--formats':
        routes.formats = parseFormats(value);
        break;
      case '--no-pluralize':
        routes.pluralize = false;
        break;
      case '--debug':
        debug = true;
        break;
      default:
        throw new Error(`Unknown flag "${flag}"`);
    }
  }

  const resolvedProjectRoot = path.resolve(projectRoot);
  return {
    cfg: {
      projectRoot: resolvedProjectRoot,
      tsConfigPath: path.isAbsolute(tsConfigPath)
        ? tsConfigPath
        : path.resolve(resolvedProjectRoot, tsConfigPath),
      routes,
    },
    outputFile: outputFile !== undefined ? path.resolve(outputFile) : null,
    debug,
  };
}

/** "json,xml" → { json: 'application/json', xml: 'text/xml' } */
export function parseFormats(list: string): Record<string, string> {
  const formats: Record<string, string> = {};
  for (const key of list.split(',').map((k) => k.trim()).filter((k) => k !== '')) {
    formats[key] = MEDIA_TYPES[key] ?? `application/${key}`;
  }
  return formats;
}
