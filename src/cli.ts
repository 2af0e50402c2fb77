#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point for a route scan.
 *
 * Prints a summary and, when an output file is given, writes the
 * deterministic route manifest JSON there.
 *
 * Usage:
 *   npx tsx src/cli.ts <projectRoot> <tsConfigPath> [outputFile] [flags]
 */

import * as path from 'node:path';
import { parseCliArgs } from './cli-args.js';
import type { CliArgs } from './cli-args.js';
import { RouteScanOrchestrator } from './orchestrator/route-scan-orchestrator.js';
import { ConsoleLogger, TeeLogger } from './services/logger.js';

function usage(): never {
  console.error('Usage: convention-routes <projectRoot> <tsConfigPath> [outputFile] [flags]');
  console.error('');
  console.error('  projectRoot            path to the controller project root');
  console.error('  tsConfigPath           tsconfig file, relative to projectRoot or absolute');
  console.error('  outputFile             (optional) route manifest JSON destination');
  console.error('  --route-prefix=<seg>   path segment inserted after parent resources');
  console.error('  --name-prefix=<prefix> prepended to every route name');
  console.error('  --api-version=<v>      restrict annotated routes to one API version');
  console.error('  --include-format       append .{_format} to every path');
  console.error('  --formats=json,xml     allowed values of {_format}');
  console.error('  --no-pluralize         keep collection resources singular');
  console.error('  --debug                emit debug-level logs and write a log file');
  process.exit(1);
}

let args: CliArgs | null;
try {
  args = parseCliArgs(process.argv.slice(2));
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  usage();
}
if (args === null) usage();

const { cfg, outputFile, debug } = args;

console.log('Route scan starting…');
console.log(`  projectRoot : ${cfg.projectRoot}`);
console.log(`  tsConfigPath: ${cfg.tsConfigPath}`);
if (outputFile !== null) {
  console.log(`  output      : ${outputFile}`);
}
if (debug) {
  console.log('  debug       : on');
}

const t0 = Date.now();
const logger = debug ? new TeeLogger('debug') : new ConsoleLogger('warn');

try {
  const manifest = new RouteScanOrchestrator(cfg, {
    ...(outputFile !== null && { outputPath: outputFile }),
    logger,
  }).run();
  const elapsed = Date.now() - t0;

  const { stats } = manifest;
  console.log('');
  console.log('Route scan complete ✓');
  console.log(`  controllers : ${stats.controllerCount}`);
  console.log(`  methods     : ${stats.methodCount}`);
  console.log(`  routes      : ${stats.routeCount}`);
  console.log(`  elapsed     : ${elapsed} ms`);
  if (outputFile === null) {
    console.log('');
    for (const route of manifest.routes) {
      console.log(`  ${route.methods.join('|').padEnd(12)} /${route.path}  ${route.name}`);
    }
  }

  if (logger instanceof TeeLogger) {
    const subjectName = path.basename(cfg.projectRoot);
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    const logPath = path.join('logs', subjectName, timestamp, 'routes.log');
    logger.flush(path.resolve(logPath));
    console.log(`  log         : ${logPath}`);
  }

  process.exit(0);
} catch (err) {
  const elapsed = Date.now() - t0;
  console.error('');
  console.error(`Route scan FAILED after ${elapsed} ms`);
  console.error(err instanceof Error ? err.message : String(err));
  if (err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exit(1);
}
