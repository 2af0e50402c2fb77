/**
 * route-exporter.ts
 * Serialize a RouteManifest to deterministic JSON.
 *
 * Constraints:
 * - JSON output must be stable: same manifest → identical bytes.
 * - Object keys are sorted recursively before stringification.
 * - Route order is the collection insertion order and is kept as is.
 * - Indentation: 2 spaces.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { RouteManifest } from '../models/routes.js';

export class RouteExporter {
  static toJson(manifest: RouteManifest): string {
    return JSON.stringify(manifest, RouteExporter._stableSortReplacer(), 2);
  }

  /**
   * Write the serialized manifest to a file, creating parent directories
   * as needed.
   */
  static writeToFile(manifest: RouteManifest, outPath: string): void {
    const resolved = path.resolve(outPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, RouteExporter.toJson(manifest), 'utf-8');
  }

  // ---------------------------------------------------------------------------
  // Stable sort replacer
  // ---------------------------------------------------------------------------

  /** JSON.stringify replacer that sorts object keys alphabetically. */
  private static _stableSortReplacer(): (key: string, value: unknown) => unknown {
    return (_key: string, value: unknown): unknown => {
      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        const entries: Array<[string, unknown]> = Object.entries(value);
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return Object.fromEntries(entries);
      }
      return value;
    };
  }
}
