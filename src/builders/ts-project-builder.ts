/**
 * ts-project-builder.ts
 * Creates the ts-morph Project deterministically from a ScanConfig.
 * Thin wrapper over TsProjectFactory; included as a builder for pipeline
 * uniformity.
 */

import * as path from 'node:path';
import type { Project } from 'ts-morph';
import type { ScanConfig } from '../models/scan-config.js';
import { TsProjectFactory } from '../parsers/ts/ts-project-factory.js';

export class TsProjectBuilder {
  /**
   * Build a ts-morph Project from the tsconfig path in `cfg`, resolved
   * against the project root when relative.
   */
  static build(cfg: ScanConfig): Project {
    return TsProjectFactory.create(path.resolve(cfg.projectRoot, cfg.tsConfigPath));
  }
}
