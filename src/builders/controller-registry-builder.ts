/**
 * controller-registry-builder.ts
 * Builds ControllerRegistry by scanning source files for controller classes.
 *
 * Deterministic order: files sorted by path, controllers sorted by id.
 *
 * Prohibited:
 *   - Route derivation
 *   - Any reference to an HTTP framework at runtime
 */

import type { Project } from 'ts-morph';
import type { RouteAnnotation } from '../models/annotations.js';
import type { ControllerDescriptor, ControllerRegistry } from '../models/controllers.js';
import { ControllerParser } from '../parsers/controllers/controller-parser.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export class ControllerRegistryBuilder {
  private readonly _log: Logger;

  constructor(logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  build(project: Project): ControllerRegistry {
    const controllers: ControllerDescriptor[] = [];
    const classAnnotations: Record<string, RouteAnnotation[]> = {};

    const sourceFiles = [...project.getSourceFiles()].sort((a, b) =>
      a.getFilePath().localeCompare(b.getFilePath()),
    );

    for (const sourceFile of sourceFiles) {
      const filePath = sourceFile.getFilePath();

      // Exclude test-only and declaration files.
      if (
        filePath.endsWith('.spec.ts') ||
        filePath.endsWith('.test.ts') ||
        filePath.endsWith('.d.ts') ||
        filePath.includes('/__tests__/') ||
        filePath.includes('/node_modules/')
      ) continue;

      for (const parsed of ControllerParser.extractControllersFromSourceFile(sourceFile)) {
        controllers.push(parsed.descriptor);
        Object.assign(classAnnotations, parsed.classAnnotations);
        this._log.debug('Controller parsed', {
          class: parsed.descriptor.className,
          file: filePath,
          methods: parsed.descriptor.methods.length,
        });
      }
    }

    controllers.sort((a, b) => a.id.localeCompare(b.id));

    const byId: Record<string, ControllerDescriptor> = {};
    for (const controller of controllers) byId[controller.id] = controller;

    return { controllers, byId, classAnnotations };
  }
}
