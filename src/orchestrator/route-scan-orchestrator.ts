/**
 * route-scan-orchestrator.ts
 * Single entry-point for a complete route scan of a controller project.
 *
 * Pipeline order:
 *   1. TsProjectBuilder.build(cfg)
 *   2. ControllerRegistryBuilder.build(project)
 *   3. ControllerRouteBuilder.build(controller), one collection per controller
 *   4. Merge collections (duplicate names across controllers fail the scan)
 *   5. Assemble RouteManifest (routes + singular names + stats)
 *   6. RouteValidator.validate(manifest)
 *   7. Optional disk output
 *   8. Return manifest
 */

import type { ControllerRegistry } from '../models/controllers.js';
import type { RouteManifest } from '../models/routes.js';
import type { ScanConfig } from '../models/scan-config.js';
import { ControllerRegistryBuilder } from '../builders/controller-registry-builder.js';
import { ControllerRouteBuilder } from '../builders/controller-route-builder.js';
import { TsProjectBuilder } from '../builders/ts-project-builder.js';
import { ActionRouteDeriver } from '../routing/action-route-deriver.js';
import { RestRouteCollection } from '../routing/route-collection.js';
import { createInjectedTypePredicate } from '../routing/resource-merger.js';
import { DescriptorAnnotationSource } from '../services/annotation-source.js';
import { PluralizeInflector } from '../services/inflector.js';
import type { Inflector } from '../services/inflector.js';
import { BindingParamReader } from '../services/param-reader.js';
import { RouteExporter } from '../services/route-exporter.js';
import { RouteValidator } from '../services/route-validator.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface RouteScanOrchestratorOptions {
  outputPath?: string;
  skipValidation?: boolean;
  /** Defaults to PluralizeInflector. */
  inflector?: Inflector;
  logger?: Logger;
}

export class RouteScanOrchestrator {
  private readonly _cfg: ScanConfig;
  private readonly _options: RouteScanOrchestratorOptions;
  private readonly _log: Logger;

  constructor(cfg: ScanConfig, options: RouteScanOrchestratorOptions = {}) {
    this._cfg = cfg;
    this._options = options;
    this._log = options.logger ?? new SilentLogger();
  }

  run(): RouteManifest {
    this._log.info('Route scan starting');

    // Step 1: Project
    this._log.info('Step 1/3  Building TypeScript project', { tsConfigPath: this._cfg.tsConfigPath });
    const project = TsProjectBuilder.build(this._cfg);
    this._log.info('Step 1/3  Done', { sourceFiles: project.getSourceFiles().length });

    // Step 2: Controller registry
    this._log.info('Step 2/3  Building controller registry');
    const registry = new ControllerRegistryBuilder(this._log).build(project);
    this._log.info('Step 2/3  Done', { controllers: registry.controllers.length });

    // Step 3: Routes
    this._log.info('Step 3/3  Deriving routes');
    const manifest = this.deriveManifest(registry);
    this._log.info('Step 3/3  Done', { routes: manifest.stats.routeCount });

    if (this._options.skipValidation !== true) {
      this._log.info('Validating route manifest');
      RouteValidator.validate(manifest, this._cfg.routes);
      this._log.info('Validation passed');
    }

    if (this._options.outputPath !== undefined) {
      this._log.info('Writing route manifest JSON', { path: this._options.outputPath });
      RouteExporter.writeToFile(manifest, this._options.outputPath);
      this._log.info('Route manifest JSON written');
    }

    this._log.info('Route scan complete');
    return manifest;
  }

  /** Derive and merge the routes of every controller in a registry. */
  deriveManifest(registry: ControllerRegistry): RouteManifest {
    const deriver = new ActionRouteDeriver({
      annotationSource: new DescriptorAnnotationSource(registry.classAnnotations),
      paramReader: new BindingParamReader(),
      inflector: this._options.inflector ?? new PluralizeInflector(),
      ...(this._cfg.injectedTypes !== undefined
        ? { isInjectedType: createInjectedTypePredicate(this._cfg.injectedTypes) }
        : {}),
      logger: this._log,
    });
    const routeBuilder = new ControllerRouteBuilder(deriver, this._cfg.routes, this._log);

    const merged = new RestRouteCollection();
    const singularNames: Record<string, string> = {};
    let methodCount = 0;

    for (const controller of registry.controllers) {
      const collection = routeBuilder.build(controller);
      merged.addCollection(collection);
      methodCount += controller.methods.length;

      const singular = collection.getSingularName();
      if (singular !== null) singularNames[controller.id] = singular;

      // Route audit log
      for (const name of collection.names()) {
        this._log.debug('  route', { name, controller: controller.className });
      }
    }

    const routes = merged.routes();
    return {
      routes,
      singularNames,
      stats: {
        controllerCount: registry.controllers.length,
        methodCount,
        routeCount: routes.length,
      },
    };
  }
}
