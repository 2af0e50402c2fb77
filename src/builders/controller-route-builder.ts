/**
 * controller-route-builder.ts
 * Builds the route collection of one controller.
 *
 * Per controller:
 *   1. Merge project-wide route settings with the class decorators
 *      (@Prefix, @NamePrefix, @Version, @ParentResource, @RouteResource)
 *   2. Resolve the seed resource list
 *   3. Pass every method to ActionRouteDeriver
 *
 * Precedence for the seed: @RouteResource, then the class name when the
 * controller implements ClassResource, else no seed.
 */

import type { ControllerDescriptor } from '../models/controllers.js';
import type { RouteSettings } from '../models/scan-config.js';
import type { ActionRouteDeriver } from '../routing/action-route-deriver.js';
import { splitPascalCase } from '../routing/action-name-parser.js';
import { ConfigurationError, createDeriverConfig, fromRouteSettings } from '../routing/deriver-config.js';
import type { DeriverConfig } from '../routing/deriver-config.js';
import { RestRouteCollection } from '../routing/route-collection.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

const CONTROLLER_SUFFIX = 'Controller';

export class ControllerRouteBuilder {
  private readonly _deriver: ActionRouteDeriver;
  private readonly _settings: RouteSettings;
  private readonly _log: Logger;

  constructor(deriver: ActionRouteDeriver, settings: RouteSettings = {}, logger?: Logger) {
    this._deriver = deriver;
    this._settings = settings;
    this._log = logger ?? new SilentLogger();
  }

  /** Derive every route of `controller` into a fresh collection. */
  build(controller: ControllerDescriptor): RestRouteCollection {
    const config = this.configFor(controller);
    const resource = ControllerRouteBuilder.resourceFor(controller);
    const collection = new RestRouteCollection();

    for (const method of controller.methods) {
      this._deriver.read(collection, method, resource, config);
    }

    this._log.debug('Controller routes built', {
      class: controller.className,
      resource,
      routes: collection.size,
    });
    return collection;
  }

  /** Project settings overridden by the controller's class decorators. */
  configFor(controller: ControllerDescriptor): DeriverConfig {
    const base = fromRouteSettings(this._settings);
    return createDeriverConfig({
      ...base,
      routePrefix: controller.prefix ?? base.routePrefix ?? null,
      namePrefix: controller.namePrefix ?? base.namePrefix ?? null,
      version: controller.version ?? base.version ?? null,
      pluralize: controller.resource?.pluralize ?? base.pluralize ?? null,
      parents: controller.parents,
    });
  }

  /**
   * Seed resource names of a controller.
   *
   * @throws ConfigurationError when a ClassResource controller's name yields
   *   no resource, e.g. a class named just "Controller".
   */
  static resourceFor(controller: ControllerDescriptor): string[] {
    if (controller.resource !== null) {
      return controller.resource.name.split('_').filter((part) => part !== '');
    }
    if (!controller.classResource) return [];

    const { className } = controller;
    const stem = className.endsWith(CONTROLLER_SUFFIX)
      ? className.slice(0, -CONTROLLER_SUFFIX.length)
      : className;
    const resource = splitPascalCase(stem);
    if (resource.length === 0) {
      throw new ConfigurationError(
        `Resource name of "${className}" cannot be derived from its class name; ` +
        'add @RouteResource to name it.',
      );
    }
    return resource;
  }
}
