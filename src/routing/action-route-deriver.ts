/**
 * action-route-deriver.ts
 * Derives routes for one controller method from its name, routable
 * arguments and route annotations, and writes them to a route collection.
 *
 * Pipeline per method:
 *   1. Parent-chain check (fatal for the whole controller scan)
 *   2. Eligibility (internal names, @NoRoute)
 *   3. Action-name parsing (verb, resources, collection semantics)
 *   4. Argument selection, singular-name recording, parent merge
 *   5. Route name + URL parts, custom-verb resolution
 *   6. One draft per annotation, or one convention draft
 *   7. Collection write with collection-alias handling
 *
 * Prohibited:
 *   - Source parsing (ControllerParser's job)
 *   - Class-level settings such as prefixes (ControllerRouteBuilder's job)
 */

import type { MethodDescriptor } from '../models/controllers.js';
import type { AnnotationSource } from '../services/annotation-source.js';
import type { Inflector } from '../services/inflector.js';
import type { ParamReader } from '../services/param-reader.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import { parseAction } from './action-name-parser.js';
import { writeRoute } from './collection-writer.js';
import { assertValidParents } from './deriver-config.js';
import type { DeriverConfig } from './deriver-config.js';
import { ineligibilityReason } from './eligibility.js';
import {
  createInjectedTypePredicate,
  mergeResources,
  selectRoutableArguments,
} from './resource-merger.js';
import type { InjectedTypePredicate } from './resource-merger.js';
import type { RouteCollection } from './route-collection.js';
import {
  collectRouteAnnotations,
  materializeConventionDraft,
  materializeDraft,
} from './route-materializer.js';
import type { RouteBase } from './route-materializer.js';
import { buildRouteName, buildUrlParts, isHttpMethod, resolveCustomVerb } from './route-utils.js';

export interface ActionRouteDeriverOptions {
  annotationSource: AnnotationSource;
  paramReader: ParamReader;
  inflector: Inflector;
  /** Defaults to the predicate over DEFAULT_INJECTED_TYPES. */
  isInjectedType?: InjectedTypePredicate;
  logger?: Logger;
}

export class ActionRouteDeriver {
  private readonly _annotations: AnnotationSource;
  private readonly _paramReader: ParamReader;
  private readonly _inflector: Inflector;
  private readonly _isInjectedType: InjectedTypePredicate;
  private readonly _log: Logger;

  constructor(options: ActionRouteDeriverOptions) {
    this._annotations = options.annotationSource;
    this._paramReader = options.paramReader;
    this._inflector = options.inflector;
    this._isInjectedType = options.isInjectedType ?? createInjectedTypePredicate();
    this._log = options.logger ?? new SilentLogger();
  }

  /**
   * Derive and register the routes of one method.
   *
   * @param resource - Seed resource names of the controller, e.g. ["post"].
   * @returns Names written to the collection, in write order.
   * @throws ConfigurationError when a configured parent is invalid.
   * @throws DuplicateRouteError when a derived name is already registered.
   */
  read(
    collection: RouteCollection,
    method: MethodDescriptor,
    resource: readonly string[],
    config: DeriverConfig,
  ): string[] {
    assertValidParents(config.parents);

    const reason = ineligibilityReason(method, this._annotations);
    if (reason !== null) {
      this._log.debug('Method skipped', { method: method.name, reason });
      return [];
    }

    const pluralize = (r: string): string => this._resourceName(r, config);
    const parsed = parseAction(method.name, resource, pluralize);
    if (parsed === null) {
      this._log.debug('Method skipped', { method: method.name, reason: 'not-an-action' });
      return [];
    }

    const args = selectRoutableArguments(method, this._paramReader, this._isInjectedType);

    // One resource acted on through one own argument: an object call, which
    // names the collection's singular form.
    const [only] = parsed.resources;
    if (
      parsed.resources.length === 1 &&
      only !== undefined &&
      only !== null &&
      args.length - config.parents.length === 1
    ) {
      collection.setSingularName(only);
    }

    const resources = mergeResources(parsed.resources, config.parents);
    let httpMethod = parsed.httpMethod;

    const routeName = (httpMethod + buildRouteName(resources)).toLowerCase();
    const urlParts = buildUrlParts(resources, args, httpMethod, {
      routePrefix: config.routePrefix,
      parentCount: config.parents.length,
      pluralize,
    });

    // Not an HTTP verb: a hypertext-driven transition, a custom member action
    // or a custom collection action, addressed by a trailing segment.
    if (!isHttpMethod(httpMethod)) {
      urlParts.push(httpMethod);
      httpMethod = resolveCustomVerb(httpMethod, resources, args);
    }

    const base: RouteBase = {
      path: urlParts.join('/'),
      controller: `${method.declaringClass}::${method.name}`,
      httpMethod,
    };
    const writeOptions = {
      namePrefix: config.namePrefix,
      isCollection: parsed.isCollection,
      isInflectable: parsed.isInflectable,
      logger: this._log,
    };

    const annotations = collectRouteAnnotations(method, this._annotations);
    const written: string[] = [];

    if (annotations.length === 0) {
      const route = materializeConventionDraft(base, config);
      written.push(...writeRoute(collection, routeName, route, { ...writeOptions, annotation: null }));
    } else {
      for (const annotation of annotations) {
        const route = materializeDraft(base, annotation, config);
        written.push(...writeRoute(collection, routeName, route, { ...writeOptions, annotation }));
      }
    }

    this._log.debug('Routes derived', { method: method.name, names: written });
    return written;
  }

  private _resourceName(resource: string, config: DeriverConfig): string {
    if (config.pluralize === false) return resource;
    return this._inflector.pluralize(resource);
  }
}
