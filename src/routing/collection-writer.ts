/**
 * collection-writer.ts
 * Names a draft and inserts it into the route collection.
 *
 * A collection action whose resource does not change when pluralized
 * ("sheep") cannot be told apart from its member route by name, so it is
 * registered twice: under the "c"-prefixed collection name, and under the
 * plain name unless something already holds it.
 */

import type { RouteAnnotation } from '../models/annotations.js';
import type { RouteDraft } from '../models/routes.js';
import type { Logger } from '../services/logger.js';
import { cloneRoute } from './route-collection.js';
import type { RouteCollection } from './route-collection.js';
import { COLLECTION_ROUTE_PREFIX } from './route-utils.js';

export interface WriteRouteOptions {
  namePrefix: string;
  isCollection: boolean;
  isInflectable: boolean;
  annotation: RouteAnnotation | null;
  logger: Logger;
}

/**
 * Apply an annotation's explicit name: it replaces the convention name when
 * `options.method_prefix` is false, and is appended to it otherwise.
 */
export function resolveRouteName(routeName: string, annotation: RouteAnnotation | null): string {
  if (annotation === null || annotation.name === null) return routeName;
  if (annotation.options['method_prefix'] === false) return annotation.name;
  return routeName + annotation.name;
}

/** Register the draft; returns the names actually written. */
export function writeRoute(
  collection: RouteCollection,
  routeName: string,
  route: RouteDraft,
  options: WriteRouteOptions,
): string[] {
  const name = resolveRouteName(routeName, options.annotation);
  const fullName = options.namePrefix + name;

  if (!options.isCollection || options.isInflectable) {
    collection.add(fullName, route);
    return [fullName];
  }

  const collectionName = options.namePrefix + COLLECTION_ROUTE_PREFIX + name;
  collection.add(collectionName, route);

  const occupant = collection.get(fullName);
  if (occupant === null) {
    collection.add(fullName, cloneRoute(route));
    return [collectionName, fullName];
  }

  const compatible =
    occupant.path === route.path && occupant.methods.join('|') === route.methods.join('|');
  if (compatible) {
    options.logger.debug('Collection alias already registered', { name: fullName });
  } else {
    options.logger.warn('Collection alias skipped: name held by a different route', {
      name: fullName,
      existingPath: occupant.path,
      existingMethods: occupant.methods,
      skippedPath: route.path,
      skippedMethods: route.methods,
    });
  }
  return [collectionName];
}
