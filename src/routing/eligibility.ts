/**
 * eligibility.ts
 * Decides whether a controller method produces routes at all.
 *
 * Rules, in order:
 *   1. Names starting with "_" are internal.
 *   2. A method-level @NoRoute always excludes.
 *   3. A class-level @NoRoute excludes unless the method declares a route
 *      explicitly (@Route, @Get, ...).
 */

import { ROUTE_ANNOTATION_ORDER } from '../models/annotations.js';
import type { MethodDescriptor } from '../models/controllers.js';
import type { AnnotationSource } from '../services/annotation-source.js';

export type IneligibilityReason = 'internal-name' | 'no-route-method' | 'no-route-class';

/** Why the method is excluded, or null when it is eligible. */
export function ineligibilityReason(
  method: MethodDescriptor,
  source: AnnotationSource,
): IneligibilityReason | null {
  if (method.name.startsWith('_')) return 'internal-name';

  if (source.getMethodAnnotation(method, 'NoRoute') !== null) return 'no-route-method';

  if (source.getClassAnnotation(method.declaringType, 'NoRoute') === null) return null;

  const declaresRoute = ROUTE_ANNOTATION_ORDER.some(
    (kind) => source.getMethodAnnotation(method, kind) !== null,
  );
  return declaresRoute ? null : 'no-route-class';
}

export function isEligible(method: MethodDescriptor, source: AnnotationSource): boolean {
  return ineligibilityReason(method, source) === null;
}
