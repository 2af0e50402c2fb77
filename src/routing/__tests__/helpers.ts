/**
 * helpers.ts
 * Hand-built descriptors and collaborators shared by the routing tests.
 */

import { createRouteAnnotation } from '../../models/annotations.js';
import type { ParamBinding, RouteAnnotation, RouteAnnotationKind } from '../../models/annotations.js';
import type { MethodDescriptor, ParameterDescriptor } from '../../models/controllers.js';
import { DescriptorAnnotationSource } from '../../services/annotation-source.js';
import type { Inflector } from '../../services/inflector.js';
import { BindingParamReader } from '../../services/param-reader.js';
import { ActionRouteDeriver } from '../action-route-deriver.js';
import type { Logger } from '../../services/logger.js';

/** "post" → "posts"; nouns ending in "sheep" stay as they are. */
export const suffixInflector: Inflector = {
  pluralize: (word) => (word.toLowerCase().endsWith('sheep') ? word : `${word}s`),
};

export function param(name: string, typeName: string | null = null, typeAncestors: string[] = []): ParameterDescriptor {
  return { name, typeName, typeAncestors };
}

export interface MethodOverrides {
  declaringType?: string;
  declaringClass?: string;
  annotations?: RouteAnnotation[];
  paramBindings?: ParamBinding[];
}

export function method(
  name: string,
  parameters: ParameterDescriptor[] = [],
  overrides: MethodOverrides = {},
): MethodDescriptor {
  return {
    name,
    declaringType: overrides.declaringType ?? 'PostController',
    declaringClass: overrides.declaringClass ?? overrides.declaringType ?? 'PostController',
    parameters,
    annotations: overrides.annotations ?? [],
    paramBindings: overrides.paramBindings ?? [],
  };
}

export function annotation(
  kind: RouteAnnotationKind,
  fields: Partial<Omit<RouteAnnotation, 'kind'>> = {},
): RouteAnnotation {
  return createRouteAnnotation(kind, fields);
}

export function makeDeriver(
  classAnnotations: Record<string, RouteAnnotation[]> = {},
  logger?: Logger,
): ActionRouteDeriver {
  return new ActionRouteDeriver({
    annotationSource: new DescriptorAnnotationSource(classAnnotations),
    paramReader: new BindingParamReader(),
    inflector: suffixInflector,
    ...(logger !== undefined ? { logger } : {}),
  });
}
