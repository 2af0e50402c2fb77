/**
 * annotation-source.ts
 * Lookup of route-family annotations on controller classes and methods.
 */

import type { RouteAnnotation, RouteAnnotationKind } from '../models/annotations.js';
import type { MethodDescriptor } from '../models/controllers.js';

export interface AnnotationSource {
  /** First class-level annotation of `kind` on the type with the given id. */
  getClassAnnotation(type: string, kind: RouteAnnotationKind): RouteAnnotation | null;
  /** First method-level annotation of `kind`. */
  getMethodAnnotation(method: MethodDescriptor, kind: RouteAnnotationKind): RouteAnnotation | null;
  /** Every method-level annotation, in declaration order. */
  getMethodAnnotations(method: MethodDescriptor): RouteAnnotation[];
}

/**
 * Serves annotations recorded on descriptors. Class annotations are keyed by
 * declaring-type id so inherited methods resolve against their declaring class.
 */
export class DescriptorAnnotationSource implements AnnotationSource {
  private readonly _classAnnotations: ReadonlyMap<string, readonly RouteAnnotation[]>;

  constructor(classAnnotations: Record<string, RouteAnnotation[]> = {}) {
    this._classAnnotations = new Map(Object.entries(classAnnotations));
  }

  getClassAnnotation(type: string, kind: RouteAnnotationKind): RouteAnnotation | null {
    return this._classAnnotations.get(type)?.find((a) => a.kind === kind) ?? null;
  }

  getMethodAnnotation(method: MethodDescriptor, kind: RouteAnnotationKind): RouteAnnotation | null {
    return method.annotations.find((a) => a.kind === kind) ?? null;
  }

  getMethodAnnotations(method: MethodDescriptor): RouteAnnotation[] {
    return [...method.annotations];
  }
}
