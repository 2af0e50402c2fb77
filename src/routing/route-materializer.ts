/**
 * route-materializer.ts
 * Turns convention output, optionally overlaid by one route annotation, into
 * a RouteDraft. Every call returns a fresh draft; nothing is shared between
 * the drafts of one method.
 */

import {
  ANNOTATION_VERBS,
  ROUTE_ANNOTATION_ORDER,
  isVerbAnnotationKind,
} from '../models/annotations.js';
import type { RouteAnnotation } from '../models/annotations.js';
import type { MethodDescriptor } from '../models/controllers.js';
import type { RouteDraft } from '../models/routes.js';
import type { AnnotationSource } from '../services/annotation-source.js';
import type { DeriverConfig } from './deriver-config.js';
import { applyFormatSuffix, composeCondition } from './route-utils.js';

/** Convention-derived route data shared by every draft of a method. */
export interface RouteBase {
  /** Slash-joined convention path. */
  path: string;
  /** Dispatch target, "<Controller>::<method>". */
  controller: string;
  /** Lowercase dispatch verb; may hold "|"-joined alternatives. */
  httpMethod: string;
}

/**
 * Route-declaring annotations grouped in tag order (Route, Get, Post, ...).
 * NoRoute is never returned.
 */
export function collectRouteAnnotations(
  method: MethodDescriptor,
  source: AnnotationSource,
): RouteAnnotation[] {
  const all = source.getMethodAnnotations(method);
  const collected: RouteAnnotation[] = [];
  for (const kind of ROUTE_ANNOTATION_ORDER) {
    collected.push(...all.filter((annotation) => annotation.kind === kind));
  }
  return collected;
}

/** Draft for a method without route annotations. */
export function materializeConventionDraft(base: RouteBase, config: DeriverConfig): RouteDraft {
  const { path, requirements } = applyFormatSuffix(
    base.path,
    {},
    config.includeFormat,
    config.formats,
  );

  return {
    path,
    defaults: { _controller: base.controller },
    requirements,
    options: {},
    host: '',
    schemes: [],
    methods: splitMethods(base.httpMethod),
    condition: null,
  };
}

/**
 * Draft for one annotation layered over the convention:
 * explicit methods and path win, requirements/options/defaults merge on top,
 * host/schemes/condition come from the annotation.
 */
export function materializeDraft(
  base: RouteBase,
  annotation: RouteAnnotation,
  config: DeriverConfig,
): RouteDraft {
  const explicitMethods = annotationMethods(annotation);
  const methods = explicitMethods.length > 0
    ? explicitMethods.map((m) => m.toUpperCase())
    : splitMethods(base.httpMethod);

  const { path, requirements } = applyFormatSuffix(
    annotation.path !== null ? config.routePrefix + annotation.path : base.path,
    annotation.requirements,
    config.includeFormat,
    config.formats,
  );

  return {
    path,
    defaults: { _controller: base.controller, ...annotation.defaults },
    requirements,
    options: { ...annotation.options },
    host: annotation.host ?? '',
    schemes: [...annotation.schemes],
    methods,
    condition: composeCondition(annotation.condition, config.version),
  };
}

/** Verb tags imply their verb; the generic tag carries an explicit list. */
export function annotationMethods(annotation: RouteAnnotation): string[] {
  const { kind } = annotation;
  if (isVerbAnnotationKind(kind)) return [ANNOTATION_VERBS[kind]];
  return [...annotation.methods];
}

function splitMethods(httpMethod: string): string[] {
  return httpMethod.toUpperCase().split('|');
}
