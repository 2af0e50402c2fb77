/**
 * models/index.ts
 * Barrel export for the route model package.
 */

export type { Origin } from './origin.js';

export type {
  RouteValue,
  VerbAnnotationKind,
  RouteAnnotationKind,
  RouteAnnotation,
  ParamBindingKind,
  ParamBinding,
} from './annotations.js';

export {
  ROUTE_ANNOTATION_ORDER,
  ANNOTATION_VERBS,
  createRouteAnnotation,
  isVerbAnnotationKind,
} from './annotations.js';

export type {
  ParameterDescriptor,
  MethodDescriptor,
  ResourceDeclaration,
  ControllerDescriptor,
  ControllerRegistry,
} from './controllers.js';

export type {
  ParsedAction,
  RouteDraft,
  NamedRoute,
  RouteManifest,
} from './routes.js';

export type { RouteSettings, ScanConfig } from './scan-config.js';
