/**
 * index.ts
 * Public API of convention-routes.
 */

export * from './models/index.js';
export * from './services/index.js';
export * from './builders/index.js';
export * from './orchestrator/index.js';

export { ActionRouteDeriver } from './routing/action-route-deriver.js';
export type { ActionRouteDeriverOptions } from './routing/action-route-deriver.js';
export { parseAction, splitPascalCase, tokenizeActionName } from './routing/action-name-parser.js';
export type { ActionNameTokens } from './routing/action-name-parser.js';
export {
  ConfigurationError,
  assertValidParents,
  createDeriverConfig,
  fromRouteSettings,
} from './routing/deriver-config.js';
export type { DeriverConfig, DeriverConfigInput } from './routing/deriver-config.js';
export { isEligible, ineligibilityReason } from './routing/eligibility.js';
export type { IneligibilityReason } from './routing/eligibility.js';
export {
  DEFAULT_INJECTED_TYPES,
  createInjectedTypePredicate,
  mergeResources,
  selectRoutableArguments,
} from './routing/resource-merger.js';
export type { InjectedTypePredicate } from './routing/resource-merger.js';
export { DuplicateRouteError, RestRouteCollection, cloneRoute } from './routing/route-collection.js';
export type { RouteCollection } from './routing/route-collection.js';
export { resolveRouteName, writeRoute } from './routing/collection-writer.js';
export { ControllerParser } from './parsers/controllers/controller-parser.js';
export { AnnotationParser } from './parsers/controllers/annotation-parser.js';
export * from './decorators/index.js';
