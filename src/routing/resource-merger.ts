/**
 * resource-merger.ts
 * Routable argument selection and parent-chain merging.
 */

import type { MethodDescriptor, ParameterDescriptor } from '../models/controllers.js';
import type { ParamReader } from '../services/param-reader.js';

/** Answers "is this parameter filled by the framework, not by the URL?". */
export type InjectedTypePredicate = (param: ParameterDescriptor) => boolean;

/** Request abstraction, param fetcher, validation errors, param converter. */
export const DEFAULT_INJECTED_TYPES: readonly string[] = [
  'Request',
  'ParamFetcher',
  'ConstraintViolationList',
  'ParamConverter',
] as const;

/**
 * Predicate matching parameters whose declared type, or any ancestor of it,
 * is one of `typeNames`.
 */
export function createInjectedTypePredicate(
  typeNames: readonly string[] = DEFAULT_INJECTED_TYPES,
): InjectedTypePredicate {
  const excluded = new Set(typeNames);
  return (param) => {
    if (param.typeName === null) return false;
    if (excluded.has(param.typeName)) return true;
    return param.typeAncestors.some((ancestor) => excluded.has(ancestor));
  };
}

/**
 * Parameters that map to path placeholders, in declaration order:
 * everything except query/request-bound and framework-injected parameters.
 */
export function selectRoutableArguments(
  method: MethodDescriptor,
  paramReader: ParamReader,
  isInjectedType: InjectedTypePredicate,
): ParameterDescriptor[] {
  const bound = paramReader.getParamsFromMethod(method);
  return method.parameters.filter((param) => !bound.has(param.name) && !isInjectedType(param));
}

/**
 * Prepend the parent chain. An empty result becomes a single null entry, the
 * anonymous root resource.
 */
export function mergeResources(
  resources: ReadonlyArray<string | null>,
  parents: readonly string[],
): Array<string | null> {
  const merged: Array<string | null> = [...parents, ...resources];
  if (merged.length === 0) merged.push(null);
  return merged;
}
