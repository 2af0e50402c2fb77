/**
 * param-reader.ts
 * Lists method parameters already consumed by query-string or request-body
 * binding. Those parameters never become path placeholders.
 */

import type { MethodDescriptor } from '../models/controllers.js';

export interface ParamReader {
  getParamsFromMethod(method: MethodDescriptor): ReadonlySet<string>;
}

/** Reads `@QueryParam` / `@RequestParam` bindings recorded on the descriptor. */
export class BindingParamReader implements ParamReader {
  getParamsFromMethod(method: MethodDescriptor): ReadonlySet<string> {
    return new Set(method.paramBindings.map((binding) => binding.parameter));
  }
}
