import type { ParamBindingOptions } from './interfaces.js';

type ParameterDecoratorFn = (target: object, propertyKey: string | symbol | undefined, parameterIndex: number) => void;

/** Binds a parameter to the query string; it never becomes a path placeholder. */
export function QueryParam(_nameOrOptions?: string | ParamBindingOptions): ParameterDecoratorFn {
  return (_target, _propertyKey, _parameterIndex) => {};
}

/** Binds a parameter to the request body; it never becomes a path placeholder. */
export function RequestParam(_nameOrOptions?: string | ParamBindingOptions): ParameterDecoratorFn {
  return (_target, _propertyKey, _parameterIndex) => {};
}
