import type { RouteDecoratorOptions } from './interfaces.js';

type MethodDecoratorFn = (target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor) => void;

/**
 * Route decorators carry no runtime behavior: routes are derived statically
 * from the decorated source by the scanner.
 */
function createRouteDecorator() {
  return function (_pathOrOptions?: string | RouteDecoratorOptions, _options?: RouteDecoratorOptions): MethodDecoratorFn {
    return (_target, _propertyKey, _descriptor) => {};
  };
}

export const Route = createRouteDecorator();
export const Get = createRouteDecorator();
export const Post = createRouteDecorator();
export const Put = createRouteDecorator();
export const Patch = createRouteDecorator();
export const Delete = createRouteDecorator();
export const Link = createRouteDecorator();
export const Unlink = createRouteDecorator();
export const Head = createRouteDecorator();
export const Options = createRouteDecorator();

/** Excludes a method, or a whole controller, from convention routing. */
export function NoRoute() {
  return (_target: object, _propertyKey?: string | symbol, _descriptor?: PropertyDescriptor): void => {};
}
