import type { RouteResourceOptions } from './interfaces.js';

type ControllerDecoratorTarget = abstract new (...args: never[]) => object;

export function RestController() {
  return (_target: ControllerDecoratorTarget) => {};
}

/** Resource name for every action, underscore-separated for nesting: "blog_post". */
export function RouteResource(_resource: string, _options?: RouteResourceOptions) {
  return (_target: ControllerDecoratorTarget) => {};
}

export function Prefix(_prefix: string) {
  return (_target: ControllerDecoratorTarget) => {};
}

export function NamePrefix(_namePrefix: string) {
  return (_target: ControllerDecoratorTarget) => {};
}

export function Version(_version: string) {
  return (_target: ControllerDecoratorTarget) => {};
}

/** Repeatable; outermost parent first. */
export function ParentResource(_parent: string) {
  return (_target: ControllerDecoratorTarget) => {};
}
