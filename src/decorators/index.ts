export { Route, Get, Post, Put, Patch, Delete, Link, Unlink, Head, Options, NoRoute } from './method.decorator.js';
export { RestController, RouteResource, Prefix, NamePrefix, Version, ParentResource } from './class.decorator.js';
export { QueryParam, RequestParam } from './parameter.decorator.js';
export type {
  ClassResource,
  ParamBindingOptions,
  RouteDecoratorOptions,
  RouteOptionValue,
  RouteResourceOptions,
} from './interfaces.js';
