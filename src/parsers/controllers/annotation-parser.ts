/**
 * annotation-parser.ts
 * Reads route, controller and parameter decorators statically.
 *
 * Accepted route decorator shapes:
 *   @Get                          bare
 *   @Get()                        no arguments
 *   @Get('/path')                 path only
 *   @Get('/path', { ... })        path + options
 *   @Get({ path: '/path', ... })  options only
 *
 * Non-literal values (identifiers, calls, template expressions) are ignored;
 * decorators are never evaluated.
 */

import type { Decorator, Node, ParameterDeclaration } from 'ts-morph';
import { createRouteAnnotation } from '../../models/annotations.js';
import type {
  ParamBinding,
  ParamBindingKind,
  RouteAnnotation,
  RouteAnnotationKind,
} from '../../models/annotations.js';
import type { ResourceDeclaration } from '../../models/controllers.js';
import { TsAstUtils } from '../ts/ts-ast-utils.js';

const ROUTE_DECORATORS: ReadonlySet<string> = new Set<RouteAnnotationKind>([
  'Route', 'Get', 'Post', 'Put', 'Patch', 'Delete', 'Link', 'Unlink', 'Head', 'Options', 'NoRoute',
]);

const PARAM_DECORATORS: ReadonlySet<string> = new Set<ParamBindingKind>(['QueryParam', 'RequestParam']);

function isRouteKind(name: string): name is RouteAnnotationKind {
  return ROUTE_DECORATORS.has(name);
}

function isParamKind(name: string): name is ParamBindingKind {
  return PARAM_DECORATORS.has(name);
}

// ---------------------------------------------------------------------------
// Output type
// ---------------------------------------------------------------------------

/** Class-level settings read from controller decorators. */
export interface ControllerSettings {
  annotations: RouteAnnotation[];
  resource: ResourceDeclaration | null;
  prefix: string | null;
  namePrefix: string | null;
  version: string | null;
  parents: string[];
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export class AnnotationParser {
  /**
   * Route-family annotation for a method or class decorator, or null when
   * the decorator is not part of the route family.
   */
  static parseRouteDecorator(decorator: Decorator): RouteAnnotation | null {
    const kind = decorator.getName();
    if (!isRouteKind(kind)) return null;

    const [first, second] = TsAstUtils.getDecoratorArguments(decorator);
    const positionalPath = first !== undefined ? TsAstUtils.getStringLiteralValue(first) : null;
    const options = TsAstUtils.asObjectLiteral(first) ?? TsAstUtils.asObjectLiteral(second);

    const read = (key: string): Node | undefined =>
      options !== null ? TsAstUtils.getProperty(options, key) : undefined;
    const readString = (key: string): string | null => {
      const node = read(key);
      return node !== undefined ? TsAstUtils.getStringLiteralValue(node) : null;
    };
    const readList = (key: string): string[] => {
      const node = read(key);
      return node !== undefined ? TsAstUtils.getStringList(node) : [];
    };

    return createRouteAnnotation(kind, {
      path: positionalPath ?? readString('path'),
      host: readString('host'),
      schemes: readList('schemes'),
      methods: readList('methods'),
      requirements: TsAstUtils.getStringRecord(read('requirements')),
      options: TsAstUtils.getScalarRecord(read('options')),
      defaults: TsAstUtils.getScalarRecord(read('defaults')),
      condition: readString('condition'),
      name: readString('name'),
    });
  }

  /** Read class decorators into controller settings. */
  static parseControllerDecorators(decorators: Decorator[]): ControllerSettings {
    const settings: ControllerSettings = {
      annotations: [],
      resource: null,
      prefix: null,
      namePrefix: null,
      version: null,
      parents: [],
    };

    for (const decorator of decorators) {
      const name = decorator.getName();
      const args = TsAstUtils.getDecoratorArguments(decorator);
      const value = args[0] !== undefined ? TsAstUtils.getStringLiteralValue(args[0]) : null;

      switch (name) {
        case 'NoRoute': {
          const annotation = AnnotationParser.parseRouteDecorator(decorator);
          if (annotation !== null) settings.annotations.push(annotation);
          break;
        }
        case 'RouteResource':
          if (value !== null) {
            settings.resource = { name: value, pluralize: AnnotationParser._readPluralize(args[1]) };
          }
          break;
        case 'Prefix':
          settings.prefix = value;
          break;
        case 'NamePrefix':
          settings.namePrefix = value;
          break;
        case 'Version':
          settings.version = value;
          break;
        case 'ParentResource':
          if (value !== null) settings.parents.push(value);
          break;
        default:
          break;
      }
    }

    return settings;
  }

  /** Query/request binding declared on a parameter, or null. */
  static parseParamBinding(param: ParameterDeclaration): ParamBinding | null {
    for (const decorator of param.getDecorators()) {
      const kind = decorator.getName();
      if (!isParamKind(kind)) continue;

      const [first] = TsAstUtils.getDecoratorArguments(decorator);
      let key: string | null = null;
      if (first !== undefined) {
        const obj = TsAstUtils.asObjectLiteral(first);
        const keyNode = obj !== null ? TsAstUtils.getProperty(obj, 'name') : first;
        key = keyNode !== undefined ? TsAstUtils.getStringLiteralValue(keyNode) : null;
      }
      return { kind, parameter: param.getName(), key };
    }
    return null;
  }

  private static _readPluralize(node: Node | undefined): boolean | null {
    const options = TsAstUtils.asObjectLiteral(node);
    if (options === null) return null;
    const value = TsAstUtils.getProperty(options, 'pluralize');
    if (value === undefined) return null;
    const scalar = TsAstUtils.getScalarValue(value);
    return typeof scalar === 'boolean' ? scalar : null;
  }
}
