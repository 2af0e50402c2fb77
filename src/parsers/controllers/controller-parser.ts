/**
 * controller-parser.ts
 * Extracts controller descriptors from TypeScript classes.
 *
 * A class is a controller when it is not abstract and either carries
 * @RestController or has a name ending in "Controller".
 *
 * Methods: public, non-static, own first, then inherited ones not overridden.
 * Parameters: declared type name plus every resolvable ancestor type, so
 * framework-injected types are recognized through subclasses.
 */

import { Node, Scope } from 'ts-morph';
import type {
  ClassDeclaration,
  ExpressionWithTypeArguments,
  MethodDeclaration,
  ParameterDeclaration,
  SourceFile,
} from 'ts-morph';
import type { ParamBinding, RouteAnnotation } from '../../models/annotations.js';
import type {
  ControllerDescriptor,
  MethodDescriptor,
  ParameterDescriptor,
} from '../../models/controllers.js';
import { TsAstUtils } from '../ts/ts-ast-utils.js';
import { AnnotationParser } from './annotation-parser.js';

/** Marker interface opting a controller into class-name resources. */
export const CLASS_RESOURCE_MARKER = 'ClassResource';

export interface ParsedController {
  descriptor: ControllerDescriptor;
  /**
   * Class-level route annotations of the controller and every base class
   * that declares one of its methods, keyed by "<file>#<className>".
   */
  classAnnotations: Record<string, RouteAnnotation[]>;
}

export class ControllerParser {
  static isController(classDecl: ClassDeclaration): boolean {
    if (classDecl.isAbstract()) return false;
    if (TsAstUtils.findDecorator(classDecl, 'RestController') !== null) return true;
    return (classDecl.getName() ?? '').endsWith('Controller');
  }

  /** Every controller declared in a source file, in declaration order. */
  static extractControllersFromSourceFile(sourceFile: SourceFile): ParsedController[] {
    return sourceFile
      .getClasses()
      .filter((classDecl) => ControllerParser.isController(classDecl))
      .map((classDecl) => ControllerParser.parseController(classDecl));
  }

  static parseController(classDecl: ClassDeclaration): ParsedController {
    const className = classDecl.getName() ?? 'AnonymousController';
    const settings = AnnotationParser.parseControllerDecorators(classDecl.getDecorators());

    const classAnnotations: Record<string, RouteAnnotation[]> = {};
    const methods: MethodDescriptor[] = [];
    const seenMethods = new Set<string>();

    for (const current of ControllerParser._classChain(classDecl)) {
      const currentName = current.getName() ?? className;
      const currentId = ControllerParser.classId(current, currentName);
      const annotations = current === classDecl
        ? settings.annotations
        : AnnotationParser.parseControllerDecorators(current.getDecorators()).annotations;
      classAnnotations[currentId] = annotations;

      for (const method of current.getMethods()) {
        const name = method.getName();
        if (seenMethods.has(name) || !ControllerParser._isPublicInstanceMethod(method)) continue;
        seenMethods.add(name);
        methods.push(ControllerParser.parseMethod(method, currentId, currentName));
      }
    }

    const descriptor: ControllerDescriptor = {
      id: ControllerParser.classId(classDecl, className),
      className,
      annotations: settings.annotations,
      resource: settings.resource,
      classResource: classDecl
        .getImplements()
        .some((impl) => TsAstUtils.bareTypeName(impl.getExpression().getText()) === CLASS_RESOURCE_MARKER),
      prefix: settings.prefix,
      namePrefix: settings.namePrefix,
      version: settings.version,
      parents: settings.parents,
      methods,
      origin: TsAstUtils.getOrigin(classDecl, className),
    };

    return { descriptor, classAnnotations };
  }

  /** "<file>#<className>", unique across files that reuse a class name. */
  static classId(classDecl: ClassDeclaration, className: string): string {
    return `${classDecl.getSourceFile().getFilePath()}#${className}`;
  }

  static parseMethod(
    method: MethodDeclaration,
    declaringType: string,
    declaringClass: string,
  ): MethodDescriptor {
    const annotations: RouteAnnotation[] = [];
    for (const decorator of method.getDecorators()) {
      const annotation = AnnotationParser.parseRouteDecorator(decorator);
      if (annotation !== null) annotations.push(annotation);
    }

    const paramBindings: ParamBinding[] = [];
    const parameters: ParameterDescriptor[] = [];
    for (const param of method.getParameters()) {
      parameters.push(ControllerParser.parseParameter(param));
      const binding = AnnotationParser.parseParamBinding(param);
      if (binding !== null) paramBindings.push(binding);
    }

    return {
      name: method.getName(),
      declaringType,
      declaringClass,
      parameters,
      annotations,
      paramBindings,
      origin: TsAstUtils.getOrigin(method, method.getName()),
    };
  }

  static parseParameter(param: ParameterDeclaration): ParameterDescriptor {
    const typeNode = param.getTypeNode();
    const typeName = typeNode !== undefined ? TsAstUtils.bareTypeName(typeNode.getText()) : null;

    const ancestors: string[] = [];
    const visited = new Set<Node>();
    for (const decl of param.getType().getSymbol()?.getDeclarations() ?? []) {
      ControllerParser._collectAncestors(decl, ancestors, visited);
    }

    return {
      name: param.getName(),
      typeName: typeName === '' ? null : typeName,
      typeAncestors: [...new Set(ancestors)],
    };
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private static _isPublicInstanceMethod(method: MethodDeclaration): boolean {
    if (method.isStatic()) return false;
    if (method.getName().startsWith('#')) return false;
    return method.getScope() === Scope.Public;
  }

  /** The class followed by its resolvable base classes, nearest first. */
  private static _classChain(classDecl: ClassDeclaration): ClassDeclaration[] {
    const chain: ClassDeclaration[] = [];
    let current: ClassDeclaration | undefined = classDecl;
    while (current !== undefined && !chain.includes(current)) {
      chain.push(current);
      current = current.getBaseClass();
    }
    return chain;
  }

  /** Depth-first walk of extends/implements clauses. */
  private static _collectAncestors(decl: Node, out: string[], visited: Set<Node>): void {
    if (visited.has(decl)) return;
    visited.add(decl);

    let heritage: ExpressionWithTypeArguments[] = [];
    if (Node.isClassDeclaration(decl)) {
      const ext = decl.getExtends();
      heritage = ext !== undefined ? [ext, ...decl.getImplements()] : decl.getImplements();
    } else if (Node.isInterfaceDeclaration(decl)) {
      heritage = decl.getExtends();
    }

    for (const clause of heritage) {
      out.push(TsAstUtils.bareTypeName(clause.getExpression().getText()));
      for (const next of clause.getType().getSymbol()?.getDeclarations() ?? []) {
        ControllerParser._collectAncestors(next, out, visited);
      }
    }
  }
}
