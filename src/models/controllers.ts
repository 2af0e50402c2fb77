/**
 * controllers.ts
 * Controller and method descriptors consumed by the route deriver.
 *
 * ID convention: ControllerDescriptor.id === "<file>#<className>" when parsed
 * from source; hand-built descriptors may use any stable string.
 * Ordering: controllers sorted by id, methods kept in declaration order.
 */

import type { Origin } from './origin.js';
import type { ParamBinding, RouteAnnotation } from './annotations.js';

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

export interface ParameterDescriptor {
  name: string;
  /** Declared type name without generics or namespace, null when untyped. */
  typeName: string | null;
  /**
   * Names of every ancestor of the declared type: base classes, implemented
   * and extended interfaces. Does not include `typeName` itself.
   */
  typeAncestors: string[];
}

// ---------------------------------------------------------------------------
// Methods
// ---------------------------------------------------------------------------

export interface MethodDescriptor {
  name: string;
  /**
   * Id of the class that declares the method, "<file>#<className>" when
   * parsed from source. Keys class-level annotation lookups.
   */
  declaringType: string;
  /** Bare name of the declaring class, used in `_controller`. */
  declaringClass: string;
  parameters: ParameterDescriptor[];
  /** Method-level route-family annotations, in declaration order. */
  annotations: RouteAnnotation[];
  /** Query/request parameter bindings declared on the method's parameters. */
  paramBindings: ParamBinding[];
  origin?: Origin;
}

// ---------------------------------------------------------------------------
// Controllers
// ---------------------------------------------------------------------------

/** `@RouteResource` payload. */
export interface ResourceDeclaration {
  /** Underscore-separated resource path, e.g. "blog_post". */
  name: string;
  pluralize: boolean | null;
}

export interface ControllerDescriptor {
  id: string;
  className: string;
  /** Class-level route-family annotations (in practice only `NoRoute`). */
  annotations: RouteAnnotation[];
  resource: ResourceDeclaration | null;
  /** True when the class implements the `ClassResource` marker interface. */
  classResource: boolean;
  prefix: string | null;
  namePrefix: string | null;
  version: string | null;
  /** `@ParentResource` values in declaration order. */
  parents: string[];
  /** Public instance methods, own and inherited. */
  methods: MethodDescriptor[];
  origin?: Origin;
}

/** All controllers found in one scan, sorted by id. */
export interface ControllerRegistry {
  controllers: ControllerDescriptor[];
  byId: Record<string, ControllerDescriptor>;
  /**
   * Class-level route annotations by declaring-type id, covering controllers
   * and the base classes their methods are inherited from.
   */
  classAnnotations: Record<string, RouteAnnotation[]>;
}
