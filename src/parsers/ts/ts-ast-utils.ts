/**
 * ts-ast-utils.ts
 * Low-level, deterministic TypeScript AST utilities used by the controller
 * parsers. No project-level orchestration.
 *
 * Literal readers return null for anything that is not a literal: decorator
 * arguments are read statically, never evaluated.
 */

import { Node, SyntaxKind } from 'ts-morph';
import type { ClassDeclaration, Decorator, ObjectLiteralExpression } from 'ts-morph';
import type { Origin } from '../../models/origin.js';
import type { RouteValue } from '../../models/annotations.js';

export class TsAstUtils {
  // ---------------------------------------------------------------------------
  // Origin
  // ---------------------------------------------------------------------------

  /**
   * Derive an Origin from a ts-morph Node.
   *
   * @param symbolHint - Optional symbol name to attach (class/method name).
   */
  static getOrigin(node: Node, symbolHint?: string): Origin {
    const sourceFile = node.getSourceFile();
    const { line: startLine0, character: startChar0 } =
      sourceFile.compilerNode.getLineAndCharacterOfPosition(node.getStart());
    const { line: endLine0 } =
      sourceFile.compilerNode.getLineAndCharacterOfPosition(node.getEnd());

    const origin: Origin = {
      file: sourceFile.getFilePath(),
      startLine: startLine0 + 1,    // convert 0-based → 1-based
      startCol: startChar0 + 1,
      endLine: endLine0 + 1,
    };
    if (symbolHint !== undefined) {
      origin.symbol = symbolHint;
    }
    return origin;
  }

  // ---------------------------------------------------------------------------
  // Decorator helpers
  // ---------------------------------------------------------------------------

  /** Find a named decorator on a class declaration, or null. */
  static findDecorator(classDecl: ClassDeclaration, decoratorName: string): Decorator | null {
    return classDecl.getDecorator(decoratorName) ?? null;
  }

  /** Decorator arguments, empty for a bare `@Name` without a call. */
  static getDecoratorArguments(decorator: Decorator): Node[] {
    return decorator.isDecoratorFactory() ? decorator.getArguments() : [];
  }

  // ---------------------------------------------------------------------------
  // Literal extraction
  // ---------------------------------------------------------------------------

  /**
   * Extract the string value from a StringLiteral or NoSubstitutionTemplateLiteral node.
   * Returns null for any other node kind.
   */
  static getStringLiteralValue(node: Node): string | null {
    if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
      return node.getLiteralValue();
    }
    return null;
  }

  /**
   * Read a literal scalar: string, number, true, false or null.
   * Returns undefined for anything else.
   */
  static getScalarValue(node: Node): RouteValue | undefined {
    const str = TsAstUtils.getStringLiteralValue(node);
    if (str !== null) return str;
    if (Node.isNumericLiteral(node)) return node.getLiteralValue();
    if (Node.isTrueLiteral(node)) return true;
    if (Node.isFalseLiteral(node)) return false;
    if (Node.isNullLiteral(node)) return null;
    if (Node.isPrefixUnaryExpression(node) && node.getOperatorToken() === SyntaxKind.MinusToken) {
      const operand = node.getOperand();
      if (Node.isNumericLiteral(operand)) return -operand.getLiteralValue();
    }
    return undefined;
  }

  /**
   * String literal values of an ArrayLiteralExpression, in source order.
   * A single string literal is read as a one-element list.
   */
  static getStringList(node: Node): string[] {
    const single = TsAstUtils.getStringLiteralValue(node);
    if (single !== null) return [single];
    if (!Node.isArrayLiteralExpression(node)) return [];

    const results: string[] = [];
    for (const element of node.getElements()) {
      const value = TsAstUtils.getStringLiteralValue(element);
      if (value !== null) results.push(value);
    }
    return results;
  }

  // ---------------------------------------------------------------------------
  // Object literals
  // ---------------------------------------------------------------------------

  /** Narrow to an object literal, or null. */
  static asObjectLiteral(node: Node | undefined): ObjectLiteralExpression | null {
    return node !== undefined && Node.isObjectLiteralExpression(node) ? node : null;
  }

  /** Initializer of a `key: value` property, or undefined. */
  static getProperty(obj: ObjectLiteralExpression, key: string): Node | undefined {
    for (const prop of obj.getProperties()) {
      if (Node.isPropertyAssignment(prop) && TsAstUtils._propertyKey(prop.getNameNode()) === key) {
        return prop.getInitializer();
      }
    }
    return undefined;
  }

  /** `{ a: 'x', b: 'y' }` → { a: 'x', b: 'y' }; non-string values are skipped. */
  static getStringRecord(node: Node | undefined): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of TsAstUtils._entries(node)) {
      const str = TsAstUtils.getStringLiteralValue(value);
      if (str !== null) record[key] = str;
    }
    return record;
  }

  /** `{ a: 1, b: false }` → { a: 1, b: false }; non-literal values are skipped. */
  static getScalarRecord(node: Node | undefined): Record<string, RouteValue> {
    const record: Record<string, RouteValue> = {};
    for (const [key, value] of TsAstUtils._entries(node)) {
      const scalar = TsAstUtils.getScalarValue(value);
      if (scalar !== undefined) record[key] = scalar;
    }
    return record;
  }

  // ---------------------------------------------------------------------------
  // Type names
  // ---------------------------------------------------------------------------

  /**
   * Bare type name from a type reference text:
   * "express.Request" → "Request", "Array<Post>" → "Array", "Foo | null" → "Foo".
   */
  static bareTypeName(typeText: string): string {
    const first = typeText.split('|').map((t) => t.trim()).find((t) => t !== 'null' && t !== 'undefined') ?? '';
    const withoutGenerics = first.replace(/<.*$/s, '');
    const dot = withoutGenerics.lastIndexOf('.');
    return (dot === -1 ? withoutGenerics : withoutGenerics.slice(dot + 1)).trim();
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  private static _entries(node: Node | undefined): Array<[string, Node]> {
    const obj = TsAstUtils.asObjectLiteral(node);
    if (obj === null) return [];
    const entries: Array<[string, Node]> = [];
    for (const prop of obj.getProperties()) {
      if (!Node.isPropertyAssignment(prop)) continue;
      const key = TsAstUtils._propertyKey(prop.getNameNode());
      const value = prop.getInitializer();
      if (key !== null && value !== undefined) entries.push([key, value]);
    }
    return entries;
  }

  private static _propertyKey(nameNode: Node): string | null {
    if (Node.isIdentifier(nameNode)) return nameNode.getText();
    return TsAstUtils.getStringLiteralValue(nameNode);
  }
}
