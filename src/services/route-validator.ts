/**
 * route-validator.ts
 * Invariant checks over a derived route manifest.
 * Throws a descriptive error on the first violation found.
 *
 * Validation rules enforced:
 *   1. Every route carries a non-empty string `_controller` default.
 *   2. Every route has at least one method, all upper-case.
 *   3. No placeholder appears twice in one path.
 *   4. With includeFormat and known formats, every path ends in the format
 *      placeholder and constrains it.
 */

import type { NamedRoute, RouteManifest } from '../models/routes.js';
import type { RouteSettings } from '../models/scan-config.js';
import { FORMAT_PLACEHOLDER, extractPlaceholders } from '../routing/route-utils.js';

export class RouteValidator {
  /**
   * Validate every route of a manifest.
   * Throws `ValidationError` on the first violation.
   */
  static validate(manifest: RouteManifest, settings: RouteSettings = {}): void {
    const checkFormat =
      settings.includeFormat === true && Object.keys(settings.formats ?? {}).length > 0;

    for (const route of manifest.routes) {
      RouteValidator._validateController(route);
      RouteValidator._validateMethods(route);
      RouteValidator._validatePlaceholders(route);
      if (checkFormat) RouteValidator._validateFormat(route);
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 1: controller reference
  // ---------------------------------------------------------------------------

  private static _validateController(route: NamedRoute): void {
    const controller = route.defaults['_controller'];
    if (typeof controller !== 'string' || controller === '') {
      throw new ValidationError(
        `Rule 1 violation: route "${route.name}" has no _controller default.`,
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 2: methods
  // ---------------------------------------------------------------------------

  private static _validateMethods(route: NamedRoute): void {
    if (route.methods.length === 0) {
      throw new ValidationError(`Rule 2 violation: route "${route.name}" has no methods.`);
    }
    for (const method of route.methods) {
      if (method === '' || method !== method.toUpperCase()) {
        throw new ValidationError(
          `Rule 2 violation: route "${route.name}" has method "${method}" which is not upper-case.`,
        );
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 3: placeholders
  // ---------------------------------------------------------------------------

  private static _validatePlaceholders(route: NamedRoute): void {
    const seen = new Set<string>();
    for (const placeholder of extractPlaceholders(route.path)) {
      if (seen.has(placeholder)) {
        throw new ValidationError(
          `Rule 3 violation: route "${route.name}" repeats placeholder "{${placeholder}}" ` +
          `in path "${route.path}".`,
        );
      }
      seen.add(placeholder);
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 4: format suffix
  // ---------------------------------------------------------------------------

  private static _validateFormat(route: NamedRoute): void {
    if (
      !route.path.endsWith(`.{${FORMAT_PLACEHOLDER}}`) ||
      route.requirements[FORMAT_PLACEHOLDER] === undefined
    ) {
      throw new ValidationError(
        `Rule 4 violation: route "${route.name}" lacks a constrained {${FORMAT_PLACEHOLDER}} suffix.`,
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
