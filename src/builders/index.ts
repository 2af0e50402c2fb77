/**
 * builders/index.ts
 * Barrel export for all scan builders.
 */

export { TsProjectBuilder } from './ts-project-builder.js';
export { ControllerRegistryBuilder } from './controller-registry-builder.js';
export { ControllerRouteBuilder } from './controller-route-builder.js';
