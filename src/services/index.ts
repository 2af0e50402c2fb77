/**
 * services/index.ts
 * Barrel export for the routing services.
 */

export { DescriptorAnnotationSource } from './annotation-source.js';
export type { AnnotationSource } from './annotation-source.js';
export { PluralizeInflector } from './inflector.js';
export type { Inflector } from './inflector.js';
export { BindingParamReader } from './param-reader.js';
export type { ParamReader } from './param-reader.js';
export { RouteValidator, ValidationError } from './route-validator.js';
export { RouteExporter } from './route-exporter.js';
export { ConsoleLogger, BufferedLogger, TeeLogger, SilentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
