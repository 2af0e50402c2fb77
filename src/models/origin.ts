/**
 * origin.ts
 * Provenance pointer from a descriptor back to the controller source.
 *
 * Controllers and methods parsed from TypeScript carry an Origin; descriptors
 * built by hand (tests, programmatic callers) may omit it.
 */

export interface Origin {
  /** Absolute or project-relative path to the source file. */
  file: string;
  /** 1-based start line. */
  startLine?: number;
  /** 1-based start column. */
  startCol?: number;
  /** 1-based end line. */
  endLine?: number;
  /** Class or method name the origin points at. */
  symbol?: string;
}
