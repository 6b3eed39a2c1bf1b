/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { SfmParser, SfmWriter } from 'sfm-toolkit';
 * ```
 */

export { AbstractParser, type ResolvedParserOptions } from "./abstract-parser";
export * from "./sfm";
