/**
 * @nullmask/core
 *
 * Deterministic null-injection decision engine.
 */

export const VERSION = "0.1.0";

export {
  NULL_MARKER,
  NumericLiteral,
  isNullMarker,
  toCellValue,
  type CellValue,
  type Dataset,
  type InjectionResult,
  type InjectionSummary,
  type NullMarker,
  type OpaqueValue,
  type Row,
} from "./types.js";

export {
  ConfigError,
  SchemaMismatchError,
  type ConfigErrorCode,
  type ConfigIssue,
  type SchemaMismatchReason,
} from "./errors.js";

export {
  DEFAULT_SEED,
  compilePattern,
  normalizeColumnNames,
  parseConfig,
  validateConfig,
  type ConfigValidationResult,
  type InjectionConfig,
  type RawInjectionConfig,
} from "./config.js";

export { ColumnSelector, findUnknownColumns } from "./column-selector.js";
export { PatternMatcher, toCanonicalText } from "./pattern-matcher.js";
export { ProbabilitySampler } from "./sampler.js";
export { createSummary, mergeSummaries, replacementRate } from "./summary.js";

export {
  NullInjector,
  assertDatasetShape,
  createInjectionPlan,
  injectNulls,
  type InjectionPlan,
  type RowBatchResult,
} from "./injector.js";

export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CONCURRENCY,
  injectNullsConcurrently,
  planChunks,
  type ConcurrentInjectionOptions,
} from "./concurrent.js";
