import { type CellValue, NumericLiteral, isNullMarker } from "./types.js";

/**
 * Stable, locale-independent text for a non-null value.
 *
 * - numbers use `String()` ("1.5", "1e+21", "NaN"); `-0` renders "0"
 * - numeric literals render their source text
 * - booleans render "true" / "false"
 * - dates render ISO-8601
 * - other objects render as JSON
 */
export function toCanonicalText(value: Exclude<CellValue, null>): string {
  switch (typeof value) {
    case "string":
      return value;
    case "number":
    case "boolean":
    case "bigint":
      return String(value);
    default:
      break;
  }

  if (value instanceof NumericLiteral) {
    return value.text;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }

  try {
    return JSON.stringify(value, nestedValue) ?? String(value);
  } catch {
    // Nested bigints and cycles have no JSON form
    return String(value);
  }
}

// JSON has no bigint; nested numeric literals keep their digits
function nestedValue(_key: string, value: unknown): unknown {
  if (typeof value === "bigint" || value instanceof NumericLiteral) {
    return value.toString();
  }
  return value;
}

/**
 * Decides whether a cell value is a replacement candidate.
 *
 * Matching is a search anywhere in the canonical text, not a full-string
 * match; anchor the pattern (^...$) for whole-value semantics.
 */
export class PatternMatcher {
  private readonly pattern: RegExp | undefined;

  constructor(pattern?: RegExp) {
    // Stateful flags would make test() depend on previous calls
    this.pattern =
      pattern && (pattern.global || pattern.sticky)
        ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""))
        : pattern;
  }

  get source(): string | undefined {
    return this.pattern?.source;
  }

  /**
   * True when the value is a candidate. The null marker never is.
   */
  matches(value: CellValue): boolean {
    if (isNullMarker(value)) {
      return false;
    }
    if (!this.pattern) {
      return true;
    }
    return this.pattern.test(toCanonicalText(value));
  }
}
