import { ConfigError, type ConfigIssue } from "./errors.js";

/**
 * One UnknownColumn issue per configured name missing from the schema
 */
export function findUnknownColumns(
  schema: readonly string[],
  configured: readonly string[]
): ConfigIssue[] {
  const known = new Set(schema);
  return configured
    .map((name, index) => ({ name, index }))
    .filter(({ name }) => !known.has(name))
    .map(({ name, index }) => ({
      code: "UnknownColumn" as const,
      path: `columns.${index}`,
      message: `Column "${name}" not found in dataset (available: ${schema.join(", ")})`,
      column: name,
    }));
}

/**
 * Resolves which columns are eligible for injection.
 * Immutable once resolved.
 */
export class ColumnSelector {
  private readonly eligible: ReadonlySet<string>;

  private constructor(readonly columns: readonly string[]) {
    this.eligible = new Set(columns);
  }

  /**
   * Resolve eligible columns against a schema
   *
   * @param schema - Ordered dataset column names
   * @param configured - Allow-list; undefined selects the whole schema
   * @throws ConfigError listing every configured name the schema lacks
   */
  static resolve(schema: readonly string[], configured?: readonly string[]): ColumnSelector {
    if (configured === undefined) {
      return new ColumnSelector(Object.freeze([...schema]));
    }

    const unknown = findUnknownColumns(schema, configured);
    if (unknown.length > 0) {
      throw new ConfigError(unknown);
    }

    return new ColumnSelector(Object.freeze([...configured]));
  }

  includes(column: string): boolean {
    return this.eligible.has(column);
  }

  get size(): number {
    return this.eligible.size;
  }
}
