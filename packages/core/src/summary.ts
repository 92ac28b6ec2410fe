import type { InjectionSummary } from "./types.js";

/**
 * An all-zero summary with a counter for each eligible column
 */
export function createSummary(eligibleColumns: readonly string[]): InjectionSummary {
  return {
    rowsProcessed: 0,
    cellsExamined: 0,
    candidateCells: 0,
    cellsReplaced: 0,
    // fromEntries defines own properties, so a column named "__proto__" is safe
    replacedByColumn: Object.fromEntries(eligibleColumns.map((column): [string, number] => [column, 0])),
  };
}

/**
 * Combine two partial summaries.
 *
 * Plain sums: associative and commutative, so partials from concurrent
 * workers can be merged in whatever order the workers finish.
 */
export function mergeSummaries(left: InjectionSummary, right: InjectionSummary): InjectionSummary {
  const replacedByColumn = new Map<string, number>(Object.entries(left.replacedByColumn));
  for (const [column, count] of Object.entries(right.replacedByColumn)) {
    replacedByColumn.set(column, (replacedByColumn.get(column) ?? 0) + count);
  }

  return {
    rowsProcessed: left.rowsProcessed + right.rowsProcessed,
    cellsExamined: left.cellsExamined + right.cellsExamined,
    candidateCells: left.candidateCells + right.candidateCells,
    cellsReplaced: left.cellsReplaced + right.cellsReplaced,
    replacedByColumn: Object.fromEntries(replacedByColumn),
  };
}

/**
 * Fraction of candidate cells that were replaced (0 when there were none)
 */
export function replacementRate(summary: InjectionSummary): number {
  return summary.candidateCells === 0 ? 0 : summary.cellsReplaced / summary.candidateCells;
}
