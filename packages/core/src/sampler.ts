import { createHmac } from "node:crypto";

const SCORE_BYTES = 6;
const SCORE_RANGE = 2 ** (SCORE_BYTES * 8);

/**
 * Per-cell deterministic draw at a fixed probability.
 *
 * Each cell's score is derived from a keyed hash of (seed, rowIndex, column)
 * alone, so a draw never depends on which cells were drawn before it. Rows
 * can be processed in any order, or split across workers, with identical
 * results.
 */
export class ProbabilitySampler {
  private readonly key: string;

  constructor(
    readonly probability: number,
    readonly seed: number
  ) {
    this.key = `nullmask:${seed}`;
  }

  /**
   * Pseudo-random score in [0, 1) for a cell
   */
  score(rowIndex: number, column: string): number {
    const digest = createHmac("sha256", this.key).update(`${rowIndex}\u0000${column}`).digest();
    return digest.readUIntBE(0, SCORE_BYTES) / SCORE_RANGE;
  }

  /**
   * True means "replace this cell with the null marker"
   */
  draw(rowIndex: number, column: string): boolean {
    if (this.probability <= 0) {
      return false;
    }
    if (this.probability >= 1) {
      return true;
    }
    return this.score(rowIndex, column) < this.probability;
  }
}
