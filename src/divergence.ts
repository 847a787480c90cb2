// Structural Change Analyzer - Divergence Policies
// Functions comparing the left and right window means of a frame.
//
// Every policy is stateless between calls (Mahalanobis holds a read-only
// inverse covariance matrix) and works on local copies of its inputs.

import { DimensionMismatchError, InvalidCovarianceError } from "./errors.js";
import { defaultLogger } from "./logger.js";
import type { DivergenceName, DivergencePolicy, Logger } from "./types.js";

function assertSameLength(a: readonly number[], b: readonly number[], policy: string): void {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length, `${policy} divergence`);
  }
}

// ─── Euclidean ──────────────────────────────────────────────────────────────────

export class EuclideanDivergence implements DivergencePolicy {
  readonly name = "euclidean" as const;

  compare(a: readonly number[], b: readonly number[]): number {
    assertSameLength(a, b, "Euclidean");
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      const d = a[i] - b[i];
      sum += d * d;
    }
    return Math.sqrt(sum);
  }
}

// ─── Correlation ────────────────────────────────────────────────────────────────

/**
 * `0.5 - 0.5 * r` where `r` is the Pearson correlation of `a` and `b`, which
 * maps `r ∈ [-1, 1]` onto `[0, 1]`.
 *
 * A vector is treated as constant when no two adjacent elements differ; the
 * correlation is undefined then and the policy returns 0.
 */
export class CorrelationDivergence implements DivergencePolicy {
  readonly name = "correlation" as const;

  compare(a: readonly number[], b: readonly number[]): number {
    assertSameLength(a, b, "Correlation");
    const n = a.length;

    let aMean = 0;
    let bMean = 0;
    let aVaries = false;
    let bVaries = false;

    for (let i = 0; i < n; i++) {
      aMean += a[i];
      bMean += b[i];
      if (i > 0) {
        if (a[i] !== a[i - 1]) aVaries = true;
        if (b[i] !== b[i - 1]) bVaries = true;
      }
    }

    if (!aVaries || !bVaries) return 0;

    aMean /= n;
    bMean /= n;

    let covariance = 0;
    let aVariance = 0;
    let bVariance = 0;
    for (let i = 0; i < n; i++) {
      const aShifted = a[i] - aMean;
      const bShifted = b[i] - bMean;
      covariance += aShifted * bShifted;
      aVariance += aShifted * aShifted;
      bVariance += bShifted * bShifted;
    }

    // rounding can push r just past ±1
    const r = Math.min(1, Math.max(-1, covariance / (Math.sqrt(aVariance) * Math.sqrt(bVariance))));
    return 0.5 - 0.5 * r;
  }
}

// ─── Jensen–Shannon ─────────────────────────────────────────────────────────────

/**
 * Jensen–Shannon divergence of `a` and `b` read as unnormalized histograms.
 *
 * Both vectors must be non-negative with at least one positive element. A
 * negative element is reported through the logger; either failure yields 0.
 */
export class JensenShannonDivergence implements DivergencePolicy {
  readonly name = "jensen-shannon" as const;
  private logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  compare(a: readonly number[], b: readonly number[]): number {
    assertSameLength(a, b, "Jensen-Shannon");
    const n = a.length;

    let aSum = 0;
    let bSum = 0;
    let aValid = false;
    let bValid = false;

    for (let i = 0; i < n; i++) {
      if (a[i] < 0 || b[i] < 0) {
        this.logger.warn(
          `Jensen-Shannon divergence needs non-negative values, got ${a[i] < 0 ? a[i] : b[i]} at index ${i}`,
        );
        return 0;
      }
      aSum += a[i];
      bSum += b[i];
      if (a[i] > 0) aValid = true;
      if (b[i] > 0) bValid = true;
    }

    if (!aValid || !bValid) return 0;

    let divergence = 0;
    for (let i = 0; i < n; i++) {
      const p = a[i] / aSum;
      const q = b[i] / bSum;
      const m = 0.5 * (p + q);
      if (p > 0) divergence += p * Math.log(p / m);
      if (q > 0) divergence += q * Math.log(q / m);
    }

    return 0.5 * divergence;
  }
}

// ─── Mahalanobis ────────────────────────────────────────────────────────────────

/**
 * `sqrt((a - b)ᵀ Σ⁻¹ (a - b))` for a precomputed inverse covariance matrix.
 *
 * Only the first `min(D, M)` dimensions take part, so a policy built for M-dimensional
 * features also accepts shorter vectors.
 */
export class MahalanobisDivergence implements DivergencePolicy {
  readonly name = "mahalanobis" as const;
  private readonly inverseCovariance: readonly (readonly number[])[];

  constructor(inverseCovariance: readonly (readonly number[])[]) {
    const size = inverseCovariance.length;
    if (size === 0) {
      throw new InvalidCovarianceError("Inverse covariance must have at least one row");
    }
    inverseCovariance.forEach((row, i) => {
      if (row.length !== size) {
        throw new InvalidCovarianceError(
          `Inverse covariance must be square: row ${i} has ${row.length} entries, expected ${size}`,
        );
      }
      if (!row.every(Number.isFinite)) {
        throw new InvalidCovarianceError(`Inverse covariance row ${i} contains a non-finite entry`);
      }
    });
    this.inverseCovariance = inverseCovariance.map((row) => [...row]);
  }

  get size(): number {
    return this.inverseCovariance.length;
  }

  compare(a: readonly number[], b: readonly number[]): number {
    assertSameLength(a, b, "Mahalanobis");
    const n = Math.min(a.length, this.inverseCovariance.length);

    let sum = 0;
    for (let i = 0; i < n; i++) {
      const row = this.inverseCovariance[i];
      let weighted = 0;
      for (let j = 0; j < n; j++) {
        weighted += row[j] * (a[j] - b[j]);
      }
      sum += weighted * (a[i] - b[i]);
    }

    return Math.sqrt(sum);
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

export interface DivergenceOptions {
  /** Required for "mahalanobis" */
  inverseCovariance?: readonly (readonly number[])[];
  logger?: Logger;
}

export function createDivergencePolicy(
  name: DivergenceName,
  options: DivergenceOptions = {},
): DivergencePolicy {
  switch (name) {
    case "euclidean":
      return new EuclideanDivergence();
    case "correlation":
      return new CorrelationDivergence();
    case "jensen-shannon":
      return new JensenShannonDivergence(options.logger);
    case "mahalanobis":
      if (!options.inverseCovariance) {
        throw new InvalidCovarianceError("Mahalanobis divergence requires an inverse covariance matrix");
      }
      return new MahalanobisDivergence(options.inverseCovariance);
    default: {
      const exhaustiveCheck: never = name;
      throw new Error(`Unknown divergence: ${String(exhaustiveCheck)}`);
    }
  }
}
