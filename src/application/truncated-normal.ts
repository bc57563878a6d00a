/**
 * Standard normal CDF / quantile and inverse-CDF sampling of a truncated
 * standard normal.
 *
 * Sampling never rejects draws, so bounds many stddevs away from the mean
 * cost the same as bounds around it.
 */

/** Uniform source on [0, 1). Injectable for deterministic tests. */
export type RandomSource = () => number;

/**
 * Complementary error function (Chebyshev fit, fractional error < 1.2e-7).
 * Keeps relative precision deep in the tail, which `1 - erf(x)` does not.
 */
function erfc(x: number): number {
  const z = Math.abs(x);
  const t = 1 / (1 + 0.5 * z);
  const r =
    t *
    Math.exp(
      -z * z -
        1.26551223 +
        t *
          (1.00002368 +
            t *
              (0.37409196 +
                t *
                  (0.09678418 +
                    t *
                      (-0.18628806 +
                        t *
                          (0.27886807 +
                            t *
                              (-1.13520398 +
                                t * (1.48851587 + t * (-0.82215223 + t * 0.17087277)))))))),
    );
  return x >= 0 ? r : 2 - r;
}

/** Φ(x) for the standard normal. */
export function normalCdf(x: number): number {
  return 0.5 * erfc(-x / Math.SQRT2);
}

// Rational approximation of Φ⁻¹ (relative error < 1.15e-9).
const A = [-3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2, 1.38357751867269e2, -3.066479806614716e1, 2.506628277459239] as const;
const B = [-5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2, 6.680131188771972e1, -1.328068155288572e1] as const;
const C = [-7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838, -2.549732539343734, 4.374664141464968, 2.938163982698783] as const;
const D = [7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996, 3.754408661907416] as const;
const P_LOW = 0.02425;

function tail(q: number): number {
  const [c0, c1, c2, c3, c4, c5] = C;
  const [d0, d1, d2, d3] = D;
  return (((((c0 * q + c1) * q + c2) * q + c3) * q + c4) * q + c5) / ((((d0 * q + d1) * q + d2) * q + d3) * q + 1);
}

/** Φ⁻¹(p) for the standard normal; ±Infinity at the ends of [0, 1]. */
export function normalQuantile(p: number): number {
  if (Number.isNaN(p)) return Number.NaN;
  if (p <= 0) return Number.NEGATIVE_INFINITY;
  if (p >= 1) return Number.POSITIVE_INFINITY;

  if (p < P_LOW) return tail(Math.sqrt(-2 * Math.log(p)));
  if (p > 1 - P_LOW) return -tail(Math.sqrt(-2 * Math.log(1 - p)));

  const [a0, a1, a2, a3, a4, a5] = A;
  const [b0, b1, b2, b3, b4] = B;
  const q = p - 0.5;
  const r = q * q;
  return (
    ((((((a0 * r + a1) * r + a2) * r + a3) * r + a4) * r + a5) * q) /
    (((((b0 * r + b1) * r + b2) * r + b3) * r + b4) * r + 1)
  );
}

/**
 * Draws z ~ N(0, 1) conditioned on alpha <= z <= beta, given u in [0, 1).
 *
 * Bounds entirely in the upper tail are mirrored into the lower tail, where
 * Φ is small and still precise. When the interval carries no representable
 * probability mass the bound closest to 0 is returned.
 */
export function sampleTruncatedNormal(alpha: number, beta: number, u: number): number {
  if (alpha > 0) return -sampleTruncatedNormal(-beta, -alpha, 1 - u);

  const lo = normalCdf(alpha);
  const hi = normalCdf(beta);
  if (!(hi > lo)) return Math.abs(alpha) <= Math.abs(beta) ? alpha : beta;

  const z = normalQuantile(lo + u * (hi - lo));
  return Math.min(beta, Math.max(alpha, z));
}
