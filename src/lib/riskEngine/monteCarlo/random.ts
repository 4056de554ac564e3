/**
 * Monte Carlo — Random Numbers
 *
 * Seedable mulberry32 stream with Box-Muller normals, plus the standard
 * normal CDF and its inverse used by the marginal transforms.
 */

// --------------------------- RNG (seedable) ---------------------------

export class SeededRandom {
  private state: number;
  private spareNormal: number | null = null;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Uniform on [0, 1) — mulberry32 */
  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Standard normal via Box-Muller; the second variate of each pair is cached. */
  nextNormal(): number {
    if (this.spareNormal !== null) {
      const z = this.spareNormal;
      this.spareNormal = null;
      return z;
    }
    const u1 = 1 - this.next(); // (0, 1], keeps log finite
    const u2 = this.next();
    const radius = Math.sqrt(-2 * Math.log(u1));
    this.spareNormal = radius * Math.sin(2 * Math.PI * u2);
    return radius * Math.cos(2 * Math.PI * u2);
  }
}

/**
 * Independent stream seed for work unit `index` (splitmix32-style mix).
 */
export function deriveStreamSeed(seed: number, index: number): number {
  let z = (seed + Math.imul(index + 1, 0x9e3779b9)) >>> 0;
  z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
  z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
  return (z ^ (z >>> 16)) >>> 0;
}

// --------------------------- Normal CDF ---------------------------

/**
 * Φ(x). Hart's double-precision rational approximation (|error| < 1e-14).
 */
export function standardNormalCdf(x: number): number {
  if (Number.isNaN(x)) return Number.NaN;
  const absX = Math.abs(x);
  let tail: number;

  if (absX > 37) {
    tail = 0;
  } else {
    const e = Math.exp((-absX * absX) / 2);
    if (absX < 7.07106781186547) {
      let num = 3.52624965998911e-2 * absX + 0.700383064443688;
      num = num * absX + 6.37396220353165;
      num = num * absX + 33.912866078383;
      num = num * absX + 112.079291497871;
      num = num * absX + 221.213596169931;
      num = num * absX + 220.206867912376;
      let den = 8.83883476483184e-2 * absX + 1.75566716318264;
      den = den * absX + 16.064177579207;
      den = den * absX + 86.7807322029461;
      den = den * absX + 296.564248779674;
      den = den * absX + 637.333633378831;
      den = den * absX + 793.826512519948;
      den = den * absX + 440.413735824752;
      tail = (e * num) / den;
    } else {
      let cf = absX + 0.65;
      cf = absX + 4 / cf;
      cf = absX + 3 / cf;
      cf = absX + 2 / cf;
      cf = absX + 1 / cf;
      tail = e / cf / 2.506628274631;
    }
  }

  return x > 0 ? 1 - tail : tail;
}

// Acklam's rational approximation coefficients
const A = [
  -3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2, 1.38357751867269e2,
  -3.066479806614716e1, 2.506628277459239,
] as const;
const B = [
  -5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2, 6.680131188771972e1,
  -1.328068155288572e1,
] as const;
const C = [
  -7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838, -2.549732539343734,
  4.374664141464968, 2.938163982698783,
] as const;
const D = [7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996, 3.754408661907416] as const;

const P_LOW = 0.02425;

function lowerTail(q: number): number {
  return (
    (((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
    ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1)
  );
}

/**
 * Φ⁻¹(p) for p in (0, 1). Acklam's algorithm (relative error < 1.2e-9).
 * Returns ±Infinity at the closed endpoints.
 */
export function inverseStandardNormalCdf(p: number): number {
  if (Number.isNaN(p) || p < 0 || p > 1) return Number.NaN;
  if (p === 0) return Number.NEGATIVE_INFINITY;
  if (p === 1) return Number.POSITIVE_INFINITY;

  if (p < P_LOW) {
    return lowerTail(Math.sqrt(-2 * Math.log(p)));
  }
  if (p > 1 - P_LOW) {
    return -lowerTail(Math.sqrt(-2 * Math.log(1 - p)));
  }

  const q = p - 0.5;
  const r = q * q;
  return (
    ((((((A[0] * r + A[1]) * r + A[2]) * r + A[3]) * r + A[4]) * r + A[5]) * q) /
    (((((B[0] * r + B[1]) * r + B[2]) * r + B[3]) * r + B[4]) * r + 1)
  );
}
