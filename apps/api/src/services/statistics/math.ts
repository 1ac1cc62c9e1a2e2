/**
 * Descriptive statistics over plain number arrays.
 *
 * Standard deviation is the population form. Every function returns 0 for
 * inputs too small to define the quantity instead of NaN.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function std(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  let acc = 0;
  for (const v of values) acc += (v - m) ** 2;
  return Math.sqrt(acc / values.length);
}

/** Pearson correlation; 0 when either side has no variance */
export function correlation(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return 0;
  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return 0;
  return Math.max(-1, Math.min(1, sxy / Math.sqrt(sxx * syy)));
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export function countBy<T>(items: readonly T[], key: (item: T) => string | undefined): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    if (k === undefined) continue;
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

/**
 * Turn counts into probabilities over `support`, adding `smoothing` to every
 * bin so that zero bins stay finite under KL divergence.
 */
export function toDistribution(
  counts: ReadonlyMap<string, number>,
  support: readonly string[],
  smoothing = 0
): number[] {
  const raw = support.map((k) => (counts.get(k) ?? 0) + smoothing);
  const total = raw.reduce((a, b) => a + b, 0);
  if (total === 0) return support.map(() => 0);
  return raw.map((v) => v / total);
}

/** KL(p || q) in nats; bins where p is 0 contribute nothing */
export function klDivergence(p: readonly number[], q: readonly number[]): number {
  let kl = 0;
  for (let i = 0; i < p.length; i++) {
    if (p[i] > 0 && q[i] > 0) kl += p[i] * Math.log(p[i] / q[i]);
  }
  return Math.max(0, kl);
}

/** Total variation distance in [0, 1] */
export function totalVariation(p: readonly number[], q: readonly number[]): number {
  let d = 0;
  for (let i = 0; i < p.length; i++) d += Math.abs(p[i] - (q[i] ?? 0));
  return clamp01(d / 2);
}
