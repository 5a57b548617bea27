/**
 * Running trapezoid-rule integral of `values` over the sample coordinates
 * `xs`, starting from `initial`. Repeated coordinates (jump samples)
 * contribute nothing.
 */
export function cumulativeTrapezoid(
  xs: readonly number[],
  values: readonly number[],
  initial: number = 0,
): number[] {
  if (xs.length !== values.length) {
    throw new Error(
      `Sample length mismatch: ${xs.length} coordinates, ${values.length} values`,
    );
  }
  const out = new Array<number>(xs.length);
  if (xs.length === 0) return out;

  out[0] = initial;
  for (let i = 1; i < xs.length; i++) {
    const h = xs[i] - xs[i - 1];
    out[i] = out[i - 1] + (h * (values[i] + values[i - 1])) / 2;
  }
  return out;
}

/** Linear interpolation of (xs, values) at x; xs must be non-decreasing. */
export function interpolate(
  xs: readonly number[],
  values: readonly number[],
  x: number,
): number {
  const n = xs.length;
  if (n === 0) return NaN;
  if (x <= xs[0]) return values[0];
  if (x >= xs[n - 1]) return values[n - 1];

  let lo = 0;
  let hi = n - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (xs[mid] <= x) lo = mid;
    else hi = mid;
  }
  const span = xs[hi] - xs[lo];
  if (span === 0) return values[hi];
  const t = (x - xs[lo]) / span;
  return values[lo] + t * (values[hi] - values[lo]);
}

export const allFinite = (values: readonly number[]) =>
  values.every((v) => Number.isFinite(v));
