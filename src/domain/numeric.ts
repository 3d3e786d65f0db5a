/** Relative tolerance used for every amount comparison. */
export const RELATIVE_TOLERANCE = 1e-9;

/**
 * Near-equality for monetary amounts held as floating point numbers
 * Same rule as a relative comparison with no absolute floor: 0 only equals 0
 */
export function isClose(a: number, b: number, relTol = RELATIVE_TOLERANCE, absTol = 0): boolean {
  if (a === b) {
    return true;
  }
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    return false;
  }
  const diff = Math.abs(a - b);
  return diff <= Math.max(relTol * Math.max(Math.abs(a), Math.abs(b)), absTol);
}

/**
 * Scales an amount to an integer count of the commodity's smallest unit,
 * rounding half away from zero
 */
export function toScaled(value: number, fraction: number): number {
  const magnitude = Number((Math.abs(value) * fraction).toPrecision(15));
  const scaled = Math.round(magnitude);
  return value < 0 ? -scaled : scaled;
}

export function fromScaled(num: number, denom: number): number {
  return num / denom;
}
