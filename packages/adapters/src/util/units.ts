const KPH_TO_KNOTS = 0.539957;
const MPH_TO_KNOTS = 0.868976;
const MPS_TO_KNOTS = 1.94384;

export function kphToKnots(kph: number): number {
  return Number.isFinite(kph) ? kph * KPH_TO_KNOTS : 0;
}

export function mphToKnots(mph: number): number {
  return Number.isFinite(mph) ? mph * MPH_TO_KNOTS : 0;
}

export function mpsToKnots(mps: number): number {
  return Number.isFinite(mps) ? mps * MPS_TO_KNOTS : 0;
}

/**
 * Lower-case key safe for query strings and topic segments:
 * `"Coolant Temp. (C)"` → `"coolant_temp_c"`.
 */
export function cleanSensorName(name: string): string {
  const cleaned = name
    .replace(/[^\w]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
  return cleaned.length > 0 ? cleaned : 'unknown_sensor';
}

/** Integers pass through untouched; scaling them can lose bits above 2^53. */
export function roundTo(value: number, decimals: number): number {
  if (Number.isInteger(value)) return value;
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
