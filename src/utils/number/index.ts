/**
 * Number utilities
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Clamp a value into [min, max]
 * @param value - Value to clamp
 * @param min - Lower bound
 * @param max - Upper bound
 * @returns Clamped value (NaN clamps to min)
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value) || value < min) return min;
  if (value > max) return max;
  return value;
}

/**
 * Draw an integer from [base, base + span) using a random source
 * @param random - Uniform source in [0, 1)
 * @param base - Lowest value
 * @param span - Number of distinct values
 * @returns base + floor(random() * span)
 */
export function drawInRange(random: () => number, base: number, span: number): number {
  return base + Math.floor(random() * span);
}
