/**
 * Statistical utility functions
 */

/**
 * Whether a value is a usable number (defined and finite)
 */
export function isDefinedNumber(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value);
}

/**
 * Collect the defined, finite values of a sequence
 *
 * @param values - Values, possibly with gaps
 * @returns Only the usable numbers, in their original order
 */
export function definedValues(values: Iterable<number | undefined>): number[] {
  const result: number[] = [];
  for (const value of values) {
    if (isDefinedNumber(value)) {
      result.push(value);
    }
  }
  return result;
}

/**
 * Minimum and maximum of the defined values of a sequence
 *
 * @param values - Values, possibly with gaps
 * @returns Extremes, or undefined when no value is defined
 */
export function definedExtrema(
  values: Iterable<number | undefined>,
): { min: number; max: number } | undefined {
  let min = Infinity;
  let max = -Infinity;
  let found = false;

  for (const value of values) {
    if (!isDefinedNumber(value)) continue;
    found = true;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  return found ? { min, max } : undefined;
}
