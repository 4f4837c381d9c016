import { KpiError } from '../errors';

/**
 * Division where a zero denominator or an undefined result yields 0
 */
export function safeRatio(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  const ratio = numerator / denominator;
  return Number.isNaN(ratio) ? 0 : ratio;
}

/**
 * Element-wise {@link safeRatio} over aligned columns
 */
export function safeRatios(numerators: readonly number[], denominators: readonly number[]): number[] {
  if (numerators.length !== denominators.length) {
    throw KpiError.invalidInput(
      `ratio columns differ in length (${numerators.length} numerators, ${denominators.length} denominators)`
    );
  }
  return numerators.map((numerator, i) => safeRatio(numerator, denominators[i]));
}
