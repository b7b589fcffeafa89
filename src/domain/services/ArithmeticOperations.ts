/**
 * Integer arithmetic used as delegate targets.
 *
 * @module domain/services/ArithmeticOperations
 */

/**
 * Signature shared by every operation here.
 */
export type MathOperation = (x: number, y: number) => number;

export function add(x: number, y: number): number {
  return x + y;
}

export function subtract(x: number, y: number): number {
  return x - y;
}

export function multiply(x: number, y: number): number {
  return x * y;
}

/**
 * Integer division, truncating toward zero.
 *
 * @throws RangeError when `y` is zero
 */
export function divide(x: number, y: number): number {
  if (y === 0) {
    throw new RangeError('Attempted to divide by zero.');
  }
  return Math.trunc(x / y);
}
