import { describe, it, expect } from 'vitest';
import { add, divide, multiply, subtract } from '@/domain/services/ArithmeticOperations';

describe('ArithmeticOperations', () => {
  it('should compute the basic operations', () => {
    expect(add(2, 3)).toBe(5);
    expect(multiply(6, 7)).toBe(42);
    expect(subtract(5, 2)).toBe(3);
    expect(divide(10, 2)).toBe(5);
  });

  it('should truncate division toward zero', () => {
    expect(divide(7, 2)).toBe(3);
    expect(divide(-7, 2)).toBe(-3);
  });

  it('should reject division by zero', () => {
    expect(() => divide(1, 0)).toThrow(RangeError);
  });
});
