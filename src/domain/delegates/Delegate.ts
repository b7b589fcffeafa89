/**
 * Delegate
 *
 * A callable reference: a value that points at one procedure of a fixed
 * signature. The procedure may be a free function, a closure over
 * enclosing state, or a method bound to a target object.
 *
 * @module domain/delegates/Delegate
 */

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Procedure shape referenced by a delegate.
 */
export type Callable<TArgs extends unknown[], TResult> = (...args: TArgs) => TResult;

// ============================================================================
// Delegate Implementation
// ============================================================================

/**
 * Reference to a single procedure.
 *
 * Two delegates are equal when they reference the same procedure on the
 * same target; that equality is what removal from an invocation list
 * matches on.
 *
 * @example
 * ```typescript
 * const add = (x: number, y: number) => x + y;
 * const operation = new Delegate(add);
 * operation.invoke(2, 3); // 5
 *
 * // Bound method: `this` is the target when invoked
 * const greet = new Delegate(greeter.greet, greeter);
 * ```
 */
export class Delegate<TArgs extends unknown[], TResult> {
  /** Referenced procedure */
  readonly method: Callable<TArgs, TResult>;

  /** Object the method is invoked on, or null for free functions */
  readonly target: object | null;

  constructor(method: Callable<TArgs, TResult>, target: object | null = null) {
    this.method = method;
    this.target = target;
  }

  /**
   * Wraps a plain function; an existing delegate is returned as is.
   */
  static from<TArgs extends unknown[], TResult>(
    source: Callable<TArgs, TResult> | Delegate<TArgs, TResult>
  ): Delegate<TArgs, TResult> {
    return source instanceof Delegate ? source : new Delegate(source);
  }

  /** Name of the referenced procedure, for diagnostics. */
  get methodName(): string {
    return this.method.name || '(anonymous)';
  }

  /**
   * Calls the referenced procedure.
   *
   * Errors thrown by the procedure propagate to the caller unchanged.
   */
  invoke(...args: TArgs): TResult {
    if (this.target === null) {
      return this.method(...args);
    }
    return this.method.apply(this.target, args);
  }

  equals(other: Delegate<TArgs, TResult>): boolean {
    return this.method === other.method && this.target === other.target;
  }
}
