/**
 * Built-in generic delegate forms.
 *
 * Ready-made signatures that spare declaring a custom delegate type for
 * every shape: `Func` returns a value, `Action` returns nothing and
 * `Predicate` answers a yes/no question about one value.
 *
 * @module domain/delegates/GenericDelegates
 */

import type { Delegate } from './Delegate';

/**
 * Procedure taking `TArgs` and returning `TResult`.
 *
 * @example
 * ```typescript
 * const multiply: Func<[number, number], number> = (x, y) => x * y;
 * ```
 */
export type Func<TArgs extends unknown[], TResult> = (...args: TArgs) => TResult;

/**
 * Procedure taking `TArgs` and returning nothing.
 */
export type Action<TArgs extends unknown[] = []> = (...args: TArgs) => void;

/**
 * Single-argument test, typically used for filtering.
 */
export type Predicate<T> = (obj: T) => boolean;

/**
 * Delegate type matching a custom function type.
 *
 * @example
 * ```typescript
 * type MathOperation = (x: number, y: number) => number;
 * const op: DelegateFor<MathOperation> = new Delegate(add);
 * ```
 */
export type DelegateFor<F> = F extends (...args: infer A extends unknown[]) => infer R
  ? Delegate<A, R>
  : never;
