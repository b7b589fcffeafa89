/**
 * Multicast Delegate
 *
 * An ordered, immutable invocation list of delegates sharing one
 * signature. Combining and removing produce new lists; an empty result is
 * represented by `null`, the same "no delegate" state an unsubscribed
 * event starts in.
 *
 * Because a list never changes after construction, every invocation works
 * on a snapshot: handlers added or removed while a list is being invoked
 * only affect later invocations.
 *
 * @module domain/delegates/MulticastDelegate
 */

import { Delegate, type Callable } from './Delegate';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Anything that can be combined into an invocation list.
 */
export type DelegateSource<TArgs extends unknown[], TResult> =
  | Callable<TArgs, TResult>
  | Delegate<TArgs, TResult>
  | MulticastDelegate<TArgs, TResult>;

/**
 * Result of invoking one member in isolation.
 */
export type InvocationOutcome<TArgs extends unknown[], TResult> =
  | {
      status: 'fulfilled';
      /** Member that was invoked */
      delegate: Delegate<TArgs, TResult>;
      /** Value the member returned */
      value: TResult;
    }
  | {
      status: 'rejected';
      /** Member that was invoked */
      delegate: Delegate<TArgs, TResult>;
      /** Error the member threw */
      reason: unknown;
    };

type InvocationList<TArgs extends unknown[], TResult> = readonly [
  Delegate<TArgs, TResult>,
  ...Delegate<TArgs, TResult>[],
];

// ============================================================================
// Multicast Delegate Implementation
// ============================================================================

/**
 * Ordered invocation list.
 *
 * @example
 * ```typescript
 * let log: MulticastDelegate<[string], void> | null = null;
 * log = MulticastDelegate.combine(log, logMessage);
 * log = MulticastDelegate.combine(log, warnMessage);
 * log?.invoke('disk almost full'); // logMessage, then warnMessage
 *
 * const math = MulticastDelegate.combine(add, multiply);
 * math?.invoke(2, 3); // 6, only the last member's result is returned
 * ```
 */
export class MulticastDelegate<TArgs extends unknown[], TResult> {
  private constructor(private readonly list: InvocationList<TArgs, TResult>) {}

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * Concatenates the invocation lists of `a` and `b`, in that order.
   *
   * @returns The combined list, or null when both sides are absent
   */
  static combine<TArgs extends unknown[], TResult>(
    a: DelegateSource<TArgs, TResult> | null | undefined,
    b: DelegateSource<TArgs, TResult> | null | undefined
  ): MulticastDelegate<TArgs, TResult> | null {
    return MulticastDelegate.fromList([
      ...MulticastDelegate.toList(a),
      ...MulticastDelegate.toList(b),
    ]);
  }

  /**
   * Builds a list from the given sources, in order.
   */
  static of<TArgs extends unknown[], TResult>(
    ...sources: DelegateSource<TArgs, TResult>[]
  ): MulticastDelegate<TArgs, TResult> | null {
    return MulticastDelegate.fromList(sources.flatMap((source) => MulticastDelegate.toList(source)));
  }

  /**
   * Removes the last occurrence of `value`'s invocation list from `source`.
   *
   * A multicast `value` only matches where its members appear as one
   * contiguous run in the same order.
   *
   * @returns The reduced list; `source` itself when nothing matched; null
   *   when no member remains
   */
  static remove<TArgs extends unknown[], TResult>(
    source: MulticastDelegate<TArgs, TResult> | null | undefined,
    value: DelegateSource<TArgs, TResult> | null | undefined
  ): MulticastDelegate<TArgs, TResult> | null {
    if (!source) {
      return null;
    }
    const reduced = removeLastRun(source.list, MulticastDelegate.toList(value));
    return reduced === source.list ? source : MulticastDelegate.fromList(reduced);
  }

  /**
   * Removes every occurrence of `value`'s invocation list from `source`.
   */
  static removeAll<TArgs extends unknown[], TResult>(
    source: MulticastDelegate<TArgs, TResult> | null | undefined,
    value: DelegateSource<TArgs, TResult> | null | undefined
  ): MulticastDelegate<TArgs, TResult> | null {
    let current = source ?? null;
    let previous: MulticastDelegate<TArgs, TResult> | null;
    do {
      previous = current;
      current = MulticastDelegate.remove(current, value);
    } while (current !== null && current !== previous);
    return current;
  }

  // ==========================================================================
  // Public Methods
  // ==========================================================================

  /** Number of members in the invocation list. */
  get length(): number {
    return this.list.length;
  }

  /**
   * Invokes every member in registration order.
   *
   * Only the last member's return value reaches the caller. An error from
   * any member propagates immediately and the remaining members are not
   * invoked.
   */
  invoke(...args: TArgs): TResult {
    const [first, ...rest] = this.list;
    let result = first.invoke(...args);
    for (const member of rest) {
      result = member.invoke(...args);
    }
    return result;
  }

  /**
   * Invokes every member separately, catching each member's error so that
   * later members still run.
   *
   * @returns One outcome per member, in registration order
   */
  invokeEach(...args: TArgs): InvocationOutcome<TArgs, TResult>[] {
    return this.getInvocationList().map((delegate): InvocationOutcome<TArgs, TResult> => {
      try {
        return { status: 'fulfilled', delegate, value: delegate.invoke(...args) };
      } catch (reason) {
        return { status: 'rejected', delegate, reason };
      }
    });
  }

  /**
   * Snapshot of the members, for invoking each one individually.
   */
  getInvocationList(): Delegate<TArgs, TResult>[] {
    return [...this.list];
  }

  equals(other: MulticastDelegate<TArgs, TResult>): boolean {
    return (
      this.list.length === other.list.length &&
      this.list.every((member, index) => other.list[index]?.equals(member) === true)
    );
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private static toList<TArgs extends unknown[], TResult>(
    source: DelegateSource<TArgs, TResult> | null | undefined
  ): readonly Delegate<TArgs, TResult>[] {
    if (!source) {
      return [];
    }
    if (source instanceof MulticastDelegate) {
      return source.list;
    }
    return [Delegate.from(source)];
  }

  private static fromList<TArgs extends unknown[], TResult>(
    list: readonly Delegate<TArgs, TResult>[]
  ): MulticastDelegate<TArgs, TResult> | null {
    const [first, ...rest] = list;
    return first === undefined ? null : new MulticastDelegate([first, ...rest]);
  }
}

/**
 * Returns `list` without the last contiguous run equal to `run`, or `list`
 * itself when there is no such run.
 */
function removeLastRun<TArgs extends unknown[], TResult>(
  list: readonly Delegate<TArgs, TResult>[],
  run: readonly Delegate<TArgs, TResult>[]
): readonly Delegate<TArgs, TResult>[] {
  if (run.length === 0 || run.length > list.length) {
    return list;
  }
  for (let start = list.length - run.length; start >= 0; start--) {
    const matches = run.every((member, offset) => list[start + offset]?.equals(member) === true);
    if (matches) {
      return [...list.slice(0, start), ...list.slice(start + run.length)];
    }
  }
  return list;
}
