/**
 * Delegates Module
 *
 * Callable references, multicast invocation lists and the generic
 * delegate forms.
 *
 * @module domain/delegates
 */

export type { Callable } from './Delegate';
export { Delegate } from './Delegate';

export type { DelegateSource, InvocationOutcome } from './MulticastDelegate';
export { MulticastDelegate } from './MulticastDelegate';

export type { Action, DelegateFor, Func, Predicate } from './GenericDelegates';
