/**
 * Delegates Demo
 *
 * Walks through custom delegate types, explicit delegate construction,
 * multicast invocation (combined and per member), the generic forms
 * `Func`, `Action` and `Predicate`, lambdas, method references and
 * anonymous functions.
 *
 * @module application/demos/DelegatesDemo
 */

import { injectable, inject } from 'tsyringe';
import type { ILogger } from '@/infrastructure/interfaces/ILogger';
import type { IOutput } from '@/infrastructure/interfaces/IOutput';
import { Delegate } from '@/domain/delegates/Delegate';
import { MulticastDelegate } from '@/domain/delegates/MulticastDelegate';
import type { Action, DelegateFor, Func, Predicate } from '@/domain/delegates/GenericDelegates';
import { add, multiply, type MathOperation } from '@/domain/services/ArithmeticOperations';
import type { Demo } from './Demo';

/**
 * Custom delegate type for log sinks.
 */
export type LogOperation = (message: string) => void;

@injectable()
export class DelegatesDemo implements Demo {
  readonly name = 'delegates' as const;

  constructor(
    @inject('IOutput') private readonly output: IOutput,
    @inject('ILogger') private readonly logger: ILogger
  ) {}

  run(): void {
    this.logger.info('Running delegates demo');
    this.customDelegates();
    this.multicastDelegates();
    this.genericDelegates();
    this.lambdasAndMethodReferences();
  }

  // ==========================================================================
  // Sections
  // ==========================================================================

  private customDelegates(): void {
    // A function value typed by a custom delegate type
    const addOperation: MathOperation = add;
    this.output.writeLine(`Custom delegate: ${addOperation(2, 3)}`);

    // The same reference as an explicit Delegate object, invoked through invoke()
    const explicitAddOperation: DelegateFor<MathOperation> = new Delegate(add);
    this.output.writeLine(
      `Custom delegate with explicit construction: ${explicitAddOperation.invoke(2, 3)}`
    );
  }

  private multicastDelegates(): void {
    const logMessage = new Delegate(this.logMessage, this);
    const warnMessage = new Delegate(this.warnMessage, this);

    let messageDelegate: MulticastDelegate<Parameters<Action<[string]>>, void> | null = null;
    messageDelegate = MulticastDelegate.combine(messageDelegate, logMessage);
    messageDelegate = MulticastDelegate.combine(messageDelegate, warnMessage);
    messageDelegate?.invoke('Multicast delegate example');

    const logOperation: MulticastDelegate<Parameters<LogOperation>, void> | null =
      MulticastDelegate.of(logMessage, warnMessage);
    logOperation?.invoke('Log and Warn using LogOperation delegate');

    this.output.writeLine();
    this.output.writeLine('Multicast approach using getInvocationList for LogOperation:');
    for (const member of logOperation?.getInvocationList() ?? []) {
      try {
        member.invoke('Invoked individually via getInvocationList');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.output.writeLine(`Error invoking delegate: ${errorMessage}`);
      }
    }

    // Intermediate results are discarded; only multiply's result comes back
    const mathOperations = MulticastDelegate.of<Parameters<MathOperation>, number>(add, multiply);
    this.output.writeLine(`Multicast return value: ${mathOperations?.invoke(2, 3)}`);
  }

  private genericDelegates(): void {
    const output = this.output;

    const multiplyOperation: Func<[number, number], number> = (x, y) => x * y;
    output.writeLine(`Func delegate: ${multiplyOperation(3, 4)}`);

    const sumOperation: Func<[number, number], number> = function (x, y) {
      return x + y;
    };
    output.writeLine(`Anonymous Func delegate: ${sumOperation(3, 4)}`);

    const greetAction: Action<[string]> = (name) => output.writeLine(`Hello, ${name}!`);
    greetAction('World');

    const logAction: Action<[string]> = function (message) {
      output.writeLine(`Action delegate log: ${message}`);
    };
    logAction('This is a log message using Action delegate');

    const isEvenPredicate: Predicate<number> = (n) => n % 2 === 0;
    output.writeLine(`Predicate delegate: ${isEvenPredicate(10)}`);

    const isPositivePredicate: Predicate<number> = function (n) {
      return n > 0;
    };
    output.writeLine(`Predicate delegate for positive check: ${isPositivePredicate(5)}`);
  }

  private lambdasAndMethodReferences(): void {
    const subtractOperation: MathOperation = (x, y) => x - y;
    this.output.writeLine(`Lambda delegate: ${subtractOperation(5, 2)}`);

    const multiplyMethodOperation: DelegateFor<MathOperation> = new Delegate(multiply);
    this.output.writeLine(`Method group delegate: ${multiplyMethodOperation.invoke(6, 7)}`);

    // Anonymous function expression; integer division like the other operations
    const anonymousOperation: MathOperation = function (x, y) {
      return Math.trunc(x / y);
    };
    this.output.writeLine(`Anonymous delegate: ${anonymousOperation(10, 2)}`);
  }

  // ==========================================================================
  // Delegate Targets
  // ==========================================================================

  private logMessage(message: string): void {
    this.output.writeLine(`Log: ${message}`);
  }

  private warnMessage(message: string): void {
    this.output.writeLine(`Warning: ${message}`);
  }
}
