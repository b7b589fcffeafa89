/**
 * DI Container Setup
 *
 * Registers loggers, configuration, output and demos in a child of the
 * global TSyringe container, so each CLI run (and each test) gets its own
 * singletons.
 *
 * @module interfaces/cli/container
 */

import 'reflect-metadata';
import { container, type DependencyContainer } from 'tsyringe';

// ============================================================================
// Core Interfaces
// ============================================================================

import type { ILogger } from '@/infrastructure/interfaces/ILogger';
import type { IOutput } from '@/infrastructure/interfaces/IOutput';
import type { IConfigRepository } from '@/infrastructure/interfaces/IConfigRepository';

// ============================================================================
// Core Implementations
// ============================================================================

import { ConsoleLogger } from '@/infrastructure/logger';
import { ConsoleOutput } from '@/infrastructure/output/ConsoleOutput';
import { EnvConfigRepository, type EnvironmentSource } from '@/infrastructure/repositories';
import { AppConfigService } from '@/infrastructure/config/AppConfig';

// ============================================================================
// Application
// ============================================================================

import type { Demo } from '@/application/demos/Demo';
import { DelegatesDemo } from '@/application/demos/DelegatesDemo';
import { MulticastFailureDemo } from '@/application/demos/MulticastFailureDemo';
import { EventsDemo } from '@/application/demos/EventsDemo';
import { DemoRunner } from '@/application/services/DemoRunner';

export interface ContainerOptions {
  /** Environment read by the configuration repository */
  env: EnvironmentSource;
  /** Output sink; standard output when omitted */
  output?: IOutput;
}

/**
 * Creates a configured child container.
 */
export function createContainer(options: ContainerOptions): DependencyContainer {
  const child = container.createChildContainer();

  // ------------------------------------------------------------------------
  // Register Core Interfaces
  // ------------------------------------------------------------------------

  child.registerSingleton(ConsoleLogger);
  child.register<ILogger>('ILogger', { useToken: ConsoleLogger });
  child.register<EnvironmentSource>('Environment', { useValue: options.env });
  child.registerSingleton<IConfigRepository>('IConfigRepository', EnvConfigRepository);
  child.registerSingleton('AppConfigService', AppConfigService);

  if (options.output) {
    child.register<IOutput>('IOutput', { useValue: options.output });
  } else {
    child.registerSingleton<IOutput>('IOutput', ConsoleOutput);
  }

  // ------------------------------------------------------------------------
  // Register Demos (in default run order)
  // ------------------------------------------------------------------------

  child.register<Demo>('Demo', { useClass: DelegatesDemo });
  child.register<Demo>('Demo', { useClass: MulticastFailureDemo });
  child.register<Demo>('Demo', { useClass: EventsDemo });
  child.registerSingleton(DemoRunner);

  return child;
}
