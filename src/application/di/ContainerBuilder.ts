/**
 * di-registry - Container Builder
 *
 * Fluent configuration for a {@link Container}.
 *
 * @example
 * ```typescript
 * const container = createContainerBuilder()
 *   .withDefaultLifetime(Lifetime.Static)
 *   .withLogger(consoleLogger)
 *   .build();
 * ```
 */

import type { ILogger } from '../logging';
import { Container } from './Container';
import type {
  ContainerOptions,
  DefaultRegistrationOptions,
  Lifetime,
} from './IDependencyInjection';

export class ContainerBuilder {
  private defaults: DefaultRegistrationOptions[] = [];
  private logger?: ILogger;

  /**
   * Set the lifetime of registrations that do not pass one
   */
  withDefaultLifetime(lifetime: Lifetime): this {
    this.defaults.push({ lifetime });
    return this;
  }

  /**
   * Append default options; later ones win per field
   */
  withDefaults(...defaults: DefaultRegistrationOptions[]): this {
    this.defaults.push(...defaults);
    return this;
  }

  /**
   * Set logger
   */
  withLogger(logger: ILogger): this {
    this.logger = logger;
    return this;
  }

  /**
   * Build a new, empty container. The builder can be reused.
   */
  build(): Container {
    const options: ContainerOptions = {
      defaults: [...this.defaults],
      logger: this.logger,
    };
    return new Container(options);
  }
}

/**
 * Create a new container builder
 */
export function createContainerBuilder(): ContainerBuilder {
  return new ContainerBuilder();
}
