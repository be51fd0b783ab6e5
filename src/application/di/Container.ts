/**
 * @fileoverview Container - Registration and Resolution
 *
 * @packageDocumentation
 * @module di-registry/application/di
 *
 * ## Overview
 *
 * `Container` stores factories keyed by type descriptor and runs them on
 * demand. Each resolution:
 *
 * 1. looks up the type's registration group (`NotExistError` if absent);
 * 2. picks the registration (last anonymous, a named one, or all of them);
 * 3. runs its factory, or replays the memoised outcome of a Static one;
 * 4. narrows the value through the descriptor's guard.
 *
 * The container is synchronous and unsynchronised: every call completes
 * before it returns, so there is no interleaving to guard against on the
 * event loop.
 *
 * @example
 * ```typescript
 * const container = createContainer(withDefaultLifetime(Lifetime.Static));
 *
 * container
 *   .registerInstance(Types.string, 'hello')
 *   .registerConstructor(EnglishGreeter);
 *
 * container.resolve(GreeterType).greet();
 * ```
 */

import {
  NameNotExistError,
  NotExistError,
  SignatureValidationError,
} from '../../domain/exceptions';
import type { TypeDescriptor, TypeKey } from '../../domain/types';
import {
  assertConstructorShape,
  readSignature,
} from '../../infrastructure/metadata';
import type { Invocable } from '../../infrastructure/metadata';
import { silentLogger } from '../logging';
import type { ILogger } from '../logging';
import { buildRegistrationOptions } from './IDependencyInjection';
import type {
  ContainerOptions,
  DefaultRegistrationOptions,
  FactoryFn,
  IContainer,
  RegistrationOption,
} from './IDependencyInjection';
import { invoke } from './invoke';
import { RegistrationGroup, RegistrationItem } from './registration';

// ==================== Container ====================

export class Container implements IContainer {
  private readonly groups = new Map<TypeKey, RegistrationGroup>();
  private readonly defaults: readonly DefaultRegistrationOptions[];
  private readonly logger: ILogger;

  /** Registrations currently being produced, outermost first */
  private readonly resolutionPath: string[] = [];

  constructor(options: ContainerOptions = {}) {
    this.defaults = options.defaults ?? [];
    this.logger = options.logger ?? silentLogger;
  }

  // ==================== Registration ====================

  registerInstance<T>(
    type: TypeDescriptor<T>,
    instance: T,
    ...options: RegistrationOption[]
  ): this {
    return this.register(type, () => instance, options, 'instance');
  }

  registerDynamic<T>(
    type: TypeDescriptor<T>,
    factory: FactoryFn<T>,
    ...options: RegistrationOption[]
  ): this {
    return this.register(type, factory, options, 'factory');
  }

  /**
   * Register a callable under its declared return type.
   *
   * @remarks
   * Options from `@Injectable()` apply after the container defaults and
   * before the ones passed here.
   */
  registerConstructor(
    constructor: Invocable,
    ...options: RegistrationOption[]
  ): this {
    const signature = readSignature(constructor);
    const type = assertConstructorShape(signature);

    return this.register(
      type,
      (resolver) => invoke(resolver, constructor),
      [signature.registration, ...options],
      `constructor '${signature.name}'`,
    );
  }

  replaceDynamic<T>(
    type: TypeDescriptor<T>,
    factory: FactoryFn<T>,
    ...options: RegistrationOption[]
  ): this {
    return this.removeAll(type).registerDynamic(type, factory, ...options);
  }

  replaceInstance<T>(
    type: TypeDescriptor<T>,
    instance: T,
    ...options: RegistrationOption[]
  ): this {
    return this.removeAll(type).registerInstance(type, instance, ...options);
  }

  removeAll(type: TypeDescriptor): this {
    const group = this.groups.get(type.key);
    if (group) {
      this.groups.delete(type.key);
      this.logger.debug(
        `Removed ${group.size} registration(s) of '${type.name}'`,
      );
    }
    return this;
  }

  has(type: TypeDescriptor, name?: string): boolean {
    const group = this.groups.get(type.key);
    if (!group) return false;
    if (name === undefined) return true;
    return name === '' ? group.hasAnonymous() : group.byName(name) !== undefined;
  }

  private register(
    type: TypeDescriptor,
    factory: FactoryFn,
    overrides: readonly RegistrationOption[],
    source: string,
  ): this {
    const options = buildRegistrationOptions(this.defaults, overrides);

    let group = this.groups.get(type.key);
    if (!group) {
      group = new RegistrationGroup();
      this.groups.set(type.key, group);
    }

    const replaced = group.add(new RegistrationItem(type.name, factory, options));

    this.logger.debug(`Registered ${source} for '${type.name}'`, {
      lifetime: options.lifetime,
      name: options.name,
      replaced: replaced !== undefined,
    });
    return this;
  }

  // ==================== Resolution ====================

  resolve<T>(type: TypeDescriptor<T>): T {
    const item = this.groupOf(type).primary();
    if (!item) throw this.notExist(type);

    return this.narrow(type, this.produce(item, labelOf(item)));
  }

  resolveAll<T>(type: TypeDescriptor<T>): T[] {
    return this.groupOf(type)
      .all()
      .map((item) => this.narrow(type, this.produce(item, labelOf(item))));
  }

  resolveByName<T>(type: TypeDescriptor<T>, name: string): T {
    const item = this.groupOf(type).byName(name);
    if (!item) {
      throw new NameNotExistError(
        type.name,
        name,
        this.renderGraph(`${type.name} [${name}] (UNREGISTERED NAME)`),
      );
    }

    return this.narrow(type, this.produce(item, labelOf(item)));
  }

  resolveMap<T>(type: TypeDescriptor<T>): Map<string, T> {
    const resolved = new Map<string, T>();
    for (const [name, item] of this.groupOf(type).namedEntries()) {
      resolved.set(name, this.narrow(type, this.produce(item, labelOf(item))));
    }
    return resolved;
  }

  private groupOf(type: TypeDescriptor): RegistrationGroup {
    const group = this.groups.get(type.key);
    if (!group || group.size === 0) throw this.notExist(type);
    return group;
  }

  private produce(item: RegistrationItem, label: string): unknown {
    const replaying = item.hasMemoisedFailure;
    this.resolutionPath.push(label);

    try {
      return item.produce(this);
    } catch (error) {
      if (!replaying && item.hasMemoisedFailure) {
        this.logger.warn(
          `Static registration '${label}' failed; the failure is kept for the life of the container`,
          error,
        );
      }
      throw error;
    } finally {
      this.resolutionPath.pop();
    }
  }

  private narrow<T>(type: TypeDescriptor<T>, value: unknown): T {
    if (type.is(value)) return value;
    throw new SignatureValidationError(
      `unable to cast instance to '${type.name}'`,
    );
  }

  // ==================== Diagnostics ====================

  private notExist(type: TypeDescriptor): NotExistError {
    return new NotExistError(
      type.name,
      this.renderGraph(`${type.name} (UNREGISTERED)`),
    );
  }

  /**
   * Render the current resolution path, ending in the failed lookup:
   *
   * ```
   * └─ Aggregate
   *   └─ Dependency (UNREGISTERED)
   * ```
   */
  private renderGraph(failed: string): string {
    if (this.resolutionPath.length === 0) return '';

    return [...this.resolutionPath, failed]
      .map((entry, depth) => `${'  '.repeat(depth)}└─ ${entry}`)
      .join('\n');
  }
}

function labelOf(item: RegistrationItem): string {
  const { name } = item.options;
  return name === '' ? item.typeName : `${item.typeName} [${name}]`;
}

/**
 * Create a container applying the given defaults to every registration.
 *
 * @example
 * ```typescript
 * const container = createContainer(withDefaultLifetime(Lifetime.Static));
 * ```
 */
export function createContainer(
  ...defaults: DefaultRegistrationOptions[]
): Container {
  return new Container({ defaults });
}
