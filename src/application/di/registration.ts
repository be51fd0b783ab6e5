/**
 * di-registry - Registration Store
 *
 * One {@link RegistrationGroup} per type key; each group holds the type's
 * anonymous and named {@link RegistrationItem}s.
 */

import {
  DependencyResolutionError,
  FactoryError,
  isDependencyError,
} from '../../domain/exceptions';
import { Lifetime } from './IDependencyInjection';
import type {
  FactoryFn,
  RegistrationOptions,
  Resolver,
} from './IDependencyInjection';

type Outcome =
  | { readonly settled: false }
  | { readonly settled: true; readonly value: unknown }
  | { readonly settled: true; readonly failure: DependencyResolutionError };

function toDependencyFailure(
  typeName: string,
  error: unknown,
): DependencyResolutionError {
  return isDependencyError(error) ? error : new FactoryError(typeName, error);
}

/**
 * A factory plus its effective options and, for Static registrations, the
 * memoised outcome of its first run.
 */
export class RegistrationItem {
  private outcome: Outcome = { settled: false };

  constructor(
    public readonly typeName: string,
    private readonly factory: FactoryFn,
    public readonly options: Readonly<RegistrationOptions>,
  ) {}

  get isStatic(): boolean {
    return this.options.lifetime === Lifetime.Static;
  }

  /**
   * Whether a Static item has already run and failed.
   */
  get hasMemoisedFailure(): boolean {
    return this.outcome.settled && 'failure' in this.outcome;
  }

  /**
   * Run the factory, or replay the memoised outcome of a Static item.
   *
   * @throws DependencyResolutionError raised by the factory, unchanged
   * @throws FactoryError wrapping anything else the factory throws
   */
  produce(resolver: Resolver): unknown {
    const { outcome } = this;
    if (outcome.settled) {
      if ('failure' in outcome) throw outcome.failure;
      return outcome.value;
    }

    let value: unknown;
    try {
      value = this.factory(resolver);
    } catch (error) {
      const failure = toDependencyFailure(this.typeName, error);
      if (this.isStatic) this.outcome = { settled: true, failure };
      throw failure;
    }

    if (this.isStatic) this.outcome = { settled: true, value };
    return value;
  }
}

/**
 * Every registration of one type.
 *
 * @remarks
 * Anonymous items keep insertion order. Named items are unique per name;
 * registering a name again replaces the item and moves it to the end of the
 * named order.
 */
export class RegistrationGroup {
  private readonly anonymous: RegistrationItem[] = [];
  private readonly named = new Map<string, RegistrationItem>();

  /**
   * @returns The item the new one replaced, if any
   */
  add(item: RegistrationItem): RegistrationItem | undefined {
    const { name } = item.options;
    if (name === '') {
      this.anonymous.push(item);
      return undefined;
    }

    const replaced = this.named.get(name);
    this.named.delete(name);
    this.named.set(name, item);
    return replaced;
  }

  /**
   * Item used by a plain resolve: the last anonymous one, or the most
   * recently registered named one when there are no anonymous items.
   */
  primary(): RegistrationItem | undefined {
    const lastAnonymous = this.anonymous[this.anonymous.length - 1];
    if (lastAnonymous) return lastAnonymous;

    let lastNamed: RegistrationItem | undefined;
    for (const item of this.named.values()) lastNamed = item;
    return lastNamed;
  }

  hasAnonymous(): boolean {
    return this.anonymous.length > 0;
  }

  byName(name: string): RegistrationItem | undefined {
    return this.named.get(name);
  }

  /** Named items first, then anonymous ones. */
  all(): RegistrationItem[] {
    return [...this.named.values(), ...this.anonymous];
  }

  namedEntries(): [string, RegistrationItem][] {
    return [...this.named.entries()];
  }

  get size(): number {
    return this.anonymous.length + this.named.size;
  }
}
