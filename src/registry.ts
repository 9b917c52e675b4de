/**
 * Name → factory lookup tables, one per capability category.
 *
 * Registries are populated at startup and frozen before the first run looks
 * anything up; after `freeze()` the table is read-only.
 */

import { DuplicateKeyError, RegistryFrozenError, UnknownKeyError } from './errors.js';

/**
 * Builds a component from the arguments forwarded by `Registry.create`.
 */
export type ComponentFactory<T, TArgs extends unknown[]> = (...args: TArgs) => T;

export class Registry<T, TArgs extends unknown[] = [params: Record<string, unknown>]> {
  readonly name: string;
  private readonly factories = new Map<string, ComponentFactory<T, TArgs>>();
  private isFrozen = false;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Register a factory under `key`.
   *
   * @throws {DuplicateKeyError} if the key is already taken.
   * @throws {RegistryFrozenError} once the registry has been frozen.
   */
  register(key: string, factory: ComponentFactory<T, TArgs>): this {
    if (this.isFrozen) {
      throw new RegistryFrozenError(this.name, key);
    }
    if (this.factories.has(key)) {
      throw new DuplicateKeyError(this.name, key);
    }
    this.factories.set(key, factory);
    return this;
  }

  /**
   * Construct the component registered under `key`, forwarding `args` verbatim.
   */
  create(key: string, ...args: TArgs): T {
    return this.get(key)(...args);
  }

  /**
   * Return the factory registered under `key`.
   */
  get(key: string): ComponentFactory<T, TArgs> {
    const factory = this.factories.get(key);
    if (!factory) {
      throw new UnknownKeyError(this.name, key, this.keys());
    }
    return factory;
  }

  has(key: string): boolean {
    return this.factories.has(key);
  }

  /** Registered keys, sorted. */
  keys(): string[] {
    return [...this.factories.keys()].sort();
  }

  freeze(): this {
    this.isFrozen = true;
    return this;
  }

  get frozen(): boolean {
    return this.isFrozen;
  }
}
