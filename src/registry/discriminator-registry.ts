/**
 * Explicit mapping from stored discriminator strings to the handlers that
 * reconstruct them.
 *
 * Entries only ever come from `register()` calls; nothing is resolved by
 * inspecting type or class names at runtime.
 *
 * @module registry/discriminator-registry
 */

import { UnknownVariantError } from '../errors.js';

export class DiscriminatorRegistry<T> {
  private entries: Map<string, T> = new Map();

  /**
   * @param label - What the registry resolves, used in error messages
   *   (e.g. "attribute variant", "record kind")
   */
  constructor(private readonly label: string) {}

  /**
   * Register an entry under one or more discriminators.
   * Re-registering a discriminator replaces the previous entry.
   */
  register(entry: T, ...discriminators: string[]): this {
    for (const discriminator of discriminators) {
      this.entries.set(discriminator, entry);
    }
    return this;
  }

  has(discriminator: string): boolean {
    return this.entries.has(discriminator);
  }

  /**
   * Look up the entry for a discriminator.
   *
   * @throws {UnknownVariantError} if the discriminator was never registered
   */
  resolve(discriminator: string): T {
    const entry = this.entries.get(discriminator);
    if (entry === undefined) {
      throw new UnknownVariantError(discriminator, this.label);
    }
    return entry;
  }

  /** Registered discriminators, in registration order. */
  get discriminators(): string[] {
    return Array.from(this.entries.keys());
  }
}
