import type { StageFactory } from "../types/stream.ts";

/**
 * Maps stage names to factories. The chain compiler only ever calls
 * `resolve`; how a catalog gets populated is up to its owner.
 */
export class StageCatalog {
  private readonly factories = new Map<string, StageFactory>();

  constructor(entries?: Iterable<readonly [string, StageFactory]>) {
    for (const [name, factory] of entries ?? []) {
      this.register(name, factory);
    }
  }

  register(name: string, factory: StageFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  unregister(name: string): boolean {
    return this.factories.delete(name);
  }

  resolve(name: string): StageFactory | undefined {
    return this.factories.get(name);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  /** A new catalog holding this one's entries, then `other`'s (which win on clashes). */
  merge(other: StageCatalog): StageCatalog {
    return new StageCatalog([...this.factories, ...other.factories]);
  }
}
