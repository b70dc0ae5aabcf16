import { Data } from "effect"

export namespace Stored {
  export class String extends Data.TaggedClass("String")<{
    readonly value: string
  }> {}

  // mutated in place by HSET
  export class Hash extends Data.TaggedClass("Hash")<{
    readonly value: Map<string, string>
  }> {}
}

export type StoredValue = Stored.String | Stored.Hash

/**
 * Keyed container for stored values. It knows nothing about commands or the
 * wire protocol; keys are only ever added or overwritten.
 */
export class Store {
  private readonly entries = new Map<string, StoredValue>()

  get(key: string): StoredValue | undefined {
    return this.entries.get(key)
  }

  set(key: string, value: StoredValue): void {
    this.entries.set(key, value)
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  get size(): number {
    return this.entries.size
  }
}
