/* =======================================================================================
 * NAMESPACE STORE
 * ---------------------------------------------------------------------------------------
 * Keyed, write-once tables that statements publish cross references into and
 * look them up from. A partition names one logical table; its scope decides
 * which storage a write lands in and which storages a lookup consults:
 *
 *   global  one table for the whole compilation
 *   root    one table per module root (writes and lookups go to ctx.root)
 *   local   one table per context, no inheritance
 *   tree    one table per context; lookups walk up through the ancestors
 * ======================================================================================= */

import type { DiagnosticStage } from "../model/diagnostics.js";
import type { SourceLocation } from "../model/source.js";
import { NamespaceWriteError } from "../shared/errors.js";

export type NamespaceScope = "global" | "root" | "local" | "tree";

export interface NamespacePartition<K, V> {
  readonly name: string;
  readonly scope: NamespaceScope;
  /** Stable string form of a key; equal keys must encode equally. */
  encodeKey(key: K): string;
  /** Type-only marker; never set at runtime. */
  readonly __entry?: { key: K; value: V };
}

export function definePartition<K, V>(
  name: string,
  scope: NamespaceScope,
  encodeKey: (key: K) => string = String,
): NamespacePartition<K, V> {
  return { name, scope, encodeKey };
}

/** Context id used by storages; `null` is the global storage. */
export type StorageOwner = number | null;

/** Tree shape the store needs to pick storages; implemented by the context tree. */
export interface ScopeResolver {
  parentOf(id: number): number | null;
  rootOf(id: number): number;
  locationOf(id: number): SourceLocation;
}

export interface NamespaceEntry<V> {
  readonly key: unknown;
  readonly value: V;
}

type Table = Map<string, NamespaceEntry<unknown>>;

export type NamespaceWriteListener = (partition: string, encodedKey: string) => void;

export class NamespaceStore {
  readonly #global = new Map<string, Table>();
  readonly #local = new Map<number, Map<string, Table>>();
  readonly #listeners: NamespaceWriteListener[] = [];
  #writes = 0;

  constructor(
    private readonly scopes: ScopeResolver,
    private readonly stage: () => DiagnosticStage,
  ) {}

  get writeCount(): number {
    return this.#writes;
  }

  onWrite(listener: NamespaceWriteListener): void {
    this.#listeners.push(listener);
  }

  /**
   * Publish `value` under `key`. A second write of the same key into the same
   * storage fails, whatever the value.
   *
   * @param from - the context performing the write; `null` only for global partitions
   */
  write<K, V>(from: number | null, partition: NamespacePartition<K, V>, key: K, value: V): void {
    const owner = this.ownerForWrite(from, partition);
    const encoded = partition.encodeKey(key);
    const table = this.table(owner, partition.name, true);
    if (table.has(encoded)) {
      throw new NamespaceWriteError(
        partition.name,
        encoded,
        from === null ? null : this.scopes.locationOf(from),
        this.stage(),
      );
    }
    table.set(encoded, { key, value });
    this.#writes++;
    for (const listener of this.#listeners) listener(partition.name, encoded);
  }

  /** Look a key up; `undefined` while nobody has published it. */
  read<K, V>(from: number | null, partition: NamespacePartition<K, V>, key: K): V | undefined {
    const encoded = partition.encodeKey(key);
    for (const owner of this.ownersForRead(from, partition)) {
      const entry = this.table(owner, partition.name, false)?.get(encoded);
      // Entries of a partition are only ever written through write<K, V> above.
      if (entry) return entry.value as V;
    }
    return undefined;
  }

  /** Entries visible in exactly one storage (no ancestor walk), in insertion order. */
  entries<K, V>(from: number | null, partition: NamespacePartition<K, V>): readonly NamespaceEntry<V>[] {
    const owner = this.ownerForWrite(from, partition);
    const table = this.table(owner, partition.name, false);
    if (!table) return [];
    return [...table.values()].map((entry) => ({ key: entry.key, value: entry.value as V }));
  }

  private ownerForWrite<K, V>(from: number | null, partition: NamespacePartition<K, V>): StorageOwner {
    if (partition.scope === "global") return null;
    if (from === null) {
      throw new Error(`Partition '${partition.name}' (${partition.scope}) needs a context`);
    }
    return partition.scope === "root" ? this.scopes.rootOf(from) : from;
  }

  private *ownersForRead<K, V>(from: number | null, partition: NamespacePartition<K, V>): Iterable<StorageOwner> {
    if (partition.scope !== "tree") {
      yield this.ownerForWrite(from, partition);
      return;
    }
    let current = from;
    while (current !== null) {
      yield current;
      current = this.scopes.parentOf(current);
    }
  }

  private table(owner: StorageOwner, name: string, create: true): Table;
  private table(owner: StorageOwner, name: string, create: false): Table | undefined;
  private table(owner: StorageOwner, name: string, create: boolean): Table | undefined {
    let tables: Map<string, Table> | undefined;
    if (owner === null) {
      tables = this.#global;
    } else {
      tables = this.#local.get(owner);
      if (!tables) {
        if (!create) return undefined;
        tables = new Map();
        this.#local.set(owner, tables);
      }
    }
    let table = tables.get(name);
    if (!table && create) {
      table = new Map();
      tables.set(name, table);
    }
    return table;
  }
}
