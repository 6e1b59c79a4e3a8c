/**
 * InMemoryTaskStore
 *
 * Ephemeral store scoped to a single pipeline run.
 * Backed by a Map with composite keys; computes SHA-256 hashes on set.
 */

import { contentHash } from "../shared/hash.js";
import type { TaskStore, ProducedRef, StoreKind, StoreValues } from "./types.js";

export class InMemoryTaskStore implements TaskStore {
  private data = new Map<string, unknown>();

  private key(kind: StoreKind, id: string): string {
    return `${kind}::${id}`;
  }

  set<K extends StoreKind>(kind: K, id: string, value: StoreValues[K]): ProducedRef {
    this.data.set(this.key(kind, id), value);
    return { kind, id, hash: contentHash(value) };
  }

  get<K extends StoreKind>(kind: K, id: string): StoreValues[K] {
    const k = this.key(kind, id);
    if (!this.data.has(k)) {
      throw new Error(`TaskStore: key not found: ${k}`);
    }
    // set() is the only writer and is typed per kind
    return this.data.get(k) as StoreValues[K];
  }

  has(kind: StoreKind, id: string): boolean {
    return this.data.has(this.key(kind, id));
  }

  clear(): void {
    this.data.clear();
  }

  get size(): number {
    return this.data.size;
  }
}
