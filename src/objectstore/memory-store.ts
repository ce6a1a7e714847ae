/**
 * In-memory object store backed by a Map keyed by object key.
 */

import { keyFromObject, keyToString } from "../object-key.js";
import type { ClusterObject, ObjectKey, ObjectListFilter, ObjectStore } from "../types.js";

export class MemoryObjectStore implements ObjectStore {
  private objects = new Map<string, ClusterObject>();

  constructor(initial: ClusterObject[] = []) {
    for (const object of initial) {
      this.objects.set(keyToString(keyFromObject(object)), object);
    }
  }

  async get(key: ObjectKey): Promise<ClusterObject | null> {
    return this.objects.get(keyToString(key)) ?? null;
  }

  async list(filter: ObjectListFilter = {}): Promise<ClusterObject[]> {
    const result: ClusterObject[] = [];
    for (const object of this.objects.values()) {
      if (filter.kind !== undefined && object.kind !== filter.kind) continue;
      if (filter.namespace !== undefined && (object.metadata.namespace ?? "") !== filter.namespace) continue;
      result.push(object);
    }
    return result;
  }

  async put(object: ClusterObject): Promise<void> {
    this.objects.set(keyToString(keyFromObject(object)), object);
  }

  async delete(key: ObjectKey): Promise<boolean> {
    return this.objects.delete(keyToString(key));
  }

  get size(): number {
    return this.objects.size;
  }
}
