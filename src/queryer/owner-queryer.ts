/**
 * Owner-reference queryer — an object's children are the stored objects that
 * name it in `metadata.ownerReferences`.
 */

import { throwIfCancelled } from "../errors.js";
import { keyFromObject, keyToString } from "../object-key.js";
import type { ClusterObject, ObjectStore, OwnerReference, Queryer, TraversalOptions } from "../types.js";

export class OwnerReferenceQueryer implements Queryer {
  constructor(private readonly store: ObjectStore) {}

  async children(object: ClusterObject, options: TraversalOptions = {}): Promise<ClusterObject[]> {
    throwIfCancelled(options.signal);

    const namespace = object.metadata.namespace;
    const candidates = await this.store.list(namespace ? { namespace } : {});
    throwIfCancelled(options.signal);

    return candidates
      .filter((candidate) => (candidate.metadata.ownerReferences ?? []).some((ref) => isOwnedBy(ref, object)))
      .map((child) => ({ child, id: keyToString(keyFromObject(child)) }))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map(({ child }) => child);
  }
}

/**
 * Match by uid when both sides carry one, otherwise by kind and name.
 * Callers only pass candidates from the owner's namespace.
 */
function isOwnedBy(ref: OwnerReference, owner: ClusterObject): boolean {
  if (ref.uid && owner.metadata.uid) {
    return ref.uid === owner.metadata.uid;
  }
  return ref.kind === owner.kind && ref.name === owner.metadata.name;
}
