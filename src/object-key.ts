/**
 * Object keys — deterministic identity derived from type and identity metadata.
 */

import { InvalidObjectError } from "./errors.js";
import type { ClusterObject, ObjectKey } from "./types.js";

/**
 * Derive the key of an object. Only apiVersion, kind, namespace and name
 * participate; resourceVersion, labels, spec and status never do.
 */
export function keyFromObject(object: ClusterObject): ObjectKey {
  const missing: string[] = [];
  if (!object.apiVersion) missing.push("apiVersion");
  if (!object.kind) missing.push("kind");
  if (!object.metadata?.name) missing.push("metadata.name");
  if (missing.length > 0) throw new InvalidObjectError(missing);

  return Object.freeze({
    apiVersion: object.apiVersion,
    kind: object.kind,
    namespace: object.metadata.namespace ?? "",
    name: object.metadata.name,
  });
}

/**
 * Format: `{apiVersion}:{kind}:{namespace}:{name}`
 */
export function keyToString(key: ObjectKey): string {
  return `${key.apiVersion}:${key.kind}:${key.namespace}:${key.name}`;
}

export function keysEqual(a: ObjectKey, b: ObjectKey): boolean {
  return keyToString(a) === keyToString(b);
}

/** Graph node id: the object's uid, falling back to the key string. */
export function nodeIdFor(object: ClusterObject): string {
  const key = keyFromObject(object);
  return object.metadata.uid || keyToString(key);
}
