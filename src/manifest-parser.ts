/**
 * Manifest parser — turn `kubectl get -o json` output into validated cluster objects.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Errors } from "@sinclair/typebox/errors";
import { Check } from "@sinclair/typebox/value";
import { ManifestParseError } from "./errors.js";
import type { ClusterObject } from "./types.js";

export const OwnerReferenceSchema = Type.Object({
  apiVersion: Type.String(),
  kind: Type.String(),
  name: Type.String(),
  uid: Type.Optional(Type.String()),
  controller: Type.Optional(Type.Boolean()),
});

export const ClusterObjectSchema = Type.Object({
  apiVersion: Type.String({ minLength: 1 }),
  kind: Type.String({ minLength: 1 }),
  metadata: Type.Object({
    name: Type.String({ minLength: 1 }),
    namespace: Type.Optional(Type.String()),
    uid: Type.Optional(Type.String()),
    resourceVersion: Type.Optional(Type.String()),
    labels: Type.Optional(Type.Record(Type.String(), Type.String())),
    annotations: Type.Optional(Type.Record(Type.String(), Type.String())),
    creationTimestamp: Type.Optional(Type.String()),
    ownerReferences: Type.Optional(Type.Array(OwnerReferenceSchema)),
  }),
  spec: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  status: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export type ClusterObjectInput = Static<typeof ClusterObjectSchema>;

const ListSchema = Type.Object({
  kind: Type.Literal("List"),
  items: Type.Array(Type.Unknown()),
});

/** Validate an unknown value as a cluster object. */
export function toClusterObject(value: unknown, position = "object"): ClusterObject {
  if (Check(ClusterObjectSchema, value)) {
    return value;
  }
  const first = [...Errors(ClusterObjectSchema, value)][0];
  const detail = first ? `${first.path || "/"}: ${first.message}` : "does not match schema";
  throw new ManifestParseError(`Invalid ${position}: ${detail}`);
}

/**
 * Parse kubectl JSON output. A `List` wrapper yields its items; anything
 * else is treated as a single object.
 */
export function parseManifestJson(json: string): ClusterObject[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ManifestParseError(`Manifest is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (Check(ListSchema, parsed)) {
    return parsed.items.map((item, index) => toClusterObject(item, `item ${index}`));
  }
  return [toClusterObject(parsed)];
}

/** Count objects per kind. */
export function getKindDistribution(objects: ClusterObject[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const object of objects) {
    counts[object.kind] = (counts[object.kind] ?? 0) + 1;
  }
  return counts;
}
