import type { ClusterObject } from "../types.js";

/** A Deployment → ReplicaSet → two Pods chain plus an unowned Service. */
export function webStack(): ClusterObject[] {
  return [
    {
      apiVersion: "apps/v1",
      kind: "Deployment",
      metadata: { name: "web", namespace: "default", uid: "d1" },
    },
    {
      apiVersion: "apps/v1",
      kind: "ReplicaSet",
      metadata: {
        name: "web-abc",
        namespace: "default",
        uid: "r1",
        ownerReferences: [{ apiVersion: "apps/v1", kind: "Deployment", name: "web", uid: "d1" }],
      },
    },
    {
      apiVersion: "v1",
      kind: "Pod",
      metadata: {
        name: "web-abc-2",
        namespace: "default",
        uid: "p2",
        ownerReferences: [{ apiVersion: "apps/v1", kind: "ReplicaSet", name: "web-abc", uid: "r1" }],
      },
    },
    {
      apiVersion: "v1",
      kind: "Pod",
      metadata: {
        name: "web-abc-1",
        namespace: "default",
        uid: "p1",
        ownerReferences: [{ apiVersion: "apps/v1", kind: "ReplicaSet", name: "web-abc", uid: "r1" }],
      },
    },
    {
      apiVersion: "v1",
      kind: "Service",
      metadata: { name: "web", namespace: "default", uid: "s1" },
    },
  ];
}
