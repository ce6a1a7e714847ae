/**
 * Resource viewer types — cluster objects, keys, rendered graph, collaborators.
 */

/* ---------- Cluster Object ---------- */

export interface OwnerReference {
  apiVersion: string;
  kind: string;
  name: string;
  uid?: string;
  controller?: boolean;
}

export interface ObjectMetadata {
  name: string;
  namespace?: string;
  uid?: string;
  resourceVersion?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  creationTimestamp?: string;
  ownerReferences?: OwnerReference[];
}

export interface ClusterObject {
  apiVersion: string;
  kind: string;
  metadata: ObjectMetadata;
  spec?: Record<string, unknown>;
  status?: Record<string, unknown>;
}

/* ---------- Object Key ---------- */

export interface ObjectKey {
  readonly apiVersion: string;
  readonly kind: string;
  /** Empty for cluster-scoped objects. */
  readonly namespace: string;
  readonly name: string;
}

/* ---------- Collaborators ---------- */

export interface TraversalOptions {
  signal?: AbortSignal;
}

/** Returns the direct children of an object. */
export interface Queryer {
  children(object: ClusterObject, options?: TraversalOptions): Promise<ClusterObject[]>;
}

export interface ObjectListFilter {
  namespace?: string;
  kind?: string;
}

export interface ObjectStore {
  get(key: ObjectKey): Promise<ClusterObject | null>;
  list(filter?: ObjectListFilter): Promise<ClusterObject[]>;
  put(object: ClusterObject): Promise<void>;
  delete(key: ObjectKey): Promise<boolean>;
}

/** Collaborator bundle injected into the viewer and cache. */
export interface DashConfig {
  objectStore(): ObjectStore;
  objectPath(apiVersion: string, kind: string, name: string, namespace?: string): Promise<string>;
}

/** Invoked once per object reachable from a root. */
export interface Visitor {
  visit(object: ClusterObject, options?: TraversalOptions): Promise<void>;
}

/* ---------- Rendered Graph ---------- */

export type NodeStatus = "ok" | "pending";

export interface ResourceViewerNode {
  name: string;
  apiVersion: string;
  kind: string;
  namespace?: string;
  path?: string;
  status: NodeStatus;
}

export type EdgeType = "explicit" | "implicit";

export interface ResourceViewerEdge {
  node: string;
  edge: EdgeType;
}

export interface TextTitle {
  type: "text";
  config: { text: string };
}

export interface ResourceViewerConfig {
  selected: string;
  nodes: Record<string, ResourceViewerNode>;
  edges: Record<string, ResourceViewerEdge[]>;
}

export interface ComponentMetadata {
  type: "resourceViewer";
  title: TextTitle[];
}

/** Outcome of a background resolution. Never rejected. */
export type ResolutionResult =
  | { ok: true; key: ObjectKey }
  | { ok: false; error: Error };

export type Resolution = Promise<ResolutionResult>;
