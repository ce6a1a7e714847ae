/**
 * Mutable node/edge graph owned by a single traversal session.
 *
 * The root node is stored under its real node id from the start. Its
 * rendered id depends on the root state: while pending it renders under
 * PLACEHOLDER_ID, once resolved under its own id.
 */

import { keyFromObject, nodeIdFor } from "../object-key.js";
import type {
  ClusterObject,
  ObjectKey,
  ResourceViewerConfig,
  ResourceViewerEdge,
  ResourceViewerNode,
} from "../types.js";

export const PLACEHOLDER_ID = "emptyID";

export type RootState =
  | { state: "pending" }
  | { state: "resolved"; key: ObjectKey };

type NodeRecord = {
  object: ClusterObject;
  path?: string;
};

export class ResourceGraph {
  private nodes = new Map<string, NodeRecord>();
  private edges = new Map<string, ResourceViewerEdge[]>();
  private rootId: string | null = null;
  private root: RootState = { state: "pending" };

  /** Record the root under the pending placeholder. No-op when already set. */
  setRoot(object: ClusterObject): string {
    const id = nodeIdFor(object);
    if (this.rootId === null) {
      this.rootId = id;
      this.root = { state: "pending" };
    }
    this.addNode(object);
    return id;
  }

  get rootState(): RootState {
    return this.root;
  }

  get rootNodeId(): string | null {
    return this.rootId;
  }

  /** Move the root from pending to resolved. Returns the resolved key. */
  resolveRoot(): ObjectKey {
    if (this.rootId === null) {
      throw new Error("resource graph has no root");
    }
    const record = this.nodes.get(this.rootId);
    if (!record) {
      throw new Error(`resource graph root ${this.rootId} has no node`);
    }
    const key = keyFromObject(record.object);
    this.root = { state: "resolved", key };
    return key;
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  /** Add a node for the object. Returns false when one already exists. */
  addNode(object: ClusterObject): boolean {
    const id = nodeIdFor(object);
    if (this.nodes.has(id)) return false;
    this.nodes.set(id, { object });
    return true;
  }

  /** Add a parent → child edge. Returns false for a duplicate pair. */
  addEdge(parentId: string, childId: string): boolean {
    const list = this.edges.get(parentId) ?? [];
    if (list.some((e) => e.node === childId)) return false;
    list.push({ node: childId, edge: "explicit" });
    this.edges.set(parentId, list);
    return true;
  }

  setPath(id: string, path: string): void {
    const record = this.nodes.get(id);
    if (record) record.path = path;
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Deep copy of the current graph in rendered form. */
  toConfig(): ResourceViewerConfig {
    const nodes: Record<string, ResourceViewerNode> = {};
    for (const [id, record] of this.nodes) {
      nodes[this.renderedId(id)] = this.renderNode(id, record);
    }

    const edges: Record<string, ResourceViewerEdge[]> = {};
    for (const [parentId, list] of this.edges) {
      edges[this.renderedId(parentId)] = list.map((e) => ({
        node: this.renderedId(e.node),
        edge: e.edge,
      }));
    }

    const selected = this.rootId === null ? "" : this.renderedId(this.rootId);
    return { selected, nodes, edges };
  }

  private renderedId(id: string): string {
    return id === this.rootId && this.root.state === "pending" ? PLACEHOLDER_ID : id;
  }

  private renderNode(id: string, record: NodeRecord): ResourceViewerNode {
    const { object } = record;
    const node: ResourceViewerNode = {
      name: object.metadata.name,
      apiVersion: object.apiVersion,
      kind: object.kind,
      status: id === this.rootId && this.root.state === "pending" ? "pending" : "ok",
    };
    if (object.metadata.namespace) node.namespace = object.metadata.namespace;
    if (record.path !== undefined) node.path = record.path;
    return node;
  }
}
