/**
 * Graph-building visitor.
 *
 * Records each reachable object as a node, links it to its parent, and
 * recurses through the queryer. Objects already in the graph only gain the
 * new parent edge, which also terminates cycles.
 */

import { ChildLookupError, ContextCancelledError, throwIfCancelled } from "../errors.js";
import { getLogger, type Logger } from "../logging/logger.js";
import { nodeIdFor } from "../object-key.js";
import type { ClusterObject, Queryer, TraversalOptions, Visitor } from "../types.js";
import type { ResourceGraph } from "./graph.js";

export class GraphVisitor implements Visitor {
  private readonly logger: Logger;

  constructor(
    private readonly graph: ResourceGraph,
    private readonly queryer: Queryer,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger("visitor");
  }

  async visit(object: ClusterObject, options: TraversalOptions = {}): Promise<void> {
    const errors: Error[] = [];
    await this.visitObject(object, undefined, options, errors);
    if (errors.length > 0) {
      throw errors[0];
    }
  }

  private async visitObject(
    object: ClusterObject,
    parentId: string | undefined,
    options: TraversalOptions,
    errors: Error[],
  ): Promise<void> {
    throwIfCancelled(options.signal);

    const id = nodeIdFor(object);
    const added = this.graph.addNode(object);
    if (parentId !== undefined) {
      this.graph.addEdge(parentId, id);
    }
    // The root is seeded before traversal starts, so only revisits of
    // non-root objects stop here.
    if (!added && parentId !== undefined) return;

    let children: ClusterObject[];
    try {
      children = await this.queryer.children(object, options);
    } catch (err) {
      if (err instanceof ContextCancelledError) throw err;
      throwIfCancelled(options.signal);
      const lookupError = new ChildLookupError(id, err);
      this.logger.warn("child lookup failed", { node: id, error: lookupError.message });
      errors.push(lookupError);
      return;
    }
    throwIfCancelled(options.signal);

    this.logger.trace("visited object", { node: id, children: children.length });

    for (const child of children) {
      try {
        await this.visitObject(child, id, options, errors);
      } catch (err) {
        if (err instanceof ContextCancelledError) throw err;
        errors.push(err instanceof Error ? err : new Error(String(err)));
      }
    }
  }
}
