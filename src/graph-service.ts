/**
 * Resource graph service — builds a fully resolved graph for one root object
 * out of a set of loaded objects. Shared by the CLI and the agent tool.
 */

import { createDashConfig } from "./dash-config.js";
import { ManifestParseError } from "./errors.js";
import type { Logger } from "./logging/logger.js";
import { keyFromObject } from "./object-key.js";
import { MemoryObjectStore } from "./objectstore/memory-store.js";
import { OwnerReferenceQueryer } from "./queryer/owner-queryer.js";
import { createComponentCache } from "./resourceviewer/component-cache.js";
import type { ResourceViewerComponent } from "./resourceviewer/component.js";
import type { ClusterObject } from "./types.js";

export type RootSelector = {
  kind: string;
  name: string;
  namespace?: string;
};

export type BuildGraphOptions = {
  pathPrefix?: string;
  capacity?: number;
  ttlMs?: number;
  logger?: Logger;
  signal?: AbortSignal;
};

export function findRoot(objects: ClusterObject[], selector: RootSelector): ClusterObject {
  const matches = objects.filter(
    (o) =>
      o.kind === selector.kind &&
      o.metadata.name === selector.name &&
      (selector.namespace === undefined || (o.metadata.namespace ?? "") === selector.namespace),
  );
  const ns = selector.namespace !== undefined ? ` in namespace ${selector.namespace}` : "";
  if (matches.length === 0) {
    throw new ManifestParseError(`No ${selector.kind}/${selector.name}${ns} in manifest`);
  }
  if (matches.length > 1) {
    throw new ManifestParseError(`${selector.kind}/${selector.name} is ambiguous; pass a namespace`);
  }
  return matches[0];
}

/**
 * Build and resolve the graph rooted at the selected object.
 * Rejects with the resolution error when traversal fails.
 */
export async function buildResourceGraph(
  objects: ClusterObject[],
  selector: RootSelector,
  options: BuildGraphOptions = {},
): Promise<ResourceViewerComponent> {
  const root = findRoot(objects, selector);
  const store = new MemoryObjectStore(objects);
  const cache = createComponentCache(createDashConfig(store, { pathPrefix: options.pathPrefix }), {
    queryer: new OwnerReferenceQueryer(store),
    capacity: options.capacity,
    ttlMs: options.ttlMs,
    logger: options.logger,
  });

  const placeholder = await cache.get(root, { signal: options.signal });
  const resolution = await (cache.whenResolved(keyFromObject(root)) ?? Promise.resolve(undefined));
  if (resolution === undefined) {
    return placeholder;
  }
  if (!resolution.ok) {
    throw resolution.error;
  }
  return cache.lookup(resolution.key) ?? placeholder;
}

/** Indented tree rendering, starting at the selected node. */
export function formatComponentTree(component: ResourceViewerComponent): string {
  const { nodes, edges, selected } = component.config;
  const title = component.metadata.title.map((t) => t.config.text).join(" ");
  const lines = [`${title} (${Object.keys(nodes).length} nodes)`];
  const seen = new Set<string>();

  const walk = (id: string, depth: number): void => {
    const node = nodes[id];
    if (!node) return;
    const ns = node.namespace ? ` [${node.namespace}]` : "";
    const path = node.path ? ` ${node.path}` : "";
    const revisit = seen.has(id) ? " (see above)" : "";
    lines.push(`${"  ".repeat(depth)}${node.kind}/${node.name}${ns}${path}${revisit}`);
    if (revisit) return;
    seen.add(id);
    for (const edge of edges[id] ?? []) {
      walk(edge.node, depth + 1);
    }
  };

  if (selected) walk(selected, 0);
  return lines.join("\n");
}
