/**
 * Resource viewer agent tools — resource_viewer_graph.
 */

import { Type, type Static } from "@sinclair/typebox";
import { buildResourceGraph, formatComponentTree } from "./graph-service.js";
import { parseManifestJson } from "./manifest-parser.js";

export function createResourceViewerTools() {
  return [resourceViewerGraphTool];
}

const GraphToolInput = Type.Object({
  resourceJson: Type.String({ description: "JSON output from `kubectl get <resource> -o json`" }),
  kind: Type.String({ description: "Kind of the root object, e.g. Deployment" }),
  name: Type.String({ description: "Name of the root object" }),
  namespace: Type.Optional(Type.String({ description: "Namespace of the root object" })),
  format: Type.Optional(Type.Union([Type.Literal("tree"), Type.Literal("json")])),
});

type GraphToolInput = Static<typeof GraphToolInput>;

/* ---------- resource_viewer_graph ---------- */

const resourceViewerGraphTool = {
  name: "resource_viewer_graph",
  description:
    "Build the ownership graph rooted at one object from Kubernetes resource JSON and return its nodes and edges.",
  inputSchema: GraphToolInput,
  execute: async (input: GraphToolInput) => {
    try {
      const objects = parseManifestJson(input.resourceJson);
      const component = await buildResourceGraph(objects, {
        kind: input.kind,
        name: input.name,
        namespace: input.namespace,
      });
      const text =
        input.format === "json" ? JSON.stringify(component.toJSON(), null, 2) : formatComponentTree(component);
      return { content: [{ type: "text" as const, text }] };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { content: [{ type: "text" as const, text: `Error building resource graph: ${message}` }] };
    }
  },
};
