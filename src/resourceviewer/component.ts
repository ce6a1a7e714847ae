/**
 * Rendered resource viewer component — the snapshot handed to the rendering layer.
 */

import type { ComponentMetadata, ResourceViewerConfig } from "../types.js";

export const RESOURCE_VIEWER_TITLE = "Resource Viewer";

export class ResourceViewerComponent {
  readonly metadata: ComponentMetadata;
  readonly config: ResourceViewerConfig;

  constructor(config: ResourceViewerConfig, title = RESOURCE_VIEWER_TITLE) {
    this.metadata = {
      type: "resourceViewer",
      title: [{ type: "text", config: { text: title } }],
    };
    this.config = freezeConfig(config);
    for (const entry of this.metadata.title) {
      Object.freeze(entry.config);
      Object.freeze(entry);
    }
    Object.freeze(this.metadata.title);
    Object.freeze(this.metadata);
    Object.freeze(this);
  }

  getMetadata(): ComponentMetadata {
    return this.metadata;
  }

  isEmpty(): boolean {
    return Object.keys(this.config.nodes).length === 0;
  }

  /** Rendered node ids in insertion order. */
  nodeIds(): string[] {
    return Object.keys(this.config.nodes);
  }

  toJSON(): { metadata: ComponentMetadata; config: ResourceViewerConfig } {
    return { metadata: this.metadata, config: this.config };
  }
}

/** Freeze the config in place, down to each node and edge. */
function freezeConfig(config: ResourceViewerConfig): ResourceViewerConfig {
  for (const node of Object.values(config.nodes)) {
    Object.freeze(node);
  }
  for (const list of Object.values(config.edges)) {
    for (const edge of list) {
      Object.freeze(edge);
    }
    Object.freeze(list);
  }
  Object.freeze(config.nodes);
  Object.freeze(config.edges);
  return Object.freeze(config);
}
