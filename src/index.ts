export * from "./types.js";
export * from "./errors.js";
export * from "./object-key.js";
export * from "./config.js";
export * from "./dash-config.js";
export * from "./manifest-parser.js";
export * from "./graph-service.js";
export { MemoryObjectStore } from "./objectstore/memory-store.js";
export { OwnerReferenceQueryer } from "./queryer/owner-queryer.js";
export { ResourceGraph, PLACEHOLDER_ID, type RootState } from "./resourceviewer/graph.js";
export { ResourceViewerComponent, RESOURCE_VIEWER_TITLE } from "./resourceviewer/component.js";
export { GraphVisitor } from "./resourceviewer/visitor.js";
export * from "./resourceviewer/resource-viewer.js";
export { LRUCache, type LRUCacheOptions } from "./resourceviewer/lru-cache.js";
export * from "./resourceviewer/component-cache.js";
export * from "./logging/logger.js";
export { createResourceViewerTools } from "./tools.js";
export { createResourceViewerCli } from "./cli/cli.js";
export { VERSION } from "./version.js";
