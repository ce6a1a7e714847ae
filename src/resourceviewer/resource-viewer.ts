/**
 * Resource Viewer — one traversal session over an object's relationship graph.
 */

import { ConfigurationError } from "../errors.js";
import { getLogger, type Logger } from "../logging/logger.js";
import type {
  ClusterObject,
  DashConfig,
  ObjectKey,
  ObjectStore,
  Queryer,
  TraversalOptions,
  Visitor,
} from "../types.js";
import { ResourceViewerComponent } from "./component.js";
import { ResourceGraph, type RootState } from "./graph.js";
import { GraphVisitor } from "./visitor.js";

/** Construction option; throws ConfigurationError on bad input. */
export type ViewerOption = (viewer: ViewerBuilder) => void;

type ViewerBuilder = {
  graph: ResourceGraph;
  visitor?: Visitor;
  queryer?: Queryer;
  logger?: Logger;
};

/** Replace the default graph visitor. */
export function withVisitor(visitor: Visitor): ViewerOption {
  return (builder) => {
    builder.visitor = visitor;
  };
}

/** Queryer used by the default graph visitor. */
export function withQueryer(queryer: Queryer): ViewerOption {
  return (builder) => {
    builder.queryer = queryer;
  };
}

/** Build the visitor around the viewer's own graph. */
export function withVisitorFactory(factory: (graph: ResourceGraph) => Visitor): ViewerOption {
  return (builder) => {
    builder.visitor = factory(builder.graph);
  };
}

export function withLogger(logger: Logger): ViewerOption {
  return (builder) => {
    builder.logger = logger;
  };
}

export class ResourceViewer {
  private rootObject: ClusterObject | null = null;

  constructor(
    private readonly store: ObjectStore,
    private readonly graph: ResourceGraph,
    private readonly visitor: Visitor,
    private readonly logger: Logger,
  ) {}

  objectStore(): ObjectStore {
    return this.store;
  }

  /** Record the root under the pending placeholder without traversing. */
  seed(object: ClusterObject): void {
    if (this.rootObject === null) {
      this.rootObject = object;
    }
    this.graph.setRoot(this.rootObject);
  }

  /**
   * Seed the root, run the visitor over it and resolve the root's identity.
   * Rejects with the visitor's error; the root then stays pending.
   */
  async visit(object: ClusterObject, options: TraversalOptions = {}): Promise<ResourceViewerComponent> {
    this.seed(object);
    await this.visitor.visit(object, options);
    const key = this.graph.resolveRoot();
    this.logger.debug("resolved root", { kind: key.kind, name: key.name, nodes: this.graph.size });
    return this.component();
  }

  get rootState(): RootState {
    return this.graph.rootState;
  }

  /** Resolved root key, or null while pending. */
  rootKey(): ObjectKey | null {
    const state = this.graph.rootState;
    return state.state === "resolved" ? state.key : null;
  }

  annotateRoot(annotations: { path?: string }): void {
    const id = this.graph.rootNodeId;
    if (id !== null && annotations.path !== undefined) {
      this.graph.setPath(id, annotations.path);
    }
  }

  component(): ResourceViewerComponent {
    return new ResourceViewerComponent(this.graph.toConfig());
  }
}

/**
 * Create a resource viewer. The default visitor is a GraphVisitor over the
 * viewer's graph, which needs a queryer.
 */
export function createResourceViewer(config: DashConfig | undefined, ...options: ViewerOption[]): ResourceViewer {
  if (!config) {
    throw new ConfigurationError("resource viewer requires a dash config");
  }

  const builder: ViewerBuilder = { graph: new ResourceGraph() };
  for (const option of options) {
    option(builder);
  }

  const logger = builder.logger ?? getLogger("resource-viewer");
  const visitor =
    builder.visitor ?? (builder.queryer ? new GraphVisitor(builder.graph, builder.queryer, logger.child("visitor")) : undefined);
  if (!visitor) {
    throw new ConfigurationError("resource viewer requires a visitor or a queryer");
  }

  return new ResourceViewer(config.objectStore(), builder.graph, visitor, logger);
}
