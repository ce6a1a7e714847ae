/**
 * Component Cache
 *
 * LRU store of rendered resource viewer components keyed by object key.
 *
 *   - Hit: the cached component is returned as is, even while a background
 *     resolution for the same key is still running.
 *   - Miss: a placeholder component (root only, under PLACEHOLDER_ID) is
 *     cached and returned at once; the full traversal runs in the background
 *     and replaces the entry when it completes.
 *
 * Concurrent misses for the same key share one traversal.
 */

import { parseSettings } from "../config.js";
import {
  ConfigurationError,
  NoQueryerConfiguredError,
  SupersededResolutionError,
  throwIfCancelled,
} from "../errors.js";
import { getLogger, type Logger } from "../logging/logger.js";
import { keyFromObject, keyToString } from "../object-key.js";
import type {
  ClusterObject,
  DashConfig,
  ObjectKey,
  Queryer,
  Resolution,
  TraversalOptions,
} from "../types.js";
import type { ResourceViewerComponent } from "./component.js";
import { LRUCache } from "./lru-cache.js";
import {
  createResourceViewer,
  withLogger,
  withQueryer,
  type ResourceViewer,
  type ViewerOption,
} from "./resource-viewer.js";

export type ComponentCacheOptions = {
  /** Maximum number of cached components (default: 100). */
  capacity?: number;
  /** Component lifetime in milliseconds; 0 never expires (default: 0). */
  ttlMs?: number;
  queryer?: Queryer;
  logger?: Logger;
  /** Extra options applied to every viewer the cache creates. */
  viewerOptions?: ViewerOption[];
};

export type ComponentCacheStats = {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  hitRate: number;
  inFlight: number;
};

export class ComponentCache {
  private components: LRUCache<string, ResourceViewerComponent>;
  private queryer: Queryer | undefined;
  private readonly logger: Logger;
  private readonly viewerOptions: ViewerOption[];

  private pending = new Map<string, Promise<ResourceViewerComponent>>();
  private resolutions = new Map<string, Resolution>();
  private inFlight = new Set<Resolution>();

  private hits = 0;
  private misses = 0;

  constructor(
    private readonly config: DashConfig,
    options: ComponentCacheOptions = {},
  ) {
    const settings = parseSettings({ capacity: options.capacity, ttlMs: options.ttlMs });
    this.logger = options.logger ?? getLogger("component-cache");
    this.components = new LRUCache({
      capacity: settings.capacity,
      ttlMs: settings.ttlMs,
      onEvict: (key) => {
        this.resolutions.delete(key);
        this.logger.debug("evicted component", { key });
      },
    });
    this.queryer = options.queryer;
    this.viewerOptions = options.viewerOptions ?? [];
  }

  /** Set or clear the queryer used for child lookups. */
  setQueryer(queryer: Queryer | undefined): void {
    this.queryer = queryer;
  }

  /**
   * Get the rendered graph for an object. On a miss this returns the
   * placeholder component and starts background resolution; use
   * whenResolved() to wait for it.
   */
  async get(object: ClusterObject, options: TraversalOptions = {}): Promise<ResourceViewerComponent> {
    if (!this.queryer) {
      throw new NoQueryerConfiguredError();
    }

    const key = keyFromObject(object);
    const id = keyToString(key);

    const cached = this.components.get(id);
    if (cached) {
      this.hits++;
      return cached;
    }

    const inflight = this.pending.get(id);
    if (inflight) {
      this.hits++;
      return inflight;
    }

    this.misses++;
    const build = this.buildPlaceholder(key, object, options);
    this.pending.set(id, build);
    try {
      return await build;
    } finally {
      this.pending.delete(id);
    }
  }

  /**
   * Current snapshot of the viewer's graph for an object. Seeds the root
   * under the placeholder when the viewer has not seen it yet; never
   * traverses.
   */
  async getComponent(
    key: ObjectKey,
    object: ClusterObject,
    viewer: ResourceViewer,
  ): Promise<ResourceViewerComponent> {
    viewer.seed(object);
    this.logger.trace("materialized component", { key: keyToString(key), state: viewer.rootState.state });
    return viewer.component();
  }

  /**
   * Run the full traversal in the background. On success the final component
   * is cached under the resolved key; on failure the cached placeholder is
   * left untouched. A result is discarded when its key was invalidated,
   * cleared or evicted meanwhile, or a newer visit replaced it. The returned
   * promise never rejects.
   */
  visit(key: ObjectKey, object: ClusterObject, viewer: ResourceViewer, options: TraversalOptions = {}): Resolution {
    const id = keyToString(key);
    const logger = this.logger.withContext({ objectKey: id });

    const task: Resolution = (async () => {
      try {
        await viewer.visit(object, options);
        const path = await this.config.objectPath(
          key.apiVersion,
          key.kind,
          key.name,
          key.namespace || undefined,
        );
        throwIfCancelled(options.signal);
        viewer.annotateRoot({ path });

        const resolved = viewer.rootKey() ?? key;
        if (this.resolutions.get(id) !== task) {
          throw new SupersededResolutionError(id);
        }
        this.components.set(keyToString(resolved), viewer.component());
        logger.debug("resolved resource graph", { resolvedKey: keyToString(resolved) });
        return { ok: true as const, key: resolved };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        logger.warn("resource graph resolution failed", { error: error.message, name: error.name });
        return { ok: false as const, error };
      }
    })();

    this.resolutions.set(id, task);
    this.inFlight.add(task);
    void task.then(() => this.inFlight.delete(task));
    return task;
  }

  /**
   * Resolution of the latest traversal for an object key, settled or not.
   * Dropped when the key is evicted or invalidated.
   */
  whenResolved(key: ObjectKey): Resolution | undefined {
    return this.resolutions.get(keyToString(key));
  }

  /** Read a cached component by key. */
  lookup(key: ObjectKey): ResourceViewerComponent | undefined {
    return this.components.get(keyToString(key));
  }

  invalidate(key: ObjectKey): boolean {
    const id = keyToString(key);
    this.resolutions.delete(id);
    return this.components.delete(id);
  }

  clear(): void {
    this.resolutions.clear();
    this.components.clear();
  }

  /** Cached keys from least to most recently used. */
  keys(): string[] {
    return this.components.keys();
  }

  stats(): ComponentCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.components.size,
      capacity: this.components.capacity,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      inFlight: this.inFlight.size,
    };
  }

  /** A fresh viewer wired to the current queryer. */
  newResourceViewer(): ResourceViewer {
    if (!this.queryer) {
      throw new NoQueryerConfiguredError();
    }
    return createResourceViewer(
      this.config,
      withQueryer(this.queryer),
      withLogger(this.logger.child("viewer")),
      ...this.viewerOptions,
    );
  }

  private async buildPlaceholder(
    key: ObjectKey,
    object: ClusterObject,
    options: TraversalOptions,
  ): Promise<ResourceViewerComponent> {
    const viewer = this.newResourceViewer();
    const component = await this.getComponent(key, object, viewer);
    const id = keyToString(key);
    this.components.set(id, component);
    this.logger.debug("cached placeholder component", { key: id });
    void this.visit(key, object, viewer, options);
    return component;
  }
}

export function createComponentCache(config: DashConfig | undefined, options?: ComponentCacheOptions): ComponentCache {
  if (!config) {
    throw new ConfigurationError("component cache requires a dash config");
  }
  return new ComponentCache(config, options);
}
