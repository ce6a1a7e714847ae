/**
 * Component Cache — Unit Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { ComponentCache, createComponentCache } from "./component-cache.js";
import { PLACEHOLDER_ID } from "./graph.js";
import { withVisitor } from "./resource-viewer.js";
import {
  ChildLookupError,
  ConfigurationError,
  ContextCancelledError,
  NoQueryerConfiguredError,
  SupersededResolutionError,
} from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { keyFromObject } from "../object-key.js";
import { MemoryObjectStore } from "../objectstore/memory-store.js";
import type { ClusterObject, DashConfig, Queryer, ResolutionResult } from "../types.js";

// ── Helpers ─────────────────────────────────────────────────────────────────────

const silentLogger = createLogger("test", { transports: [] });

function makeDeployment(name = "deployment"): ClusterObject {
  return {
    apiVersion: "apps/v1",
    kind: "Deployment",
    metadata: { name, namespace: "default", uid: name },
  };
}

const replicaSet: ClusterObject = {
  apiVersion: "apps/v1",
  kind: "ReplicaSet",
  metadata: { name: "deployment-rs", namespace: "default", uid: "deployment-rs" },
};

function createMockDashConfig() {
  const store = new MemoryObjectStore();
  return {
    objectStore: () => store,
    objectPath: vi.fn(async (_apiVersion: string, _kind: string, _name: string, _namespace?: string) => "/path"),
  };
}

function createQueryer(children: ClusterObject[] = []) {
  return {
    children: vi.fn(async (object: ClusterObject): Promise<ClusterObject[]> =>
      object.kind === "Deployment" ? children : [],
    ),
  };
}

function createCache(queryer?: Queryer, config: DashConfig = createMockDashConfig()): ComponentCache {
  const cache = createComponentCache(config, { logger: silentLogger });
  cache.setQueryer(queryer);
  return cache;
}

/** A queryer whose lookups wait until release() is called. */
function createGatedQueryer() {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const queryer: Queryer = {
    children: vi.fn(async () => {
      await gate;
      return [];
    }),
  };
  return { queryer, release: () => release() };
}

async function resolved(cache: ComponentCache, object: ClusterObject): Promise<ResolutionResult> {
  const resolution = cache.whenResolved(keyFromObject(object));
  if (!resolution) throw new Error("no resolution tracked");
  return resolution;
}

// ── Tests ───────────────────────────────────────────────────────────────────────

describe("createComponentCache", () => {
  it("throws ConfigurationError without a dash config", () => {
    expect(() => createComponentCache(undefined)).toThrow(ConfigurationError);
  });

  it("throws ConfigurationError for an invalid capacity", () => {
    expect(() => createComponentCache(createMockDashConfig(), { capacity: 0, logger: silentLogger })).toThrow(
      ConfigurationError,
    );
  });

  it("defaults to a capacity of 100", () => {
    expect(createCache().stats().capacity).toBe(100);
  });
});

describe("ComponentCache.get", () => {
  it("fails with NoQueryerConfiguredError when no queryer is set", async () => {
    const cache = createCache();
    await expect(cache.get(makeDeployment())).rejects.toBeInstanceOf(NoQueryerConfiguredError);
    await expect(cache.get(makeDeployment())).rejects.toThrow("no queryer set");
  });

  it("fails again after the queryer is cleared", async () => {
    const cache = createCache(createQueryer());
    cache.setQueryer(undefined);
    await expect(cache.get(makeDeployment())).rejects.toBeInstanceOf(NoQueryerConfiguredError);
  });

  it("returns the placeholder component on a miss", async () => {
    const cache = createCache(createQueryer());

    const component = await cache.get(makeDeployment());

    const metadata = component.getMetadata();
    expect(metadata.type).toBe("resourceViewer");
    expect(metadata.title[0].config.text).toBe("Resource Viewer");
    expect(component.isEmpty()).toBe(false);
    expect(component.nodeIds()).toEqual([PLACEHOLDER_ID]);
    expect(component.config.nodes[PLACEHOLDER_ID].name).toBe("deployment");
    await resolved(cache, makeDeployment());
  });

  it("replaces the placeholder once background resolution completes", async () => {
    const config = createMockDashConfig();
    const queryer = createQueryer([replicaSet]);
    const cache = createCache(queryer, config);
    const deployment = makeDeployment();

    await cache.get(deployment);
    const result = await resolved(cache, deployment);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.key).toEqual(keyFromObject(deployment));

    const component = cache.lookup(result.key);
    expect(component?.nodeIds()).toEqual(["deployment", "deployment-rs"]);
    expect(component?.config.nodes.deployment).toEqual({
      name: "deployment",
      apiVersion: "apps/v1",
      kind: "Deployment",
      namespace: "default",
      path: "/path",
      status: "ok",
    });
    expect(component?.config.edges.deployment).toEqual([{ node: "deployment-rs", edge: "explicit" }]);
    expect(config.objectPath).toHaveBeenCalledWith("apps/v1", "Deployment", "deployment", "default");
    expect(queryer.children).toHaveBeenCalledTimes(2);
  });

  it("serves hits without traversing again", async () => {
    const queryer = createQueryer();
    const cache = createCache(queryer);
    const deployment = makeDeployment();

    await cache.get(deployment);
    await resolved(cache, deployment);
    const first = await cache.get(deployment);
    const second = await cache.get(deployment);

    expect(second).toBe(first);
    expect(second.config).toEqual(first.config);
    expect(queryer.children).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toMatchObject({ hits: 2, misses: 1 });
  });

  it("coalesces concurrent misses for the same object", async () => {
    const queryer = createQueryer();
    const cache = createCache(queryer);
    const deployment = makeDeployment();

    const [a, b] = await Promise.all([cache.get(deployment), cache.get(deployment)]);
    await resolved(cache, deployment);

    expect(a).toBe(b);
    expect(queryer.children).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toMatchObject({ hits: 1, misses: 1 });
  });

  it("evicts the least recently used object past capacity", async () => {
    const cache = createComponentCache(createMockDashConfig(), { capacity: 2, logger: silentLogger });
    cache.setQueryer(createQueryer());
    const [a, b, c] = [makeDeployment("a"), makeDeployment("b"), makeDeployment("c")];

    await cache.get(a);
    await resolved(cache, a);
    await cache.get(b);
    await resolved(cache, b);
    await cache.get(a);
    await cache.get(c);
    await resolved(cache, c);

    expect(cache.lookup(keyFromObject(b))).toBeUndefined();
    expect(cache.keys()).toEqual(["apps/v1:Deployment:default:a", "apps/v1:Deployment:default:c"]);
  });

  it("traverses again after invalidation", async () => {
    const queryer = createQueryer();
    const cache = createCache(queryer);
    const deployment = makeDeployment();

    await cache.get(deployment);
    await resolved(cache, deployment);
    expect(cache.invalidate(keyFromObject(deployment))).toBe(true);
    await cache.get(deployment);
    await resolved(cache, deployment);

    expect(queryer.children).toHaveBeenCalledTimes(2);
  });
});

describe("ComponentCache background failures", () => {
  it("keeps the placeholder when a child lookup fails", async () => {
    const queryer: Queryer = { children: vi.fn(async () => Promise.reject(new Error("apiserver down"))) };
    const cache = createCache(queryer);
    const deployment = makeDeployment();

    const placeholder = await cache.get(deployment);
    const result = await resolved(cache, deployment);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ChildLookupError);
    expect(cache.lookup(keyFromObject(deployment))).toBe(placeholder);
  });

  it("reports cancellation and keeps the placeholder", async () => {
    const controller = new AbortController();
    const queryer: Queryer = {
      children: vi.fn(async () => {
        controller.abort();
        return [replicaSet];
      }),
    };
    const cache = createCache(queryer);
    const deployment = makeDeployment();

    const placeholder = await cache.get(deployment, { signal: controller.signal });
    const result = await resolved(cache, deployment);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ContextCancelledError);
    expect(cache.lookup(keyFromObject(deployment))).toBe(placeholder);
    expect(placeholder.nodeIds()).toEqual([PLACEHOLDER_ID]);
  });

  it("reports a path lookup failure", async () => {
    const config = createMockDashConfig();
    config.objectPath.mockRejectedValueOnce(new Error("no path"));
    const cache = createCache(createQueryer(), config);
    const deployment = makeDeployment();

    const placeholder = await cache.get(deployment);
    const result = await resolved(cache, deployment);

    expect(result).toEqual({ ok: false, error: new Error("no path") });
    expect(cache.lookup(keyFromObject(deployment))).toBe(placeholder);
  });

  it("applies viewer options to the viewers it creates", async () => {
    const cache = createComponentCache(createMockDashConfig(), {
      logger: silentLogger,
      queryer: createQueryer(),
      viewerOptions: [withVisitor({ visit: async () => Promise.reject(new Error("fail")) })],
    });
    const deployment = makeDeployment();

    await cache.get(deployment);
    const result = await resolved(cache, deployment);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("fail");
  });
});

describe("ComponentCache.getComponent / visit", () => {
  it("materializes the placeholder root without querying children", async () => {
    const queryer = createQueryer([replicaSet]);
    const cache = createCache(queryer);
    const object = makeDeployment();
    const viewer = cache.newResourceViewer();

    const component = await cache.getComponent(keyFromObject(object), object, viewer);

    expect(component.config.nodes[PLACEHOLDER_ID].name).toBe("deployment");
    expect(queryer.children).not.toHaveBeenCalled();
  });

  it("publishes the resolved key and exposes the expanded graph", async () => {
    const queryer = createQueryer([replicaSet]);
    const cache = createCache(queryer);
    const object = makeDeployment();
    const key = keyFromObject(object);
    const viewer = cache.newResourceViewer();

    const placeholder = await cache.getComponent(key, object, viewer);
    expect(placeholder.config.nodes[PLACEHOLDER_ID]?.name).toBe("deployment");

    const result = await cache.visit(key, object, viewer);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const component = await cache.getComponent(result.key, object, viewer);
    expect(component.config.nodes[PLACEHOLDER_ID]).toBeUndefined();
    expect(component.config.nodes.deployment.name).toBe("deployment");
    expect(component.config.nodes["deployment-rs"].kind).toBe("ReplicaSet");
    // Earlier snapshots are not rewritten.
    expect(placeholder.nodeIds()).toEqual([PLACEHOLDER_ID]);
  });

  it("requires a queryer to create viewers", () => {
    expect(() => createCache().newResourceViewer()).toThrow(NoQueryerConfiguredError);
  });
});

describe("ComponentCache consistency", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("discards a traversal that finishes after invalidation", async () => {
    const { queryer, release } = createGatedQueryer();
    const cache = createCache(queryer);
    const deployment = makeDeployment();

    await cache.get(deployment);
    const resolution = cache.whenResolved(keyFromObject(deployment));
    expect(cache.invalidate(keyFromObject(deployment))).toBe(true);
    release();
    const result = await resolution;

    expect(result?.ok).toBe(false);
    if (result === undefined || result.ok) return;
    expect(result.error).toBeInstanceOf(SupersededResolutionError);
    expect(cache.lookup(keyFromObject(deployment))).toBeUndefined();
    expect(cache.stats().size).toBe(0);
  });

  it("discards a traversal that finishes after clear", async () => {
    const { queryer, release } = createGatedQueryer();
    const cache = createCache(queryer);
    const deployment = makeDeployment();

    await cache.get(deployment);
    const resolution = cache.whenResolved(keyFromObject(deployment));
    cache.clear();
    release();
    await resolution;

    expect(cache.stats().size).toBe(0);
  });

  it("keeps the newer traversal when an older one finishes last", async () => {
    const slow = createGatedQueryer();
    const config = createMockDashConfig();
    const cache = createCache(slow.queryer, config);
    const deployment = makeDeployment();
    const key = keyFromObject(deployment);

    await cache.get(deployment);
    const stale = cache.whenResolved(key);
    cache.invalidate(key);

    cache.setQueryer(createQueryer([replicaSet]));
    await cache.get(deployment);
    const fresh = await resolved(cache, deployment);
    expect(fresh.ok).toBe(true);

    slow.release();
    const staleResult = await stale;

    expect(staleResult?.ok).toBe(false);
    expect(cache.lookup(key)?.nodeIds()).toEqual(["deployment", "deployment-rs"]);
    expect(cache.whenResolved(key)).not.toBe(stale);
  });

  it("drops resolutions of expired entries", async () => {
    vi.useFakeTimers();
    const cache = createComponentCache(createMockDashConfig(), { ttlMs: 10, logger: silentLogger });
    cache.setQueryer(createQueryer());
    const deployment = makeDeployment();
    const key = keyFromObject(deployment);

    await cache.get(deployment);
    await resolved(cache, deployment);
    vi.advanceTimersByTime(100);

    expect(cache.lookup(key)).toBeUndefined();
    expect(cache.whenResolved(key)).toBeUndefined();
  });
});
