/**
 * Default collaborator bundle: an object store plus a path resolver.
 */

import { DEFAULT_SETTINGS } from "./config.js";
import type { DashConfig, ObjectStore } from "./types.js";

export type DashConfigOptions = {
  pathPrefix?: string;
};

/**
 * Path format: `{prefix}/{namespace|cluster}/{kind lowercased}/{name}`
 */
export function buildObjectPath(
  prefix: string,
  kind: string,
  name: string,
  namespace?: string,
): string {
  const scope = namespace ? encodeURIComponent(namespace) : "cluster";
  return `${prefix}/${scope}/${kind.toLowerCase()}/${encodeURIComponent(name)}`;
}

export function createDashConfig(store: ObjectStore, options: DashConfigOptions = {}): DashConfig {
  const prefix = (options.pathPrefix ?? DEFAULT_SETTINGS.pathPrefix).replace(/\/+$/, "");
  return {
    objectStore: () => store,
    objectPath: async (_apiVersion, kind, name, namespace) => buildObjectPath(prefix, kind, name, namespace),
  };
}
