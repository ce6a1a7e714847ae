/**
 * Resource viewer CLI commands — resource-viewer graph/kinds.
 */

import type { Command } from "commander";
import { loadSettingsFromEnv } from "../config.js";
import { createLogger } from "../logging/logger.js";

interface ResourceViewerCliContext {
  program: Command;
}

type GraphCommandOptions = {
  kind: string;
  name: string;
  namespace?: string;
  json?: boolean;
  verbose?: boolean;
};

export function createResourceViewerCli() {
  return (ctx: ResourceViewerCliContext) => {
    const settings = loadSettingsFromEnv();

    ctx.program
      .command("graph")
      .description("Build the ownership graph rooted at one object")
      .argument("<file>", "path to JSON file (kubectl get -o json output)")
      .requiredOption("-k, --kind <kind>", "kind of the root object")
      .requiredOption("-N, --name <name>", "name of the root object")
      .option("-n, --namespace <ns>", "namespace of the root object")
      .option("--json", "print the rendered component as JSON")
      .option("-v, --verbose", "debug logging")
      .action(async (file: string, opts: GraphCommandOptions) => {
        const { readFile } = await import("node:fs/promises");
        const { parseManifestJson } = await import("../manifest-parser.js");
        const { buildResourceGraph, formatComponentTree } = await import("../graph-service.js");
        const logger = createLogger("cli", { level: opts.verbose ? "debug" : settings.logLevel });
        try {
          const objects = parseManifestJson(await readFile(file, "utf-8"));
          const component = await buildResourceGraph(
            objects,
            { kind: opts.kind, name: opts.name, namespace: opts.namespace },
            { pathPrefix: settings.pathPrefix, capacity: settings.capacity, ttlMs: settings.ttlMs, logger },
          );
          console.log(opts.json ? JSON.stringify(component.toJSON(), null, 2) : formatComponentTree(component));
        } catch (err) {
          console.error("Failed:", err instanceof Error ? err.message : err);
          process.exitCode = 1;
        }
      });

    ctx.program
      .command("kinds")
      .description("Count the objects per kind in a JSON manifest")
      .argument("<file>", "path to JSON file (kubectl get -o json output)")
      .action(async (file: string) => {
        const { readFile } = await import("node:fs/promises");
        const { parseManifestJson, getKindDistribution } = await import("../manifest-parser.js");
        try {
          const objects = parseManifestJson(await readFile(file, "utf-8"));
          console.log(`\n${objects.length} objects parsed`);
          for (const [kind, count] of Object.entries(getKindDistribution(objects))) {
            console.log(`  ${kind}: ${count}`);
          }
        } catch (err) {
          console.error("Failed:", err instanceof Error ? err.message : err);
          process.exitCode = 1;
        }
      });
  };
}
