/**
 * Resolver Module
 * Publishes every link to the short-URL registry
 *
 * Runs AFTER linker: dependencies must be fixed before any URL is created.
 */

import type { LinkerContext, RegistryClient } from "../types";
import { ShlinkRegistryClient, UrlResolver } from "../utils";
import { ConfigError } from "../utils/errors";

function createRegistry(ctx: LinkerContext): RegistryClient {
  const { apiUri, apiKey } = ctx.config.registry;
  if (!apiUri || !apiKey) {
    throw new ConfigError(
      "Registry is not configured: set SHLINK_API_URI and SHLINK_API_KEY",
    );
  }
  return new ShlinkRegistryClient({ apiUri, apiKey });
}

export async function resolve(ctx: LinkerContext): Promise<void> {
  if (ctx.options.dryRun) {
    return;
  }
  if (!ctx.nodes || !ctx.edges) {
    throw new Error("Linker must run before resolver");
  }

  const { nodes, tracker, logger, options } = ctx;
  const registry = ctx.registry ?? createRegistry(ctx);
  if (!ctx.registry) ctx.registry = registry;

  // Logged before the first progress report: the CLI spinner owns the
  // terminal from then on
  const mode = options.fast ? "fast" : "two-phase";
  logger.info(`resolving links for ${nodes.length} links (${mode})...`);

  const resolver = new UrlResolver({
    registry,
    onStep: (step) => {
      if (step.phase === "finalize") {
        tracker.incrementUpdated();
      } else {
        tracker.incrementCreated();
      }
      ctx.onProgress?.(nodes);
    },
  });

  ctx.onProgress?.(nodes);
  await resolver.resolve(nodes, mode);
}
