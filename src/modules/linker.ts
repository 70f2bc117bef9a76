/**
 * Linker Module
 * Builds the dependency graph once all nodes exist
 */

import type { LinkerContext } from "../types";
import { findAmbiguousNames, linkNodes } from "../utils";

export async function link(ctx: LinkerContext): Promise<void> {
  if (!ctx.nodes) {
    throw new Error("Parser must run before linker");
  }

  const { nodes, tracker, logger } = ctx;

  // Reported, not rewritten: substitution order decides the outcome
  for (const ambiguous of findAmbiguousNames(nodes)) {
    tracker.trackAmbiguousName(ambiguous);
    logger.warn(
      `link name "${ambiguous.inner}" is part of "${ambiguous.outer}", references may be ambiguous`,
    );
  }

  ctx.edges = linkNodes(nodes);
  tracker.setGraphSize(nodes.length, ctx.edges.length);

  for (const node of nodes) {
    if (node.dependencies.length > 0) {
      logger.debug(`${node.name} → ${node.dependencies.join(", ")}`);
    }
  }

  logger.info(`linked ${nodes.length} links (${ctx.edges.length} references)`);
}
