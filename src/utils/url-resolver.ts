/**
 * URL Resolver
 * Gives every linked node its final short URL
 *
 * Two strategies:
 * - two-phase: placeholder URL for every node, then update each with substituted text.
 *   Works with cycles, costs 2×N registry calls.
 * - fast: resolve nodes in dependency order, one final create per node.
 *   N registry calls, fails with CycleError on cycles.
 *
 * Registry calls are awaited one at a time; phase 2 reads URLs written in phase 1.
 */

import type { RegistryClient } from "../types/registry";
import type { ResolveMode, ResolveStep } from "../types/link";
import { buildLongUrl, type PayloadEncoder } from "./encode-payload";
import { CycleError } from "./errors";
import type { LinkNode } from "./link-node";

export interface UrlResolverOptions {
  registry: RegistryClient;
  /** Defaults to buildLongUrl */
  encoder?: PayloadEncoder;
  /** Called after every registry call */
  onStep?: (step: ResolveStep) => void;
}

export class UrlResolver {
  private readonly registry: RegistryClient;
  private readonly encoder: PayloadEncoder;
  private readonly onStep?: (step: ResolveStep) => void;

  constructor(options: UrlResolverOptions) {
    this.registry = options.registry;
    this.encoder = options.encoder ?? buildLongUrl;
    this.onStep = options.onStep;
  }

  async resolve(nodes: readonly LinkNode[], mode: ResolveMode): Promise<void> {
    if (mode === "fast") {
      await this.resolveFast(nodes);
    } else {
      await this.resolveTwoPhase(nodes);
    }
  }

  async resolveTwoPhase(nodes: readonly LinkNode[]): Promise<void> {
    // Phase 1: placeholder over the raw text, breaks every cycle
    for (const node of nodes) {
      if (node.url !== undefined) continue;
      const url = await this.registry.createOrFind(
        this.encoder(node.target, node.rawText),
        true,
      );
      node.setUrl(url);
      this.onStep?.({ phase: "shallow", name: node.name, url });
    }

    // Phase 2: every dependency now has a URL
    for (const node of nodes) {
      const url = requireUrl(node);
      await this.registry.update(url, this.encoder(node.target, node.substitute()));
      node.markResolved();
      this.onStep?.({ phase: "finalize", name: node.name, url });
    }
  }

  async resolveFast(nodes: readonly LinkNode[]): Promise<void> {
    for (;;) {
      const pending = nodes.filter((node) => !node.resolved);
      if (pending.length === 0) return;

      const next = pending.find((node) => node.isReady());
      if (!next) {
        throw new CycleError(
          "fast",
          pending.map((node) => node.name),
        );
      }

      const url = await this.registry.createOrFind(
        this.encoder(next.target, next.substitute()),
        false,
      );
      next.setUrl(url);
      next.markResolved();
      this.onStep?.({ phase: "fast", name: next.name, url });
    }
  }
}

function requireUrl(node: LinkNode): string {
  if (node.url === undefined) {
    throw new Error(`Link "${node.name}" has no URL after phase 1`);
  }
  return node.url;
}
