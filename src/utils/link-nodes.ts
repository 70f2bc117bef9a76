/**
 * Dependency Graph Builder
 * Single linking pass over the full node set
 */

import type { AmbiguousName, DependencyEdge } from "../types/link";
import type { LinkNode } from "./link-node";

/**
 * Link every node against the full set and return the resulting edges
 * Edge order follows node order, then dependency order
 */
export function linkNodes(nodes: readonly LinkNode[]): DependencyEdge[] {
  const edges: DependencyEdge[] = [];

  for (const node of nodes) {
    node.link(nodes);
    for (const dependency of node.dependencies) {
      edges.push({ from: node.name, to: dependency.name });
    }
  }

  return edges;
}

/**
 * Find names that are substrings of other names
 * "$A" inside "$AB" makes "$AB" look like a reference to "$A" too
 */
export function findAmbiguousNames(
  nodes: readonly LinkNode[],
): AmbiguousName[] {
  const ambiguous: AmbiguousName[] = [];

  for (const inner of nodes) {
    for (const outer of nodes) {
      if (inner !== outer && outer.name.includes(inner.name)) {
        ambiguous.push({ inner: inner.name, outer: outer.name });
      }
    }
  }

  return ambiguous;
}
