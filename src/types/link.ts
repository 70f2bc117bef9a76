/**
 * Link graph types
 */

import type { AppTargetConfig } from "./config";

/**
 * Destination application for a fragment
 * `name` is the last path segment of the URI (e.g., "quest.fortuna-events.fr")
 */
export interface AppTarget extends Readonly<AppTargetConfig> {
  readonly name: string;
}

export type LinkStatus = "creating" | "updating" | "done";

export type ResolveMode = "two-phase" | "fast";

/**
 * Edge A→B: `from` contains the symbolic name of `to` in its raw text
 */
export interface DependencyEdge {
  from: string;
  to: string;
}

/**
 * Pair of symbolic names where `inner` is a substring of `outer`
 * Substitution of `inner` may corrupt occurrences of `outer`
 */
export interface AmbiguousName {
  inner: string;
  outer: string;
}

export type ResolvePhase = "shallow" | "finalize" | "fast";

/**
 * Emitted by the resolver after each registry call
 */
export interface ResolveStep {
  phase: ResolvePhase;
  name: string;
  url: string;
}
