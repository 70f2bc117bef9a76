/**
 * Linker context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { LinkerConfig } from "./config";
import type { DependencyEdge } from "./link";
import type { RegistryClient } from "./registry";
import type { AppTargetTable } from "../utils/app-target";
import type { LinkNode } from "../utils/link-node";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

// ============================================================================
// Issues
// ============================================================================

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type LinkIssueReason = "ambiguous-name";

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface LinkIssue {
  type: "link";
  name: string;
  reason: LinkIssueReason;
  details?: string;
}

export type Issue = ResourceIssue | LinkIssue;
export type IssueType = Issue["type"];

export interface RunStats {
  totalLinks: number;
  totalEdges: number;
  createdUrls: number;
  updatedUrls: number;
  registryCalls: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Context
// ============================================================================

export interface LinkerOptions {
  data: string;
  fast: boolean;
  dryRun: boolean;
  preview: boolean;
  withDebug: boolean;
  quiet: boolean;
}

export interface LinkerContext {
  // Input - provided at initialization
  readonly config: LinkerConfig;
  readonly targets: AppTargetTable;
  readonly options: LinkerOptions;
  readonly tracker: Tracker;
  readonly logger: Logger;

  // Built lazily by the resolver module unless injected
  registry?: RegistryClient;
  // Called after every resolver step (progress display)
  onProgress?: (nodes: readonly LinkNode[]) => void;

  nodes?: LinkNode[]; // Parsed fragments, in file order
  edges?: DependencyEdge[]; // Written by the linker
  previewPath?: string; // Written by the preview module
}
