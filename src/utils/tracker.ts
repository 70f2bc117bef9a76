/**
 * Run Tracker
 * Unified tracking for registry calls and non-fatal issues
 */

import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  ResourceIssueReason,
  RunStats,
} from "../types/context";
import type { AmbiguousName } from "../types/link";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalLinks = 0;
  private totalEdges = 0;
  private createdUrls = 0;
  private updatedUrls = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setGraphSize(links: number, edges: number): void {
    this.totalLinks = links;
    this.totalEdges = edges;
  }

  incrementCreated(): void {
    this.createdUrls++;
  }

  incrementUpdated(): void {
    this.updatedUrls++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  trackAmbiguousName({ inner, outer }: AmbiguousName): void {
    this.issues.push({
      type: "link",
      name: outer,
      reason: "ambiguous-name",
      details: `"${inner}" is a substring of "${outer}"`,
    });
  }

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalLinks: this.totalLinks,
      totalEdges: this.totalEdges,
      createdUrls: this.createdUrls,
      updatedUrls: this.updatedUrls,
      registryCalls: this.createdUrls + this.updatedUrls,
      issues: this.issues,
      duration,
    };
  }
}
