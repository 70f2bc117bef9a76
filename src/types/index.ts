/**
 * Central type exports
 */

// Configuration
export type {
  AppTargetConfig,
  ParserConfig,
  RegistryConfig,
  PreviewConfig,
  LoggingConfig,
  LinkerConfig,
  PartialLinkerConfig,
  ConfigLoadError,
} from "./config";
export {
  AppTargetSchema,
  LinkerConfigSchema,
  PartialLinkerConfigSchema,
} from "./config";

// Link graph
export type {
  AppTarget,
  LinkStatus,
  ResolveMode,
  ResolvePhase,
  ResolveStep,
  DependencyEdge,
  AmbiguousName,
} from "./link";

// Registry
export type { RegistryClient, RegistryOperation } from "./registry";

// Context
export type {
  LinkerContext,
  LinkerOptions,
  Issue,
  IssueType,
  ResourceIssue,
  LinkIssue,
  ResourceIssueReason,
  LinkIssueReason,
  RunStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
