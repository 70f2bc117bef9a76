/**
 * Utility exports
 */

// Link graph
export { LinkNode } from "./link-node";
export type { LinkNodeOptions } from "./link-node";
export { linkNodes, findAmbiguousNames } from "./link-nodes";
export { getLinkStatus } from "./status";

// Parsing
export { parseDocument, splitLines } from "./parse-document";
export type { ParseOptions } from "./parse-document";
export { AppTargetTable, createAppTarget } from "./app-target";

// Encoding
export {
  encodePayload,
  decodePayload,
  escapeNonAscii,
  buildLongUrl,
} from "./encode-payload";
export type { PayloadEncoder } from "./encode-payload";

// Registry & resolution
export { ShlinkRegistryClient, getShortCode } from "./registry-client";
export type { ShlinkClientOptions } from "./registry-client";
export { UrlResolver } from "./url-resolver";
export type { UrlResolverOptions } from "./url-resolver";

// Display
export { formatProgress, countProgress } from "./progress";
export type { ProgressCounts } from "./progress";
export { renderPreview, buildPreviewContext } from "./render-preview";
export type { PreviewContext, PreviewNode } from "./render-preview";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
  applyEnv,
} from "./load-config";

// Errors
export {
  LinkerError,
  ParseError,
  RegistryError,
  CycleError,
  ConfigError,
  isLinkerError,
} from "./errors";

// Classes
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { Tracker } from "./tracker";
