/**
 * Linker Errors
 * Every fatal condition of a run is a LinkerError subclass
 */

import type { ResolveMode } from "../types/link";
import type { RegistryOperation } from "../types/registry";

export type LinkerErrorKind = "parse" | "registry" | "cycle" | "config";

export abstract class LinkerError extends Error {
  abstract readonly kind: LinkerErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Empty or malformed data file
 */
export class ParseError extends LinkerError {
  readonly kind = "parse";

  constructor(
    message: string,
    readonly line?: number,
  ) {
    super(line === undefined ? message : `${message} (line ${line})`);
  }
}

/**
 * Non-success response (or no response) from the short-URL registry
 */
export class RegistryError extends LinkerError {
  readonly kind = "registry";

  constructor(
    readonly operation: RegistryOperation,
    readonly target: string,
    readonly status?: number,
    reason?: string,
    options?: ErrorOptions,
  ) {
    const verb = operation === "create" ? "shorten URL" : `update short URL ${target}`;
    const detail = status === undefined ? reason : `${status} ${reason ?? ""}`.trim();
    super(`Could not ${verb}${detail ? `: ${detail}` : ""}`, options);
  }
}

/**
 * No resolvable node left while some remain unresolved
 */
export class CycleError extends LinkerError {
  readonly kind = "cycle";

  constructor(
    readonly mode: ResolveMode,
    readonly pending: string[],
  ) {
    super(
      `Cannot resolve in ${mode} mode with cycling dependencies: ${pending.join(", ")}`,
    );
  }
}

/**
 * Missing or invalid runtime configuration
 */
export class ConfigError extends LinkerError {
  readonly kind = "config";
}

export function isLinkerError(error: unknown): error is LinkerError {
  return error instanceof LinkerError;
}
