/**
 * AppTarget helpers
 */

import type { AppTargetConfig } from "../types/config";
import type { AppTarget } from "../types/link";

/**
 * Freeze a configured app into an AppTarget
 *
 * @example
 * createAppTarget({ uri: "https://quest.fortuna-events.fr", separator: "$", color: "#a1e6e6" }).name
 * // "quest.fortuna-events.fr"
 */
export function createAppTarget(app: AppTargetConfig): AppTarget {
  const name = app.uri.replace(/\/+$/, "").split("/").pop() ?? app.uri;
  return Object.freeze({ ...app, name });
}

/**
 * Immutable lookup table from separator character to AppTarget
 */
export class AppTargetTable {
  private readonly bySeparator: ReadonlyMap<string, AppTarget>;

  constructor(readonly targets: readonly AppTarget[]) {
    this.bySeparator = new Map(targets.map((t) => [t.separator, t]));
  }

  static fromConfig(apps: readonly AppTargetConfig[]): AppTargetTable {
    return new AppTargetTable(Object.freeze(apps.map(createAppTarget)));
  }

  findBySeparator(separator: string): AppTarget | undefined {
    return this.bySeparator.get(separator);
  }
}
