/**
 * LinkNode
 * One fragment of the data file and its resolution state
 */

import type { AppTarget, LinkStatus } from "../types/link";
import { getLinkStatus } from "./status";

export interface LinkNodeOptions {
  /** Show this node in the preview graph (default: true) */
  preview?: boolean;
}

export class LinkNode {
  readonly preview: boolean;
  private _dependencies: readonly LinkNode[] | null = null;
  private _url: string | undefined;
  private _resolved = false;

  constructor(
    readonly target: AppTarget,
    readonly name: string,
    readonly rawText: string,
    options: LinkNodeOptions = {},
  ) {
    this.preview = options.preview ?? true;
  }

  get dependencies(): readonly LinkNode[] {
    return this._dependencies ?? [];
  }

  get linked(): boolean {
    return this._dependencies !== null;
  }

  get url(): string | undefined {
    return this._url;
  }

  get resolved(): boolean {
    return this._resolved;
  }

  /**
   * Record every node whose name occurs in this node's raw text
   * Includes this node itself when its own name appears in its text
   */
  link(nodes: readonly LinkNode[]): void {
    if (this._dependencies !== null) {
      throw new Error(`Link "${this.name}" is already linked`);
    }
    this._dependencies = Object.freeze(
      nodes.filter((other) => this.rawText.includes(other.name)),
    );
  }

  /**
   * Raw text with each dependency name replaced by that dependency's URL
   */
  substitute(): string {
    let text = this.rawText;
    for (const dependency of this.dependencies) {
      if (dependency.url === undefined) {
        throw new Error(
          `Cannot substitute "${dependency.name}" in "${this.name}": no URL yet`,
        );
      }
      text = text.split(dependency.name).join(dependency.url);
    }
    return text;
  }

  isReady(): boolean {
    return !this._resolved && this.dependencies.every((dep) => dep.resolved);
  }

  setUrl(url: string): void {
    this._url = url;
  }

  markResolved(): void {
    this._resolved = true;
  }

  getStatus(): LinkStatus {
    return getLinkStatus(this._url, this._resolved);
  }

  toString(): string {
    return this.name;
  }
}
