/**
 * In-memory short-URL registry for tests
 */

import type { RegistryClient } from "../types";
import { RegistryError } from "../utils/errors";

export type RegistryCall =
  | { op: "create"; longUrl: string; findExisting: boolean }
  | { op: "update"; shortUrl: string; longUrl: string };

export interface FakeRegistryOptions {
  /** Fail every call after this many successful ones */
  failAfter?: number;
}

export class FakeRegistry implements RegistryClient {
  readonly calls: RegistryCall[] = [];
  // short URL → current long URL
  readonly urls = new Map<string, string>();
  private counter = 0;

  constructor(private readonly options: FakeRegistryOptions = {}) {}

  async createOrFind(longUrl: string, findExisting: boolean): Promise<string> {
    this.guard("create", longUrl);
    this.calls.push({ op: "create", longUrl, findExisting });

    if (findExisting) {
      for (const [shortUrl, target] of this.urls) {
        if (target === longUrl) return shortUrl;
      }
    }

    this.counter++;
    // c1z is never a prefix of c10z
    const shortUrl = `https://s.test/c${this.counter}z`;
    this.urls.set(shortUrl, longUrl);
    return shortUrl;
  }

  async update(shortUrl: string, longUrl: string): Promise<void> {
    this.guard("update", shortUrl);
    this.calls.push({ op: "update", shortUrl, longUrl });
    this.urls.set(shortUrl, longUrl);
  }

  private guard(operation: "create" | "update", target: string): void {
    const { failAfter } = this.options;
    if (failAfter !== undefined && this.calls.length >= failAfter) {
      throw new RegistryError(operation, target, 500, "Internal Server Error");
    }
  }
}
