/**
 * Shlink Registry Client
 * Short-URL registry over the Shlink REST API
 */

import { z } from "zod";
import type { RegistryClient, RegistryOperation } from "../types/registry";
import { RegistryError } from "./errors";

const ShortUrlResponseSchema = z.object({
  shortUrl: z.string().url(),
});

export interface ShlinkClientOptions {
  /** Base URI of the REST API (e.g., "https://s.example.com/rest/v3") */
  apiUri: string;
  apiKey: string;
  /** Defaults to global fetch */
  fetch?: typeof fetch;
}

export class ShlinkRegistryClient implements RegistryClient {
  private readonly apiUri: string;
  private readonly apiKey: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: ShlinkClientOptions) {
    this.apiUri = options.apiUri.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetch ?? fetch;
  }

  async createOrFind(longUrl: string, findExisting: boolean): Promise<string> {
    const response = await this.request(
      "create",
      longUrl,
      `${this.apiUri}/short-urls`,
      "POST",
      { longUrl, findIfExists: findExisting },
    );

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RegistryError("create", longUrl, response.status, "invalid JSON response", {
        cause: error,
      });
    }

    const parsed = ShortUrlResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RegistryError("create", longUrl, response.status, "response has no shortUrl");
    }
    return parsed.data.shortUrl;
  }

  async update(shortUrl: string, longUrl: string): Promise<void> {
    const shortCode = getShortCode(shortUrl);
    const response = await this.request(
      "update",
      shortUrl,
      `${this.apiUri}/short-urls/${encodeURIComponent(shortCode)}`,
      "PATCH",
      { longUrl },
    );
    await this.drain("update", shortUrl, response);
  }

  private async request(
    operation: RegistryOperation,
    target: string,
    url: string,
    method: "POST" | "PATCH",
    body: Record<string, unknown>,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          "X-Api-Key": this.apiKey,
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RegistryError(operation, target, undefined, reason, { cause: error });
    }

    if (!response.ok) {
      await this.drain(operation, target, response);
      throw new RegistryError(operation, target, response.status, response.statusText);
    }
    return response;
  }

  /**
   * Read an unused body to the end; undici holds the socket until then
   */
  private async drain(
    operation: RegistryOperation,
    target: string,
    response: Response,
  ): Promise<void> {
    try {
      await response.text();
    } catch (error) {
      throw new RegistryError(operation, target, response.status, "unreadable response body", {
        cause: error,
      });
    }
  }
}

/**
 * Last path segment of a short URL
 *
 * @example
 * getShortCode("https://s.example.com/abc12") // "abc12"
 */
export function getShortCode(shortUrl: string): string {
  return shortUrl.replace(/\/+$/, "").split("/").pop() ?? shortUrl;
}
