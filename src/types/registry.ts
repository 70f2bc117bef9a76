/**
 * Short-URL registry contract
 */

export interface RegistryClient {
  /**
   * Create a short URL for `longUrl`
   * With `findExisting`, an existing short URL for the same long URL is returned instead of a duplicate
   */
  createOrFind(longUrl: string, findExisting: boolean): Promise<string>;

  /**
   * Point an existing short URL at a new long URL
   */
  update(shortUrl: string, longUrl: string): Promise<void>;
}

export type RegistryOperation = "create" | "update";
