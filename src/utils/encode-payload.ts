/**
 * Payload Encoder
 * Turns fragment text into a URL-safe token for the `z` query parameter
 *
 * Format: lz-string base64, made URL-safe (+ → -, / → _, no padding), reversed.
 * Target applications decode it by reversing these steps.
 */

import LZString from "lz-string";
import type { AppTarget } from "../types/link";

/**
 * Replace every non-ASCII code point by an XML character reference
 *
 * @example
 * escapeNonAscii("café") // "caf&#233;"
 */
export function escapeNonAscii(text: string): string {
  let result = "";
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    result += code > 127 ? `&#${code};` : char;
  }
  return result;
}

export function encodePayload(text: string): string {
  return LZString.compressToBase64(escapeNonAscii(text))
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=/g, "")
    .split("")
    .reverse()
    .join("");
}

/**
 * Inverse of encodePayload (character references are left as-is)
 * Returns null when the token is not a valid payload
 */
export function decodePayload(token: string): string | null {
  const base64 = token
    .split("")
    .reverse()
    .join("")
    .replace(/-/g, "+")
    .replace(/_/g, "/");
  const padded = base64.padEnd(Math.ceil(base64.length / 4) * 4, "=");
  return LZString.decompressFromBase64(padded);
}

/**
 * Build the long URL a short URL points to
 */
export function buildLongUrl(target: AppTarget, text: string): string {
  return `${target.uri}?z=${encodePayload(text)}`;
}

export type PayloadEncoder = (target: AppTarget, text: string) => string;
