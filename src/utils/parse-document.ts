/**
 * Data file parser
 *
 * Format:
 *   $$$$$ intro
 *   Welcome! Go to $$$$$ next... (any text)
 *   ===== next
 *   ...
 *
 * A header is a separator character repeated `separatorLength` times, then the link name.
 * The separator picks the target app.
 */

import type { ParserConfig } from "../types/config";
import type { AppTarget } from "../types/link";
import { type AppTargetTable, createAppTarget } from "./app-target";
import { ParseError } from "./errors";
import { LinkNode } from "./link-node";

export interface ParseOptions {
  targets: AppTargetTable;
  parser: ParserConfig;
  /** Append a debug link listing every link name */
  includeDebug?: boolean;
}

const ZERO_WIDTH_SPACE = "&#x200B;";

// Any character repeated, then a name of letters, digits and underscores
function buildHeaderPattern(length: number): RegExp {
  return new RegExp(`^(.)\\1{${length - 1}}\\s*([\\p{L}\\p{N}_]+)`, "u");
}

/**
 * Split data file lines into link nodes
 *
 * @throws ParseError on empty input, text before the first header or duplicate names
 */
export function parseDocument(
  lines: readonly string[],
  options: ParseOptions,
): LinkNode[] {
  if (lines.length === 0 || lines.every((line) => line.trim() === "")) {
    throw new ParseError("Empty data file");
  }

  const { targets, parser } = options;
  const pattern = buildHeaderPattern(parser.separatorLength);

  const nodes: LinkNode[] = [];
  const names = new Set<string>();
  let current: { target: AppTarget; name: string; buffer: string[] } | null =
    null;

  const flush = (): void => {
    if (current) {
      nodes.push(
        new LinkNode(current.target, current.name, current.buffer.join("\n")),
      );
    }
  };

  lines.forEach((line, index) => {
    const match = pattern.exec(line);
    // A repeated character that selects no app is body text
    const target = match ? targets.findBySeparator(match[1]) : undefined;

    if (!match || !target) {
      if (!current) {
        throw new ParseError("Text found before the first link header", index + 1);
      }
      current.buffer.push(line);
      return;
    }

    const name = match[2];
    if (names.has(name)) {
      throw new ParseError(`Duplicate link name "${name}"`, index + 1);
    }

    flush();
    names.add(name);
    current = { target, name, buffer: [] };
  });

  flush();

  if (options.includeDebug) {
    if (names.has(parser.debugName)) {
      throw new ParseError(`Duplicate link name "${parser.debugName}"`);
    }
    nodes.push(createDebugNode(nodes, parser));
  }

  return nodes;
}

/**
 * Debug link listing every link with its URL
 * Each name appears once plain (substituted by its URL) and once split by
 * zero-width spaces, which stays readable and is never substituted
 */
function createDebugNode(nodes: LinkNode[], parser: ParserConfig): LinkNode {
  const target = createAppTarget({ ...parser.debugTarget, separator: "#" });
  const listing = nodes
    .map((node) => `${node.name}\n${[...node.name].join(ZERO_WIDTH_SPACE)}`)
    .join("\n");
  return new LinkNode(target, parser.debugName, `Debug\n${listing}`, {
    preview: false,
  });
}

/**
 * Read raw file content into parser lines (trimmed, split on line breaks)
 */
export function splitLines(content: string): string[] {
  const trimmed = content.trim();
  return trimmed === "" ? [] : trimmed.split(/\r?\n/);
}
