/**
 * Parser Module
 * Reads the data file and creates one LinkNode per fragment
 */

import { readFile } from "fs/promises";
import type { LinkerContext } from "../types";
import { parseDocument, splitLines } from "../utils";
import { ParseError } from "../utils/errors";

export async function parse(ctx: LinkerContext): Promise<void> {
  const { options, config, targets, logger } = ctx;

  let content: string;
  try {
    content = await readFile(options.data, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Cannot read ${options.data}: ${reason}`);
  }

  ctx.nodes = parseDocument(splitLines(content), {
    targets,
    parser: config.parser,
    includeDebug: options.withDebug,
  });

  logger.info(`parsed ${ctx.nodes.length} links`);
}
