/**
 * Preview Module
 * Writes the dependency graph as a Graphviz DOT file
 */

import { writeFile } from "fs/promises";
import path from "path";
import type { LinkerContext } from "../types";
import { getDefaultPreviewTemplate, loadTemplate } from "../templates";
import { renderPreview } from "../utils";

export async function preview(ctx: LinkerContext): Promise<void> {
  if (!ctx.options.preview) {
    return;
  }
  if (!ctx.nodes || !ctx.edges) {
    throw new Error("Linker must run before preview");
  }

  const { config, logger, nodes } = ctx;
  logger.info(`generating preview for ${nodes.length} links...`);

  const template = await loadTemplate(
    config.preview.template,
    getDefaultPreviewTemplate(config.preview),
  );

  const outputPath = path.resolve(config.preview.filename);
  await writeFile(outputPath, renderPreview(template, nodes), "utf-8");

  ctx.previewPath = outputPath;
  logger.info(`preview written to ${outputPath}`);
}
