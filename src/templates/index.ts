/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { getDefaultPreviewTemplate } from "./defaults";

export { getDefaultPreviewTemplate };

// DOT quoted identifier: "a \"b\""
Handlebars.registerHelper("quote", (value: unknown) => {
  const escaped = String(value).replace(/\\/g, "\\\\").replace(/"/g, '\\"');
  return `"${escaped}"`;
});

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate(
  templatePath: string | undefined,
  defaultTemplate: string,
): Promise<Handlebars.TemplateDelegate> {
  if (templatePath === undefined) {
    return Handlebars.compile(defaultTemplate);
  }

  // Load custom template - let errors bubble up to module level
  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile(templateContent);
}
