/**
 * Built-in default templates
 * These are used when no user templates are provided
 */

import type { PreviewConfig } from "../types/config";

/**
 * Generate default preview template
 * Graphviz DOT graph: one filled node per link, one edge per dependency
 */
export function getDefaultPreviewTemplate(config: PreviewConfig): string {
  return `strict digraph preview {
  layout=${config.engine};
  node [style=filled];
{{#each nodes}}
  {{{quote name}}} [label={{{quote name}}}, fillcolor={{{quote color}}}];
{{/each}}
{{#each edges}}
  {{{quote from}}} -> {{{quote to}}};
{{/each}}
}
`;
}
