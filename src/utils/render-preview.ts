/**
 * Preview renderer
 * Builds the template context for the dependency graph preview
 */

import type Handlebars from "handlebars";
import type { DependencyEdge } from "../types/link";
import type { LinkNode } from "./link-node";

export interface PreviewNode {
  name: string;
  color: string;
}

export interface PreviewContext {
  nodes: PreviewNode[];
  edges: DependencyEdge[];
}

/**
 * Only nodes with `preview` enabled are drawn, and only edges between drawn nodes
 */
export function buildPreviewContext(nodes: readonly LinkNode[]): PreviewContext {
  const visible = nodes.filter((node) => node.preview);

  return {
    nodes: visible.map((node) => ({
      name: node.name,
      color: node.target.color,
    })),
    edges: visible.flatMap((node) =>
      node.dependencies
        .filter((dependency) => dependency.preview)
        .map((dependency) => ({ from: node.name, to: dependency.name })),
    ),
  };
}

export function renderPreview(
  template: Handlebars.TemplateDelegate,
  nodes: readonly LinkNode[],
): string {
  return template(buildPreviewContext(nodes));
}
