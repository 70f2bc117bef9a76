/**
 * Progress display
 * Renders node statuses for the spinner while the resolver runs
 */

import chalk from "chalk";
import type { LinkStatus } from "../types/link";
import type { LinkNode } from "./link-node";

const BAR_SIZE = 30;

export interface ProgressCounts {
  total: number;
  /** Has a URL but is not resolved yet */
  linked: number;
  resolved: number;
}

export function countProgress(nodes: readonly LinkNode[]): ProgressCounts {
  let linked = 0;
  let resolved = 0;
  for (const node of nodes) {
    const status = node.getStatus();
    if (status === "done") resolved++;
    else if (status === "updating") linked++;
  }
  return { total: nodes.length, linked, resolved };
}

function formatStatus(node: LinkNode, status: LinkStatus): string {
  switch (status) {
    case "creating":
      return chalk.yellow.bold("creating...");
    case "updating":
      return `${chalk.blue.bold(node.url ?? "")} ${chalk.yellow.bold("updating...")}`;
    case "done":
      return `${chalk.blue.bold(node.url ?? "")} ${chalk.green.bold("done")}`;
  }
}

/**
 * Two-tone bar: resolved (green), linked (yellow), remaining (dots)
 */
function progressBar({ total, linked, resolved }: ProgressCounts): string {
  if (total === 0) return chalk.dim("·".repeat(BAR_SIZE));

  const resolvedWidth = Math.round((resolved / total) * BAR_SIZE);
  const linkedWidth = Math.round(((resolved + linked) / total) * BAR_SIZE) - resolvedWidth;
  const remainingWidth = BAR_SIZE - resolvedWidth - linkedWidth;

  const linkedPercent = Math.round(((linked + resolved) / total) * 100);
  const resolvedPercent = Math.round((resolved / total) * 100);

  return (
    `[${chalk.green.bold("#".repeat(resolvedWidth))}` +
    `${chalk.yellow.bold("#".repeat(linkedWidth))}` +
    `${"·".repeat(remainingWidth)}] ` +
    `(${linkedPercent}% linked, ${resolvedPercent}% resolved)`
  );
}

/**
 * Spinner text: one line per link (unless quiet), then the bar
 */
export function formatProgress(
  nodes: readonly LinkNode[],
  quiet = false,
): string {
  const lines: string[] = [];

  if (!quiet) {
    for (const node of nodes) {
      const name = chalk.hex(node.target.color).bold(node.name);
      lines.push(`* ${name}: ${formatStatus(node, node.getStatus())}`);
    }
  }

  lines.push(progressBar(countProgress(nodes)));
  return lines.join("\n");
}
