/**
 * Stats Module
 * Displays run statistics, published links and issues
 */

import chalk from "chalk";
import type { LinkerContext, RunStats, Tracker } from "../types";
import type { LinkNode } from "../utils";

// ============================================================================
// Formatting Helpers
// ============================================================================

function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

export async function stats(ctx: LinkerContext): Promise<void> {
  const { tracker, options } = ctx;
  const stats = tracker.getStats();
  const nodes = ctx.nodes ?? [];

  console.log("");

  const statusIcon =
    stats.issues.length > 0 ? chalk.yellow("◆") : chalk.green("✔");
  const title = options.dryRun ? "Dry Run Complete" : "Linking Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayGraphSection(stats, ctx.previewPath);

  if (!options.dryRun) {
    displayRegistrySection(stats);
    displayLinksSection(nodes);
  }

  displayIssuesSection(tracker);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayGraphSection(stats: RunStats, previewPath?: string): void {
  console.log(sectionHeader("Graph"));
  console.log(statRow(chalk.cyan("◉"), "Links", stats.totalLinks, chalk.cyan));
  console.log(
    statRow(chalk.cyan("◉"), "References", stats.totalEdges, chalk.cyan),
  );
  if (previewPath) {
    console.log(statRow(chalk.cyan("◉"), "Preview", previewPath, chalk.cyan));
  }
}

function displayRegistrySection(stats: RunStats): void {
  console.log(sectionHeader("Registry"));
  console.log(
    statRow(chalk.green("◉"), "Created", stats.createdUrls, chalk.green),
  );
  if (stats.updatedUrls > 0) {
    console.log(
      statRow(chalk.green("◉"), "Updated", stats.updatedUrls, chalk.green),
    );
  }
  console.log(statRow(chalk.dim("◉"), "Total calls", stats.registryCalls));
}

function displayLinksSection(nodes: readonly LinkNode[]): void {
  if (nodes.length === 0) {
    return;
  }

  console.log(sectionHeader("Links"));
  const width = Math.max(...nodes.map((node) => node.name.length));
  for (const node of nodes) {
    const name = chalk.hex(node.target.color)(node.name.padEnd(width));
    console.log(`   ${name}  ${chalk.blue(node.url ?? "-")}`);
  }
}

function displayIssuesSection(tracker: Tracker): void {
  const resourceIssues = tracker.getIssues("resource");
  const linkIssues = tracker.getIssues("link");

  if (resourceIssues.length === 0 && linkIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.yellow("Warnings")));

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of resourceIssues) {
      if (issue.type !== "resource") continue;
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (linkIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("◆"),
        "Ambiguous names",
        linkIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of linkIssues) {
      if (issue.type !== "link") continue;
      console.log(`      ${chalk.dim("·")} ${issue.details ?? issue.name}`);
    }
  }
}
