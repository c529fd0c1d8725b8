/**
 * Console formatting shared by the commands
 */

import chalk from "chalk";
import type { ConfigEventKind, PendingChangeSummary } from "../../types/index.js";

const KIND_LABELS: Record<ConfigEventKind, string> = {
  add: chalk.green("+ add   "),
  update: chalk.yellow("~ update"),
  remove: chalk.red("- remove"),
};

export function formatEventKind(kind: ConfigEventKind): string {
  return KIND_LABELS[kind];
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

export function printHeading(title: string): void {
  console.log();
  console.log(chalk.cyan.bold(title));
  console.log(chalk.dim("─".repeat(40)));
}

export function printSummary(summary: PendingChangeSummary): void {
  const sections: Array<[keyof PendingChangeSummary, string]> = [
    ["removed", chalk.red("Removed")],
    ["changed", chalk.yellow("Changed")],
    ["added", chalk.green("Added")],
  ];

  for (const [category, label] of sections) {
    const paths = summary[category];
    if (paths.length === 0) continue;

    console.log();
    console.log(chalk.white.bold(label));
    for (const changePath of paths) {
      console.log(`  ${changePath}`);
    }
  }
}
