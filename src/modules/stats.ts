/**
 * Stats Module
 * Displays processing statistics and issues
 */

import chalk from "chalk";
import type {
  ConversionContext,
  Issue,
  LinkIssue,
  PageIssue,
  ProcessingStats,
  ResourceIssue,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
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

/**
 * Progress bar with percentage, clamped to 0-100%
 */
export function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = Math.min(Math.max(current / total, 0), 1);
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
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

/**
 * Export stats to JSON and display processing statistics to console
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { config, tracker, verbose } = ctx;
  await tracker.exportStats(config.output.directory);

  const stats = tracker.getStats();
  const hasWarnings = stats.missingTargetLinks > 0 || stats.issues.length > 0;
  const hasErrors = stats.failedPages > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Export Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayPagesSection(stats);
  displayLinksSection(stats);
  displayIssuesSection(stats.issues, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayPagesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Pages"));

  const done = stats.renderedPages + stats.copiedFiles;
  console.log(`   ${progressBar(done, stats.totalPages)}`);

  console.log(
    statRow(chalk.green("◉"), "Rendered", stats.renderedPages, chalk.green),
  );

  if (stats.copiedFiles > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Files copied", stats.copiedFiles, chalk.cyan),
    );
  }

  if (stats.failedPages > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedPages, chalk.red),
    );
  }
}

function displayLinksSection(stats: ProcessingStats): void {
  if (stats.internalLinks === 0) {
    return;
  }

  console.log(sectionHeader("Links"));

  const existing = stats.internalLinks - stats.missingTargetLinks;
  console.log(`   ${progressBar(existing, stats.internalLinks)}`);

  console.log(
    statRow(chalk.green("◉"), "Internal", stats.internalLinks, chalk.green),
  );

  if (stats.missingTargetLinks > 0) {
    const missingText = `${stats.missingTargets} pages (${stats.missingTargetLinks} links)`;
    console.log(
      statRow(chalk.yellow("◉"), "Missing targets", missingText, chalk.yellow),
    );
  }
}

function displayIssuesSection(issues: Issue[], verbose?: boolean): void {
  const pageIssues = issues.filter((i): i is PageIssue => i.type === "page");
  const resourceIssues = issues.filter(
    (i): i is ResourceIssue => i.type === "resource",
  );
  const linkIssues = issues.filter((i): i is LinkIssue => i.type === "link");

  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  if (pageIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Pages failed", pageIssues.length, chalk.red),
    );
    for (const issue of pageIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Configs skipped",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
      }
    }
  }

  if (linkIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Bad aliases", linkIssues.length, chalk.yellow),
    );
    if (verbose) {
      for (const issue of linkIssues.slice(0, 5)) {
        console.log(`      ${chalk.dim("·")} ${issue.path}: ${issue.address}`);
      }
      if (linkIssues.length > 5) {
        console.log(`      ${chalk.dim(`  +${linkIssues.length - 5} more`)}`);
      }
    }
  }
}
