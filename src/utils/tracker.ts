/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  PageIssueReason,
  ResourceIssueReason,
  LinkIssueReason,
  PageIssue,
  ResourceIssue,
  LinkIssue,
  ProcessingStats,
} from "../types";
import { TitleDecompositionError } from "./errors";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapPageError(
  error: unknown,
  context: "read" | "render" | "write" = "render",
): IssueInfo<PageIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof TitleDecompositionError) {
    return { reason: "invalid-title", details };
  }

  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") {
      return { reason: "read-error", details };
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return {
        reason: context === "write" ? "write-error" : "read-error",
        details,
      };
    }
  }

  return { reason: `${context}-error`, details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalPages = 0;
  private renderedPages = 0;
  private copiedFiles = 0;
  private failedPages = 0;
  private internalLinks = 0;
  private issues: Issue[] = [];
  private missingTargetsMap: Map<string, { page: string; count: number }> =
    new Map();
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalPages(count: number): void {
    this.totalPages = count;
  }

  incrementRendered(): void {
    this.renderedPages++;
  }

  incrementCopied(): void {
    this.copiedFiles++;
  }

  incrementFailed(): void {
    this.failedPages++;
  }

  incrementInternalLinks(): void {
    this.internalLinks++;
  }

  /**
   * Record a link to a page that is not in storage
   * Counted per target; `page` is the first page seen linking to it.
   */
  trackMissingTarget(target: string, page: string): void {
    const existing = this.missingTargetsMap.get(target);
    if (existing) {
      existing.count++;
    } else {
      this.missingTargetsMap.set(target, { page, count: 1 });
    }
  }

  trackLinkIssue(path: string, reason: LinkIssueReason, address: string): void {
    this.issues.push({ type: "link", path, reason, address });
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(
    path: string,
    error: unknown,
    type: "page" | "resource",
    context?: "read" | "render" | "write",
  ): void {
    switch (type) {
      case "page": {
        const { reason, details } = mapPageError(error, context);
        this.issues.push({ type: "page", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    let missingTargetLinks = 0;
    for (const { count } of this.missingTargetsMap.values()) {
      missingTargetLinks += count;
    }

    return {
      totalPages: this.totalPages,
      renderedPages: this.renderedPages,
      copiedFiles: this.copiedFiles,
      failedPages: this.failedPages,
      internalLinks: this.internalLinks,
      missingTargetLinks,
      missingTargets: this.missingTargetsMap.size,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const stats = this.getStats();

    const missingTargets: Array<{ target: string; page: string; count: number }> = [];
    for (const [target, { page, count }] of this.missingTargetsMap) {
      missingTargets.push({ target, page, count });
    }

    const exported = {
      summary: {
        totalPages: stats.totalPages,
        renderedPages: stats.renderedPages,
        copiedFiles: stats.copiedFiles,
        failedPages: stats.failedPages,
        internalLinks: stats.internalLinks,
        missingTargetLinks: stats.missingTargetLinks,
        duration: stats.duration,
      },
      issues: this.groupIssuesByTypeAndReason(),
      missingTargets,
    };

    const outputPath = join(outputDir, "stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(): {
    page: Record<string, PageIssue[]>;
    resource: Record<string, ResourceIssue[]>;
    link: Record<string, LinkIssue[]>;
  } {
    const grouped: {
      page: Record<string, PageIssue[]>;
      resource: Record<string, ResourceIssue[]>;
      link: Record<string, LinkIssue[]>;
    } = {
      page: {},
      resource: {},
      link: {},
    };

    for (const issue of this.issues) {
      switch (issue.type) {
        case "page": {
          (grouped.page[issue.reason] ??= []).push(issue);
          break;
        }
        case "resource": {
          (grouped.resource[issue.reason] ??= []).push(issue);
          break;
        }
        case "link": {
          (grouped.link[issue.reason] ??= []).push(issue);
          break;
        }
      }
    }

    return grouped;
  }
}
