/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { AliasTable, BacklinkLookup, MarkupParser, PageStorage, Title } from "./wiki";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// ============================================================================
// Issues
// ============================================================================

export type PageIssueReason =
  | "invalid-title"
  | "read-error"
  | "render-error"
  | "write-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type LinkIssueReason = "unknown-alias" | "malformed-alias";

// Discriminated union - each type has its own subset of reasons
export interface PageIssue {
  type: "page";
  path: string;
  reason: PageIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface LinkIssue {
  type: "link";
  path: string;
  reason: LinkIssueReason;
  address: string;
}

export type Issue = PageIssue | ResourceIssue | LinkIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // Page counts
  totalPages: number;
  renderedPages: number;
  copiedFiles: number;
  failedPages: number;

  // Link counts
  internalLinks: number;
  missingTargetLinks: number; // Links rendered with the "nonexistent" class
  missingTargets: number; // Distinct titles behind those links

  issues: Issue[];
  duration: number;
}

export interface ConfigError {
  path: string;
  error: unknown;
}

// ============================================================================
// Context
// ============================================================================

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;

  // Unified tracking for stats, errors, and missing link targets
  tracker: Tracker;
  logger: Logger;
  verbose?: boolean;

  parser?: MarkupParser; // Defaults to WikiParser when the scanner runs

  // Scanner fills these:
  storage?: PageStorage;
  titles?: Title[];
  backlinks?: BacklinkLookup;
  aliases?: AliasTable; // Built once, shared read-only by every page
}
