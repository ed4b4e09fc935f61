/**
 * Utility exports
 */

// Path utilities
export { encodePathSegment, titleToPath } from "./encode-path";
export { PathResolver, linkExtension } from "./path-resolver";
export type { PathPurpose, PathResolverOptions } from "./path-resolver";
export { pageMime } from "./page-mime";

// Link and HTML utilities
export { isExternalLink, fixUrl } from "./url";
export { escapeHtml } from "./escape-html";
export { buildAliasTable, expandAlias } from "./alias-table";
export type { AliasExpansion } from "./alias-table";
export { LinkRenderer } from "./link-renderer";
export type { LinkRendererOptions } from "./link-renderer";
export { scrubHtml } from "./scrub-html";
export { renderPage } from "./render-page";
export type { RenderPageOptions } from "./render-page";

// Filesystem utilities
export { fileExists, ensureDirectory } from "./fs";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Errors
export { TitleDecompositionError, PageConversionError } from "./errors";

// Classes
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { Tracker } from "./tracker";
