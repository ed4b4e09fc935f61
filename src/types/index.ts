/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  WikiConfig,
  OutputConfig,
  ExtensionPolicy,
  LinksConfig,
  MarkdownConfig,
  LoggingConfig,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
  ExtensionPolicySchema,
  OutputConfigSchema,
} from "./config";

// Wiki collaborators
export type {
  Title,
  PageStorage,
  BacklinkLookup,
  RenderCallbacks,
  MarkupParser,
  AliasTable,
} from "./wiki";
export { WIKI_MARKUP_MIME } from "./wiki";

// Context
export type {
  ConversionContext,
  ConfigError,
  Issue,
  IssueType,
  PageIssue,
  ResourceIssue,
  LinkIssue,
  PageIssueReason,
  ResourceIssueReason,
  LinkIssueReason,
  ProcessingStats,
} from "./context";
