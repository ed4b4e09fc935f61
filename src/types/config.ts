/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const WikiConfigSchema = z.object({
  directory: z.string(), // Directory holding one file per page
  frontPage: z.string(), // Home page title, never used as a placement parent
  aliasPage: z.string(), // Page whose links define the alias table
  encoding: z.enum([
    "utf-8",
    "utf8",
    "utf16le",
    "latin1",
    "ascii",
    "binary",
  ]),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  format: z.enum(["html", "markdown"]),
  // Subdirectory of the output directory that receives raw (non-markup) pages
  filePrefix: z.string().nullable(),
  // Flatten raw pages into a single directory ("a/b.png" -> "a_b.png")
  filesInOneDir: z.boolean(),
  // Handlebars template for rendered pages; null uses the built-in one
  template: z.string().nullable(),
});

export const ExtensionPolicySchema = z.enum(["output", "referencesOnly", "both"]);

export const LinksConfigSchema = z.object({
  // Extension appended to markup pages (e.g. ".html", ".md"); null for none.
  // Unset follows the output format: ".md" for Markdown, ".html" otherwise.
  extension: z.string().nullable().optional(),
  // Whether the extension names the written file, only the links to it, or both
  extensionAppliesTo: ExtensionPolicySchema,
});

export const MarkdownConfigSchema = z.object({
  headingStyle: z.enum(["atx", "setext"]),
  codeBlockStyle: z.enum(["fenced", "indented"]),
  emphasis: z.enum(["_", "*"]),
  strong: z.enum(["__", "**"]),
  bulletMarker: z.enum(["-", "+", "*"]),
  horizontalRule: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const ConversionConfigSchema = z.object({
  wiki: WikiConfigSchema,
  output: OutputConfigSchema,
  links: LinksConfigSchema,
  markdown: MarkdownConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial()
  .extend({
    wiki: WikiConfigSchema.partial().optional(),
    output: OutputConfigSchema.partial().optional(),
    links: LinksConfigSchema.partial().optional(),
    markdown: MarkdownConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type WikiConfig = z.infer<typeof WikiConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type ExtensionPolicy = z.infer<typeof ExtensionPolicySchema>;
export type LinksConfig = z.infer<typeof LinksConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;
