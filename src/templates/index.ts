/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import {
  getDefaultPageTemplate,
  getDefaultMarkdownTemplate,
} from "./defaults";
import type { OutputConfig } from "../types";

export { getDefaultPageTemplate, getDefaultMarkdownTemplate };

// Double-quoted YAML scalar; a JSON string is one
Handlebars.registerHelper(
  "yamlString",
  (value: unknown) => new Handlebars.SafeString(JSON.stringify(String(value))),
);

/**
 * Variables available to page templates
 */
export interface PageTemplateContext {
  title: string;
  body: string;
}

export type PageTemplate = HandlebarsTemplateDelegate<PageTemplateContext>;

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<PageTemplate> {
  if (templatePath === null) {
    // Use built-in default
    return Handlebars.compile<PageTemplateContext>(defaultTemplate);
  }

  // Load custom template - let errors bubble up to module level
  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile<PageTemplateContext>(templateContent);
}

/**
 * Load the page template for the configured output format
 */
export async function loadPageTemplate(
  output: Pick<OutputConfig, "format" | "template">,
): Promise<PageTemplate> {
  const defaultTemplate =
    output.format === "markdown"
      ? getDefaultMarkdownTemplate()
      : getDefaultPageTemplate();
  return loadTemplate(output.template, defaultTemplate);
}
