/**
 * Page Renderer
 * Wiki markup -> HTML body -> document (HTML or Markdown)
 */

import type TurndownService from "turndown";
import type { PageTemplate } from "../templates";
import type { MarkupParser, RenderCallbacks, Title } from "../types";
import { scrubHtml } from "./scrub-html";

export interface RenderPageOptions {
  title: Title;
  text: string;
  parser: MarkupParser;
  callbacks: RenderCallbacks;
  template: PageTemplate;
  /** Set for Markdown output; the scrubbed body is converted before templating */
  turndown?: TurndownService;
}

export function renderPage(options: RenderPageOptions): string {
  const { title, text, parser, callbacks, template, turndown } = options;

  // Fragments can be as small as one character; order is all that counts
  const body = Array.from(parser.parse(text, callbacks)).join("");

  if (turndown) {
    const markdown = turndown.turndown(scrubHtml(body));
    return template({ title, body: markdown });
  }

  return scrubHtml(template({ title, body }));
}
