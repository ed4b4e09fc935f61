/**
 * Turndown Configuration
 * Converts rendered wiki pages to Markdown
 */

import TurndownService from "turndown";
import { gfm } from "@truto/turndown-plugin-gfm";
import type { MarkdownConfig } from "../types";
import { fileImageRule } from "./rules";

// "$...$" and "$$...$$" spans written by the math callback
const MATH_SPAN = /(\$\$[\s\S]+?\$\$|\$[^$\n]+?\$)/;

export function createTurndownService(
  config: MarkdownConfig,
): TurndownService {
  const turndownService = new TurndownService({
    headingStyle: config.headingStyle,
    codeBlockStyle: config.codeBlockStyle,
    emDelimiter: config.emphasis,
    strongDelimiter: config.strong,
    bulletListMarker: config.bulletMarker,
    hr: config.horizontalRule,
  });

  // Tables, strikethrough, task lists
  turndownService.use(gfm);
  turndownService.use(fileImageRule());

  // TeX stays as written for a dollar-math aware Markdown reader;
  // escaping "_" or "*" inside it would change the formula
  const escapeText = turndownService.escape.bind(turndownService);
  turndownService.escape = (text: string): string =>
    text
      .split(MATH_SPAN)
      .map((part, index) => (index % 2 === 1 ? part : escapeText(part)))
      .join("");

  return turndownService;
}
