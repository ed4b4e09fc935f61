/**
 * Built-in default templates
 * These are used when no user template is provided
 */

/**
 * Generate default HTML page template
 * The title is inserted literally, as the wiki wrote it.
 */
export function getDefaultPageTemplate(): string {
  return `<!DOCTYPE html>
<html lang="en">
    <head>
        <meta charset="utf-8" />
        <title>{{{title}}}</title>
    </head>
    <body>{{{body}}}</body>
</html>`;
}

/**
 * Generate default Markdown page template
 */
export function getDefaultMarkdownTemplate(): string {
  return `---
title: {{yamlString title}}
---

{{{body}}}
`;
}
