/**
 * Wiki Markup Parser
 * Renders the Hatta-style markup subset used by the wiki pages to HTML.
 * Links, images and math are delegated to the render callbacks so the
 * caller decides where they point.
 *
 * Block syntax: "= Heading =", "* item", "# item", "> quote", "|a|b|",
 * "----", "{{{ ... }}}" (preformatted, no highlighting) and
 * "{{{#!math ... }}}" (display math). Blank lines end blocks.
 *
 * Inline syntax: [[target|label]], {{image|alt}}, $$math$$, **bold**,
 * //italic//, ##code##, {{{code}}}, bare URLs and "\\" line breaks.
 */

import type { MarkupParser, RenderCallbacks } from "../types";
import { escapeHtml } from "../utils/escape-html";

const HEADING = /^(={1,6})\s*(.*?)\s*=*\s*$/;
const RULE = /^-{4,}\s*$/;
const LIST_ITEM = /^\s*([*#])\s+(.*)$/;
const QUOTE = /^>\s?(.*)$/;
const TABLE_ROW = /^\s*\|(.*)$/;
const BLOCK_OPEN = /^\{\{\{(#!(\w+))?\s*$/;
const BLOCK_CLOSE = /^\}\}\}\s*$/;
const IMAGE_LABEL = /^\{\{([^}|]+)(?:\|([^}]*))?\}\}$/;

const INLINE = new RegExp(
  [
    String.raw`\[\[(?<link>[^\]|]+)(?:\|(?<label>.*?))?\]\]`,
    String.raw`\{\{\{(?<mono>.+?)\}\}\}`,
    String.raw`\{\{(?<image>[^}|]+)(?:\|(?<alt>[^}]*))?\}\}`,
    String.raw`\$\$(?<math>.+?)\$\$`,
    String.raw`\*\*(?<bold>.+?)\*\*`,
    String.raw`(?<url>\b(?:https?|ftp):\/\/[^\s<>"]*[^\s<>".,;:!?)\]])`,
    String.raw`\/\/(?<italic>.+?)\/\/`,
    String.raw`##(?<code>.+?)##`,
    String.raw`(?<br>\\\\)`,
  ].join("|"),
  "gs",
);

type OpenBlock =
  | { kind: "paragraph"; line: number; text: string[] }
  | { kind: "list"; line: number; tag: "ul" | "ol"; items: string[] }
  | { kind: "quote"; line: number; text: string[] }
  | { kind: "table"; line: number; rows: string[][] };

export class WikiParser implements MarkupParser {
  *parse(text: string, callbacks: RenderCallbacks): Generator<string> {
    const lines = text.split(/\r?\n/);
    const inline = (source: string) => renderInline(source, callbacks);
    let open: OpenBlock | null = null;
    let headings = 0;

    function* close(): Generator<string> {
      if (open === null) return;
      const block: OpenBlock = open;
      open = null;

      switch (block.kind) {
        case "paragraph":
          yield `<p id="line_${block.line}">${inline(block.text.join("\n"))}</p>`;
          break;
        case "quote":
          yield `<blockquote id="line_${block.line}">${inline(block.text.join("\n"))}</blockquote>`;
          break;
        case "list":
          yield `<${block.tag} id="line_${block.line}">`;
          for (const item of block.items) {
            yield `<li>${inline(item)}</li>`;
          }
          yield `</${block.tag}>`;
          break;
        case "table":
          yield `<table id="line_${block.line}">`;
          for (const row of block.rows) {
            yield "<tr>";
            for (const cell of row) {
              yield `<td>${inline(cell.trim())}</td>`;
            }
            yield "</tr>";
          }
          yield "</table>";
          break;
      }
    }

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index];
      const lineNo = index + 1;

      const fence = BLOCK_OPEN.exec(line.trim());
      if (fence) {
        yield* close();
        const body: string[] = [];
        index++;
        while (index < lines.length && !BLOCK_CLOSE.test(lines[index].trim())) {
          body.push(lines[index]);
          index++;
        }
        if (fence[2] === "math") {
          yield `<div id="line_${lineNo}">${callbacks.math(body.join("\n"), true)}</div>`;
        } else {
          yield `<pre class="code" id="line_${lineNo}">${escapeHtml(body.join("\n"))}</pre>`;
        }
        continue;
      }

      if (line.trim() === "") {
        yield* close();
        continue;
      }

      const heading = HEADING.exec(line);
      if (heading) {
        yield* close();
        const level = heading[1].length;
        headings++;
        yield `<a name="head-${headings}"></a><h${level} id="line_${lineNo}">${inline(heading[2])}</h${level}>`;
        continue;
      }

      if (RULE.test(line)) {
        yield* close();
        yield "<hr>";
        continue;
      }

      const item = LIST_ITEM.exec(line);
      if (item) {
        const tag = item[1] === "*" ? "ul" : "ol";
        const current: OpenBlock | null = open;
        if (current?.kind === "list" && current.tag === tag) {
          current.items.push(item[2]);
        } else {
          yield* close();
          open = { kind: "list", line: lineNo, tag, items: [item[2]] };
        }
        continue;
      }

      const quote = QUOTE.exec(line);
      if (quote) {
        const current: OpenBlock | null = open;
        if (current?.kind === "quote") {
          current.text.push(quote[1]);
        } else {
          yield* close();
          open = { kind: "quote", line: lineNo, text: [quote[1]] };
        }
        continue;
      }

      const row = TABLE_ROW.exec(line);
      if (row) {
        const cells = splitCells(row[1]);
        const current: OpenBlock | null = open;
        if (current?.kind === "table") {
          current.rows.push(cells);
        } else {
          yield* close();
          open = { kind: "table", line: lineNo, rows: [cells] };
        }
        continue;
      }

      const current: OpenBlock | null = open;
      if (current?.kind === "paragraph") {
        current.text.push(line);
      } else {
        yield* close();
        open = { kind: "paragraph", line: lineNo, text: [line] };
      }
    }

    yield* close();
  }
}

/**
 * Split a table row on "|", ignoring bars inside [[...]] and {{...}}
 */
function splitCells(row: string): string[] {
  const cells: string[] = [];
  let depth = 0;
  let cell = "";

  for (let i = 0; i < row.length; i++) {
    const pair = row.slice(i, i + 2);
    if (pair === "[[" || pair === "{{") {
      depth++;
      cell += pair;
      i++;
    } else if ((pair === "]]" || pair === "}}") && depth > 0) {
      depth--;
      cell += pair;
      i++;
    } else if (row[i] === "|" && depth === 0) {
      cells.push(cell);
      cell = "";
    } else {
      cell += row[i];
    }
  }

  // A trailing "|" closes the row rather than opening an empty cell
  if (cell.trim() !== "") {
    cells.push(cell);
  }
  return cells;
}

function renderInline(text: string, callbacks: RenderCallbacks): string {
  let html = "";
  let last = 0;

  for (const match of text.matchAll(INLINE)) {
    const start = match.index ?? 0;
    html += escapeHtml(text.slice(last, start));
    html += renderToken(match.groups ?? {}, callbacks);
    last = start + match[0].length;
  }

  return html + escapeHtml(text.slice(last));
}

function renderToken(
  groups: Record<string, string | undefined>,
  callbacks: RenderCallbacks,
): string {
  const { link, label, mono, image, alt, math, bold, url, italic, code } =
    groups;

  if (link !== undefined) {
    const picture = label === undefined ? null : IMAGE_LABEL.exec(label.trim());
    if (picture) {
      const imageAlt = picture[2] ?? picture[1];
      return callbacks.link(
        link,
        imageAlt,
        undefined,
        callbacks.image(picture[1], imageAlt),
      );
    }
    return callbacks.link(link, label);
  }
  if (mono !== undefined) return `<code>${escapeHtml(mono)}</code>`;
  if (image !== undefined) return callbacks.image(image, alt ?? image);
  if (math !== undefined) return callbacks.math(math, false);
  if (bold !== undefined) {
    return `<strong>${renderInline(bold, callbacks)}</strong>`;
  }
  if (url !== undefined) return callbacks.link(url);
  if (italic !== undefined) {
    return `<em>${renderInline(italic, callbacks)}</em>`;
  }
  if (code !== undefined) return `<code>${escapeHtml(code)}</code>`;
  return "<br>";
}

/**
 * A link or image reference found in a page
 */
export interface CollectedLink {
  address: string;
  label?: string;
  image: boolean;
}

/**
 * Every link and image a page refers to, in document order
 */
export function collectLinks(parser: MarkupParser, text: string): CollectedLink[] {
  const links: CollectedLink[] = [];
  const recorder: RenderCallbacks = {
    link(address, label) {
      links.push({ address, label, image: false });
      return "";
    },
    image(address, alt) {
      links.push({ address, label: alt, image: true });
      return "";
    },
    math() {
      return "";
    },
  };

  // Drain the parser; only the callbacks matter here
  Array.from(parser.parse(text, recorder));
  return links;
}
