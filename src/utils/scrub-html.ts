/**
 * HTML Scrubber
 * Strips attributes the wiki renderer adds for its own use: classes,
 * generic line IDs and empty heading anchors.
 */

import { load } from "cheerio";
import type { AnyNode } from "domhandler";

/**
 * Remove renderer-internal markup from an HTML document
 * Runs on htmlparser2 with entities left as written, so markup the
 * scrubber does not touch comes back unchanged.
 *
 * @example
 * scrubHtml('<p class="x" id="line_3">Hi</p>') // "<p>Hi</p>"
 */
export function scrubHtml(html: string): string {
  const $ = load(html, { xml: { xmlMode: false, decodeEntities: false } });

  $("[class]").removeAttr("class");
  $("[id^='line_']").removeAttr("id");

  // Only empty anchors; a head-* anchor wrapping content is a real link
  $("a[name^='head-']").each((_index: number, element: AnyNode) => {
    const $anchor = $(element);
    if ($anchor.contents().length === 0) {
      $anchor.remove();
    }
  });

  return $.html();
}
