import path from "node:path";
import { lookup } from "mime-types";
import { WIKI_MARKUP_MIME, type Title } from "../types";

/**
 * Guess a page's MIME type from its title
 * Titles without a known extension hold wiki markup.
 *
 * @example
 * pageMime("Courses/diagram.png") // "image/png"
 * pageMime("Search (AI)") // "text/x-wiki"
 */
export function pageMime(title: Title): string {
  const extension = path.posix.extname(title);
  if (!extension) {
    return WIKI_MARKUP_MIME;
  }
  const mime = lookup(extension);
  return mime === false ? WIKI_MARKUP_MIME : mime;
}
