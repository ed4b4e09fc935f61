/**
 * Wiki collaborator contracts
 * Storage, backlink lookup and markup parsing are consumed through these
 * interfaces so placement and rendering can run against synthetic wikis.
 */

/**
 * Page identifier, possibly "/"-separated ("COMP3620/Search (AI)")
 */
export type Title = string;

/**
 * MIME type the storage reports for pages holding wiki markup
 */
export const WIKI_MARKUP_MIME = "text/x-wiki";

export interface PageStorage {
  pageExists(title: Title): boolean;
  pageMimeType(title: Title): string;
  /** Markup pages only */
  pageText(title: Title): Promise<string>;
  /** Raw pages only */
  pageBytes(title: Title): Promise<Buffer>;
  allPageTitles(): Title[];
}

/**
 * Read-only view of the link graph
 * No ordering guarantee on the returned set
 */
export interface BacklinkLookup {
  backlinksOf(title: Title): ReadonlySet<Title>;
}

/**
 * Callbacks the markup parser invokes for links, images and math
 * Each returns the HTML to splice into the output
 */
export interface RenderCallbacks {
  link(
    address: string,
    label?: string,
    cssClass?: string,
    imageMarkup?: string,
  ): string;
  image(address: string, alt: string, cssClass?: string): string;
  math(text: string, display: boolean): string;
}

/**
 * Markup parser
 * Output is a sequence of HTML fragments whose only guarantee is their
 * order; callers concatenate them without separators.
 */
export interface MarkupParser {
  parse(text: string, callbacks: RenderCallbacks): Iterable<string>;
}

/**
 * Alias name -> substitution pattern (at most one "%s") or literal prefix
 */
export type AliasTable = ReadonlyMap<string, string>;
