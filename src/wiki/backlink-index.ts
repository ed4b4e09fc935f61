/**
 * Backlink Index
 * Which pages link to which, built once per run by parsing every markup page
 */

import type { BacklinkLookup, MarkupParser, PageStorage, Title } from "../types";
import { WIKI_MARKUP_MIME } from "../types";
import { isExternalLink } from "../utils/url";
import { collectLinks } from "./parser";

const EMPTY: ReadonlySet<Title> = new Set();

/**
 * Reduce a link address to the page it targets
 * External links, aliases and in-page anchors target no page.
 */
export function linkTarget(address: string): Title | null {
  const trimmed = address.trim();
  if (isExternalLink(trimmed) || trimmed.startsWith(":")) {
    return null;
  }
  const target = trimmed.split("#", 1)[0];
  return target === "" ? null : target;
}

export class BacklinkIndex implements BacklinkLookup {
  private readonly sources = new Map<Title, Set<Title>>();

  /**
   * Parse every markup page in storage and record its links and images
   */
  static async build(
    storage: PageStorage,
    parser: MarkupParser,
  ): Promise<BacklinkIndex> {
    const index = new BacklinkIndex();
    for (const title of storage.allPageTitles()) {
      if (storage.pageMimeType(title) !== WIKI_MARKUP_MIME) continue;

      const text = await storage.pageText(title);
      const targets = collectLinks(parser, text).map((link) =>
        linkTarget(link.address),
      );
      index.addLinks(
        title,
        targets.filter((target): target is Title => target !== null),
      );
    }
    return index;
  }

  addLinks(source: Title, targets: Iterable<Title>): void {
    for (const target of targets) {
      let sources = this.sources.get(target);
      if (!sources) {
        sources = new Set();
        this.sources.set(target, sources);
      }
      sources.add(source);
    }
  }

  backlinksOf(title: Title): ReadonlySet<Title> {
    return this.sources.get(title) ?? EMPTY;
  }
}
