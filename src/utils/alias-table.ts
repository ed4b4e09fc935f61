/**
 * Alias Table
 * Named link shorthands defined on a designated wiki page.
 * A link "[[wp|https://en.wikipedia.org/wiki/%s]]" on that page makes
 * ":wp:Graph" expand to "https://en.wikipedia.org/wiki/Graph".
 */

import { collectLinks } from "../wiki/parser";
import type { AliasTable, MarkupParser, PageStorage, Title } from "../types";

/**
 * Build the alias table from the alias page's links (target -> label)
 * Links without a label define nothing. A missing alias page gives an
 * empty table.
 */
export async function buildAliasTable(
  storage: PageStorage,
  parser: MarkupParser,
  aliasPage: Title,
): Promise<AliasTable> {
  const aliases = new Map<string, string>();
  if (!storage.pageExists(aliasPage)) {
    return aliases;
  }

  const text = await storage.pageText(aliasPage);
  for (const { address, label } of collectLinks(parser, text)) {
    if (label !== undefined) {
      aliases.set(address.trim(), label.trim());
    }
  }
  return aliases;
}

export type AliasExpansion =
  | { resolved: true; url: string }
  | { resolved: false; reason: "malformed-alias" | "unknown-alias" };

/**
 * Expand "name:target" against the alias table
 * A pattern holding "%s" gets the target substituted, any other pattern
 * is a prefix.
 *
 * @example
 * expandAlias("wp:Graph", new Map([["wp", "https://w.org/%s"]]))
 * // { resolved: true, url: "https://w.org/Graph" }
 */
export function expandAlias(shorthand: string, aliases: AliasTable): AliasExpansion {
  const separator = shorthand.indexOf(":");
  if (separator === -1) {
    return { resolved: false, reason: "malformed-alias" };
  }

  const name = shorthand.slice(0, separator);
  const target = shorthand.slice(separator + 1);
  const pattern = aliases.get(name);
  if (pattern === undefined) {
    return { resolved: false, reason: "unknown-alias" };
  }

  if (pattern.includes("%s")) {
    return { resolved: true, url: pattern.replace("%s", () => target) };
  }
  return { resolved: true, url: pattern + target };
}
