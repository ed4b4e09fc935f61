/**
 * Scanner Module
 * Opens the wiki, lists its pages and builds the run-wide lookups
 */

import path from "node:path";
import { BacklinkIndex, DirectoryStorage, WikiParser } from "../wiki";
import { buildAliasTable, fileExists } from "../utils";
import type { ConversionContext } from "../types";

/**
 * Scans the wiki directory and populates context
 *
 * Writes to context:
 * - storage: Page storage (unless one was provided)
 * - parser: Markup parser (unless one was provided)
 * - titles: Every page title, in storage order
 * - backlinks: Link graph of all markup pages
 * - aliases: Alias table, built once and shared by every page
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { config, tracker, logger } = ctx;

  if (!ctx.storage) {
    const directory = path.resolve(config.wiki.directory);
    if (!(await fileExists(directory))) {
      throw new Error(`Wiki directory not found: ${directory}`);
    }
    ctx.storage = await DirectoryStorage.open(directory, config.wiki.encoding);
  }

  const parser = ctx.parser ?? new WikiParser();
  ctx.parser = parser;

  const titles = ctx.storage.allPageTitles();
  tracker.setTotalPages(titles.length);
  logger.info(`Converting ${titles.length} wiki entries`);

  ctx.titles = titles;
  ctx.backlinks = await BacklinkIndex.build(ctx.storage, parser);
  ctx.aliases = await buildAliasTable(
    ctx.storage,
    parser,
    config.wiki.aliasPage,
  );

  logger.debug(`Loaded ${ctx.aliases.size} aliases from '${config.wiki.aliasPage}'`);
}
