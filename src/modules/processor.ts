/**
 * Processor Module
 * Converts pages one at a time and writes each as soon as it is done
 */

import { writeFile } from "fs/promises";
import { dirname, join } from "node:path";
import { createTurndownService } from "../turndown";
import { loadPageTemplate } from "../templates";
import {
  ensureDirectory,
  LinkRenderer,
  PageConversionError,
  PathResolver,
  renderPage,
} from "../utils";
import type {
  AliasTable,
  BacklinkLookup,
  ConversionContext,
  MarkupParser,
  PageStorage,
  Title,
} from "../types";

interface ScanResult {
  storage: PageStorage;
  parser: MarkupParser;
  titles: Title[];
  backlinks: BacklinkLookup;
  aliases: AliasTable;
}

function requireScan(ctx: ConversionContext): ScanResult {
  const { storage, parser, titles, backlinks, aliases } = ctx;
  if (!storage || !parser || !titles || !backlinks || !aliases) {
    throw new Error("Scanner must run before processor");
  }
  return { storage, parser, titles, backlinks, aliases };
}

// ============================================================================
// Main Processor Function
// ============================================================================

export async function process(ctx: ConversionContext): Promise<void> {
  const { storage, parser, titles, backlinks, aliases } = requireScan(ctx);

  // ============================================================================
  // Shared State (closure variables)
  // ============================================================================

  const { config, tracker, logger } = ctx;
  const outputDir = config.output.directory;
  const resolver = new PathResolver({
    storage,
    backlinks,
    frontPage: config.wiki.frontPage,
    output: config.output,
    links: config.links,
  });
  const template = await loadPageTemplate(config.output);
  const turndown =
    config.output.format === "markdown"
      ? createTurndownService(config.markdown)
      : undefined;

  // Stage of the page being converted, for error reporting
  let stage: "read" | "render" | "write" = "read";

  await ensureDirectory(outputDir);

  // ============================================================================
  // Processing Functions
  // ============================================================================

  async function copyFile(title: Title, outputPath: string): Promise<void> {
    stage = "read";
    const data = await storage.pageBytes(title);
    stage = "write";
    await writeFile(outputPath, data);
    tracker.incrementCopied();
  }

  async function convertMarkup(title: Title, outputPath: string): Promise<void> {
    stage = "read";
    const text = await storage.pageText(title);

    stage = "render";
    const callbacks = new LinkRenderer({
      pageTitle: title,
      resolver,
      storage,
      aliases,
      aliasPage: config.wiki.aliasPage,
      tracker,
    });
    const document = renderPage({
      title,
      text,
      parser,
      callbacks,
      template,
      turndown,
    });

    stage = "write";
    await writeFile(outputPath, document, "utf-8");
    tracker.incrementRendered();
  }

  async function convertPage(title: Title): Promise<void> {
    stage = "render";
    const subpath = resolver.resolve(title, "output");
    const outputPath = join(outputDir, ...subpath.split("/"));

    stage = "write";
    await ensureDirectory(dirname(outputPath));

    const raw = resolver.isRaw(title);
    if (raw) {
      await copyFile(title, outputPath);
    } else {
      await convertMarkup(title, outputPath);
    }

    const kind = raw ? "file" : "page";
    logger.debug(`${kind} (${storage.pageMimeType(title)}): ${title} -> ${subpath}`);
  }

  // ============================================================================
  // Process all pages
  // ============================================================================

  for (const title of titles) {
    try {
      await convertPage(title);
    } catch (error) {
      // One unreadable or unplaceable page stops the run
      tracker.incrementFailed();
      tracker.trackError(title, error, "page", stage);
      throw new PageConversionError(title, { cause: error });
    }
  }
}
