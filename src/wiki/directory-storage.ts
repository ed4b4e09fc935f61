/**
 * Directory Storage
 * A wiki stored as one file per page. The page title is the file's path
 * relative to the wiki directory ("Courses/diagram.png", "Search (AI)").
 */

import glob from "fast-glob";
import { readFile } from "fs/promises";
import path from "node:path";
import type { PageStorage, Title } from "../types";
import { pageMime } from "../utils/page-mime";

export class DirectoryStorage implements PageStorage {
  private readonly pages: Set<Title>;

  private constructor(
    private readonly directory: string,
    private readonly encoding: BufferEncoding,
    titles: Title[],
  ) {
    this.pages = new Set(titles);
  }

  /**
   * Scan a wiki directory
   * Hidden files and directories (".hg", ".git") are not pages.
   */
  static async open(
    directory: string,
    encoding: BufferEncoding = "utf-8",
  ): Promise<DirectoryStorage> {
    const root = path.resolve(directory);
    const titles = await glob("**/*", {
      cwd: root,
      onlyFiles: true,
      dot: false,
    });
    return new DirectoryStorage(root, encoding, titles.sort());
  }

  pageExists(title: Title): boolean {
    return this.pages.has(title);
  }

  pageMimeType(title: Title): string {
    return pageMime(title);
  }

  async pageText(title: Title): Promise<string> {
    return readFile(this.pathOf(title), this.encoding);
  }

  async pageBytes(title: Title): Promise<Buffer> {
    return readFile(this.pathOf(title));
  }

  allPageTitles(): Title[] {
    return [...this.pages];
  }

  private pathOf(title: Title): string {
    return path.join(this.directory, ...title.split("/"));
  }
}
