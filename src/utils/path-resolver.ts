/**
 * Path Resolver
 * Maps page titles to output paths and computes links between them
 */

import path from "node:path";
import { placeTitle, type PlacementContext } from "../placement";
import {
  WIKI_MARKUP_MIME,
  type BacklinkLookup,
  type ExtensionPolicy,
  type LinksConfig,
  type OutputConfig,
  type PageStorage,
  type Title,
} from "../types";
import { titleToPath } from "./encode-path";

/**
 * What a path is computed for: naming the written file, or linking to it
 * from another page. The link extension policy can treat the two differently.
 */
export type PathPurpose = "output" | "reference";

export interface PathResolverOptions {
  storage: Pick<PageStorage, "pageMimeType">;
  backlinks: BacklinkLookup;
  frontPage: Title;
  output: Pick<OutputConfig, "format" | "filePrefix" | "filesInOneDir">;
  links: LinksConfig;
}

/**
 * Extension of rendered pages: the configured one, else the format's own
 */
export function linkExtension(
  links: Pick<LinksConfig, "extension">,
  format: OutputConfig["format"],
): string | null {
  if (links.extension !== undefined) {
    return links.extension;
  }
  return format === "markdown" ? ".md" : ".html";
}

export class PathResolver {
  private readonly storage: Pick<PageStorage, "pageMimeType">;
  private readonly placement: PlacementContext;
  private readonly output: Pick<OutputConfig, "filePrefix" | "filesInOneDir">;
  private readonly extension: string | null;
  private readonly policy: ExtensionPolicy;
  // Placement depends only on the title and a fixed backlink snapshot
  private readonly placed = new Map<Title, Title>();

  constructor(options: PathResolverOptions) {
    this.storage = options.storage;
    this.placement = {
      backlinks: options.backlinks,
      frontPage: options.frontPage,
    };
    this.output = options.output;
    this.extension = linkExtension(options.links, options.output.format);
    this.policy = options.links.extensionAppliesTo;
  }

  /**
   * Raw pages are copied verbatim; everything else is wiki markup
   * Classified on the title as stored, before placement.
   */
  isRaw(title: Title): boolean {
    return this.storage.pageMimeType(title) !== WIKI_MARKUP_MIME;
  }

  /**
   * Title after the placement chain
   */
  place(title: Title): Title {
    let placed = this.placed.get(title);
    if (placed === undefined) {
      placed = placeTitle(title, this.placement);
      this.placed.set(title, placed);
    }
    return placed;
  }

  /**
   * Relative POSIX path of a page's file inside the output directory
   *
   * @throws TitleDecompositionError if the title has no usable segments
   */
  resolve(title: Title, purpose: PathPurpose = "output"): string {
    const raw = this.isRaw(title);
    let placed = this.place(title);

    if (raw && this.output.filesInOneDir) {
      placed = placed.replace(/\//g, "_");
    }

    let subpath = titleToPath(placed);

    if (raw && this.output.filePrefix !== null) {
      subpath = path.posix.join(this.output.filePrefix, subpath);
    }

    if (!raw && this.extension !== null && this.appliesTo(purpose)) {
      subpath += this.extension;
    }

    return subpath;
  }

  /**
   * Path from the directory holding `from` to the file for `to`
   *
   * @example
   * // "Root/Notes.html" -> "Courses/ANU/COMP3620.html"
   * resolver.relativeReference("Notes", "COMP3620")
   * // "../Courses/ANU/COMP3620.html"
   */
  relativeReference(from: Title, to: Title): string {
    const fromDir = path.posix.dirname(this.resolve(from, "reference"));
    const target = this.resolve(to, "reference");
    return path.posix.relative(fromDir, target) || ".";
  }

  private appliesTo(purpose: PathPurpose): boolean {
    if (this.policy === "both") return true;
    return purpose === "output"
      ? this.policy === "output"
      : this.policy === "referencesOnly";
  }
}
