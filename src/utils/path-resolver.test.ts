import path from "node:path";
import { describe, it, expect, vi } from "vitest";
import type { BacklinkLookup, LinksConfig, Title } from "../types";
import { PathResolver, type PathResolverOptions } from "./path-resolver";
import { pageMime } from "./page-mime";
import { TitleDecompositionError } from "./errors";

function graph(links: Record<Title, Title[]> = {}): BacklinkLookup {
  return {
    backlinksOf: (title) => new Set(links[title] ?? []),
  };
}

function createResolver(
  overrides: Partial<PathResolverOptions> = {},
): PathResolver {
  return new PathResolver({
    storage: { pageMimeType: pageMime },
    backlinks: graph(),
    frontPage: "Home",
    output: { format: "html", filePrefix: null, filesInOneDir: false },
    links: { extension: ".html", extensionAppliesTo: "both" },
    ...overrides,
  });
}

function withPolicy(links: LinksConfig): PathResolver {
  return createResolver({ links });
}

describe("PathResolver", () => {
  describe("isRaw", () => {
    it("classifies pages by the storage MIME type", () => {
      const resolver = createResolver();
      expect(resolver.isRaw("diagram.png")).toBe(true);
      expect(resolver.isRaw("Search (AI)")).toBe(false);
    });
  });

  describe("resolve", () => {
    it("places flat pages under Root with the link extension", () => {
      expect(createResolver().resolve("RandomNotes")).toBe(
        "Root/RandomNotes.html",
      );
    });

    it("runs the placement chain and encodes the result", () => {
      const resolver = createResolver({
        backlinks: graph({ "Search (AI)": ["COMP3620", "COMP3620Revision"] }),
      });
      expect(resolver.resolve("Search (AI)")).toBe(
        "Courses/ANU/COMP3620/Search %28AI%29.html",
      );
    });

    it("never appends the extension to raw files", () => {
      expect(createResolver().resolve("diagrams/tree.png")).toBe(
        "diagrams/tree.png",
      );
    });

    it("flattens raw files and puts them under the file prefix", () => {
      const resolver = createResolver({
        output: { format: "html", filePrefix: "files", filesInOneDir: true },
      });
      expect(resolver.resolve("diagrams/tree.png")).toBe(
        "files/diagrams_tree.png",
      );
      expect(resolver.resolve("logo.png")).toBe("files/Root_logo.png");
    });

    it("leaves markup pages alone when flattening files", () => {
      const resolver = createResolver({
        output: { format: "html", filePrefix: "files", filesInOneDir: true },
      });
      expect(resolver.resolve("Lectures/Kernels")).toBe(
        "Lectures/Kernels.html",
      );
    });

    it("omits the extension when none is configured", () => {
      const resolver = withPolicy({
        extension: null,
        extensionAppliesTo: "both",
      });
      expect(resolver.resolve("RandomNotes")).toBe("Root/RandomNotes");
    });

    it("defaults the extension to the output format", () => {
      const links: LinksConfig = { extensionAppliesTo: "both" };
      const html = createResolver({ links });
      const markdown = createResolver({
        links,
        output: { format: "markdown", filePrefix: null, filesInOneDir: false },
      });

      expect(html.resolve("RandomNotes")).toBe("Root/RandomNotes.html");
      expect(markdown.resolve("RandomNotes")).toBe("Root/RandomNotes.md");
      expect(markdown.relativeReference("RandomNotes", "COMP3620")).toBe(
        "../Courses/ANU/COMP3620.md",
      );
    });

    it("keeps a configured extension for Markdown output", () => {
      const resolver = createResolver({
        links: { extension: null, extensionAppliesTo: "both" },
        output: { format: "markdown", filePrefix: null, filesInOneDir: false },
      });
      expect(resolver.resolve("RandomNotes")).toBe("Root/RandomNotes");
    });

    it("applies the extension only to written files under 'output'", () => {
      const resolver = withPolicy({
        extension: ".html",
        extensionAppliesTo: "output",
      });
      expect(resolver.resolve("RandomNotes", "output")).toBe(
        "Root/RandomNotes.html",
      );
      expect(resolver.resolve("RandomNotes", "reference")).toBe(
        "Root/RandomNotes",
      );
    });

    it("applies the extension only to links under 'referencesOnly'", () => {
      const resolver = withPolicy({
        extension: ".html",
        extensionAppliesTo: "referencesOnly",
      });
      expect(resolver.resolve("RandomNotes", "output")).toBe(
        "Root/RandomNotes",
      );
      expect(resolver.resolve("RandomNotes", "reference")).toBe(
        "Root/RandomNotes.html",
      );
    });

    it("throws for titles without path segments", () => {
      expect(() => createResolver().resolve("/")).toThrow(
        TitleDecompositionError,
      );
    });
  });

  describe("place", () => {
    it("runs the placement chain once per title", () => {
      const backlinksOf = vi.fn((): ReadonlySet<Title> => new Set<Title>());
      const resolver = createResolver({ backlinks: { backlinksOf } });

      expect(resolver.place("RandomNotes")).toBe("Root/RandomNotes");
      expect(resolver.place("RandomNotes")).toBe("Root/RandomNotes");
      expect(backlinksOf).toHaveBeenCalledTimes(1);
    });
  });

  describe("relativeReference", () => {
    it("links between directories", () => {
      expect(
        createResolver().relativeReference("RandomNotes", "COMP3620"),
      ).toBe("../Courses/ANU/COMP3620.html");
    });

    it("links within a directory by file name", () => {
      expect(createResolver().relativeReference("RandomNotes", "Other")).toBe(
        "Other.html",
      );
    });

    it("links from a nested page to a raw file under the prefix", () => {
      const resolver = createResolver({
        backlinks: graph({ "Search (AI)": ["COMP3620"] }),
        output: { format: "html", filePrefix: "files", filesInOneDir: true },
      });
      expect(resolver.relativeReference("Search (AI)", "logo.png")).toBe(
        "../../../files/Root_logo.png",
      );
    });

    it("leads back to the resolved target from the source directory", () => {
      const resolver = createResolver({
        backlinks: graph({
          "Search (AI)": ["COMP3620", "COMP3620Revision"],
          Kernels: ["Lectures", "LecturesWeek2"],
        }),
        output: { format: "html", filePrefix: "files", filesInOneDir: false },
      });
      const titles = [
        "RandomNotes",
        "Search (AI)",
        "Kernels",
        "COMP3620",
        "CS188 Notes",
        "GREPrepNotes",
        "diagrams/tree.png",
        "Notes: 2017",
      ];

      for (const from of titles) {
        for (const to of titles) {
          const fromDir = path.posix.dirname(resolver.resolve(from, "reference"));
          const joined = path.posix.join(
            fromDir,
            resolver.relativeReference(from, to),
          );
          expect(joined).toBe(resolver.resolve(to, "reference"));
        }
      }
    });
  });
});
