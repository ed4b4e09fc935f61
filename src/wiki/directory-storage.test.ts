import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { DirectoryStorage } from "./directory-storage";

describe("DirectoryStorage", () => {
  let root: string;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), "wikitree-storage-"));
    await mkdir(join(root, "Courses"));
    await mkdir(join(root, ".hg"));
    await writeFile(join(root, "Home"), "= Home =\n", "utf-8");
    await writeFile(join(root, "Courses", "diagram.png"), Buffer.from([1, 2, 3]));
    await writeFile(join(root, ".hg", "store"), "internal", "utf-8");
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("lists files as titles, skipping hidden ones", async () => {
    const storage = await DirectoryStorage.open(root);
    expect(storage.allPageTitles()).toEqual(["Courses/diagram.png", "Home"]);
    expect(storage.pageExists("Home")).toBe(true);
    expect(storage.pageExists(".hg/store")).toBe(false);
  });

  it("reads markup as text and files as bytes", async () => {
    const storage = await DirectoryStorage.open(root);
    expect(await storage.pageText("Home")).toBe("= Home =\n");
    expect([...(await storage.pageBytes("Courses/diagram.png"))]).toEqual([
      1, 2, 3,
    ]);
  });

  it("reports MIME types from titles", async () => {
    const storage = await DirectoryStorage.open(root);
    expect(storage.pageMimeType("Courses/diagram.png")).toBe("image/png");
    expect(storage.pageMimeType("Home")).toBe("text/x-wiki");
  });
});
