import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ensureDirectory, fileExists } from "./fs";

describe("ensureDirectory", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "wikitree-fs-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("creates nested directories and tolerates existing ones", async () => {
    const dir = join(root, "Courses", "ANU");
    await ensureDirectory(dir);
    await ensureDirectory(dir);
    expect(await fileExists(dir)).toBe(true);
  });

  it("rejects a file standing where the directory should be", async () => {
    const file = join(root, "COMP3620");
    await writeFile(file, "", "utf-8");
    await expect(ensureDirectory(file)).rejects.toThrow(
      `Cannot create directory '${file}': a file with that name exists`,
    );
  });

  it("propagates other errors", async () => {
    const file = join(root, "Home.html");
    await writeFile(file, "", "utf-8");
    await expect(ensureDirectory(join(file, "sub"))).rejects.toThrow();
  });
});
