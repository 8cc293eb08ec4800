import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, readdir, stat, writeFile } from "fs/promises";
import path from "node:path";
import { ensureSubdirectory } from "./layout";
import { LayoutError } from "../utils";
import {
  RecordingRunner,
  createTempDir,
  removeTempDir,
  testContext,
} from "../test-utils";

describe("ensureSubdirectory", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("creates a missing subdirectory and returns its path", async () => {
    const ctx = testContext(dir, new RecordingRunner());

    const created = await ensureSubdirectory(ctx, dir, "binary");

    expect(created).toBe(path.join(dir, "binary"));
    expect((await stat(created)).isDirectory()).toBe(true);
    expect(ctx.tracker.getStats().createdDirectories).toEqual([created]);
  });

  it("creates the directory at most once across repeated calls", async () => {
    const ctx = testContext(dir, new RecordingRunner());

    await ensureSubdirectory(ctx, dir, "binary");
    await expect(ensureSubdirectory(ctx, dir, "binary")).resolves.toBe(
      path.join(dir, "binary"),
    );

    expect(ctx.tracker.getStats().createdDirectories).toEqual([
      path.join(dir, "binary"),
    ]);
  });

  it("leaves an existing directory and its contents untouched", async () => {
    const ctx = testContext(dir, new RecordingRunner());
    await mkdir(path.join(dir, "binary"));
    await writeFile(path.join(dir, "binary", "notes.txt"), "keep me", "utf-8");

    await ensureSubdirectory(ctx, dir, "binary");

    expect(await readdir(path.join(dir, "binary"))).toEqual(["notes.txt"]);
    expect(await readFile(path.join(dir, "binary", "notes.txt"), "utf-8")).toBe("keep me");
    expect(ctx.tracker.getStats().createdDirectories).toEqual([]);
  });

  it("fails when a file occupies the path", async () => {
    const ctx = testContext(dir, new RecordingRunner());
    await writeFile(path.join(dir, "ordering"), "", "utf-8");

    const result = ensureSubdirectory(ctx, dir, "ordering");

    await expect(result).rejects.toBeInstanceOf(LayoutError);
    await expect(result).rejects.toMatchObject({ code: "ERR_LAYOUT_NOT_DIRECTORY" });
  });

  it("does not create missing parent directories", async () => {
    const base = path.join(dir, "missing");
    const ctx = testContext(base, new RecordingRunner());

    await expect(ensureSubdirectory(ctx, base, "binary")).rejects.toMatchObject({
      code: "ERR_LAYOUT_CREATE",
      message: `Failed to create directory ${path.join(base, "binary")}`,
    });
  });

  it("touches nothing on a dry run", async () => {
    const ctx = { ...testContext(dir, new RecordingRunner()), dryRun: true };

    await ensureSubdirectory(ctx, dir, "binary");

    expect(await readdir(dir)).toEqual([]);
  });
});
