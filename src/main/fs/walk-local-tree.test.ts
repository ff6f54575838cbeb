import { mkdir, symlink, writeFile } from "node:fs/promises";
import { join as joinPath } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { WalkEntry } from "../../shared/transfer.js";
import { createTempDir, removeTempDir } from "../../testing/harness.js";
import { walkLocalTree } from "./walk-local-tree.js";

async function collect(root: string): Promise<WalkEntry[]> {
  const entries: WalkEntry[] = [];
  for await (const entry of walkLocalTree(root)) {
    entries.push(entry);
  }
  return entries;
}

describe("walkLocalTree", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(workDir);
  });

  it("visits a directory before its children, in name order", async () => {
    const root = joinPath(workDir, "root");
    await mkdir(joinPath(root, "a"), { recursive: true });
    await writeFile(joinPath(root, "b.txt"), "bb");
    await writeFile(joinPath(root, "a", "x.txt"), "x");

    const entries = await collect(root);

    expect(entries.map((entry) => [entry.kind, entry.path])).toEqual([
      ["directory", root],
      ["directory", joinPath(root, "a")],
      ["file", joinPath(root, "a", "x.txt")],
      ["file", joinPath(root, "b.txt")]
    ]);
    expect(entries[3]).toMatchObject({ kind: "file", size: 2 });
  });

  it("yields a single file", async () => {
    const filePath = joinPath(workDir, "only.txt");
    await writeFile(filePath, "12345");

    const entries = await collect(filePath);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ kind: "file", path: filePath, size: 5 });
  });

  it("reports a symbolic link instead of following it", async () => {
    const root = joinPath(workDir, "root");
    await mkdir(root);
    await writeFile(joinPath(root, "real.txt"), "r");
    await symlink(joinPath(root, "real.txt"), joinPath(root, "link.txt"));

    const entries = await collect(root);

    expect(entries.map((entry) => [entry.kind, entry.path])).toEqual([
      ["directory", root],
      ["error", joinPath(root, "link.txt")],
      ["file", joinPath(root, "real.txt")]
    ]);
    const skipped = entries[1];
    expect(skipped?.kind === "error" ? skipped.error.message : null).toBe(
      "Not a regular file or directory: symbolic link"
    );
  });

  it("turns a missing path into an error entry", async () => {
    const missing = joinPath(workDir, "missing");

    const entries = await collect(missing);

    expect(entries).toHaveLength(1);
    expect(entries[0]?.kind).toBe("error");
    expect(entries[0]?.path).toBe(missing);
  });
});
