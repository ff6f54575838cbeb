import type { Stats } from "node:fs";
import { lstat, readdir } from "node:fs/promises";
import { join as joinPath } from "node:path";

import type { WalkEntry } from "../../shared/transfer.js";

/**
 * Pre-order walk of a local tree. Directory children are visited in lexical
 * order. Entries that cannot be read, and anything that is neither a regular
 * file nor a directory, are yielded as `error` entries instead of ending the
 * walk. Symbolic links are not followed.
 */
export async function* walkLocalTree(root: string): AsyncGenerator<WalkEntry> {
  let stats: Stats;
  try {
    stats = await lstat(root);
  } catch (error) {
    yield { kind: "error", path: root, error: toError(error) };
    return;
  }

  if (stats.isFile()) {
    yield {
      kind: "file",
      path: root,
      size: stats.size,
      mode: stats.mode,
      mtime: stats.mtimeMs / 1000,
      atime: stats.atimeMs / 1000
    };
    return;
  }
  if (!stats.isDirectory()) {
    yield {
      kind: "error",
      path: root,
      error: new Error(`Not a regular file or directory: ${describeFileType(stats)}`)
    };
    return;
  }

  yield {
    kind: "directory",
    path: root,
    mode: stats.mode,
    mtime: stats.mtimeMs / 1000,
    atime: stats.atimeMs / 1000
  };

  let names: string[];
  try {
    names = await readdir(root);
  } catch (error) {
    yield { kind: "error", path: root, error: toError(error) };
    return;
  }

  for (const name of names.sort()) {
    yield* walkLocalTree(joinPath(root, name));
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeFileType(stats: Stats): string {
  if (stats.isSymbolicLink()) {
    return "symbolic link";
  }
  if (stats.isFIFO()) {
    return "named pipe";
  }
  if (stats.isSocket()) {
    return "socket";
  }
  if (stats.isBlockDevice() || stats.isCharacterDevice()) {
    return "device";
  }
  return "special file";
}
