// src/path-tree.ts
//
// Peer-side directory walk for one path of interest. The reader behind
// @nodelib/fs.walk is queue driven, so depth is bounded by memory rather than
// the call stack.

import * as fsWalk from "@nodelib/fs.walk";
import { lstatSync, type BigIntStats } from "node:fs";
import { stat } from "node:fs/promises";
import path from "node:path";
import { errnoCode } from "./errors.js";
import type { Logger } from "./logger.js";

export type PathTreeListing = {
  files: string[];
  dirs: string[];
};

// filesystem calls the walk makes; tests swap in failing ones
export type WalkFileSystem = NonNullable<
  ConstructorParameters<typeof fsWalk.Settings>[0]
>["fs"];

export type WalkOptions = {
  skipDirs?: Iterable<string>;
  skipFiles?: Iterable<string>;
  concurrency?: number;
  fs?: WalkFileSystem;
  logger?: Logger;
};

const DEFAULT_WALK_CONCURRENCY = 16;

// bigint stats: inode numbers can exceed 2^53
function identityOf(st: BigIntStats): string {
  return `${st.dev}:${st.ino}`;
}

function directoryIdentity(dir: string): string | null {
  try {
    return identityOf(lstatSync(dir, { bigint: true }));
  } catch {
    // readdir reports the same failure through errorFilter
    return null;
  }
}

async function pointsAtDirectory(link: string): Promise<boolean> {
  try {
    return (await stat(link)).isDirectory();
  } catch {
    // dangling or looping link: listed as a file
    return false;
  }
}

function walkEntries(
  root: string,
  settings: fsWalk.Settings,
): Promise<fsWalk.Entry[]> {
  return new Promise((resolve, reject) => {
    fsWalk.walk(root, settings, (err, entries) => {
      if (err) reject(err);
      else resolve(entries);
    });
  });
}

/**
 * Lists every file and directory below `root` as absolute paths.
 *
 * Entries whose base name is in `skipDirs` / `skipFiles` are neither listed
 * nor descended into, wherever they occur. Symbolic links are listed under
 * their own path, in `dirs` when they point at a directory and in `files`
 * otherwise, and are never descended. Each directory identity (dev + inode)
 * is descended at most once, which stops bind-mount loops. Directories that
 * cannot be read are left out and the walk carries on; a missing or
 * unreadable root lists nothing.
 */
export async function walkPathTree(
  root: string,
  {
    skipDirs = [],
    skipFiles = [],
    concurrency = DEFAULT_WALK_CONCURRENCY,
    fs,
    logger,
  }: WalkOptions = {},
): Promise<PathTreeListing> {
  const absRoot = path.resolve(root);
  const skipDirNames = new Set(skipDirs);
  const skipFileNames = new Set(skipFiles);

  let rootStats: BigIntStats;
  try {
    rootStats = await stat(absRoot, { bigint: true });
  } catch (err) {
    logger?.debug("path of interest not readable", {
      root: absRoot,
      code: errnoCode(err),
    });
    return { files: [], dirs: [] };
  }
  if (!rootStats.isDirectory()) {
    return { files: [], dirs: [] };
  }

  const visited = new Set<string>([identityOf(rootStats)]);
  const unreadable = new Set<string>();

  const settings = new fsWalk.Settings({
    stats: true,
    followSymbolicLinks: false,
    concurrency,
    fs,
    deepFilter: (entry) => {
      if (skipDirNames.has(entry.name)) return false;
      const id = directoryIdentity(entry.path);
      if (id === null) return true;
      if (visited.has(id)) {
        logger?.debug("not descending into already visited directory", {
          path: entry.path,
        });
        return false;
      }
      visited.add(id);
      return true;
    },
    // links are filtered once we know what they point at
    entryFilter: (entry) =>
      entry.dirent.isSymbolicLink() ||
      (entry.dirent.isDirectory()
        ? !skipDirNames.has(entry.name)
        : !skipFileNames.has(entry.name)),
    errorFilter: (error) => {
      if (error.path) unreadable.add(error.path);
      logger?.debug("skipping unreadable path", {
        path: error.path,
        code: error.code,
      });
      return true;
    },
  });
  const entries = await walkEntries(absRoot, settings);

  const files: string[] = [];
  const dirs: string[] = [];
  const links: fsWalk.Entry[] = [];
  for (const entry of entries) {
    if (unreadable.has(entry.path)) continue;
    if (entry.dirent.isSymbolicLink()) {
      links.push(entry);
    } else if (entry.dirent.isDirectory()) {
      dirs.push(entry.path);
    } else {
      files.push(entry.path);
    }
  }

  const resolved = await Promise.all(
    links.map(async (entry) => ({
      entry,
      isDir: await pointsAtDirectory(entry.path),
    })),
  );
  for (const { entry, isDir } of resolved) {
    if (isDir) {
      if (!skipDirNames.has(entry.name)) dirs.push(entry.path);
    } else if (!skipFileNames.has(entry.name)) {
      files.push(entry.path);
    }
  }
  return { files, dirs };
}
