// src/stat-path.ts
import type { BigIntStats } from "node:fs";
import { lstat, readFile, stat } from "node:fs/promises";
import { groupName, ownerName, type AccountNames } from "./accounts.js";
import { errnoCode, faultFromError } from "./errors.js";
import type { ContentCapture, RemoteFault, StatRecord } from "./metadata.js";

export type StatReply = {
  path: string;
  stat: StatRecord | null;
  exception?: RemoteFault;
  capture?: ContentCapture;
};

export type StatPathDeps = {
  accounts: AccountNames;
  readFile?: (path: string) => Promise<Buffer>;
};

export function toStatRecord(st: BigIntStats, accounts: AccountNames): StatRecord {
  const uid = Number(st.uid);
  const gid = Number(st.gid);
  return {
    mode: Number(st.mode),
    uid,
    gid,
    owner: ownerName(accounts, uid),
    group: groupName(accounts, gid),
    size: Number(st.size),
    nlink: Number(st.nlink),
    dev: st.dev.toString(),
    ino: st.ino.toString(),
    rdev: Number(st.rdev),
    atimeMs: Number(st.atimeMs),
    mtimeMs: Number(st.mtimeMs),
    ctimeMs: Number(st.ctimeMs),
    blocks: Number(st.blocks),
    blksize: Number(st.blksize),
  };
}

async function statFollowing(target: string): Promise<BigIntStats> {
  try {
    return await stat(target, { bigint: true });
  } catch (err) {
    // dangling symlink: describe the link itself
    if (errnoCode(err) === "ENOENT") {
      return await lstat(target, { bigint: true });
    }
    throw err;
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

async function captureContents(
  target: string,
  read: (path: string) => Promise<Buffer>,
): Promise<ContentCapture> {
  let bytes: Buffer;
  try {
    bytes = await read(target);
  } catch (err) {
    return { kind: "capture_error", exception: faultFromError(err) };
  }
  try {
    return { kind: "contents", contents: utf8.decode(bytes) };
  } catch (err) {
    return {
      kind: "capture_error",
      exception: {
        name: "ContentDecodeError",
        message: `${target} is not valid UTF-8: ${faultFromError(err).message}`,
      },
    };
  }
}

/**
 * Stats one path and, for regular files when asked, reads its whole content.
 * Neither a failed stat nor a failed read rejects: both come back as data on
 * the reply so the rest of the tree is still collected.
 */
export async function statPath(
  target: string,
  { captureContents: capture = false }: { captureContents?: boolean },
  deps: StatPathDeps,
): Promise<StatReply> {
  let st: BigIntStats;
  try {
    st = await statFollowing(target);
  } catch (err) {
    return { path: target, stat: null, exception: faultFromError(err) };
  }
  const reply: StatReply = {
    path: target,
    stat: toStatRecord(st, deps.accounts),
  };
  if (capture && st.isFile()) {
    const read = deps.readFile ?? ((p: string) => readFile(p));
    reply.capture = await captureContents(target, read);
  }
  return reply;
}

export async function statPaths(
  targets: readonly string[],
  opts: { captureContents?: boolean },
  deps: StatPathDeps,
): Promise<StatReply[]> {
  const out: StatReply[] = [];
  for (const target of targets) {
    out.push(await statPath(target, opts, deps));
  }
  return out;
}
