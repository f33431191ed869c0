// src/remote-protocol.ts
//
// Operations a peer can run for the collector, their argument and result
// shapes, and the JSON reply envelope. Both directions are decoded by hand:
// nothing coming off the wire is trusted to have the right shape.

import { RemoteProtocolError } from "./errors.js";
import type {
  ContentCapture,
  RemoteFault,
  StatRecord,
} from "./metadata.js";
import type { PathTreeListing } from "./path-tree.js";
import type { StatReply } from "./stat-path.js";

export type PathTreeArgs = {
  root: string;
  skipDirs: string[];
  skipFiles: string[];
};

export type StatPathArgs = {
  path: string;
  captureContents: boolean;
};

export type StatPathsArgs = {
  paths: string[];
  captureContents: boolean;
};

export type NoArgs = Record<string, never>;

export type RemoteOperations = {
  path_tree: { args: PathTreeArgs; result: PathTreeListing };
  stat_path: { args: StatPathArgs; result: StatReply };
  stat_paths: { args: StatPathsArgs; result: StatReply[] };
  ceph_version: { args: NoArgs; result: string | null };
  ceph_is_installed: { args: NoArgs; result: boolean };
};

export type OperationName = keyof RemoteOperations;
export type OperationArgs<K extends OperationName> = RemoteOperations[K]["args"];
export type OperationResult<K extends OperationName> =
  RemoteOperations[K]["result"];

export const OPERATION_NAMES: readonly OperationName[] = [
  "path_tree",
  "stat_path",
  "stat_paths",
  "ceph_version",
  "ceph_is_installed",
];

export function isOperationName(raw: string): raw is OperationName {
  return OPERATION_NAMES.some((name) => name === raw);
}

export type ReplyEnvelope<T> =
  | { ok: true; result: T }
  | { ok: false; error: RemoteFault };

// ----------------------- primitives -----------------------

type Decoder<T> = (raw: unknown, where: string) => T;

function fail(where: string, expected: string): never {
  throw new RemoteProtocolError(`${where}: expected ${expected}`);
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

function record(raw: unknown, where: string): Record<string, unknown> {
  return isRecord(raw) ? raw : fail(where, "an object");
}

function str(raw: unknown, where: string): string {
  return typeof raw === "string" ? raw : fail(where, "a string");
}

function num(raw: unknown, where: string): number {
  return typeof raw === "number" && Number.isFinite(raw)
    ? raw
    : fail(where, "a number");
}

function decimal(raw: unknown, where: string): string {
  return typeof raw === "string" && /^\d+$/.test(raw)
    ? raw
    : fail(where, "a decimal string");
}

function bool(raw: unknown, where: string): boolean {
  return typeof raw === "boolean" ? raw : fail(where, "a boolean");
}

function strArray(raw: unknown, where: string): string[] {
  if (!Array.isArray(raw)) fail(where, "an array of strings");
  return raw.map((item, i) => str(item, `${where}[${i}]`));
}

function optionalStrArray(raw: unknown, where: string): string[] {
  return raw === undefined ? [] : strArray(raw, where);
}

// ----------------------- metadata shapes -----------------------

export function decodeFault(raw: unknown, where = "fault"): RemoteFault {
  const r = record(raw, where);
  const fault: RemoteFault = {
    name: str(r.name, `${where}.name`),
    message: str(r.message, `${where}.message`),
  };
  if (r.code !== undefined) fault.code = str(r.code, `${where}.code`);
  return fault;
}

const STAT_NUMBER_FIELDS = [
  "mode",
  "uid",
  "gid",
  "size",
  "nlink",
  "rdev",
  "atimeMs",
  "mtimeMs",
  "ctimeMs",
  "blocks",
  "blksize",
] as const;

export function decodeStatRecord(raw: unknown, where = "stat"): StatRecord {
  const r = record(raw, where);
  const n = (field: (typeof STAT_NUMBER_FIELDS)[number]) =>
    num(r[field], `${where}.${field}`);
  return {
    mode: n("mode"),
    uid: n("uid"),
    gid: n("gid"),
    owner: str(r.owner, `${where}.owner`),
    group: str(r.group, `${where}.group`),
    size: n("size"),
    nlink: n("nlink"),
    dev: decimal(r.dev, `${where}.dev`),
    ino: decimal(r.ino, `${where}.ino`),
    rdev: n("rdev"),
    atimeMs: n("atimeMs"),
    mtimeMs: n("mtimeMs"),
    ctimeMs: n("ctimeMs"),
    blocks: n("blocks"),
    blksize: n("blksize"),
  };
}

function decodeCapture(raw: unknown, where: string): ContentCapture {
  const r = record(raw, where);
  switch (r.kind) {
    case "contents":
      return { kind: "contents", contents: str(r.contents, `${where}.contents`) };
    case "capture_error":
      return {
        kind: "capture_error",
        exception: decodeFault(r.exception, `${where}.exception`),
      };
    default:
      return fail(`${where}.kind`, `"contents" or "capture_error"`);
  }
}

export function decodeStatReply(raw: unknown, where = "stat reply"): StatReply {
  const r = record(raw, where);
  const reply: StatReply = {
    path: str(r.path, `${where}.path`),
    stat: r.stat === null ? null : decodeStatRecord(r.stat, `${where}.stat`),
  };
  if (r.exception !== undefined) {
    reply.exception = decodeFault(r.exception, `${where}.exception`);
  }
  if (r.capture !== undefined) {
    reply.capture = decodeCapture(r.capture, `${where}.capture`);
  }
  if (reply.stat === null && !reply.exception) {
    fail(where, "a stat record or an exception");
  }
  return reply;
}

function decodeListing(raw: unknown, where: string): PathTreeListing {
  const r = record(raw, where);
  return {
    files: strArray(r.files, `${where}.files`),
    dirs: strArray(r.dirs, `${where}.dirs`),
  };
}

// ----------------------- per operation -----------------------

const argDecoders: { [K in OperationName]: Decoder<OperationArgs<K>> } = {
  path_tree: (raw, where) => {
    const r = record(raw, where);
    return {
      root: str(r.root, `${where}.root`),
      skipDirs: optionalStrArray(r.skipDirs, `${where}.skipDirs`),
      skipFiles: optionalStrArray(r.skipFiles, `${where}.skipFiles`),
    };
  },
  stat_path: (raw, where) => {
    const r = record(raw, where);
    return {
      path: str(r.path, `${where}.path`),
      captureContents:
        r.captureContents === undefined
          ? false
          : bool(r.captureContents, `${where}.captureContents`),
    };
  },
  stat_paths: (raw, where) => {
    const r = record(raw, where);
    return {
      paths: strArray(r.paths, `${where}.paths`),
      captureContents:
        r.captureContents === undefined
          ? false
          : bool(r.captureContents, `${where}.captureContents`),
    };
  },
  ceph_version: (raw, where) => {
    if (raw !== undefined) record(raw, where);
    return {};
  },
  ceph_is_installed: (raw, where) => {
    if (raw !== undefined) record(raw, where);
    return {};
  },
};

const resultDecoders: { [K in OperationName]: Decoder<OperationResult<K>> } = {
  path_tree: decodeListing,
  stat_path: decodeStatReply,
  stat_paths: (raw, where) => {
    if (!Array.isArray(raw)) fail(where, "an array of stat replies");
    return raw.map((item, i) => decodeStatReply(item, `${where}[${i}]`));
  },
  ceph_version: (raw, where) => (raw === null ? null : str(raw, where)),
  ceph_is_installed: bool,
};

export function decodeArgs<K extends OperationName>(
  op: K,
  raw: unknown,
): OperationArgs<K> {
  return argDecoders[op](raw, `${op} args`);
}

export function decodeResult<K extends OperationName>(
  op: K,
  raw: unknown,
): OperationResult<K> {
  return resultDecoders[op](raw, `${op} result`);
}

export function decodeEnvelope<K extends OperationName>(
  op: K,
  raw: unknown,
): ReplyEnvelope<OperationResult<K>> {
  const r = record(raw, `${op} reply`);
  if (r.ok === true) {
    return { ok: true, result: decodeResult(op, r.result) };
  }
  if (r.ok === false) {
    return { ok: false, error: decodeFault(r.error, `${op} reply.error`) };
  }
  return fail(`${op} reply.ok`, "a boolean");
}

export function parseEnvelope<K extends OperationName>(
  op: K,
  text: string,
): ReplyEnvelope<OperationResult<K>> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new RemoteProtocolError(
      `${op} reply is not JSON: ${text.slice(0, 200)}`,
    );
  }
  return decodeEnvelope(op, raw);
}
