// src/node-metadata.ts
//
// Builds the full metadata record for one node over an open channel.

import type { RemotePeerChannel } from "./channel.js";
import {
  DEFAULT_PATHS_OF_INTEREST,
  DEFAULT_SETTINGS,
  type PathRule,
  type PathsOfInterest,
} from "./config.js";
import type { Inventory } from "./inventory.js";
import type { Logger } from "./logger.js";
import {
  emptyPathTree,
  type CephMetadata,
  type DeviceMetadata,
  type DirEntry,
  type FileEntry,
  type NetworkMetadata,
  type NodeMetadata,
  type PathTree,
} from "./metadata.js";
import type { CollectionPhase, PhaseStatus } from "./progress.js";
import type { StatReply } from "./stat-path.js";

export type NodeCollectorContext = {
  inventory: Inventory;
  logger?: Logger;
};

/**
 * Collection steps that are expected to grow beyond placeholders. Each one
 * can be swapped out through BuildOptions.collectors.
 */
export type NodeCollectors = {
  network: (
    channel: RemotePeerChannel,
    ctx: NodeCollectorContext,
  ) => Promise<NetworkMetadata>;
  devices: (
    channel: RemotePeerChannel,
    ctx: NodeCollectorContext,
  ) => Promise<DeviceMetadata>;
};

// TODO: probe connectivity from this node to the other inventory hosts
export async function collectNetwork(
  _channel: RemotePeerChannel,
  _ctx: NodeCollectorContext,
): Promise<NetworkMetadata> {
  return {};
}

export async function collectDevices(
  _channel: RemotePeerChannel,
  _ctx: NodeCollectorContext,
): Promise<DeviceMetadata> {
  return {};
}

export const DEFAULT_COLLECTORS: NodeCollectors = {
  network: collectNetwork,
  devices: collectDevices,
};

export type BuildOptions = {
  pathsOfInterest?: PathsOfInterest;
  inventory?: Inventory;
  statBatchSize?: number;
  collectors?: Partial<NodeCollectors>;
  onPhase?: (phase: CollectionPhase, status: PhaseStatus) => void;
  logger?: Logger;
};

function toFileEntry(reply: StatReply): FileEntry {
  const entry: FileEntry = { kind: "file", path: reply.path, stat: reply.stat };
  if (reply.exception) entry.exception = reply.exception;
  if (reply.capture) entry.capture = reply.capture;
  return entry;
}

function toDirEntry(reply: StatReply): DirEntry {
  const entry: DirEntry = { kind: "dir", path: reply.path, stat: reply.stat };
  if (reply.exception) entry.exception = reply.exception;
  return entry;
}

async function statInBatches(
  channel: RemotePeerChannel,
  paths: readonly string[],
  captureContents: boolean,
  batchSize: number,
): Promise<StatReply[]> {
  const size = Math.max(1, batchSize);
  const out: StatReply[] = [];
  for (let i = 0; i < paths.length; i += size) {
    const batch = paths.slice(i, i + size);
    out.push(...(await channel.call("stat_paths", { paths: batch, captureContents })));
  }
  return out;
}

/**
 * Walks one path of interest on the peer and stats everything under it. The
 * root itself is always recorded under `dirs`; a root the peer does not have
 * contributes an empty tree.
 */
export async function collectPathTree(
  channel: RemotePeerChannel,
  root: string,
  rule: PathRule,
  {
    statBatchSize = DEFAULT_SETTINGS.statBatchSize,
    logger,
  }: { statBatchSize?: number; logger?: Logger } = {},
): Promise<PathTree> {
  const rootReply = await channel.call("stat_path", {
    path: root,
    captureContents: false,
  });
  if (rootReply.stat === null && rootReply.exception?.code === "ENOENT") {
    logger?.debug("path of interest missing", { root });
    return emptyPathTree();
  }

  const listing = await channel.call("path_tree", {
    root,
    skipDirs: Array.from(rule.skipDirs),
    skipFiles: Array.from(rule.skipFiles),
  });

  const tree = emptyPathTree();
  tree.dirs.set(root, toDirEntry({ ...rootReply, path: root }));
  const files = await statInBatches(
    channel,
    listing.files,
    rule.captureContents,
    statBatchSize,
  );
  for (const reply of files) {
    tree.files.set(reply.path, toFileEntry(reply));
  }
  const dirs = await statInBatches(channel, listing.dirs, false, statBatchSize);
  for (const reply of dirs) {
    if (reply.path === root) continue;
    tree.dirs.set(reply.path, toDirEntry(reply));
  }
  logger?.debug("collected path of interest", {
    root,
    files: tree.files.size,
    dirs: tree.dirs.size,
  });
  return tree;
}

export async function collectPaths(
  channel: RemotePeerChannel,
  pathsOfInterest: PathsOfInterest = DEFAULT_PATHS_OF_INTEREST,
  opts: { statBatchSize?: number; logger?: Logger } = {},
): Promise<Map<string, PathTree>> {
  const paths = new Map<string, PathTree>();
  for (const [root, rule] of pathsOfInterest) {
    paths.set(root, await collectPathTree(channel, root, rule, opts));
  }
  return paths;
}

export async function collectCeph(
  channel: RemotePeerChannel,
): Promise<CephMetadata> {
  const version = await channel.call("ceph_version", {});
  const installed = await channel.call("ceph_is_installed", {});
  return { version, installed };
}

/**
 * Runs every collection step against one node. Remote failures are not
 * handled here: they reject and the caller decides what a failed node means.
 */
export async function buildNodeMetadata(
  channel: RemotePeerChannel,
  {
    pathsOfInterest = DEFAULT_PATHS_OF_INTEREST,
    inventory = {},
    statBatchSize,
    collectors,
    onPhase,
    logger,
  }: BuildOptions = {},
): Promise<NodeMetadata> {
  const steps: NodeCollectors = { ...DEFAULT_COLLECTORS, ...collectors };
  const ctx: NodeCollectorContext = { inventory, logger };

  const phase = async <T>(name: CollectionPhase, fn: () => Promise<T>) => {
    onPhase?.(name, "pending");
    try {
      const result = await fn();
      onPhase?.(name, "success");
      return result;
    } catch (err) {
      onPhase?.(name, "failure");
      throw err;
    }
  };

  const paths = await phase("paths", () =>
    collectPaths(channel, pathsOfInterest, { statBatchSize, logger }),
  );
  const network = await phase("network", () => steps.network(channel, ctx));
  const devices = await phase("devices", () => steps.devices(channel, ctx));
  const ceph = await phase("ceph", () => collectCeph(channel));
  return { paths, network, devices, ceph };
}
