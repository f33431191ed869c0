// src/config.ts
import os from "node:os";
import path from "node:path";
import { CLI_NAME } from "./constants.js";

export type PathRule = {
  captureContents: boolean;
  skipDirs: ReadonlySet<string>;
  skipFiles: ReadonlySet<string>;
};

// Root path -> collection rules. Iteration order is collection order.
export type PathsOfInterest = ReadonlyMap<string, PathRule>;

export function pathRule({
  captureContents = false,
  skipDirs = [],
  skipFiles = [],
}: {
  captureContents?: boolean;
  skipDirs?: Iterable<string>;
  skipFiles?: Iterable<string>;
} = {}): PathRule {
  return {
    captureContents,
    skipDirs: new Set(skipDirs),
    skipFiles: new Set(skipFiles),
  };
}

export const DEFAULT_PATHS_OF_INTEREST: PathsOfInterest = new Map([
  ["/etc/ceph", pathRule({ captureContents: true })],
  [
    "/var/lib/ceph",
    pathRule({
      captureContents: true,
      skipFiles: ["activate.monmap", "superblock"],
      skipDirs: ["current", "store.db"],
    }),
  ],
  ["/var/run/ceph", pathRule({ captureContents: false })],
]);

export type CollectorSettings = {
  // nodes collected at once; 1 walks the inventory strictly in order
  concurrency: number;
  connectTimeoutMs: number;
  callTimeoutMs: number;
  statBatchSize: number;
  // command that runs the agent on a peer
  remoteCommand: string;
  sshPort?: number;
  controlDir: string;
};

export const DEFAULT_SETTINGS: CollectorSettings = {
  concurrency: 8,
  connectTimeoutMs: 10_000,
  callTimeoutMs: 60_000,
  statBatchSize: 500,
  remoteCommand: CLI_NAME,
  controlDir: path.join(os.tmpdir(), `${CLI_NAME}-ssh`),
};

export function parsePositiveInt(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

export function settingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  base: CollectorSettings = DEFAULT_SETTINGS,
): CollectorSettings {
  const remoteCommand = env.MEDIC_COLLECT_REMOTE_COMMAND?.trim();
  const sshPort = parsePositiveInt(env.MEDIC_COLLECT_SSH_PORT) ?? base.sshPort;
  const settings: CollectorSettings = {
    concurrency:
      parsePositiveInt(env.MEDIC_COLLECT_CONCURRENCY) ?? base.concurrency,
    connectTimeoutMs:
      parsePositiveInt(env.MEDIC_COLLECT_CONNECT_TIMEOUT_MS) ??
      base.connectTimeoutMs,
    callTimeoutMs:
      parsePositiveInt(env.MEDIC_COLLECT_CALL_TIMEOUT_MS) ?? base.callTimeoutMs,
    statBatchSize:
      parsePositiveInt(env.MEDIC_COLLECT_STAT_BATCH) ?? base.statBatchSize,
    remoteCommand: remoteCommand || base.remoteCommand,
    controlDir: env.MEDIC_COLLECT_CONTROL_DIR?.trim() || base.controlDir,
  };
  if (sshPort != null) settings.sshPort = sshPort;
  return settings;
}
