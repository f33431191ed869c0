import { spawn } from "node:child_process";
import { createHash } from "node:crypto";
import fsp from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

export type SshControlOptions = {
  host: string;
  port?: number | null;
  socketPath: string;
  connectTimeoutMs: number;
  persistSeconds?: number;
  signal?: AbortSignal;
  logger?: Logger;
};

export type SshControlHandle = {
  socketPath: string;
  close: () => Promise<void>;
};

export async function runSsh(
  args: string[],
  { signal }: { signal?: AbortSignal } = {},
): Promise<void> {
  let stderr = "";
  await new Promise<void>((resolve, reject) => {
    const p = spawn("ssh", args, { stdio: ["ignore", "ignore", "pipe"], signal });
    p.stderr.setEncoding("utf8");
    p.stderr.on("data", (chunk: string) => (stderr += chunk));
    p.once("error", reject);
    p.once("exit", (code) => {
      if (code === 0) resolve();
      else
        reject(
          new Error(
            `ssh ${args.join(" ")} exited ${code}: ${stderr.trim() || "unknown error"}`,
          ),
        );
    });
  });
}

export function buildBaseArgs(socketPath: string, port?: number | null): string[] {
  const args = ["-S", socketPath, "-o", "BatchMode=yes"];
  if (port != null) {
    args.push("-p", String(port));
  }
  return args;
}

// unix socket paths are limited to ~104 bytes
export function sanitizeSocketPath(p: string): string {
  if (p.length < 100) return p;
  const dir = path.dirname(p);
  const hash = createHash("sha256").update(p).digest("hex").slice(0, 16);
  return path.join(dir, `ssh-${hash}.sock`);
}

async function removeSocket(socketPath: string, logger?: Logger) {
  try {
    await fsp.unlink(socketPath);
  } catch (err) {
    logger?.debug("control socket already gone", {
      socketPath,
      error: errorMessage(err),
    });
  }
}

/**
 * Starts an ssh ControlMaster for `host`; every later call multiplexes over
 * its socket instead of negotiating a new connection. Rejects when the master
 * cannot be established.
 */
export async function createSshControlMaster(
  opts: SshControlOptions,
): Promise<SshControlHandle> {
  const socketPath = sanitizeSocketPath(opts.socketPath);
  await fsp.mkdir(path.dirname(socketPath), { recursive: true });
  await removeSocket(socketPath);

  const baseArgs = buildBaseArgs(socketPath, opts.port);
  const host = opts.host;
  const persistSeconds = Math.max(5, opts.persistSeconds ?? 60);
  const connectSeconds = Math.max(1, Math.ceil(opts.connectTimeoutMs / 1000));

  try {
    await runSsh(
      [
        ...baseArgs,
        "-M",
        "-o",
        `ConnectTimeout=${connectSeconds}`,
        "-o",
        `ControlPersist=${persistSeconds}s`,
        "-fNT",
        host,
      ],
      { signal: opts.signal },
    );
  } catch (err) {
    opts.logger?.warn("ssh control master unavailable", {
      error: errorMessage(err),
      host,
    });
    await removeSocket(socketPath);
    throw err;
  }

  const close = async () => {
    try {
      await runSsh([...baseArgs, "-O", "exit", host]);
    } catch (err) {
      opts.logger?.debug("ssh control master exit failed", {
        error: errorMessage(err),
        host,
      });
    }
    await removeSocket(socketPath, opts.logger);
  };

  return { socketPath, close };
}
