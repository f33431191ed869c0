// src/agent.ts
//
// The peer side of a channel: runs one named operation on the local machine
// and describes the outcome as a reply envelope. Over ssh this is what
// `medic-collect agent <operation>` executes on every node.

import { spawn } from "node:child_process";
import { loadAccountNames, type AccountNames } from "./accounts.js";
import { faultFromError } from "./errors.js";
import type { Logger } from "./logger.js";
import { walkPathTree } from "./path-tree.js";
import {
  decodeArgs,
  isOperationName,
  type OperationArgs,
  type OperationName,
  type OperationResult,
  type ReplyEnvelope,
} from "./remote-protocol.js";
import { statPath, statPaths } from "./stat-path.js";

export type CommandResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

export type AgentDeps = {
  runCommand?: (file: string, args: string[]) => Promise<CommandResult>;
  readFile?: (path: string) => Promise<Buffer>;
  accounts?: () => Promise<AccountNames>;
  logger?: Logger;
};

export function runCommand(file: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    let stdout = "";
    let stderr = "";
    const p = spawn(file, args, { stdio: ["ignore", "pipe", "pipe"] });
    p.stdout.setEncoding("utf8");
    p.stdout.on("data", (chunk: string) => (stdout += chunk));
    p.stderr.setEncoding("utf8");
    p.stderr.on("data", (chunk: string) => (stderr += chunk));
    p.once("error", reject);
    p.once("close", (code) => resolve({ code, stdout, stderr }));
  });
}

async function tryCommand(
  deps: AgentDeps,
  file: string,
  args: string[],
): Promise<CommandResult | null> {
  const run = deps.runCommand ?? runCommand;
  try {
    return await run(file, args);
  } catch (err) {
    // most often ENOENT: the binary is not on this node at all
    deps.logger?.debug("command could not be started", {
      file,
      error: faultFromError(err).message,
    });
    return null;
  }
}

export async function cephVersion(deps: AgentDeps = {}): Promise<string | null> {
  const result = await tryCommand(deps, "ceph", ["--version"]);
  if (!result || result.code !== 0) return null;
  const line = result.stdout
    .split("\n")
    .map((l) => l.trim())
    .find(Boolean);
  return line ?? null;
}

export async function cephIsInstalled(deps: AgentDeps = {}): Promise<boolean> {
  const result = await tryCommand(deps, "which", ["ceph"]);
  return result?.code === 0;
}

type Handlers = {
  [K in OperationName]: (
    args: OperationArgs<K>,
    deps: AgentDeps,
  ) => Promise<OperationResult<K>>;
};

let accountCache: Promise<AccountNames> | null = null;

function accountsFor(deps: AgentDeps): Promise<AccountNames> {
  if (deps.accounts) return deps.accounts();
  accountCache ??= loadAccountNames();
  return accountCache;
}

const handlers: Handlers = {
  path_tree: (args, deps) =>
    walkPathTree(args.root, {
      skipDirs: args.skipDirs,
      skipFiles: args.skipFiles,
      logger: deps.logger,
    }),
  stat_path: async (args, deps) =>
    statPath(
      args.path,
      { captureContents: args.captureContents },
      { accounts: await accountsFor(deps), readFile: deps.readFile },
    ),
  stat_paths: async (args, deps) =>
    statPaths(
      args.paths,
      { captureContents: args.captureContents },
      { accounts: await accountsFor(deps), readFile: deps.readFile },
    ),
  ceph_version: (_args, deps) => cephVersion(deps),
  ceph_is_installed: (_args, deps) => cephIsInstalled(deps),
};

async function dispatch<K extends OperationName>(
  op: K,
  rawArgs: unknown,
  deps: AgentDeps,
): Promise<OperationResult<K>> {
  const handler: Handlers[K] = handlers[op];
  return handler(decodeArgs(op, rawArgs), deps);
}

/**
 * Never rejects: unknown operations, bad arguments and handler failures all
 * become `{ ok: false }` replies.
 */
export async function runAgentOperation<K extends OperationName>(
  op: K,
  rawArgs: unknown,
  deps: AgentDeps = {},
): Promise<ReplyEnvelope<OperationResult<K>>> {
  try {
    return { ok: true, result: await dispatch(op, rawArgs, deps) };
  } catch (err) {
    deps.logger?.warn("agent operation failed", {
      op,
      error: faultFromError(err).message,
    });
    return { ok: false, error: faultFromError(err) };
  }
}

export async function runAgentByName(
  name: string,
  rawArgs: unknown,
  deps: AgentDeps = {},
): Promise<ReplyEnvelope<unknown>> {
  if (!isOperationName(name)) {
    return {
      ok: false,
      error: { name: "UnknownOperation", message: `unknown operation '${name}'` },
    };
  }
  return runAgentOperation(name, rawArgs, deps);
}
