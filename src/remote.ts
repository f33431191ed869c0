// src/remote.ts
//
// ssh transport for remote peer channels. A channel owns one ControlMaster
// for its host; each call runs `<remoteCommand> agent <op> --args <json>` on
// the peer over that master and decodes the JSON reply it prints.

import { spawn } from "node:child_process";
import path from "node:path";
import type {
  CallOptions,
  ChannelFactory,
  RemotePeerChannel,
} from "./channel.js";
import { HostUnreachableError, RemoteCallError } from "./errors.js";
import type { Logger } from "./logger.js";
import {
  parseEnvelope,
  type OperationArgs,
  type OperationName,
  type OperationResult,
  type ReplyEnvelope,
} from "./remote-protocol.js";
import {
  buildBaseArgs,
  createSshControlMaster,
  type SshControlHandle,
} from "./ssh-control.js";

// single-quote safe escape for the remote login shell
export function shellEscape(s: string): string {
  return `'${String(s).replace(/'/g, `'\\''`)}'`;
}

export function argsJoin(args: string[]): string {
  return args.map((x) => (x.includes(" ") ? `'${x}'` : x)).join(" ");
}

export function buildAgentCommand(
  remoteCommand: string,
  op: OperationName,
  args: unknown,
): string {
  return `${remoteCommand} agent ${op} --args ${shellEscape(JSON.stringify(args))}`;
}

export function buildCallArgs({
  socketPath,
  port,
  host,
  command,
}: {
  socketPath: string;
  port?: number | null;
  host: string;
  command: string;
}): string[] {
  return [...buildBaseArgs(socketPath, port), "-T", host, "--", command];
}

export function controlSocketPath(
  controlDir: string,
  host: string,
  port?: number | null,
): string {
  const safeHost = host.replace(/[^\w.@-]/g, "_");
  return path.join(controlDir, `${safeHost}-${port ?? 22}.sock`);
}

type SshOutput = { code: number | null; stdout: string; stderr: string };

function runSshCapture(args: string[], signal?: AbortSignal): Promise<SshOutput> {
  return new Promise((resolve, reject) => {
    const out: Buffer[] = [];
    let stderr = "";
    const p = spawn("ssh", args, { stdio: ["ignore", "pipe", "pipe"], signal });
    p.stdout.on("data", (chunk: Buffer) => out.push(chunk));
    p.stderr.setEncoding("utf8");
    p.stderr.on("data", (chunk: string) => (stderr += chunk));
    p.once("error", reject);
    p.once("close", (code) =>
      resolve({ code, stdout: Buffer.concat(out).toString("utf8"), stderr }),
    );
  });
}

export type SshChannelOptions = {
  remoteCommand: string;
  port?: number | null;
  logger?: Logger;
};

export class SshChannel implements RemotePeerChannel {
  constructor(
    readonly host: string,
    private readonly control: SshControlHandle,
    private readonly opts: SshChannelOptions,
  ) {}

  async call<K extends OperationName>(
    op: K,
    args: OperationArgs<K>,
    { signal }: CallOptions = {},
  ): Promise<OperationResult<K>> {
    const command = buildAgentCommand(this.opts.remoteCommand, op, args);
    const sshArgs = buildCallArgs({
      socketPath: this.control.socketPath,
      port: this.opts.port,
      host: this.host,
      command,
    });
    this.opts.logger?.debug("ssh exec", {
      host: this.host,
      op,
      command: argsJoin(sshArgs),
    });
    let output: SshOutput;
    try {
      output = await runSshCapture(sshArgs, signal);
    } catch (err) {
      throw new RemoteCallError(this.host, op, { cause: err });
    }
    if (output.code !== 0) {
      throw new RemoteCallError(this.host, op, {
        detail: `exited ${output.code}: ${output.stderr.trim() || "no output"}`,
      });
    }
    let envelope: ReplyEnvelope<OperationResult<K>>;
    try {
      envelope = parseEnvelope(op, output.stdout);
    } catch (err) {
      throw new RemoteCallError(this.host, op, {
        detail: "returned an unreadable reply",
        cause: err,
      });
    }
    if (!envelope.ok) {
      throw new RemoteCallError(this.host, op, { fault: envelope.error });
    }
    return envelope.result;
  }

  close(): Promise<void> {
    return this.control.close();
  }
}

export type SshChannelFactoryOptions = SshChannelOptions & {
  controlDir: string;
  connectTimeoutMs: number;
};

export class SshChannelFactory implements ChannelFactory {
  constructor(private readonly opts: SshChannelFactoryOptions) {}

  async open(host: string, { signal }: CallOptions = {}): Promise<RemotePeerChannel> {
    const logger = this.opts.logger?.child("ssh");
    let control: SshControlHandle;
    try {
      control = await createSshControlMaster({
        host,
        port: this.opts.port,
        socketPath: controlSocketPath(this.opts.controlDir, host, this.opts.port),
        connectTimeoutMs: this.opts.connectTimeoutMs,
        signal,
        logger,
      });
    } catch (err) {
      throw new HostUnreachableError(host, { cause: err });
    }
    return new SshChannel(host, control, { ...this.opts, logger });
  }
}
