import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import type { AccountNames } from "../accounts.js";
import type { AgentDeps, CommandResult } from "../agent.js";
import {
  LocalChannel,
  type CallOptions,
  type ChannelFactory,
  type RemotePeerChannel,
} from "../channel.js";
import { RemoteCallError } from "../errors.js";
import type {
  OperationArgs,
  OperationName,
  OperationResult,
} from "../remote-protocol.js";

export function wait(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(join(os.tmpdir(), `medic-${prefix}-`));
}

export async function writeTree(root: string, files: Record<string, string | Buffer>) {
  for (const [rel, contents] of Object.entries(files)) {
    const abs = join(root, rel);
    await fsp.mkdir(join(abs, ".."), { recursive: true });
    await fsp.writeFile(abs, contents);
  }
}

// maps the owner of `probe` (normally the test process) to fixed names
export async function accountsFor(probe: string): Promise<AccountNames> {
  const st = await fsp.stat(probe);
  return {
    users: new Map([[st.uid, "tester"]]),
    groups: new Map([[st.gid, "testers"]]),
  };
}

export const CEPH_VERSION_LINE = "ceph version 18.2.0 (0000test) reef (stable)";

export function cephCommands(installed = true) {
  return async (file: string): Promise<CommandResult> => {
    if (!installed) {
      throw Object.assign(new Error(`spawn ${file} ENOENT`), { code: "ENOENT" });
    }
    if (file === "ceph") {
      return { code: 0, stdout: `${CEPH_VERSION_LINE}\n`, stderr: "" };
    }
    return { code: 0, stdout: "/usr/bin/ceph\n", stderr: "" };
  };
}

export type FakeHost =
  | { kind: "unreachable" }
  // open() never settles
  | { kind: "hang" }
  | { kind: "ok"; callDelayMs?: number; failOp?: OperationName };

export class FakeChannel implements RemotePeerChannel {
  closed = false;
  private readonly inner: LocalChannel;

  constructor(
    readonly host: string,
    private readonly behavior: Extract<FakeHost, { kind: "ok" }>,
    deps: AgentDeps,
    private readonly onClose: () => void,
  ) {
    this.inner = new LocalChannel(host, deps);
  }

  async call<K extends OperationName>(
    op: K,
    args: OperationArgs<K>,
    _opts?: CallOptions,
  ): Promise<OperationResult<K>> {
    if (this.behavior.callDelayMs) await wait(this.behavior.callDelayMs);
    if (this.behavior.failOp === op) {
      throw new RemoteCallError(this.host, op, {
        fault: { name: "Error", message: "boom" },
      });
    }
    return this.inner.call(op, args);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.onClose();
    await this.inner.close();
  }
}

/** Channels backed by the in-process agent, with per-host failure modes. */
export class FakeChannelFactory implements ChannelFactory {
  readonly openOrder: string[] = [];
  readonly channels: FakeChannel[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly deps: AgentDeps,
    private readonly hosts: Record<string, FakeHost> = {},
  ) {}

  async open(host: string): Promise<RemotePeerChannel> {
    this.openOrder.push(host);
    const behavior: FakeHost = this.hosts[host] ?? { kind: "ok" };
    if (behavior.kind === "unreachable") {
      throw new Error(`ssh: connect to host ${host} port 22: Connection refused`);
    }
    if (behavior.kind === "hang") {
      return new Promise<RemotePeerChannel>(() => {});
    }
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    const channel = new FakeChannel(host, behavior, this.deps, () => {
      this.active -= 1;
    });
    this.channels.push(channel);
    return channel;
  }

  get allClosed(): boolean {
    return this.channels.every((c) => c.closed);
  }
}
