// src/channel.ts
import { runAgentOperation, type AgentDeps } from "./agent.js";
import { RemoteCallError } from "./errors.js";
import {
  parseEnvelope,
  type OperationArgs,
  type OperationName,
  type OperationResult,
} from "./remote-protocol.js";

export type CallOptions = {
  signal?: AbortSignal;
};

export interface RemotePeerChannel {
  readonly host: string;
  call<K extends OperationName>(
    op: K,
    args: OperationArgs<K>,
    opts?: CallOptions,
  ): Promise<OperationResult<K>>;
  close(): Promise<void>;
}

export interface ChannelFactory {
  /** Rejects with HostUnreachableError when no session can be established. */
  open(host: string, opts?: CallOptions): Promise<RemotePeerChannel>;
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("aborted");
}

function isTimeout(reason: unknown): boolean {
  // AbortSignal.timeout() aborts with a DOMException named TimeoutError
  return (
    typeof reason === "object" &&
    reason !== null &&
    "name" in reason &&
    reason.name === "TimeoutError"
  );
}

/**
 * Every call made through the returned channel fails with a RemoteCallError
 * once `timeoutMs` passes or `signal` aborts, whether or not the underlying
 * transport honors the signal it is handed.
 */
export function withCallTimeout(
  channel: RemotePeerChannel,
  timeoutMs: number,
  signal?: AbortSignal,
): RemotePeerChannel {
  return {
    host: channel.host,
    close: () => channel.close(),
    call<K extends OperationName>(
      op: K,
      args: OperationArgs<K>,
      opts: CallOptions = {},
    ): Promise<OperationResult<K>> {
      const signals = [AbortSignal.timeout(timeoutMs)];
      if (signal) signals.push(signal);
      if (opts.signal) signals.push(opts.signal);
      const combined = AbortSignal.any(signals);
      const abortError = () => {
        const reason = abortReason(combined);
        const timedOut = isTimeout(reason);
        return new RemoteCallError(channel.host, op, {
          timedOut,
          detail: timedOut ? undefined : "aborted",
          cause: reason,
        });
      };
      if (combined.aborted) {
        return Promise.reject(abortError());
      }
      return new Promise<OperationResult<K>>((resolve, reject) => {
        const onAbort = () => reject(abortError());
        combined.addEventListener("abort", onAbort, { once: true });
        channel.call(op, args, { signal: combined }).then(
          (result) => {
            combined.removeEventListener("abort", onAbort);
            resolve(result);
          },
          (err: unknown) => {
            combined.removeEventListener("abort", onAbort);
            reject(err);
          },
        );
      });
    },
  };
}

// ----------------------- in-process peer -----------------------

/**
 * Runs agent operations in this process, passing arguments and replies
 * through the same JSON encoding the ssh transport uses.
 */
export class LocalChannel implements RemotePeerChannel {
  private closed = false;

  constructor(
    readonly host: string,
    private readonly deps: AgentDeps = {},
  ) {}

  async call<K extends OperationName>(
    op: K,
    args: OperationArgs<K>,
  ): Promise<OperationResult<K>> {
    if (this.closed) {
      throw new RemoteCallError(this.host, op, { detail: "channel closed" });
    }
    const wireArgs: unknown = JSON.parse(JSON.stringify(args));
    const reply = await runAgentOperation(op, wireArgs, this.deps);
    const envelope = parseEnvelope(op, JSON.stringify(reply));
    if (!envelope.ok) {
      throw new RemoteCallError(this.host, op, { fault: envelope.error });
    }
    return envelope.result;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

export class LocalChannelFactory implements ChannelFactory {
  constructor(private readonly deps: AgentDeps = {}) {}

  async open(host: string): Promise<RemotePeerChannel> {
    return new LocalChannel(host, this.deps);
  }
}
