import type { RemoteFault } from "./metadata.js";

export class HostUnreachableError extends Error {
  override readonly cause?: unknown;
  constructor(
    public readonly host: string,
    options?: { cause?: unknown },
  ) {
    super(`unable to open a channel to ${host}`);
    this.name = "HostUnreachableError";
    this.cause = options?.cause;
  }
}

export class RemoteCallError extends Error {
  override readonly cause?: unknown;
  readonly timedOut: boolean;
  readonly fault?: RemoteFault;

  constructor(
    public readonly host: string,
    public readonly operation: string,
    options: {
      timedOut?: boolean;
      fault?: RemoteFault;
      cause?: unknown;
      detail?: string;
    } = {},
  ) {
    const detail =
      options.detail ??
      (options.timedOut
        ? "timed out"
        : options.fault
          ? `${options.fault.name}: ${options.fault.message}`
          : "failed");
    super(`${operation} on ${host} ${detail}`);
    this.name = "RemoteCallError";
    this.timedOut = !!options.timedOut;
    this.fault = options.fault;
    this.cause = options.cause;
  }
}

export class RemoteProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RemoteProtocolError";
  }
}

export class AllNodesUnreachableError extends Error {
  constructor(public readonly failedHosts: readonly string[]) {
    super("All nodes failed to connect. Cannot run any checks");
    this.name = "AllNodesUnreachableError";
  }
}

export class CollectionCancelledError extends Error {
  constructor() {
    super("collection cancelled");
    this.name = "CollectionCancelledError";
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

// errors from node:fs can come from another realm (vm contexts, Jest), so
// nothing here relies on instanceof Error
function hasMessage(err: unknown): err is { message: unknown } {
  return typeof err === "object" && err !== null && "message" in err;
}

export function faultFromError(err: unknown): RemoteFault {
  if (!hasMessage(err)) {
    return { name: "Error", message: String(err) };
  }
  const name = "name" in err && typeof err.name === "string" ? err.name : "Error";
  const message = String(err.message);
  const code = errnoCode(err);
  return code ? { name, message, code } : { name, message };
}

export function errorMessage(err: unknown): string {
  return hasMessage(err) ? String(err.message) : String(err);
}
