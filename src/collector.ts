// src/collector.ts
//
// Drives metadata collection across every node of the inventory and folds
// the per-node results into one run-scoped store.

import {
  withCallTimeout,
  type ChannelFactory,
  type RemotePeerChannel,
} from "./channel.js";
import {
  DEFAULT_PATHS_OF_INTEREST,
  DEFAULT_SETTINGS,
  type CollectorSettings,
  type PathsOfInterest,
} from "./config.js";
import {
  AllNodesUnreachableError,
  CollectionCancelledError,
  HostUnreachableError,
  errorMessage,
} from "./errors.js";
import type { Inventory } from "./inventory.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  ClusterMetadataStore,
  type NodeMetadata,
  type ReadonlyClusterMetadata,
} from "./metadata.js";
import { buildNodeMetadata, type NodeCollectors } from "./node-metadata.js";
import {
  silentProgress,
  type CollectionPhase,
  type PhaseStatus,
  type ProgressReporter,
} from "./progress.js";
import { parallelMapLimit } from "./util.js";

export type NodeFailureKind = "unreachable" | "build_failed";

export type NodeFailure = {
  role: string;
  host: string;
  kind: NodeFailureKind;
  message: string;
  error: unknown;
};

export type NodeResult =
  | { ok: true; role: string; host: string; metadata: NodeMetadata }
  | { ok: false; failure: NodeFailure };

export type CollectionOutcome =
  | { kind: "completed"; store: ReadonlyClusterMetadata }
  | {
      kind: "completed_with_failures";
      store: ReadonlyClusterMetadata;
      failedHosts: string[];
      failures: NodeFailure[];
    }
  | {
      kind: "all_nodes_unreachable";
      failedHosts: string[];
      failures: NodeFailure[];
    };

export type CompletedOutcome = Exclude<
  CollectionOutcome,
  { kind: "all_nodes_unreachable" }
>;

export type CollectionOptions = {
  channels: ChannelFactory;
  settings?: Partial<CollectorSettings>;
  pathsOfInterest?: PathsOfInterest;
  collectors?: Partial<NodeCollectors>;
  progress?: ProgressReporter;
  logger?: Logger;
  signal?: AbortSignal;
};

type NodeTarget = { role: string; host: string; index: number };

function planTargets(inventory: Inventory, logger: Logger): NodeTarget[] {
  const targets: NodeTarget[] = [];
  for (const [role, nodes] of Object.entries(inventory)) {
    const seen = new Set<string>();
    for (const node of nodes) {
      if (seen.has(node.host)) {
        logger.warn("host listed twice in one role; collecting it once", {
          role,
          host: node.host,
        });
        continue;
      }
      seen.add(node.host);
      targets.push({ role, host: node.host, index: targets.length });
    }
  }
  return targets;
}

/**
 * Opens a channel, giving up after `timeoutMs` or when `signal` aborts. A
 * channel that shows up after we stopped waiting is closed right away.
 */
async function openChannel(
  factory: ChannelFactory,
  host: string,
  timeoutMs: number,
  signal: AbortSignal | undefined,
  logger: Logger,
): Promise<RemotePeerChannel> {
  const signals = [AbortSignal.timeout(timeoutMs)];
  if (signal) signals.push(signal);
  const combined = AbortSignal.any(signals);
  if (combined.aborted) {
    throw new HostUnreachableError(host, { cause: combined.reason });
  }
  return new Promise<RemotePeerChannel>((resolve, reject) => {
    let settled = false;
    const onAbort = () => {
      settled = true;
      reject(new HostUnreachableError(host, { cause: combined.reason }));
    };
    combined.addEventListener("abort", onAbort, { once: true });
    factory.open(host, { signal: combined }).then(
      (channel) => {
        combined.removeEventListener("abort", onAbort);
        if (!settled) {
          settled = true;
          resolve(channel);
          return;
        }
        channel.close().catch((err: unknown) => {
          logger.debug("closing late channel failed", {
            host,
            error: errorMessage(err),
          });
        });
      },
      (err: unknown) => {
        combined.removeEventListener("abort", onAbort);
        if (settled) return;
        settled = true;
        reject(
          err instanceof HostUnreachableError
            ? err
            : new HostUnreachableError(host, { cause: err }),
        );
      },
    );
  });
}

/**
 * Collects every node of `inventory`. Per-node failures never reject: they
 * are reported through the outcome. The only rejection is
 * CollectionCancelledError when `signal` aborts.
 */
export async function runCollection(
  inventory: Inventory,
  opts: CollectionOptions,
): Promise<CollectionOutcome> {
  const settings: CollectorSettings = { ...DEFAULT_SETTINGS, ...opts.settings };
  const logger = (opts.logger ?? new NullLogger()).child("collector");
  const progress = opts.progress ?? silentProgress;
  const pathsOfInterest = opts.pathsOfInterest ?? DEFAULT_PATHS_OF_INTEREST;
  const { signal } = opts;

  const notify = (host: string, phase: CollectionPhase, status: PhaseStatus) => {
    try {
      progress.notify(host, phase, status);
    } catch (err) {
      logger.debug("progress reporter failed", { error: errorMessage(err) });
    }
  };

  const store = new ClusterMetadataStore();
  const targets = planTargets(inventory, logger);
  const results: NodeResult[] = [];

  const collectNode = async ({ role, host }: NodeTarget): Promise<NodeResult> => {
    const nodeLogger = logger.child(host);
    notify(host, "connecting", "pending");
    let channel: RemotePeerChannel;
    try {
      nodeLogger.debug("attempting connection", { host });
      channel = await openChannel(
        opts.channels,
        host,
        settings.connectTimeoutMs,
        signal,
        nodeLogger,
      );
    } catch (err) {
      nodeLogger.warn("connection failed", { host, error: errorMessage(err) });
      notify(host, "connecting", "failure");
      return {
        ok: false,
        failure: {
          role,
          host,
          kind: "unreachable",
          message: errorMessage(err),
          error: err,
        },
      };
    }
    notify(host, "connecting", "success");

    try {
      const metadata = await buildNodeMetadata(
        withCallTimeout(channel, settings.callTimeoutMs, signal),
        {
          pathsOfInterest,
          inventory,
          statBatchSize: settings.statBatchSize,
          collectors: opts.collectors,
          onPhase: (phase, status) => notify(host, phase, status),
          logger: nodeLogger,
        },
      );
      return { ok: true, role, host, metadata };
    } catch (err) {
      nodeLogger.warn("collection failed", { host, error: errorMessage(err) });
      return {
        ok: false,
        failure: {
          role,
          host,
          kind: "build_failed",
          message: errorMessage(err),
          error: err,
        },
      };
    } finally {
      try {
        await channel.close();
      } catch (err) {
        nodeLogger.debug("closing channel failed", {
          host,
          error: errorMessage(err),
        });
      }
    }
  };

  logger.info("collecting remote node information", {
    nodes: targets.length,
    concurrency: settings.concurrency,
  });

  await parallelMapLimit(targets, settings.concurrency, async (target) => {
    if (signal?.aborted) return;
    const result = await collectNode(target);
    // a node that finished while the run was being cancelled is discarded
    if (signal?.aborted) return;
    if (result.ok) {
      store.commit(result.role, result.host, result.metadata);
    }
    results[target.index] = result;
  });

  if (signal?.aborted) {
    logger.warn("collection cancelled");
    throw new CollectionCancelledError();
  }

  const failures: NodeFailure[] = [];
  for (const result of results) {
    if (result && !result.ok) failures.push(result.failure);
  }
  const failedHosts = failures.map((f) => f.host);

  if (failures.length === targets.length) {
    logger.error("Collection failed!", { failedHosts });
    return { kind: "all_nodes_unreachable", failedHosts, failures };
  }
  const sealed = store.seal();
  logger.info("Collection completed!", {
    collected: sealed.size,
    failed: failures.length,
  });
  return failures.length
    ? { kind: "completed_with_failures", store: sealed, failedHosts, failures }
    : { kind: "completed", store: sealed };
}

/** Like runCollection, but the all-nodes-unreachable outcome throws. */
export async function collect(
  inventory: Inventory,
  opts: CollectionOptions,
): Promise<CompletedOutcome> {
  const outcome = await runCollection(inventory, opts);
  if (outcome.kind === "all_nodes_unreachable") {
    throw new AllNodesUnreachableError(outcome.failedHosts);
  }
  return outcome;
}
