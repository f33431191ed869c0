// src/progress.ts
import type { Logger } from "./logger.js";

export type CollectionPhase =
  | "connecting"
  | "paths"
  | "network"
  | "devices"
  | "ceph";

export type PhaseStatus = "pending" | "success" | "failure";

export type ProgressEvent = {
  host: string;
  phase: CollectionPhase;
  status: PhaseStatus;
};

// Purely observational; implementations must not throw.
export interface ProgressReporter {
  notify(host: string, phase: CollectionPhase, status: PhaseStatus): void;
}

export const silentProgress: ProgressReporter = { notify() {} };

export class RecordingProgressReporter implements ProgressReporter {
  readonly events: ProgressEvent[] = [];

  notify(host: string, phase: CollectionPhase, status: PhaseStatus): void {
    this.events.push({ host, phase, status });
  }

  forHost(host: string): ProgressEvent[] {
    return this.events.filter((e) => e.host === host);
  }
}

const CONNECTION_LABELS: Record<PhaseStatus, string> = {
  pending: "connecting",
  success: "connected",
  failure: "failed",
};

export function describeProgress({ host, phase, status }: ProgressEvent): string {
  const name = host.padEnd(20);
  if (phase === "connecting") {
    return `Host: ${name}  connection: [${CONNECTION_LABELS[status]}]`;
  }
  const suffix = status === "pending" ? "" : status === "success" ? " done" : " failed";
  return `Host: ${name}  collecting: [${phase}]${suffix}`;
}

/** Renders every transition as a log line; failures are logged as warnings. */
export class LoggerProgressReporter implements ProgressReporter {
  constructor(private readonly logger: Logger) {}

  notify(host: string, phase: CollectionPhase, status: PhaseStatus): void {
    const line = describeProgress({ host, phase, status });
    if (status === "failure") {
      this.logger.warn(line);
    } else {
      this.logger.info(line);
    }
  }
}
