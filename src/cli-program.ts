// src/cli-program.ts
import { readFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { runAgentByName } from "./agent.js";
import { LocalChannelFactory, type ChannelFactory } from "./channel.js";
import { runCollection } from "./collector.js";
import { parsePositiveInt, settingsFromEnv, type CollectorSettings } from "./config.js";
import { CLI_NAME } from "./constants.js";
import { errorMessage } from "./errors.js";
import { loadInventory } from "./inventory.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import { clusterMetadataToJSON } from "./metadata.js";
import { LoggerProgressReporter } from "./progress.js";
import { SshChannelFactory } from "./remote.js";

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (typeof raw === "object" && raw !== null && "version" in raw) {
      const { version } = raw;
      if (typeof version === "string") return version;
    }
  } catch {
    // not running from an installed package
  }
  return "0.0.0";
}

function positiveInt(value: string): number {
  const n = parsePositiveInt(value);
  if (n == null) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return n;
}

export type CollectCommandOptions = {
  inventory: string;
  output?: string;
  concurrency?: number;
  connectTimeout?: number;
  callTimeout?: number;
  remoteCommand?: string;
  sshPort?: number;
  local?: boolean;
};

export function resolveSettings(
  opts: CollectCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): CollectorSettings {
  const settings = settingsFromEnv(env);
  if (opts.concurrency != null) settings.concurrency = opts.concurrency;
  if (opts.connectTimeout != null) settings.connectTimeoutMs = opts.connectTimeout;
  if (opts.callTimeout != null) settings.callTimeoutMs = opts.callTimeout;
  if (opts.remoteCommand) settings.remoteCommand = opts.remoteCommand;
  if (opts.sshPort != null) settings.sshPort = opts.sshPort;
  return settings;
}

export async function runCollectCommand(
  opts: CollectCommandOptions,
  logger: Logger,
): Promise<number> {
  const settings = resolveSettings(opts);
  const inventory = await loadInventory(opts.inventory);
  const channels: ChannelFactory = opts.local
    ? new LocalChannelFactory({ logger: logger.child("agent") })
    : new SshChannelFactory({
        remoteCommand: settings.remoteCommand,
        port: settings.sshPort,
        controlDir: settings.controlDir,
        connectTimeoutMs: settings.connectTimeoutMs,
        logger,
      });

  const abort = new AbortController();
  const onSigint = () => abort.abort();
  process.once("SIGINT", onSigint);
  try {
    const outcome = await runCollection(inventory, {
      channels,
      settings,
      progress: new LoggerProgressReporter(logger.child("progress")),
      logger,
      signal: abort.signal,
    });
    if (outcome.kind === "all_nodes_unreachable") {
      logger.error("All nodes failed to connect. Cannot run any checks", {
        failedHosts: outcome.failedHosts,
      });
      return 1;
    }
    if (outcome.kind === "completed_with_failures") {
      logger.warn("some nodes were skipped", { failedHosts: outcome.failedHosts });
    }
    const json = JSON.stringify(clusterMetadataToJSON(outcome.store), null, 2);
    if (opts.output) {
      await writeFile(opts.output, json + "\n");
      logger.info("metadata written", { output: opts.output });
    } else {
      process.stdout.write(json + "\n");
    }
    return 0;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

export async function runAgentCommand(
  operation: string,
  opts: { args?: string },
  logger: Logger,
  write: (text: string) => void = (text) => process.stdout.write(text),
): Promise<void> {
  let rawArgs: unknown = {};
  if (opts.args) {
    try {
      rawArgs = JSON.parse(opts.args);
    } catch (err) {
      write(
        JSON.stringify({
          ok: false,
          error: {
            name: "InvalidArguments",
            message: `--args is not JSON: ${errorMessage(err)}`,
          },
        }) + "\n",
      );
      return;
    }
  }
  const reply = await runAgentByName(operation, rawArgs, { logger });
  write(JSON.stringify(reply) + "\n");
}

export function buildProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description("Collect filesystem metadata from every node of a storage cluster")
    .version(packageVersion())
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    );

  const loggerFor = (command: Command): Logger => {
    const globals: { logLevel?: string } = command.optsWithGlobals();
    return new ConsoleLogger(parseLogLevel(globals.logLevel));
  };

  program
    .command("collect")
    .description("connect to every inventory host and print the collected metadata as JSON")
    .requiredOption("-i, --inventory <file>", "inventory file (Ansible INI hosts or JSON)")
    .option("-o, --output <file>", "write JSON here instead of stdout")
    .option("--concurrency <n>", "nodes collected at once", positiveInt)
    .option("--connect-timeout <ms>", "per-node connection timeout", positiveInt)
    .option("--call-timeout <ms>", "per-call timeout on the remote agent", positiveInt)
    .option("--remote-command <cmd>", "command that runs the agent on each node")
    .option("--ssh-port <port>", "ssh port", positiveInt)
    .option("--local", "collect from this machine in-process instead of over ssh", false)
    .action(async (opts: CollectCommandOptions, command: Command) => {
      const code = await runCollectCommand(opts, loggerFor(command));
      process.exitCode = code;
    });

  program
    .command("agent")
    .description("(internal) run one collection operation on this machine and print the reply")
    .argument("<operation>", "operation name")
    .option("--args <json>", "operation arguments as JSON")
    .action(async (operation: string, opts: { args?: string }, command: Command) => {
      // keep stdout for the reply; only errors are echoed
      const logger = new ConsoleLogger(
        parseLogLevel(command.optsWithGlobals<{ logLevel?: string }>().logLevel, "error"),
      ).child("agent");
      await runAgentCommand(operation, opts, logger);
    });

  return program;
}
