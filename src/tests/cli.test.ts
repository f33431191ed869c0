import fsp from "node:fs/promises";
import { join } from "node:path";
import { buildProgram, resolveSettings, runAgentCommand } from "../cli-program.js";
import { NullLogger } from "../logger.js";
import { mkTmp, writeTree } from "./util.js";

async function agentReply(operation: string, args?: string): Promise<unknown> {
  const out: string[] = [];
  await runAgentCommand(operation, { args }, new NullLogger(), (text) => out.push(text));
  expect(out).toHaveLength(1);
  return JSON.parse(out[0]);
}

describe("cli", () => {
  test("registers collect and agent", () => {
    expect(buildProgram().commands.map((c) => c.name())).toEqual(["collect", "agent"]);
  });

  test("flags override environment settings", () => {
    const settings = resolveSettings(
      { inventory: "hosts", concurrency: 2, sshPort: 2200 },
      { MEDIC_COLLECT_CONCURRENCY: "5", MEDIC_COLLECT_CALL_TIMEOUT_MS: "900" },
    );
    expect(settings.concurrency).toBe(2);
    expect(settings.callTimeoutMs).toBe(900);
    expect(settings.sshPort).toBe(2200);
  });

  test("agent prints one JSON reply per invocation", async () => {
    const tmp = await mkTmp("cli");
    try {
      await writeTree(tmp, { "ceph.conf": "[global]\n", "osd/whoami": "0\n" });
      const reply = await agentReply(
        "path_tree",
        JSON.stringify({ root: tmp, skipDirs: ["osd"] }),
      );
      expect(reply).toEqual({ ok: true, result: { files: [join(tmp, "ceph.conf")], dirs: [] } });
    } finally {
      await fsp.rm(tmp, { recursive: true, force: true });
    }
  });

  test("agent refuses unknown operations", async () => {
    expect(await agentReply("wipe_disk", "{}")).toEqual({
      ok: false,
      error: { name: "UnknownOperation", message: "unknown operation 'wipe_disk'" },
    });
  });

  test("agent reports arguments that are not JSON", async () => {
    const reply = await agentReply("stat_path", "{path:");
    expect(reply).toMatchObject({ ok: false, error: { name: "InvalidArguments" } });
  });
});
