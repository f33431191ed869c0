// tests/agent.test.ts
//
// The peer side: every operation answers with an envelope and never throws.

import fsp from "node:fs/promises";
import { join } from "node:path";
import {
  cephIsInstalled,
  cephVersion,
  runAgentByName,
  runAgentOperation,
  type CommandResult,
} from "../agent.js";
import { CEPH_VERSION_LINE, accountsFor, cephCommands, mkTmp, writeTree } from "./util.js";

const exited = (code: number, stdout = ""): (() => Promise<CommandResult>) =>
  async () => ({ code, stdout, stderr: "" });

describe("ceph probes", () => {
  test("version is the first non-empty line of `ceph --version`", async () => {
    const seen: string[][] = [];
    const version = await cephVersion({
      runCommand: async (file, args) => {
        seen.push([file, ...args]);
        return { code: 0, stdout: `\n  ${CEPH_VERSION_LINE}  \nextra\n`, stderr: "" };
      },
    });
    expect(version).toBe(CEPH_VERSION_LINE);
    expect(seen).toEqual([["ceph", "--version"]]);
  });

  test("version is null when ceph fails or is absent", async () => {
    expect(await cephVersion({ runCommand: exited(1, CEPH_VERSION_LINE) })).toBeNull();
    expect(await cephVersion({ runCommand: cephCommands(false) })).toBeNull();
  });

  test("installed follows the exit status of `which ceph`", async () => {
    expect(await cephIsInstalled({ runCommand: exited(0, "/usr/bin/ceph\n") })).toBe(true);
    expect(await cephIsInstalled({ runCommand: exited(1) })).toBe(false);
    expect(await cephIsInstalled({ runCommand: cephCommands(false) })).toBe(false);
  });
});

describe("runAgentOperation", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("agent");
    await writeTree(tmp, { "ceph.conf": "[global]\n", "keyring": "key = test-secret\n" });
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("path_tree lists the walk", async () => {
    const reply = await runAgentOperation("path_tree", { root: tmp, skipFiles: ["keyring"] });
    expect(reply).toEqual({
      ok: true,
      result: { files: [join(tmp, "ceph.conf")], dirs: [] },
    });
  });

  test("stat_paths stats each path with the injected account names", async () => {
    const accounts = await accountsFor(tmp);
    const reply = await runAgentOperation(
      "stat_paths",
      { paths: [join(tmp, "ceph.conf")], captureContents: true },
      { accounts: async () => accounts },
    );
    if (!reply.ok) throw new Error(reply.error.message);
    expect(reply.result).toHaveLength(1);
    expect(reply.result[0].stat?.owner).toBe("tester");
    expect(reply.result[0].capture).toEqual({ kind: "contents", contents: "[global]\n" });
  });

  test("no-argument operations accept a missing argument object", async () => {
    const reply = await runAgentOperation("ceph_version", undefined, {
      runCommand: cephCommands(),
    });
    expect(reply).toEqual({ ok: true, result: CEPH_VERSION_LINE });
  });

  test("malformed arguments come back as a fault", async () => {
    const reply = await runAgentOperation("stat_path", { path: 42 });
    expect(reply).toEqual({
      ok: false,
      error: {
        name: "RemoteProtocolError",
        message: "stat_path args.path: expected a string",
      },
    });
  });

  test("a failing handler comes back as a fault", async () => {
    const reply = await runAgentOperation(
      "stat_path",
      { path: tmp, captureContents: false },
      { accounts: () => Promise.reject(new Error("no account database")) },
    );
    expect(reply).toEqual({
      ok: false,
      error: { name: "Error", message: "no account database" },
    });
  });

  test("unknown operations are refused by name", async () => {
    expect(await runAgentByName("wipe_disk", {})).toEqual({
      ok: false,
      error: { name: "UnknownOperation", message: "unknown operation 'wipe_disk'" },
    });
  });
});
