import { RemoteProtocolError } from "../errors.js";
import {
  decodeArgs,
  decodeEnvelope,
  decodeStatRecord,
  isOperationName,
  parseEnvelope,
} from "../remote-protocol.js";

const STAT = {
  mode: 0o100644,
  uid: 167,
  gid: 167,
  owner: "ceph",
  group: "ceph",
  size: 21,
  nlink: 1,
  dev: "2049",
  ino: "4242",
  rdev: 0,
  atimeMs: 1_700_000_000_000,
  mtimeMs: 1_700_000_000_000,
  ctimeMs: 1_700_000_000_000,
  blocks: 8,
  blksize: 4096,
};

describe("remote protocol", () => {
  test("operation names", () => {
    expect(isOperationName("stat_paths")).toBe(true);
    expect(isOperationName("statPaths")).toBe(false);
  });

  test("path_tree args default the skip lists", () => {
    expect(decodeArgs("path_tree", { root: "/etc/ceph" })).toEqual({
      root: "/etc/ceph",
      skipDirs: [],
      skipFiles: [],
    });
  });

  test("decodes a successful stat_path reply", () => {
    const reply = decodeEnvelope("stat_path", {
      ok: true,
      result: {
        path: "/etc/ceph/ceph.conf",
        stat: STAT,
        capture: { kind: "contents", contents: "[global]\n" },
      },
    });
    expect(reply).toEqual({
      ok: true,
      result: {
        path: "/etc/ceph/ceph.conf",
        stat: STAT,
        capture: { kind: "contents", contents: "[global]\n" },
      },
    });
  });

  test("decodes a fault", () => {
    expect(
      decodeEnvelope("ceph_version", {
        ok: false,
        error: { name: "Error", message: "EACCES", code: "EACCES" },
      }),
    ).toEqual({ ok: false, error: { name: "Error", message: "EACCES", code: "EACCES" } });
  });

  test("a stat reply needs either a stat or an exception", () => {
    expect(() =>
      decodeEnvelope("stat_path", { ok: true, result: { path: "/x", stat: null } }),
    ).toThrow("stat_path result: expected a stat record or an exception");
  });

  test("wrong result types are rejected with their location", () => {
    expect(() =>
      decodeEnvelope("ceph_is_installed", { ok: true, result: "yes" }),
    ).toThrow("ceph_is_installed result: expected a boolean");
    expect(() =>
      decodeEnvelope("stat_paths", { ok: true, result: [{ path: "/x", stat: { ...STAT, size: "1" } }] }),
    ).toThrow("stat_paths result[0].stat.size: expected a number");
    expect(() => decodeStatRecord({ ...STAT, owner: 167 })).toThrow(
      "stat.owner: expected a string",
    );
  });

  test("device and inode numbers travel as decimal strings", () => {
    const big = { ...STAT, ino: "18446744073709551615" };
    expect(decodeStatRecord(big).ino).toBe("18446744073709551615");
    expect(() => decodeStatRecord({ ...STAT, ino: 4242 })).toThrow(
      "stat.ino: expected a decimal string",
    );
    expect(() => decodeStatRecord({ ...STAT, dev: "-1" })).toThrow(
      "stat.dev: expected a decimal string",
    );
  });

  test("text that is not JSON is a protocol error", () => {
    expect(() => parseEnvelope("ceph_version", "bash: medic-collect: command not found")).toThrow(
      new RemoteProtocolError(
        "ceph_version reply is not JSON: bash: medic-collect: command not found",
      ),
    );
  });

  test("an envelope without ok is rejected", () => {
    expect(() => parseEnvelope("ceph_version", '{"result":"x"}')).toThrow(
      "ceph_version reply.ok: expected a boolean",
    );
  });
});
