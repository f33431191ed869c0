import fsp from "node:fs/promises";
import { join } from "node:path";
import {
  InventoryError,
  countNodes,
  loadInventory,
  parseInventory,
  parseJsonInventory,
} from "../inventory.js";
import { mkTmp } from "./util.js";

const HOSTS = `# lab cluster
[mons]
mon0 monitor_address=10.0.0.10
mon1

[osds]
osd0
osd1
; retired
; osd2

[ceph:children]
mons
osds

[ceph:vars]
fsid=00000000-0000-0000-0000-000000000000
`;

describe("parseInventory", () => {
  test("reads groups, host vars and child groups", () => {
    expect(parseInventory(HOSTS)).toEqual({
      mons: [{ host: "mon0", vars: { monitor_address: "10.0.0.10" } }, { host: "mon1" }],
      osds: [{ host: "osd0" }, { host: "osd1" }],
      ceph: [
        { host: "mon0", vars: { monitor_address: "10.0.0.10" } },
        { host: "mon1" },
        { host: "osd0" },
        { host: "osd1" },
      ],
    });
  });

  test("hosts before any header are ungrouped", () => {
    expect(parseInventory("rgw0\n[mons]\nmon0\n")).toEqual({
      ungrouped: [{ host: "rgw0" }],
      mons: [{ host: "mon0" }],
    });
  });

  test("a host listed twice in a group is kept once", () => {
    expect(parseInventory("[mons]\nmon0\nmon0 foo=bar\n")).toEqual({
      mons: [{ host: "mon0" }],
    });
  });

  test("cyclic children terminate", () => {
    expect(parseInventory("[a:children]\nb\n[b:children]\na\n")).toEqual({ a: [], b: [] });
  });
});

describe("parseJsonInventory", () => {
  test("accepts host names or host objects", () => {
    expect(parseJsonInventory('{"mons": ["mon0", {"host": " mon1 "}], "osds": []}')).toEqual({
      mons: [{ host: "mon0" }, { host: "mon1" }],
      osds: [],
    });
  });

  test("rejects shapes it cannot read", () => {
    expect(() => parseJsonInventory('{"mons": "mon0"}')).toThrow(
      new InventoryError("mons: expected a list of hosts"),
    );
    expect(() => parseJsonInventory('{"mons": [3]}')).toThrow(
      'mons[0]: expected a host name or { "host": ... }',
    );
    expect(() => parseJsonInventory('["mon0"]')).toThrow(
      "inventory must be an object of role -> hosts",
    );
  });
});

test("loadInventory picks the format from the contents", async () => {
  const tmp = await mkTmp("inventory");
  try {
    const ini = join(tmp, "hosts");
    const json = join(tmp, "hosts.json");
    await fsp.writeFile(ini, HOSTS);
    await fsp.writeFile(json, '\n  {"mgrs": ["mgr0"]}\n');
    expect(countNodes(await loadInventory(ini))).toBe(8);
    expect(await loadInventory(json)).toEqual({ mgrs: [{ host: "mgr0" }] });
  } finally {
    await fsp.rm(tmp, { recursive: true, force: true });
  }
});
