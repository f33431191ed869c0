// src/inventory.ts
//
// Role-grouped node lists. Two formats are read: Ansible-style INI hosts
// files and a plain JSON mapping of role -> hosts.

import { readFile } from "node:fs/promises";
import { errorMessage } from "./errors.js";

export type NodeDescriptor = {
  host: string;
  vars?: Record<string, string>;
};

// role -> nodes, in the order the source lists them
export type Inventory = Readonly<Record<string, readonly NodeDescriptor[]>>;

export class InventoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InventoryError";
  }
}

type Section = {
  hosts: NodeDescriptor[];
  children: string[];
};

function parseHostLine(line: string): NodeDescriptor | null {
  const [host, ...rest] = line.split(/\s+/);
  if (!host) return null;
  const vars: Record<string, string> = {};
  for (const token of rest) {
    const eq = token.indexOf("=");
    if (eq <= 0) continue;
    vars[token.slice(0, eq)] = token.slice(eq + 1);
  }
  return Object.keys(vars).length ? { host, vars } : { host };
}

export function parseInventory(text: string): Inventory {
  const sections = new Map<string, Section>();
  const section = (name: string): Section => {
    let s = sections.get(name);
    if (!s) {
      s = { hosts: [], children: [] };
      sections.set(name, s);
    }
    return s;
  };

  let current: { group: string; kind: "hosts" | "children" | "vars" } = {
    group: "ungrouped",
    kind: "hosts",
  };
  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!line || line.startsWith("#") || line.startsWith(";")) continue;
    const header = /^\[([^\]]+)\]$/.exec(line);
    if (header) {
      const [group, modifier] = header[1].trim().split(":");
      if (modifier === "vars") {
        current = { group, kind: "vars" };
        continue;
      }
      current = { group, kind: modifier === "children" ? "children" : "hosts" };
      section(group);
      continue;
    }
    if (current.kind === "vars") continue;
    if (current.kind === "children") {
      const child = line.split(/\s+/)[0];
      section(current.group).children.push(child);
      section(child);
      continue;
    }
    const node = parseHostLine(line);
    if (node) section(current.group).hosts.push(node);
  }

  const resolve = (group: string, seen: Set<string>): NodeDescriptor[] => {
    if (seen.has(group)) return [];
    seen.add(group);
    const s = sections.get(group);
    if (!s) return [];
    const out = [...s.hosts];
    for (const child of s.children) {
      out.push(...resolve(child, seen));
    }
    return out;
  };

  const inventory: Record<string, NodeDescriptor[]> = {};
  for (const group of sections.keys()) {
    const hosts = resolve(group, new Set());
    const unique = new Map<string, NodeDescriptor>();
    for (const node of hosts) {
      if (!unique.has(node.host)) unique.set(node.host, node);
    }
    if (group === "ungrouped" && unique.size === 0) continue;
    inventory[group] = Array.from(unique.values());
  }
  return inventory;
}

function decodeNode(raw: unknown, where: string): NodeDescriptor {
  if (typeof raw === "string" && raw.trim()) return { host: raw.trim() };
  if (typeof raw === "object" && raw !== null && "host" in raw) {
    const { host } = raw;
    if (typeof host === "string" && host.trim()) return { host: host.trim() };
  }
  throw new InventoryError(`${where}: expected a host name or { "host": ... }`);
}

export function parseJsonInventory(text: string): Inventory {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InventoryError(
      `inventory is not valid JSON: ${errorMessage(err)}`,
    );
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new InventoryError("inventory must be an object of role -> hosts");
  }
  const inventory: Record<string, NodeDescriptor[]> = {};
  for (const [role, nodes] of Object.entries(raw)) {
    if (!Array.isArray(nodes)) {
      throw new InventoryError(`${role}: expected a list of hosts`);
    }
    inventory[role] = nodes.map((node, i) => decodeNode(node, `${role}[${i}]`));
  }
  return inventory;
}

export function parseInventoryText(text: string): Inventory {
  return text.trimStart().startsWith("{")
    ? parseJsonInventory(text)
    : parseInventory(text);
}

export async function loadInventory(file: string): Promise<Inventory> {
  return parseInventoryText(await readFile(file, "utf8"));
}

export function countNodes(inventory: Inventory): number {
  return Object.values(inventory).reduce((n, nodes) => n + nodes.length, 0);
}
