import { readFile } from "node:fs/promises";

// uid/gid -> name, parsed from passwd(5) / group(5) formatted text
export type AccountNames = {
  users: Map<number, string>;
  groups: Map<number, string>;
};

export function parseAccountFile(text: string): Map<number, string> {
  const out = new Map<number, string>();
  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const fields = trimmed.split(":");
    if (fields.length < 3) continue;
    const name = fields[0];
    const id = Number(fields[2]);
    if (!name || !Number.isInteger(id)) continue;
    // first entry wins, same as getpwuid
    if (!out.has(id)) out.set(id, name);
  }
  return out;
}

async function readOptional(file: string): Promise<string> {
  try {
    return await readFile(file, "utf8");
  } catch {
    return "";
  }
}

export async function loadAccountNames({
  passwdFile = "/etc/passwd",
  groupFile = "/etc/group",
}: { passwdFile?: string; groupFile?: string } = {}): Promise<AccountNames> {
  const [passwd, group] = await Promise.all([
    readOptional(passwdFile),
    readOptional(groupFile),
  ]);
  return { users: parseAccountFile(passwd), groups: parseAccountFile(group) };
}

export function ownerName(names: AccountNames, uid: number): string {
  return names.users.get(uid) ?? String(uid);
}

export function groupName(names: AccountNames, gid: number): string {
  return names.groups.get(gid) ?? String(gid);
}
