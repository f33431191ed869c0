// src/metadata.ts
//
// Shapes of the collected cluster metadata, and the run-scoped store that
// checks read once collection has finished.

export type RemoteFault = {
  name: string;
  message: string;
  code?: string;
};

export type StatRecord = {
  mode: number;
  uid: number;
  gid: number;
  owner: string;
  group: string;
  size: number;
  nlink: number;
  // decimal strings: device and inode numbers can exceed 2^53
  dev: string;
  ino: string;
  rdev: number;
  atimeMs: number;
  mtimeMs: number;
  ctimeMs: number;
  blocks: number;
  blksize: number;
};

export type ContentCapture =
  | { kind: "contents"; contents: string }
  | { kind: "capture_error"; exception: RemoteFault };

export type FileEntry = {
  kind: "file";
  path: string;
  stat: StatRecord | null;
  exception?: RemoteFault;
  // only present when the owning root captures contents and the path is a
  // regular file
  capture?: ContentCapture;
};

export type DirEntry = {
  kind: "dir";
  path: string;
  stat: StatRecord | null;
  exception?: RemoteFault;
};

export type PathTree = {
  files: Map<string, FileEntry>;
  dirs: Map<string, DirEntry>;
};

export type NetworkMetadata = Record<string, unknown>;
export type DeviceMetadata = Record<string, unknown>;

export type CephMetadata = {
  version: string | null;
  installed: boolean;
};

export type NodeMetadata = {
  paths: Map<string, PathTree>;
  network: NetworkMetadata;
  devices: DeviceMetadata;
  ceph: CephMetadata;
};

export function emptyPathTree(): PathTree {
  return { files: new Map(), dirs: new Map() };
}

/** Read side of the store handed to checks. */
export interface ReadonlyClusterMetadata {
  get(role: string, host: string): NodeMetadata | undefined;
  has(role: string, host: string): boolean;
  roles(): string[];
  hosts(role: string): string[];
  readonly size: number;
}

export class MetadataStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MetadataStoreError";
  }
}

export class ClusterMetadataStore implements ReadonlyClusterMetadata {
  private readonly byRole = new Map<string, Map<string, NodeMetadata>>();
  private sealed = false;
  private count = 0;

  commit(role: string, host: string, metadata: NodeMetadata): void {
    if (this.sealed) {
      throw new MetadataStoreError(
        `metadata store is sealed; cannot commit ${role}/${host}`,
      );
    }
    let hosts = this.byRole.get(role);
    if (!hosts) {
      hosts = new Map();
      this.byRole.set(role, hosts);
    }
    if (hosts.has(host)) {
      throw new MetadataStoreError(`metadata for ${role}/${host} already committed`);
    }
    hosts.set(host, metadata);
    this.count += 1;
  }

  seal(): ReadonlyClusterMetadata {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get(role: string, host: string): NodeMetadata | undefined {
    return this.byRole.get(role)?.get(host);
  }

  has(role: string, host: string): boolean {
    return this.byRole.get(role)?.has(host) ?? false;
  }

  roles(): string[] {
    return Array.from(this.byRole.keys());
  }

  hosts(role: string): string[] {
    const hosts = this.byRole.get(role);
    return hosts ? Array.from(hosts.keys()) : [];
  }

  get size(): number {
    return this.count;
  }
}

// --- JSON rendering ---

export type PathTreeJSON = {
  files: Record<string, FileEntry>;
  dirs: Record<string, DirEntry>;
};

export type NodeMetadataJSON = {
  paths: Record<string, PathTreeJSON>;
  network: NetworkMetadata;
  devices: DeviceMetadata;
  ceph: CephMetadata;
};

export function nodeMetadataToJSON(metadata: NodeMetadata): NodeMetadataJSON {
  const paths: Record<string, PathTreeJSON> = {};
  for (const [root, tree] of metadata.paths) {
    paths[root] = {
      files: Object.fromEntries(tree.files),
      dirs: Object.fromEntries(tree.dirs),
    };
  }
  return {
    paths,
    network: metadata.network,
    devices: metadata.devices,
    ceph: metadata.ceph,
  };
}

export function clusterMetadataToJSON(
  store: ReadonlyClusterMetadata,
): Record<string, Record<string, NodeMetadataJSON>> {
  const out: Record<string, Record<string, NodeMetadataJSON>> = {};
  for (const role of store.roles()) {
    const hosts: Record<string, NodeMetadataJSON> = {};
    for (const host of store.hosts(role)) {
      const metadata = store.get(role, host);
      if (metadata) hosts[host] = nodeMetadataToJSON(metadata);
    }
    out[role] = hosts;
  }
  return out;
}
