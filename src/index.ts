export {
  ClusterMetadataStore,
  MetadataStoreError,
  clusterMetadataToJSON,
  emptyPathTree,
  nodeMetadataToJSON,
  type CephMetadata,
  type ContentCapture,
  type DeviceMetadata,
  type DirEntry,
  type FileEntry,
  type NetworkMetadata,
  type NodeMetadata,
  type PathTree,
  type ReadonlyClusterMetadata,
  type RemoteFault,
  type StatRecord,
} from "./metadata.js";
export {
  collect,
  runCollection,
  type CollectionOptions,
  type CollectionOutcome,
  type CompletedOutcome,
  type NodeFailure,
} from "./collector.js";
export {
  buildNodeMetadata,
  collectCeph,
  collectPathTree,
  collectPaths,
  DEFAULT_COLLECTORS,
  type BuildOptions,
  type NodeCollectors,
} from "./node-metadata.js";
export {
  LocalChannel,
  LocalChannelFactory,
  withCallTimeout,
  type ChannelFactory,
  type RemotePeerChannel,
} from "./channel.js";
export { SshChannel, SshChannelFactory } from "./remote.js";
export { runAgentByName, runAgentOperation, type AgentDeps } from "./agent.js";
export { walkPathTree, type PathTreeListing } from "./path-tree.js";
export { statPath, statPaths, type StatReply } from "./stat-path.js";
export {
  DEFAULT_PATHS_OF_INTEREST,
  DEFAULT_SETTINGS,
  pathRule,
  settingsFromEnv,
  type CollectorSettings,
  type PathRule,
  type PathsOfInterest,
} from "./config.js";
export {
  countNodes,
  loadInventory,
  parseInventory,
  parseInventoryText,
  parseJsonInventory,
  type Inventory,
  type NodeDescriptor,
} from "./inventory.js";
export {
  LoggerProgressReporter,
  RecordingProgressReporter,
  describeProgress,
  silentProgress,
  type CollectionPhase,
  type PhaseStatus,
  type ProgressReporter,
} from "./progress.js";
export {
  AllNodesUnreachableError,
  CollectionCancelledError,
  HostUnreachableError,
  RemoteCallError,
  RemoteProtocolError,
} from "./errors.js";
export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
} from "./logger.js";
