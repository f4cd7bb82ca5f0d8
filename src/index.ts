/**
 * cluster-converge
 *
 * Applies Kubernetes resources through a managed cluster's run-command API
 * and waits for them to converge.
 */

export { ClusterDeployer, createDeployer, waitStable, StabilityRegistry, classify, resolveNamespace, jobLogFile, TaskGroup } from './workflows/converge';
export type {
  DeployPhase,
  ConvergeOptions,
  ClusterDeployerOptions,
  StabilityStrategy,
  StabilityCheck,
  CheckTarget,
  CheckContext,
  JobBounds,
} from './workflows/converge';

export {
  AksRunCommandChannel,
  acquireCredential,
  CommandDispatcher,
  OperationPoller,
  CommandRunner,
} from './infrastructure/run-command';
export type {
  CommandChannel,
  CommandRequest,
  OperationHandle,
  OperationSnapshot,
  OperationStatus,
  RunOptions,
} from './infrastructure/run-command';
export { FileOutputSink, type OutputSink } from './infrastructure/output-sink';
export { ManagedClusterReader, type ManagedClusterClient } from './infrastructure/cluster';
export { AcrImageBuilder, loadRegistry, type ImageBuilder, type RegistryHandle } from './infrastructure/registry';

export { packageManifests, encodeArchive, manifestPath, type ManifestArchive, type ManifestEntry } from './lib/manifest-archive';
export { parseManifests, loadManifestFiles } from './lib/manifests';
export { createLogger, createTimer, type Logger } from './lib/logger';
export { createConfig, type AppConfig } from './config';
export { createClusterHandle, loadCluster, fromManifest, type ClusterHandle, type ResourceObject } from './domain/types';
export * from './errors';
