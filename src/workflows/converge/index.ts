export {
  ClusterDeployer,
  createDeployer,
  type DeployPhase,
  type ConvergeOptions,
  type ClusterDeployerOptions,
} from './deployer';
export { waitStable, type WaitStableOptions } from './coordinator';
export {
  StabilityRegistry,
  classify,
  resolveNamespace,
  jobLogFile,
  defaultJobBounds,
  rolloutStatus,
  readinessWait,
  jobCompletion,
  noCheck,
  type StabilityStrategy,
  type StabilityCheck,
  type CheckTarget,
  type CheckContext,
  type JobBounds,
} from './stability';
export { TaskGroup, type TaskFailure, type TaskGroupResult } from './task-group';
