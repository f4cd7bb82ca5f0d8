export * from './types';
export { AksRunCommandChannel, classifyRequestError, parseRetryAfter, retryAfterPolicy } from './aks-channel';
export type { RunCommandClient, RunCommandPoller, AksRunCommandChannelOptions, PollHint } from './aks-channel';
export { acquireCredential } from './credential';
export { CommandDispatcher } from './dispatcher';
export { OperationPoller, type PollerOptions, type CompletedOperation } from './poller';
export { CommandRunner, type RunOptions, type CommandRunnerDeps } from './command-runner';
