/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the default values used by the deployer.
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  pollInterval: 5000, // 5 seconds (used when the remote recommends nothing)
  maxPollInterval: 30000, // 30 seconds
  acrBuild: 1800000, // 30 minutes
} as const;

/**
 * Bounds handed to kubectl for job stability, in kubectl duration syntax
 */
export const DEFAULT_JOB_BOUNDS = {
  podRunningTimeout: '20s',
  completeTimeout: '10s',
} as const;

export const DEFAULT_NAMESPACE = 'default';

/**
 * Directory inside the zip archive that holds the manifests
 */
export const MANIFEST_DIR = 'manifests';

/**
 * Scope requested when verifying an Azure credential
 */
export const ARM_SCOPE = 'https://management.azure.com/.default';
