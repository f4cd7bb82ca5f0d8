/**
 * Domain Types - Unified exports
 */

export { type ClusterHandle, createClusterHandle, loadCluster } from './cluster';
export { type ResourceObject, fromManifest, describeObject } from './resource';
