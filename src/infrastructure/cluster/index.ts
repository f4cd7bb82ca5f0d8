export { ManagedClusterReader, type ManagedClusterClient, type ManagedClusterReaderOptions } from './managed-cluster';
