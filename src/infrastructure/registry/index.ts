export { AcrImageBuilder, loadRegistry, type ImageBuilder, type ProcessRunner, type RegistryHandle } from './acr';
