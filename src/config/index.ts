export { createConfig, type AppConfig } from './config';
export {
  DEFAULT_TIMEOUTS,
  DEFAULT_JOB_BOUNDS,
  DEFAULT_NAMESPACE,
  MANIFEST_DIR,
  ARM_SCOPE,
} from './defaults';
