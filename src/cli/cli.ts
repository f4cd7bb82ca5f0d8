/**
 * cluster-converge CLI
 *
 *   cluster-converge deploy -f app.yaml --cluster-id /subscriptions/.../managedClusters/dev
 *   cluster-converge clean -f app.yaml --cluster dev --resource-group rg --subscription sub
 *   cluster-converge build --registry-id /subscriptions/.../registries/devacr --image app:1 ./app
 */

import { Command } from 'commander';
import type { TokenCredential } from '@azure/identity';
import type { Logger } from 'pino';
import { createConfig, type AppConfig } from '../config';
import { createClusterHandle, loadCluster, type ClusterHandle } from '../domain/types';
import { ValidationError } from '../errors';
import { createLogger } from '../lib/logger';
import { loadManifestFiles } from '../lib/manifests';
import {
  acquireCredential,
  AksRunCommandChannel,
  type CommandChannel,
} from '../infrastructure/run-command';
import { AcrImageBuilder, loadRegistry, type ImageBuilder } from '../infrastructure/registry';
import { createDeployer } from '../workflows/converge';

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  getCredential?: (logger: Logger) => Promise<TokenCredential>;
  createChannel?: (credential: TokenCredential, config: AppConfig, logger: Logger) => CommandChannel;
  createImageBuilder?: (registryId: string, logger: Logger) => ImageBuilder;
  signal?: AbortSignal;
}

interface ClusterOptions {
  filename: string[];
  clusterId?: string;
  cluster?: string;
  subscription?: string;
  resourceGroup?: string;
  outputDir?: string;
}

export function resolveCluster(options: ClusterOptions, config: AppConfig): ClusterHandle {
  if (options.clusterId) {
    return loadCluster(options.clusterId);
  }

  if (!options.cluster) {
    throw new ValidationError('either --cluster-id or --cluster is required', 'cluster');
  }

  const subscriptionId = options.subscription ?? config.azure.subscriptionId;
  const resourceGroup = options.resourceGroup ?? config.azure.resourceGroup;
  if (!subscriptionId) {
    throw new ValidationError('--subscription or AZURE_SUBSCRIPTION_ID is required with --cluster', 'subscription');
  }
  if (!resourceGroup) {
    throw new ValidationError('--resource-group or AZURE_RESOURCE_GROUP is required with --cluster', 'resourceGroup');
  }

  return createClusterHandle({ name: options.cluster, subscriptionId, resourceGroup });
}

function addClusterOptions(command: Command): Command {
  return command
    .requiredOption('-f, --filename <paths...>', 'manifest files (YAML or JSON, multi-document)')
    .option('--cluster-id <id>', 'managed cluster resource id')
    .option('--cluster <name>', 'managed cluster name')
    .option('--subscription <id>', 'subscription of --cluster')
    .option('--resource-group <name>', 'resource group of --cluster')
    .option('--output-dir <path>', 'directory for job log files');
}

export function createProgram(version: string, deps: CliDeps = {}): Command {
  const env = deps.env ?? process.env;
  const getCredential = deps.getCredential ?? ((logger: Logger) => acquireCredential(logger));
  const createChannel =
    deps.createChannel ??
    ((credential: TokenCredential, _config: AppConfig, logger: Logger) =>
      new AksRunCommandChannel({ credential, logger }));

  const setup = (options: { outputDir?: string }): { config: AppConfig; logger: Logger } => {
    const config = createConfig({
      ...env,
      ...(options.outputDir !== undefined && { CONVERGE_OUTPUT_DIR: options.outputDir }),
    });
    const logger = deps.logger ?? createLogger({ level: config.logLevel });
    return { config, logger };
  };

  const converge = async (action: 'deploy' | 'clean', options: ClusterOptions): Promise<void> => {
    const { config, logger } = setup(options);
    const cluster = resolveCluster(options, config);
    const objects = await loadManifestFiles(options.filename);

    const credential = await getCredential(logger);
    const deployer = createDeployer(config, createChannel(credential, config, logger), logger);
    const convergeOptions = deps.signal !== undefined ? { signal: deps.signal } : {};

    if (action === 'deploy') {
      await deployer.deploy(cluster, objects, convergeOptions);
    } else {
      await deployer.clean(cluster, objects, convergeOptions);
    }
    logger.info({ cluster: cluster.name, objects: objects.length }, `${action} finished`);
  };

  const program = new Command();
  program
    .name('cluster-converge')
    .description('Apply Kubernetes manifests through the managed cluster run-command API and wait for them to converge')
    .version(version);

  addClusterOptions(
    program.command('deploy').description('apply manifests and wait for every resource to be stable'),
  ).action((options: ClusterOptions) => converge('deploy', options));

  addClusterOptions(program.command('clean').description('delete the resources described by the manifests')).action(
    (options: ClusterOptions) => converge('clean', options),
  );

  program
    .command('build')
    .description('build and push an image with the registry build service')
    .argument('<path>', 'build context holding the Dockerfile')
    .requiredOption('--registry-id <id>', 'container registry resource id')
    .requiredOption('--image <name>', 'image name and tag, e.g. app:1.0.0')
    .action(async (path: string, options: { registryId: string; image: string }) => {
      const { logger } = setup({});
      const builder = deps.createImageBuilder
        ? deps.createImageBuilder(options.registryId, logger)
        : new AcrImageBuilder(loadRegistry(options.registryId), logger);
      await builder.buildAndPush(options.image, path, deps.signal);
    });

  return program;
}
