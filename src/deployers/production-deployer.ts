import fs from 'fs-extra';
import DeployConfig from '../app-config/config';
import { DependencySpec, LogCheckSpec, TaskSpec } from '../app-config/plan';
import { DockerComposeUtils } from '../common/docker-compose';
import DockerComposeClient from '../common/docker-compose/client';
import { DockerService } from '../common/docker-compose/template';
import { pruneByLabel } from '../common/docker/cmd';
import DependencyNotReadyError from '../common/errors/dependency-not-ready';
import { toDependencyDescriptor } from '../common/readiness/dependency';
import ReadinessPoller, { PollOutcome, PollProgress, sleep } from '../common/readiness/poller';
import Probes from '../common/readiness/probes';
import { interpolate, parseCommand } from '../common/utils/interpolation';
import { Logger } from '../common/utils/logger';

export type DeployStatus = 'succeeded' | 'completed_with_issues';

export interface DeployResult {
  status: DeployStatus;
  running: string[];
  failed: string[];
  warnings: string[];
}

export interface ServiceStatus {
  running: string[];
  failed: string[];
}

export interface ServiceUrl {
  label: string;
  url: string;
}

export interface DeployerOptions {
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  prune?: (label: string) => Promise<boolean>;
  is_root?: () => boolean;
}

const SEPARATOR = '========================================';

const runningAsRoot = (): boolean => typeof process.getuid === 'function' && process.getuid() === 0;

export const progressMessage = (progress: PollProgress): string => {
  const reason = progress.reason || `${progress.name} still starting...`;
  return `Attempt ${progress.attempt}/${progress.max_attempts} - ${reason}`;
};

/**
 * Runs one deployment of the compose project described by the config, step after step.
 * Hard dependency failures abort the run. Everything else is recorded as a warning.
 */
export default class ProductionDeployer {
  readonly config: DeployConfig;
  readonly compose: DockerComposeClient;
  readonly logger: Logger;

  private readonly wait: (ms: number) => Promise<void>;
  private readonly prune: (label: string) => Promise<boolean>;
  private readonly is_root: () => boolean;
  private warnings: string[] = [];

  constructor(config: DeployConfig, compose: DockerComposeClient, options: DeployerOptions) {
    this.config = config;
    this.compose = compose;
    this.logger = options.logger;
    this.wait = options.sleep || sleep;
    this.prune = options.prune || pruneByLabel;
    this.is_root = options.is_root || runningAsRoot;
  }

  private warn(message: string, ...details: string[]): void {
    this.logger.warn(message);
    for (const detail of details) {
      this.logger.warn(detail);
    }
    this.warnings.push(message);
  }

  private async settle(seconds: number): Promise<void> {
    if (seconds > 0) {
      await this.wait(seconds * 1000);
    }
  }

  async deploy(): Promise<DeployResult> {
    this.warnings = [];

    this.preflight();
    await this.prepare();
    await this.start();
    await this.awaitDependencies('hard');

    await this.settle(this.config.plan.settle.dependencies_seconds);
    await this.awaitDependencies('soft');

    this.logger.info('Running post-deploy tasks...');
    await this.settle(this.config.plan.settle.tasks_seconds);
    for (const task of this.config.plan.tasks) {
      await this.runTask(task);
    }

    if (this.config.plan.log_checks.length) {
      await this.settle(this.config.plan.settle.log_checks_seconds);
      for (const log_check of this.config.plan.log_checks) {
        await this.checkLogs(log_check);
      }
    }

    return this.report();
  }

  preflight(): void {
    if (this.is_root()) {
      this.logger.warn('Running as root. Consider using a non-root user with sudo for better security.');
    }
    for (const warning of this.config.warnings) {
      this.logger.warn(warning);
    }
    this.logger.debug(`Using ${this.config.plan_file} with ${this.config.env_file}`);
    this.config.verify();

    const { binary } = this.compose;
    if (binary.flavour === 'plugin') {
      this.logger.debug(`Using docker compose ${binary.version || '(v2)'}`);
    } else {
      this.logger.debug(`Using docker-compose v${binary.version || 'unknown'}`);
    }

    DockerComposeUtils.verifyComposeFiles(this.config.project_dir, this.config.plan.compose_files);
    this.logger.info('All pre-checks passed');
  }

  async prepare(): Promise<void> {
    this.logger.info('Stopping existing containers...');
    if (!(await this.compose.down())) {
      this.logger.warn('Some containers were already stopped');
    }

    const { prune_label } = this.config.plan;
    if (prune_label && !this.config.options.skip_prune) {
      this.logger.info('Cleaning up unused Docker resources...');
      if (!(await this.prune(prune_label))) {
        this.logger.debug(`Could not prune resources labelled ${prune_label}`);
      }
    }

    if (!this.config.options.skip_pull) {
      this.logger.info('Pulling latest Docker images...');
      if (!(await this.compose.pull())) {
        this.logger.warn('Some images could not be pulled (may be built locally)');
      }
    }
  }

  async start(): Promise<void> {
    this.logger.info('Building and starting containers...');
    await this.compose.up();

    this.logger.info('Waiting for initial container startup...');
    await this.settle(this.config.plan.settle.startup_seconds);

    this.logger.info('Container status:');
    await this.compose.ps();
  }

  async awaitDependency(dependency: DependencySpec): Promise<PollOutcome> {
    this.logger.info(`Waiting for ${dependency.service} to be ready...`);
    const descriptor = toDependencyDescriptor(this.compose, dependency, this.config.values);
    const outcome = await ReadinessPoller.waitFor(descriptor, {
      sleep: this.wait,
      onProgress: (progress) => this.logger.debug(progressMessage(progress)),
    });
    if (outcome.ready) {
      this.logger.info(`${dependency.service} is ready`);
    }
    return outcome;
  }

  async awaitDependencies(kind: DependencySpec['kind']): Promise<void> {
    for (const dependency of this.config.plan.dependencies.filter((candidate) => candidate.kind === kind)) {
      const outcome = await this.awaitDependency(dependency);
      if (outcome.ready) {
        continue;
      }

      const logs_command = this.compose.logsCommand(dependency.service);
      if (kind === 'hard') {
        throw new DependencyNotReadyError(dependency.service, outcome.attempts, logs_command);
      }
      this.warn(`${dependency.service} health check timed out`, `Check logs: ${logs_command}`);
    }
  }

  async runTask(task: TaskSpec): Promise<boolean> {
    const label = task.description || task.command;

    const condition = task.unless_file_contains;
    if (condition) {
      const file_path = this.config.resolvePath(condition.path);
      if (fs.existsSync(file_path) && fs.readFileSync(file_path, 'utf-8').includes(condition.text)) {
        this.logger.debug(`Skipping ${label}: ${condition.path} already contains ${condition.text}`);
        return true;
      }
    }

    this.logger.info(`${label}...`);
    const result = await this.compose.exec(task.service, parseCommand(task.command, this.config.values));
    if (result.ok) {
      this.logger.debug(`${label} completed`);
      return true;
    }
    this.warn(`${label} failed`);
    return false;
  }

  async checkLogs(log_check: LogCheckSpec): Promise<boolean> {
    this.logger.info(`Checking ${log_check.service} logs...`);
    const logs = await this.compose.logs(log_check.service);
    if (new RegExp(log_check.pattern, 'i').test(logs)) {
      this.logger.info(log_check.found);
      return true;
    }
    this.warn(log_check.missing);
    return false;
  }

  declaredServices(): Map<string, DockerService> {
    return DockerComposeUtils.loadServices(this.config.project_dir, this.config.plan.compose_files);
  }

  expectedServices(declared: Map<string, DockerService>): string[] {
    const { expected, optional } = this.config.plan.services;
    return [...expected, ...optional.filter((service) => declared.has(service) && !expected.includes(service))];
  }

  async serviceStatus(declared = this.declaredServices()): Promise<ServiceStatus> {
    const running_services = await this.compose.runningServices();
    const status: ServiceStatus = { running: [], failed: [] };
    for (const service of this.expectedServices(declared)) {
      if (running_services.includes(service)) {
        status.running.push(service);
      } else {
        status.failed.push(service);
      }
    }
    return status;
  }

  serviceUrls(declared: Map<string, DockerService>, running_services: string[]): ServiceUrl[] {
    const urls: ServiceUrl[] = [];
    for (const url of this.config.plan.urls) {
      if (url.when_label && !DockerComposeUtils.hasLabelContaining(declared, url.when_label)) {
        continue;
      }
      if (url.when_running && !running_services.includes(url.when_running)) {
        continue;
      }
      urls.push({ label: url.label, url: interpolate(url.url, this.config.values) });
    }
    return urls;
  }

  printStatus(status: ServiceStatus): void {
    if (status.running.length) {
      this.logger.info(`Running services: ${status.running.join(' ')}`);
    }
    if (status.failed.length) {
      this.logger.warn(`Failed services: ${status.failed.join(' ')}`);
      this.logger.plain();
      this.logger.plain('Troubleshooting commands:');
      for (const service of status.failed) {
        this.logger.plain(`   ${this.compose.logsCommand(service)}`);
      }
    }
  }

  printUsefulCommands(): void {
    const prefix = this.compose.describe();
    this.logger.plain('Useful commands:');
    this.logger.plain(`   Status:    ${prefix} ps`);
    this.logger.plain(`   Logs:      ${prefix} logs -f [service-name]`);
    this.logger.plain(`   Stop:      ${prefix} down`);
    this.logger.plain(`   Restart:   ${prefix} restart [service-name]`);
    this.logger.plain(`   Shell:     ${prefix} exec [service-name] bash`);
  }

  async checkConnectivity(): Promise<boolean> {
    const { connectivity_url } = this.config.plan;
    if (!connectivity_url) {
      return true;
    }
    this.logger.info('Testing local connectivity...');
    try {
      await Probes.url(interpolate(connectivity_url, this.config.values))();
      this.logger.info('Local HTTP endpoint responding');
      return true;
    } catch (err) {
      this.logger.debug(err instanceof Error ? err.message : `${err}`);
      this.logger.warn('Local HTTP endpoint not responding yet');
      this.logger.warn('   This is normal if SSL redirect is enforced');
      return false;
    }
  }

  async report(): Promise<DeployResult> {
    this.logger.info('Performing final service status check...');
    const declared = this.declaredServices();
    const status = await this.serviceStatus(declared);

    this.logger.plain();
    this.logger.plain(SEPARATOR);
    this.logger.info('Deployment Summary');
    this.logger.plain(SEPARATOR);
    this.logger.plain();
    this.printStatus(status);

    const urls = this.serviceUrls(declared, status.running);
    if (urls.length) {
      const width = Math.max(...urls.map((url) => url.label.length)) + 2;
      this.logger.plain();
      this.logger.plain('Service URLs:');
      for (const url of urls) {
        this.logger.plain(`   ${`${url.label}:`.padEnd(width)}${url.url}`);
      }
      this.logger.plain();
      this.logger.plain('SSL certificates will be automatically generated by Let\'s Encrypt');
      this.logger.plain('   (This may take a few minutes on first deployment)');
    }

    this.logger.plain();
    this.printUsefulCommands();
    this.logger.plain();

    await this.checkConnectivity();

    const status_ok = status.failed.length === 0 && this.warnings.length === 0;
    if (status_ok) {
      this.logger.info('Deployment completed successfully!');
      this.logger.plain();
      this.logger.plain('Next steps:');
      this.logger.plain('1. Wait 2-5 minutes for SSL certificates to be generated');
      this.logger.plain(`2. Test your application at https://${this.config.domain}`);
      this.logger.plain('3. Monitor logs if you encounter any issues');
    } else {
      this.logger.warn('Deployment completed with some issues');
      this.logger.plain();
      this.logger.plain('Please check the failed services and their logs before proceeding.');
    }

    this.logger.plain();
    this.logger.info(`Monitor the deployment with: ${this.compose.logsCommand()}`);

    return {
      status: status_ok ? 'succeeded' : 'completed_with_issues',
      running: status.running,
      failed: status.failed,
      warnings: [...this.warnings],
    };
  }
}
