import { Args, Flags, ux } from '@oclif/core';
import chalk from 'chalk';
import { validateSync } from 'class-validator';
import BaseCommand from '../base-command';
import { validateCommand } from '../app-config/config';
import { DependencySpec, ProbeSpec, validateProbe } from '../app-config/plan';
import { RequiresDocker } from '../common/docker/helper';
import ConfigValidationError, { ConfigIssue } from '../common/errors/config-validation';
import DependencyNotReadyError from '../common/errors/dependency-not-ready';
import { toDependencyDescriptor } from '../common/readiness/dependency';
import ReadinessPoller, { PollOutcome } from '../common/readiness/poller';
import { InterpolationValues } from '../common/utils/interpolation';
import { Logger } from '../common/utils/logger';
import { flattenValidationErrors } from '../common/utils/validation';
import { progressMessage } from '../deployers/production-deployer';

export interface WaitFlags {
  attempts?: number;
  delay?: number;
  'report-every'?: number;
  http?: string;
  command?: string;
  tcp?: string;
  soft: boolean;
  hard?: boolean;
}

/**
 * The dependency to wait for: the plan's entry for the service when there is one, overridden by the flags.
 */
export const dependencyFromFlags = (service: string, flags: WaitFlags, planned?: DependencySpec): DependencySpec => {
  const dependency = new DependencySpec();
  dependency.service = service;
  if (flags.soft) {
    dependency.kind = 'soft';
  } else if (flags.hard) {
    dependency.kind = 'hard';
  } else {
    dependency.kind = planned?.kind || 'hard';
  }
  dependency.attempts = flags.attempts ?? planned?.attempts;
  dependency.delay_seconds = flags.delay ?? planned?.delay_seconds;
  dependency.report_every = flags['report-every'] ?? planned?.report_every;

  if (flags.command !== undefined || flags.http !== undefined || flags.tcp !== undefined) {
    const probe = new ProbeSpec();
    probe.command = flags.command;
    probe.http = flags.http;
    probe.tcp = flags.tcp;
    dependency.probe = probe;
  } else {
    dependency.probe = planned?.probe;
  }
  return dependency;
};

export const validateDependency = (dependency: DependencySpec, values: InterpolationValues): ConfigIssue[] => {
  const issues = flattenValidationErrors(validateSync(dependency));
  if (dependency.probe) {
    issues.push(...validateProbe(dependency.probe, 'probe'));
    if (dependency.probe.command !== undefined) {
      issues.push(...validateCommand('probe.command', dependency.probe.command, values));
    }
  }
  return issues;
};

/**
 * A hard dependency that never became ready fails the command; a soft one only warns.
 */
export const settleOutcome = (dependency: DependencySpec, outcome: PollOutcome, logs_command: string, logger: Logger): void => {
  if (outcome.ready) {
    return;
  }
  if (dependency.kind === 'hard') {
    throw new DependencyNotReadyError(dependency.service, outcome.attempts, logs_command);
  }
  logger.warn(`${dependency.service} health check timed out`);
  logger.warn(`Check logs: ${logs_command}`);
};

export default class Wait extends BaseCommand {
  static description = 'Wait for a single service of the stack to become ready';

  static examples = [
    'stack-deploy wait mysql --command "mysqladmin ping -h localhost -u root -p${DB_ROOT_PASSWORD} --silent"',
    'stack-deploy wait tileserver --http /health --soft',
    'stack-deploy wait api --attempts 20 --delay 3',
  ];

  static args = {
    service: Args.string({
      description: 'Name of the compose service',
      required: true,
    }),
  };

  static flags = {
    ...BaseCommand.flags,
    attempts: Flags.integer({
      description: 'Maximum number of probe attempts',
      min: 1,
    }),
    delay: Flags.integer({
      description: 'Seconds to wait between two attempts',
      min: 0,
    }),
    'report-every': Flags.integer({
      description: 'Print progress every N attempts',
      min: 1,
    }),
    command: Flags.string({
      description: 'Command run inside the container; ready when it exits 0',
      exclusive: ['http', 'tcp'],
    }),
    http: Flags.string({
      description: 'Path requested from inside the container with curl or wget',
      exclusive: ['command', 'tcp'],
    }),
    tcp: Flags.string({
      description: 'host:port opened from this host',
      exclusive: ['command', 'http'],
    }),
    soft: Flags.boolean({
      description: 'Warn instead of failing when the service never becomes ready',
      default: false,
      exclusive: ['hard'],
    }),
    hard: Flags.boolean({
      description: 'Fail when the service never becomes ready, even if the plan marks it soft',
      exclusive: ['soft'],
    }),
  };

  @RequiresDocker({ compose: true })
  async run(): Promise<void> {
    const { args, flags } = await this.parse(Wait);

    const config = this.loadConfig({
      project_dir: flags['project-dir'],
      env_file: flags['env-file'],
      plan_file: flags.plan,
    });
    const compose = this.createComposeClient(config);
    const planned = config.plan.dependencies.find((dependency) => dependency.service === args.service);
    const dependency = dependencyFromFlags(args.service, flags, planned);
    const issues = validateDependency(dependency, config.values);
    if (issues.length) {
      throw new ConfigValidationError('command line flags', issues);
    }
    const descriptor = toDependencyDescriptor(compose, dependency, config.values);

    ux.action.start(chalk.blue(`Waiting for ${dependency.service}`));
    const outcome = await ReadinessPoller.waitFor(descriptor, {
      onProgress: (progress) => {
        ux.action.status = progressMessage(progress);
      },
    });

    ux.action.stop(outcome.ready ? chalk.green(`ready after ${outcome.attempts} attempt(s)`) : chalk.yellow('timed out'));
    settleOutcome(dependency, outcome, compose.logsCommand(dependency.service), this.createLogger());
  }
}
