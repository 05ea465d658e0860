import 'reflect-metadata';
import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import DeployConfig, { ConfigLocation, DeployOptions } from './app-config/config';
import DockerComposeClient from './common/docker-compose/client';
import { ConsoleLogger, Logger } from './common/utils/logger';

export default abstract class BaseCommand extends Command {
  static flags = {
    'project-dir': Flags.string({
      char: 'd',
      description: 'Directory holding the compose files, .env and deploy.yml. Defaults to the current directory.',
    }),
    'env-file': Flags.string({
      description: 'Path to the .env file, relative to the project directory',
    }),
    plan: Flags.string({
      description: 'Path to the deploy plan, relative to the project directory. Defaults to deploy.yml',
    }),
  };

  createLogger(): Logger {
    return new ConsoleLogger((line) => this.log(line));
  }

  loadConfig(location: ConfigLocation, options?: Partial<DeployOptions>): DeployConfig {
    return DeployConfig.load(location, options);
  }

  createComposeClient(config: DeployConfig): DockerComposeClient {
    return new DockerComposeClient(config.project_dir, config.plan.compose_files);
  }

  async catch(error: Error & { stderr?: string; oclif?: { exit?: number } }): Promise<void> {
    if (error.oclif && error.oclif.exit === 0) return;

    if (error.stack) {
      error.stack = [...new Set(error.stack.split('\n'))].join('\n');
    }

    if (error.stderr) {
      error.message += `\nstderr:\n${error.stderr}\n`;
    }

    console.error(chalk.red(error.message));

    // Oclif supers go as the return
    return super.catch(error);
  }
}
