import { Flags } from '@oclif/core';
import BaseCommand from '../base-command';
import { RequiresDocker } from '../common/docker/helper';
import ProductionDeployer from '../deployers/production-deployer';

export default class Deploy extends BaseCommand {
  static description = 'Deploy the compose stack: restart it, wait for its dependencies and run the post-deploy tasks';

  static examples = [
    'stack-deploy deploy',
    'stack-deploy deploy --project-dir ~/stack --skip-pull',
    'stack-deploy deploy --env-file .env.production --plan deploy.production.yml',
  ];

  static flags = {
    ...BaseCommand.flags,
    'skip-pull': Flags.boolean({
      description: 'Do not pull images before starting the stack',
      default: false,
    }),
    'skip-prune': Flags.boolean({
      description: 'Do not prune the labelled Docker resources',
      default: false,
    }),
  };

  @RequiresDocker({ compose: true })
  async run(): Promise<void> {
    const { flags } = await this.parse(Deploy);

    const config = this.loadConfig({
      project_dir: flags['project-dir'],
      env_file: flags['env-file'],
      plan_file: flags.plan,
    }, {
      skip_pull: flags['skip-pull'],
      skip_prune: flags['skip-prune'],
    });

    const deployer = new ProductionDeployer(config, this.createComposeClient(config), { logger: this.createLogger() });
    await deployer.deploy();
  }
}
