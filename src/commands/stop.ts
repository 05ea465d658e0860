import chalk from 'chalk';
import BaseCommand from '../base-command';
import { RequiresDocker } from '../common/docker/helper';
import { DeployError } from '../common/errors/deploy-error';

export default class Stop extends BaseCommand {
  static description = 'Stop the stack and remove its containers';

  static examples = [
    'stack-deploy stop',
    'stack-deploy stop --project-dir ~/stack',
  ];

  static flags = {
    ...BaseCommand.flags,
  };

  @RequiresDocker({ compose: true })
  async run(): Promise<void> {
    const { flags } = await this.parse(Stop);

    const config = this.loadConfig({
      project_dir: flags['project-dir'],
      env_file: flags['env-file'],
      plan_file: flags.plan,
    });
    const compose = this.createComposeClient(config);

    this.createLogger().info('Stopping containers...');
    if (!(await compose.down())) {
      throw new DeployError(`Unable to stop ${config.plan.name || config.project_dir}. Run \`${compose.describe()} down\` for details.`);
    }
    this.log(chalk.green(`Successfully stopped ${config.plan.name || config.project_dir}.`));
  }
}
