import BaseCommand from '../base-command';
import ServiceTable from '../base-table';
import { RequiresDocker } from '../common/docker/helper';
import ProductionDeployer from '../deployers/production-deployer';

export default class Status extends BaseCommand {
  static description = 'Show which of the expected services are running';

  static examples = [
    'stack-deploy status',
    'stack-deploy status --project-dir ~/stack',
  ];

  static flags = {
    ...BaseCommand.flags,
  };

  @RequiresDocker({ compose: true })
  async run(): Promise<void> {
    const { flags } = await this.parse(Status);

    const config = this.loadConfig({
      project_dir: flags['project-dir'],
      env_file: flags['env-file'],
      plan_file: flags.plan,
    });
    const deployer = new ProductionDeployer(config, this.createComposeClient(config), { logger: this.createLogger() });

    const status = await deployer.serviceStatus();
    const table = new ServiceTable();
    for (const service of [...status.running, ...status.failed]) {
      table.addService(
        service,
        status.running.includes(service) ? 'running' : 'not running',
        config.plan.services.expected.includes(service) ? 'required' : 'optional',
      );
    }
    this.log(table.toString());

    deployer.printStatus(status);
    this.log();
    deployer.printUsefulCommands();
  }
}
