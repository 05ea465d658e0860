import { DeployError } from './deploy-error';

export default class ComposeNotInstalledError extends DeployError {
  constructor() {
    super();
    this.name = 'compose_not_installed';
    this.message = 'Docker Compose is not installed. Please install Docker Compose: https://docs.docker.com/compose/install/';
  }
}
