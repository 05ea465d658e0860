import { DeployError } from './deploy-error';

export default class DockerNotInstalledError extends DeployError {
  constructor() {
    super();
    this.name = 'docker_not_installed';
    this.message = 'Docker is not installed. Please install Docker first: https://docs.docker.com/engine/install/';
  }
}
