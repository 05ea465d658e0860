import { DeployError } from './deploy-error';

export default class DockerDaemonNotRunningError extends DeployError {
  constructor() {
    super();
    this.name = 'docker_daemon_not_running';
    this.message = 'Docker is not running. Please start the Docker service and try again.';
  }
}
