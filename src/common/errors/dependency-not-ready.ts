import { DeployError } from './deploy-error';

export default class DependencyNotReadyError extends DeployError {
  readonly dependency: string;
  readonly attempts: number;

  constructor(dependency: string, attempts: number, logs_command: string) {
    super();
    this.name = 'dependency_not_ready';
    this.dependency = dependency;
    this.attempts = attempts;
    this.message = `${dependency} did not become ready after ${attempts} attempt${attempts === 1 ? '' : 's'}.\n` +
      `Check ${dependency} logs: ${logs_command}`;
  }
}
