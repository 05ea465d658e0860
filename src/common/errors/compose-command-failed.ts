import { DeployError } from './deploy-error';

export default class ComposeCommandFailedError extends DeployError {
  readonly exit_code: number;
  readonly stderr: string;

  constructor(command: string, exit_code: number, stderr = '') {
    super();
    this.name = 'compose_command_failed';
    this.exit_code = exit_code;
    this.stderr = stderr;
    this.message = `\`${command}\` failed with exit code ${exit_code}`;
  }
}
