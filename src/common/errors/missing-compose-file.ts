import { DeployError } from './deploy-error';

export default class MissingComposeFileError extends DeployError {
  constructor(file_path: string) {
    super();
    this.name = 'missing_compose_file';
    this.message = `Missing required file: ${file_path}`;
  }
}
