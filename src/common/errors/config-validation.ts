import { DeployError } from './deploy-error';

export interface ConfigIssue {
  property: string;
  messages: string[];
}

export default class ConfigValidationError extends DeployError {
  readonly issues: ConfigIssue[];

  constructor(source: string, issues: ConfigIssue[]) {
    super();
    this.name = 'config_validation';
    this.issues = issues;
    const lines = issues.map(issue => `  ${issue.property}: ${issue.messages.join(', ')}`);
    this.message = `Invalid configuration in ${source}:\n${lines.join('\n')}`;
  }
}
