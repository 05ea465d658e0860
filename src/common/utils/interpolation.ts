import { parse } from 'shell-quote';
import { DeployError } from '../errors/deploy-error';

export type InterpolationValues = Record<string, string | undefined>;

const VARIABLE_REGEX = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class UnknownVariableError extends DeployError {
  constructor(variable: string, template: string) {
    super();
    this.name = 'unknown_variable';
    this.message = `Unknown variable \${${variable}} in "${template}"`;
  }
}

const lookup = (values: InterpolationValues, variable: string, template: string): string => {
  const value = values[variable];
  if (value === undefined) {
    throw new UnknownVariableError(variable, template);
  }
  return value;
};

/**
 * Replaces every `${NAME}` in the template with its value.
 */
export const interpolate = (template: string, values: InterpolationValues): string => {
  return template.replace(VARIABLE_REGEX, (_, variable: string) => lookup(values, variable, template));
};

/**
 * Splits a command line into its arguments the way a POSIX shell would, substituting `$NAME` and `${NAME}`.
 * Substituted values stay a single argument even when they contain spaces.
 */
export const parseCommand = (command: string, values: InterpolationValues): string[] => {
  const args: string[] = [];
  for (const entry of parse(command, (variable: string) => lookup(values, variable, command))) {
    if (typeof entry !== 'string') {
      throw new DeployError(`Shell operators and comments are not supported in commands: "${command}"`);
    }
    args.push(entry);
  }
  if (args.length === 0) {
    throw new DeployError('Command must not be empty');
  }
  return args;
};
