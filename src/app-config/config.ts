import fs from 'fs-extra';
import path from 'path';
import untildify from 'untildify';
import ConfigValidationError, { ConfigIssue } from '../common/errors/config-validation';
import { DeployError } from '../common/errors/deploy-error';
import { interpolate, InterpolationValues, parseCommand } from '../common/utils/interpolation';
import LocalPaths from '../paths';
import EnvironmentLoader, { DeployEnvironment } from './environment';
import DeployPlanLoader, { DeployPlan } from './plan';

export interface DeployOptions {
  skip_pull: boolean;
  skip_prune: boolean;
}

export interface ConfigLocation {
  project_dir?: string;
  env_file?: string;
  plan_file?: string;
}

export const resolveProjectDir = (location: ConfigLocation): string => {
  return path.resolve(untildify(location.project_dir || process.cwd()));
};

export const resolveEnvFile = (location: ConfigLocation): string => {
  return path.resolve(resolveProjectDir(location), untildify(location.env_file || LocalPaths.ENV_FILENAME));
};

export const resolvePlanFile = (location: ConfigLocation): string => {
  const project_dir = resolveProjectDir(location);
  if (location.plan_file) {
    return path.resolve(project_dir, untildify(location.plan_file));
  }
  for (const filename of LocalPaths.PLAN_FILENAMES) {
    const candidate = path.join(project_dir, filename);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  throw new DeployError(`No deploy plan found in ${project_dir}. Expected one of: ${LocalPaths.PLAN_FILENAMES.join(', ')}`);
};

const attempt = (property: string, render: () => unknown): ConfigIssue[] => {
  try {
    render();
    return [];
  } catch (err) {
    return [{ property, messages: [err instanceof Error ? err.message : `${err}`] }];
  }
};

export const validateCommand = (property: string, command: string, values: InterpolationValues): ConfigIssue[] => {
  return attempt(property, () => parseCommand(command, values));
};

/**
 * Renders every command and url of the plan against the environment, so that a bad one fails before any container is touched.
 */
export const validatePlanValues = (plan: DeployPlan, values: InterpolationValues): ConfigIssue[] => {
  const issues: ConfigIssue[] = [];
  plan.dependencies.forEach((dependency, index) => {
    const command = dependency.probe?.command;
    if (command !== undefined) {
      issues.push(...validateCommand(`dependencies.${index}.probe.command`, command, values));
    }
  });
  plan.tasks.forEach((task, index) => {
    issues.push(...validateCommand(`tasks.${index}.command`, task.command, values));
  });
  plan.urls.forEach((url, index) => {
    issues.push(...attempt(`urls.${index}.url`, () => interpolate(url.url, values)));
  });
  const connectivity_url = plan.connectivity_url;
  if (connectivity_url !== undefined) {
    issues.push(...attempt('connectivity_url', () => interpolate(connectivity_url, values)));
  }
  return issues;
};

/**
 * Everything a deployment run needs, resolved once and handed to every step.
 */
export default class DeployConfig {
  readonly project_dir: string;
  readonly env_file: string;
  readonly plan_file: string;
  readonly environment: DeployEnvironment;
  readonly values: InterpolationValues;
  readonly plan: DeployPlan;
  readonly options: DeployOptions;
  readonly warnings: string[];

  constructor(data: {
    project_dir: string;
    env_file: string;
    plan_file: string;
    environment: DeployEnvironment;
    values: InterpolationValues;
    plan: DeployPlan;
    options?: Partial<DeployOptions>;
    warnings?: string[];
  }) {
    this.project_dir = data.project_dir;
    this.env_file = data.env_file;
    this.plan_file = data.plan_file;
    this.environment = data.environment;
    this.values = data.values;
    this.plan = data.plan;
    this.options = {
      skip_pull: false,
      skip_prune: false,
      ...data.options,
    };
    this.warnings = data.warnings || [];
  }

  static load(location: ConfigLocation, options?: Partial<DeployOptions>, base_env: NodeJS.ProcessEnv = process.env): DeployConfig {
    const project_dir = resolveProjectDir(location);
    const env_file = resolveEnvFile(location);
    const { environment, values, warnings } = EnvironmentLoader.load(env_file, base_env);
    const plan_file = resolvePlanFile(location);
    const plan = DeployPlanLoader.load(plan_file);

    const config = new DeployConfig({ project_dir, env_file, plan_file, environment, values, plan, options, warnings });
    config.verify();
    return config;
  }

  verify(): void {
    const issues = validatePlanValues(this.plan, this.values);
    if (issues.length) {
      throw new ConfigValidationError(this.plan_file, issues);
    }
  }

  get domain(): string {
    return this.environment.DOMAIN;
  }

  resolvePath(file: string): string {
    return path.resolve(this.project_dir, file);
  }
}
