import { plainToInstance, Type } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min, ValidateNested, validateSync } from 'class-validator';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import ConfigValidationError, { ConfigIssue } from '../common/errors/config-validation';
import { DeployError } from '../common/errors/deploy-error';
import { flattenValidationErrors, ServiceNameValidator } from '../common/utils/validation';

export type DependencyKind = 'hard' | 'soft';

export const DEPENDENCY_DEFAULTS: Record<DependencyKind, { attempts: number; delay_seconds: number; report_every: number }> = {
  hard: { attempts: 60, delay_seconds: 5, report_every: 10 },
  soft: { attempts: 30, delay_seconds: 5, report_every: 5 },
};

const TCP_REGEX = /^[^:\s]+:\d{1,5}$/;

export class ProbeSpec {
  /** Run inside the service's container; ready when it exits 0. */
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  command?: string;

  /** Path requested from inside the service's container with curl, falling back to wget. */
  @IsOptional()
  @IsString()
  @Matches(/^\//, { message: 'http must be a path starting with /' })
  http?: string;

  /** host:port opened from the deploying host. */
  @IsOptional()
  @IsString()
  @Matches(TCP_REGEX, { message: 'tcp must be in the form host:port' })
  tcp?: string;
}

export class DependencySpec {
  @IsString()
  @Matches(ServiceNameValidator)
  service!: string;

  @IsIn(['hard', 'soft'])
  kind: DependencyKind = 'hard';

  @IsOptional()
  @IsInt()
  @Min(1)
  attempts?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  delay_seconds?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  report_every?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => ProbeSpec)
  probe?: ProbeSpec;
}

export class FileCondition {
  @IsString()
  @IsNotEmpty()
  path!: string;

  @IsString()
  @IsNotEmpty()
  text!: string;
}

export class TaskSpec {
  @IsString()
  @Matches(ServiceNameValidator)
  service!: string;

  @IsString()
  @IsNotEmpty()
  command!: string;

  @IsOptional()
  @IsString()
  description?: string;

  /** Skip the task when the file, relative to the project directory, already contains the text. */
  @IsOptional()
  @ValidateNested()
  @Type(() => FileCondition)
  unless_file_contains?: FileCondition;
}

export class LogCheckSpec {
  @IsString()
  @Matches(ServiceNameValidator)
  service!: string;

  /** Case-insensitive regular expression searched for in the service's logs. */
  @IsString()
  @IsNotEmpty()
  pattern!: string;

  @IsString()
  @IsNotEmpty()
  found!: string;

  @IsString()
  @IsNotEmpty()
  missing!: string;
}

export class UrlSpec {
  @IsString()
  @IsNotEmpty()
  label!: string;

  @IsString()
  @IsNotEmpty()
  url!: string;

  /** Only listed when one of the compose services carries a label containing this text. */
  @IsOptional()
  @IsString()
  when_label?: string;

  /** Only listed when this service is running. */
  @IsOptional()
  @IsString()
  when_running?: string;
}

export class SettleSpec {
  @IsInt()
  @Min(0)
  startup_seconds = 15;

  @IsInt()
  @Min(0)
  dependencies_seconds = 10;

  @IsInt()
  @Min(0)
  tasks_seconds = 10;

  @IsInt()
  @Min(0)
  log_checks_seconds = 5;
}

export class ServicesSpec {
  @IsArray()
  @Matches(ServiceNameValidator, { each: true })
  expected: string[] = [];

  /** Expected only when one of the compose files declares them. */
  @IsArray()
  @Matches(ServiceNameValidator, { each: true })
  optional: string[] = [];
}

export class DeployPlan {
  @IsOptional()
  @IsString()
  name?: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  compose_files: string[] = ['docker-compose.yml'];

  /** `docker system prune` is limited to resources carrying this label; no prune without it. */
  @IsOptional()
  @IsString()
  prune_label?: string;

  @ValidateNested()
  @Type(() => SettleSpec)
  settle: SettleSpec = new SettleSpec();

  @ValidateNested()
  @Type(() => ServicesSpec)
  services: ServicesSpec = new ServicesSpec();

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DependencySpec)
  dependencies: DependencySpec[] = [];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TaskSpec)
  tasks: TaskSpec[] = [];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LogCheckSpec)
  log_checks: LogCheckSpec[] = [];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => UrlSpec)
  urls: UrlSpec[] = [];

  @IsOptional()
  @IsString()
  connectivity_url?: string;
}

export const parseHostPort = (value: string): { host: string; port: number } => {
  const separator = value.lastIndexOf(':');
  const host = value.substring(0, separator);
  const port = Number.parseInt(value.substring(separator + 1), 10);
  return { host, port };
};

/**
 * Checks class-validator cannot express: a probe names exactly one kind of check and its tcp port is in range.
 */
export const validateProbe = (probe: ProbeSpec, property: string): ConfigIssue[] => {
  const issues: ConfigIssue[] = [];
  const kinds = [probe.command, probe.http, probe.tcp].filter((kind) => kind !== undefined);
  if (kinds.length !== 1) {
    issues.push({
      property,
      messages: ['probe must define exactly one of command, http or tcp'],
    });
  }
  if (probe.tcp !== undefined && TCP_REGEX.test(probe.tcp)) {
    const { port } = parseHostPort(probe.tcp);
    if (port < 1 || port > 65535) {
      issues.push({
        property: `${property}.tcp`,
        messages: ['tcp port must be between 1 and 65535'],
      });
    }
  }
  return issues;
};

const validateSemantics = (plan: DeployPlan): ConfigIssue[] => {
  const issues: ConfigIssue[] = [];
  plan.log_checks.forEach((log_check, index) => {
    try {
      new RegExp(log_check.pattern, 'i');
    } catch {
      issues.push({
        property: `log_checks.${index}.pattern`,
        messages: ['pattern must be a valid regular expression'],
      });
    }
  });
  plan.dependencies.forEach((dependency, index) => {
    if (dependency.probe) {
      issues.push(...validateProbe(dependency.probe, `dependencies.${index}.probe`));
    }
  });
  return issues;
};

export default class DeployPlanLoader {
  static parse(plan_file: string, contents: string): DeployPlan {
    let raw: unknown;
    try {
      raw = yaml.load(contents);
    } catch (err) {
      const reason = err instanceof Error ? err.message : `${err}`;
      throw new DeployError(`Invalid yaml in ${plan_file}:\n${reason}`);
    }

    if (raw === undefined || raw === null) {
      raw = {};
    }
    if (typeof raw !== 'object' || Array.isArray(raw)) {
      throw new DeployError(`Invalid deploy plan in ${plan_file}: expected a mapping at the top level`);
    }

    const plan = plainToInstance(DeployPlan, raw);
    const issues = [...flattenValidationErrors(validateSync(plan)), ...validateSemantics(plan)];
    if (issues.length) {
      throw new ConfigValidationError(plan_file, issues);
    }
    return plan;
  }

  static load(plan_file: string): DeployPlan {
    if (!fs.existsSync(plan_file)) {
      throw new DeployError(`Deploy plan not found: ${plan_file}`);
    }
    return DeployPlanLoader.parse(plan_file, fs.readFileSync(plan_file, 'utf-8'));
  }
}
