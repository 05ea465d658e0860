import { plainToInstance } from 'class-transformer';
import { IsNotEmpty, IsNumberString, IsOptional, IsString, Matches, validateSync } from 'class-validator';
import * as dotenv from 'dotenv';
import * as dotenvExpand from 'dotenv-expand';
import fs from 'fs-extra';
import ConfigValidationError from '../common/errors/config-validation';
import { DeployError } from '../common/errors/deploy-error';
import { InterpolationValues } from '../common/utils/interpolation';
import { DomainValidator, flattenValidationErrors } from '../common/utils/validation';

export class DeployEnvironment {
  @IsString()
  @IsNotEmpty()
  @Matches(DomainValidator, { message: 'DOMAIN must be a valid domain (e.g. example.com)' })
  DOMAIN!: string;

  @IsString()
  @IsNotEmpty()
  DB_DATABASE!: string;

  @IsString()
  @IsNotEmpty()
  DB_USERNAME!: string;

  @IsString()
  @IsNotEmpty()
  DB_PASSWORD!: string;

  @IsString()
  @IsNotEmpty()
  DB_ROOT_PASSWORD!: string;

  @IsOptional()
  @IsString()
  DB_HOST?: string;

  @IsOptional()
  @IsNumberString({ no_symbols: true })
  DB_PORT?: string;

  @IsOptional()
  @IsString()
  MAIL_MAILER?: string;

  @IsOptional()
  @IsString()
  MAIL_FROM_NAME?: string;

  @IsOptional()
  @IsString()
  MAIL_FROM_ADDRESS?: string;

  @IsOptional()
  @IsString()
  SENDGRID_API_KEY?: string;
}

export const REQUIRED_VARIABLES = ['DOMAIN', 'DB_DATABASE', 'DB_USERNAME', 'DB_PASSWORD', 'DB_ROOT_PASSWORD'];

export interface LoadedEnvironment {
  environment: DeployEnvironment;
  values: InterpolationValues;
  warnings: string[];
}

export default class EnvironmentLoader {
  /**
   * Reads the dotenv file and layers its values over `base_env`. Nothing is written to `process.env`.
   */
  static read(env_file: string, base_env: NodeJS.ProcessEnv = process.env): InterpolationValues {
    if (!fs.existsSync(env_file)) {
      throw new DeployError(`Environment file not found: ${env_file}\nCreate it with at least: ${REQUIRED_VARIABLES.join(', ')}`);
    }

    const parsed = dotenv.parse(fs.readFileSync(env_file));
    const expanded = dotenvExpand.expand({ parsed, ignoreProcessEnv: true });
    if (expanded.error) {
      throw new DeployError(`Error loading dotenv file ${env_file}: ${expanded.error.message}`);
    }

    const values: InterpolationValues = {};
    for (const [key, value] of Object.entries(base_env)) {
      values[key] = value;
    }
    for (const [key, value] of Object.entries(expanded.parsed || parsed)) {
      values[key] = value;
    }
    return values;
  }

  static validate(env_file: string, values: InterpolationValues): LoadedEnvironment {
    // Empty strings count as unset, as they would in a shell `-z` test
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined && value !== '') {
        present[key] = value;
      }
    }

    const environment = plainToInstance(DeployEnvironment, present);
    const errors = validateSync(environment);
    if (errors.length) {
      throw new ConfigValidationError(env_file, flattenValidationErrors(errors));
    }

    const warnings: string[] = [];
    if (environment.MAIL_MAILER === 'sendgrid' && !environment.SENDGRID_API_KEY) {
      warnings.push('SendGrid mailer configured but SENDGRID_API_KEY is missing. Email functionality may not work properly.');
    }

    return { environment, values, warnings };
  }

  static load(env_file: string, base_env: NodeJS.ProcessEnv = process.env): LoadedEnvironment {
    return EnvironmentLoader.validate(env_file, EnvironmentLoader.read(env_file, base_env));
  }
}
