import { ValidationError } from 'class-validator';
import { ConfigIssue } from '../errors/config-validation';

export const DomainValidator = new RegExp('^([a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\\.)+[a-zA-Z]{2,}$');
export const ServiceNameValidator = new RegExp('^[a-zA-Z0-9][a-zA-Z0-9_.-]*$');

/**
 * Flattens nested class-validator errors into one entry per failing property path, e.g. `dependencies.0.attempts`.
 */
export const flattenValidationErrors = (errors: ValidationError[], parent_path = ''): ConfigIssue[] => {
  const issues: ConfigIssue[] = [];
  for (const error of errors) {
    const property = parent_path ? `${parent_path}.${error.property}` : error.property;
    if (error.constraints) {
      issues.push({ property, messages: Object.values(error.constraints) });
    }
    if (error.children?.length) {
      issues.push(...flattenValidationErrors(error.children, property));
    }
  }
  return issues;
};
