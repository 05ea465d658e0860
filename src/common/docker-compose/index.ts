import fs from 'fs-extra';
import yaml from 'js-yaml';
import path from 'path';
import { DeployError } from '../errors/deploy-error';
import MissingComposeFileError from '../errors/missing-compose-file';
import DockerComposeTemplate, { DockerService } from './template';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export class DockerComposeUtils {
  public static resolveComposeFiles(project_dir: string, compose_files: string[]): string[] {
    return compose_files.map((file) => path.resolve(project_dir, file));
  }

  public static verifyComposeFiles(project_dir: string, compose_files: string[]): void {
    for (const file of compose_files) {
      const file_path = path.resolve(project_dir, file);
      let is_file = false;
      try {
        is_file = fs.lstatSync(file_path).isFile();
      } catch {
        is_file = false;
      }
      if (!is_file) {
        throw new MissingComposeFileError(file);
      }
    }
  }

  public static loadDockerCompose(compose_path: string): DockerComposeTemplate {
    if (!fs.existsSync(compose_path)) {
      throw new MissingComposeFileError(compose_path);
    }
    const file_contents = fs.readFileSync(compose_path, 'utf-8');

    let raw_config: unknown;
    try {
      raw_config = JSON.parse(file_contents);
    } catch {
      try {
        raw_config = yaml.load(file_contents);
      } catch (err) {
        const reason = err instanceof Error ? err.message : `${err}`;
        throw new DeployError(`Invalid docker-compose format in ${compose_path}. Must be json or yaml.\n${reason}`);
      }
    }

    if (!isRecord(raw_config)) {
      throw new DeployError(`Invalid docker-compose format in ${compose_path}. Must be json or yaml.`);
    }

    const services: { [key: string]: DockerService } = {};
    if (isRecord(raw_config.services)) {
      for (const [service_name, service] of Object.entries(raw_config.services)) {
        services[service_name] = isRecord(service) ? DockerComposeUtils.toDockerService(service) : {};
      }
    }

    return { services };
  }

  private static toDockerService(service: Record<string, unknown>): DockerService {
    const docker_service: DockerService = {};
    if (Array.isArray(service.labels)) {
      docker_service.labels = service.labels.map((label) => `${label}`);
    } else if (isRecord(service.labels)) {
      docker_service.labels = Object.fromEntries(Object.entries(service.labels).map(([key, value]) => [key, `${value}`]));
    }
    return docker_service;
  }

  /**
   * Services declared across the compose files. A later file overrides the definition of a service
   * declared by an earlier one, as `docker compose -f a -f b` does for the keys read here.
   */
  public static loadServices(project_dir: string, compose_files: string[]): Map<string, DockerService> {
    const services = new Map<string, DockerService>();
    for (const compose_file of DockerComposeUtils.resolveComposeFiles(project_dir, compose_files)) {
      const compose = DockerComposeUtils.loadDockerCompose(compose_file);
      for (const [service_name, service] of Object.entries(compose.services)) {
        services.set(service_name, { ...services.get(service_name), ...service });
      }
    }
    return services;
  }

  /**
   * Label values of a service, whichever of the two compose label syntaxes it uses.
   */
  public static getServiceLabels(service: DockerService): string[] {
    if (!service.labels) {
      return [];
    }
    if (Array.isArray(service.labels)) {
      return service.labels;
    }
    return Object.entries(service.labels).map(([key, value]) => `${key}=${value}`);
  }

  public static hasLabelContaining(services: Map<string, DockerService>, needle: string): boolean {
    for (const service of services.values()) {
      if (DockerComposeUtils.getServiceLabels(service).some((label) => label.includes(needle))) {
        return true;
      }
    }
    return false;
  }
}
