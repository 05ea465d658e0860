import execa from 'execa';
import which from 'which';
import ComposeNotInstalledError from '../errors/compose-not-installed';
import DockerDaemonNotRunningError from '../errors/docker-daemon-not-running';
import DockerNotInstalledError from '../errors/docker-not-installed';

interface DockerInfoPlugin {
  SchemaVersion: string;
  Vendor: string;
  Version: string;
  ShortDescription: string;
  Name: string;
  Path: string;
}

interface DockerInfoJSON {
  ClientInfo?: {
    Plugins?: DockerInfoPlugin[];
  };
  ServerErrors?: string[];
}

/**
 * `plugin` runs `docker compose ...`, `standalone` runs the legacy `docker-compose ...` binary.
 */
export type ComposeFlavour = 'plugin' | 'standalone';

export interface ComposeBinary {
  flavour: ComposeFlavour;
  command: string;
  base_args: string[];
  version?: string;
}

interface DockerInfo {
  daemon_running: boolean;
  compose?: DockerInfoPlugin;
}

export class _DockerHelper {
  docker_installed: boolean;
  docker_info: DockerInfo;
  standalone_compose?: string;

  constructor(probe_host = true) {
    this.docker_info = {
      daemon_running: false,
      compose: undefined,
    };
    this.docker_installed = false;

    if (probe_host) {
      this.docker_installed = this.checkDockerInstalled();
      if (this.docker_installed) {
        this.docker_info = this.getDockerInfo();
      }
      this.standalone_compose = this.getStandaloneComposeVersion();
    }
  }

  static getTestHelper(): _DockerHelper {
    const helper = new _DockerHelper(false);
    helper.docker_installed = true;
    helper.docker_info.daemon_running = true;
    helper.docker_info.compose = {
      SchemaVersion: '0.1.0',
      Vendor: 'Docker Inc.',
      Version: 'v2.24.5',
      ShortDescription: 'Docker Compose',
      Name: 'compose',
      Path: '/usr/local/lib/docker/cli-plugins/docker-compose',
    };
    return helper;
  }

  checkDockerInstalled(): boolean {
    try {
      which.sync('docker');
      return true;
    } catch {
      return false;
    }
  }

  getDockerInfo(): DockerInfo {
    let docker_info;
    try {
      docker_info = execa.sync('docker', ['info', '--format', '{{json .}}']).stdout;
    } catch {
      return {
        daemon_running: false,
        compose: undefined,
      };
    }

    const docker_json: DockerInfoJSON = JSON.parse(docker_info);
    const plugins = docker_json.ClientInfo?.Plugins || [];
    return {
      daemon_running: !docker_json.ServerErrors?.length,
      compose: plugins.find((plugin) => plugin.Name === 'compose'),
    };
  }

  getStandaloneComposeVersion(): string | undefined {
    try {
      which.sync('docker-compose');
    } catch {
      return undefined;
    }
    try {
      return execa.sync('docker-compose', ['version', '--short']).stdout.trim() || 'unknown';
    } catch {
      return 'unknown';
    }
  }

  daemonRunning(): boolean {
    return this.docker_info.daemon_running;
  }

  verifyDocker(): void {
    if (!this.docker_installed) {
      throw new DockerNotInstalledError();
    }
  }

  verifyDaemon(): void {
    if (!this.daemonRunning()) {
      throw new DockerDaemonNotRunningError();
    }
  }

  verifyCompose(): void {
    if (!this.docker_info.compose && !this.standalone_compose) {
      throw new ComposeNotInstalledError();
    }
  }

  /**
   * The compose plugin is preferred; the standalone binary is the fallback for hosts still on compose v1.
   */
  composeBinary(): ComposeBinary {
    this.verifyCompose();
    if (this.docker_info.compose) {
      return { flavour: 'plugin', command: 'docker', base_args: ['compose'], version: this.docker_info.compose.Version };
    }
    return { flavour: 'standalone', command: 'docker-compose', base_args: [], version: this.standalone_compose };
  }
}

// Create a singleton DockerHelper
export const DockerHelper = process.env.TEST === '1' ? _DockerHelper.getTestHelper() : new _DockerHelper();

interface RequiresDockerOptions {
  compose?: boolean;
}

/**
 * Used to wrap `Command.run()` when docker is required. Should be used as close to the run method as possible
 * so the checks happen before any work begins.
 */
export function RequiresDocker(options?: RequiresDockerOptions) {
  return function <A extends unknown[], R>(_target: object, _property_key: string, descriptor: TypedPropertyDescriptor<(...args: A) => R>): TypedPropertyDescriptor<(...args: A) => R> {
    const wrapped = descriptor.value;
    if (!wrapped) {
      return descriptor;
    }
    descriptor.value = function (this: unknown, ...args: A): R {
      // We always want to verify docker is installed and the daemon is running if any docker usage is required.
      DockerHelper.verifyDocker();
      DockerHelper.verifyDaemon();

      if (options?.compose) {
        DockerHelper.verifyCompose();
      }

      return wrapped.apply(this, args);
    };
    return descriptor;
  };
}
