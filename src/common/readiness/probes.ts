import axios from 'axios';
import net from 'net';
import { DependencySpec, parseHostPort } from '../../app-config/plan';
import DockerComposeClient from '../docker-compose/client';
import { InterpolationValues, parseCommand } from '../utils/interpolation';
import { ReadinessProbe } from './poller';

/**
 * Thrown by a probe to mark an attempt as not ready with a reason worth reporting.
 */
export class ProbeFailure extends Error { }

export const CONNECT_TIMEOUT_MS = 5000;

export default class Probes {
  static containerRunning(compose: DockerComposeClient, service: string): ReadinessProbe {
    return async () => {
      if (!(await compose.isRunning(service))) {
        throw new ProbeFailure(`${service} container not running`);
      }
      return true;
    };
  }

  static command(compose: DockerComposeClient, service: string, command: string[]): ReadinessProbe {
    return async () => {
      const result = await compose.exec(service, command);
      if (!result.ok) {
        throw new ProbeFailure(`${service} not responding to ${command[0]}`);
      }
      return true;
    };
  }

  /**
   * Requests the path from inside the container. Images ship either curl or wget, so wget is the fallback.
   */
  static http(compose: DockerComposeClient, service: string, http_path: string): ReadinessProbe {
    const url = `http://localhost${http_path}`;
    return async () => {
      const curl = await compose.exec(service, ['curl', '-f', '-s', url]);
      if (curl.ok) {
        return true;
      }
      const wget = await compose.exec(service, ['wget', '--quiet', '--tries=1', '--spider', url]);
      if (wget.ok) {
        return true;
      }
      throw new ProbeFailure(`${service} not responding on ${http_path}`);
    };
  }

  static tcp(host: string, port: number, timeout_ms = CONNECT_TIMEOUT_MS): ReadinessProbe {
    return () => new Promise<boolean>((resolve, reject) => {
      const socket = new net.Socket();

      const onError = (err: Error) => {
        socket.destroy();
        reject(new ProbeFailure(`${host}:${port} refused the connection (${err.message})`));
      };

      socket.setTimeout(timeout_ms);
      socket.once('error', onError);
      socket.once('timeout', () => {
        socket.destroy();
        reject(new ProbeFailure(`${host}:${port} did not accept a connection within ${timeout_ms}ms`));
      });

      socket.connect(port, host, () => {
        socket.end();
        resolve(true);
      });
    });
  }

  /**
   * Ready on any HTTP response, whatever its status. A redirect to https counts as a response.
   */
  static url(url: string, timeout_ms = CONNECT_TIMEOUT_MS): ReadinessProbe {
    return async () => {
      try {
        await axios.head(url, { timeout: timeout_ms, maxRedirects: 0, validateStatus: () => true });
        return true;
      } catch (err) {
        throw new ProbeFailure(`${url} did not respond (${err instanceof Error ? err.message : err})`);
      }
    };
  }

  /**
   * The probe of a plan dependency: its container must be running, then its own check (if any) must pass.
   */
  static forDependency(compose: DockerComposeClient, dependency: DependencySpec, values: InterpolationValues): ReadinessProbe {
    const running = Probes.containerRunning(compose, dependency.service);
    const probe = dependency.probe;

    let check: ReadinessProbe | undefined;
    if (probe?.command !== undefined) {
      check = Probes.command(compose, dependency.service, parseCommand(probe.command, values));
    } else if (probe?.http !== undefined) {
      check = Probes.http(compose, dependency.service, probe.http);
    } else if (probe?.tcp !== undefined) {
      const { host, port } = parseHostPort(probe.tcp);
      check = Probes.tcp(host, port);
    }

    return async () => {
      await running();
      return check ? check() : true;
    };
  }
}
