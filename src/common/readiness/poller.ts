import { DeployError } from '../errors/deploy-error';

/**
 * A single readiness check. Resolving `true` means the dependency can accept traffic;
 * resolving `false` or throwing means it is not ready yet.
 */
export type ReadinessProbe = () => Promise<boolean>;

export interface DependencyDescriptor {
  name: string;
  probe: ReadinessProbe;
  max_attempts: number;
  delay_ms: number;
  report_every?: number;
}

export interface PollProgress {
  name: string;
  attempt: number;
  max_attempts: number;
  reason?: string;
}

export interface PollOutcome {
  ready: boolean;
  attempts: number;
}

export interface PollHooks {
  onProgress?: (progress: PollProgress) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export default class ReadinessPoller {
  static DEFAULT_REPORT_EVERY = 10;

  static validate(descriptor: DependencyDescriptor): void {
    const { name, max_attempts, delay_ms } = descriptor;
    if (!Number.isInteger(max_attempts) || max_attempts < 1) {
      throw new DeployError(`Invalid attempt count for ${name}: ${max_attempts}. It must be a whole number of at least 1.`);
    }
    if (!Number.isInteger(delay_ms) || delay_ms < 0) {
      throw new DeployError(`Invalid delay for ${name}: ${delay_ms}ms. It must be a whole number of milliseconds, 0 or more.`);
    }
    const report_every = descriptor.report_every;
    if (report_every !== undefined && (!Number.isInteger(report_every) || report_every < 1)) {
      throw new DeployError(`Invalid reporting interval for ${name}: ${report_every}. It must be a whole number of at least 1.`);
    }
  }

  /**
   * Calls the probe until it reports ready or `max_attempts` probes have been made.
   * The delay is only slept between two attempts, never after the last one.
   */
  static async waitFor(descriptor: DependencyDescriptor, hooks: PollHooks = {}): Promise<PollOutcome> {
    ReadinessPoller.validate(descriptor);

    const wait = hooks.sleep || sleep;
    const report_every = descriptor.report_every || ReadinessPoller.DEFAULT_REPORT_EVERY;

    for (let attempt = 1; attempt <= descriptor.max_attempts; attempt++) {
      let reason: string | undefined;
      try {
        if (await descriptor.probe()) {
          return { ready: true, attempts: attempt };
        }
      } catch (err) {
        reason = err instanceof Error ? err.message : `${err}`;
      }

      if (hooks.onProgress && attempt % report_every === 0) {
        hooks.onProgress({ name: descriptor.name, attempt, max_attempts: descriptor.max_attempts, reason });
      }

      if (attempt < descriptor.max_attempts) {
        await wait(descriptor.delay_ms);
      }
    }

    return { ready: false, attempts: descriptor.max_attempts };
  }
}
