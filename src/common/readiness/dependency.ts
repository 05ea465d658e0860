import { DEPENDENCY_DEFAULTS, DependencySpec } from '../../app-config/plan';
import DockerComposeClient from '../docker-compose/client';
import { InterpolationValues } from '../utils/interpolation';
import { DependencyDescriptor } from './poller';
import Probes from './probes';

export const toDependencyDescriptor = (compose: DockerComposeClient, dependency: DependencySpec, values: InterpolationValues): DependencyDescriptor => {
  const defaults = DEPENDENCY_DEFAULTS[dependency.kind];
  return {
    name: dependency.service,
    probe: Probes.forDependency(compose, dependency, values),
    max_attempts: dependency.attempts ?? defaults.attempts,
    delay_ms: (dependency.delay_seconds ?? defaults.delay_seconds) * 1000,
    report_every: dependency.report_every ?? defaults.report_every,
  };
};
