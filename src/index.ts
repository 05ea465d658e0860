export { run } from '@oclif/core';
export { default as DeployConfig } from './app-config/config';
export type { ConfigLocation, DeployOptions } from './app-config/config';
export { default as EnvironmentLoader, DeployEnvironment } from './app-config/environment';
export { default as DeployPlanLoader, DeployPlan, DependencySpec, ProbeSpec } from './app-config/plan';
export { DockerComposeUtils } from './common/docker-compose';
export { default as DockerComposeClient } from './common/docker-compose/client';
export { DeployError } from './common/errors/deploy-error';
export { default as ConfigValidationError } from './common/errors/config-validation';
export { default as DependencyNotReadyError } from './common/errors/dependency-not-ready';
export { default as ReadinessPoller } from './common/readiness/poller';
export type { DependencyDescriptor, PollOutcome, PollProgress, ReadinessProbe } from './common/readiness/poller';
export { default as Probes, ProbeFailure } from './common/readiness/probes';
export { ConsoleLogger } from './common/utils/logger';
export type { Logger } from './common/utils/logger';
export { default as ProductionDeployer } from './deployers/production-deployer';
export type { DeployResult } from './deployers/production-deployer';
