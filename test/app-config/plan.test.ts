import { expect } from 'chai';
import fs from 'fs-extra';
import path from 'path';
import DeployPlanLoader, { parseHostPort } from '../../src/app-config/plan';
import ConfigValidationError from '../../src/common/errors/config-validation';
import { DeployError } from '../../src/common/errors/deploy-error';
import { makeTmpDir } from '../utils/mocks';

const parseIssues = (contents: string): string[] => {
  try {
    DeployPlanLoader.parse('deploy.yml', contents);
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      return err.issues.map((issue) => `${issue.property}: ${issue.messages.join(', ')}`);
    }
    throw err;
  }
  return [];
};

describe('deploy plan loader', () => {
  it('applies defaults to an empty plan', () => {
    const plan = DeployPlanLoader.parse('deploy.yml', '');

    expect(plan.compose_files).to.deep.equal(['docker-compose.yml']);
    expect(plan.settle.startup_seconds).to.eq(15);
    expect(plan.settle.dependencies_seconds).to.eq(10);
    expect(plan.settle.tasks_seconds).to.eq(10);
    expect(plan.settle.log_checks_seconds).to.eq(5);
    expect(plan.services.expected).to.deep.equal([]);
    expect(plan.dependencies).to.deep.equal([]);
    expect(plan.prune_label).to.be.undefined;
  });

  it('parses dependencies with their kinds and probes', () => {
    const plan = DeployPlanLoader.parse('deploy.yml', `
compose_files:
  - docker-compose.yml
  - docker-compose.prod.yml
dependencies:
  - service: mysql
    probe:
      command: mysqladmin ping --silent
  - service: tileserver
    kind: soft
    attempts: 10
    probe:
      http: /health
`);

    expect(plan.compose_files).to.deep.equal(['docker-compose.yml', 'docker-compose.prod.yml']);
    expect(plan.dependencies.map((dependency) => [dependency.service, dependency.kind, dependency.attempts])).to.deep.equal([
      ['mysql', 'hard', undefined],
      ['tileserver', 'soft', 10],
    ]);
    expect(plan.dependencies[0].probe?.command).to.eq('mysqladmin ping --silent');
    expect(plan.dependencies[1].probe?.http).to.eq('/health');
  });

  it('keeps partial settle overrides on top of the defaults', () => {
    const plan = DeployPlanLoader.parse('deploy.yml', 'settle:\n  startup_seconds: 30\n');

    expect(plan.settle.startup_seconds).to.eq(30);
    expect(plan.settle.tasks_seconds).to.eq(10);
  });

  it('reports the path of every invalid property', () => {
    expect(parseIssues(`
dependencies:
  - service: mysql
    kind: eventual
    attempts: 0
  - service: api
    probe:
      http: health
`)).to.deep.equal([
      'dependencies.0.kind: kind must be one of the following values: hard, soft',
      'dependencies.0.attempts: attempts must not be less than 1',
      'dependencies.1.probe.http: http must be a path starting with /',
    ]);
  });

  it('requires exactly one kind of probe', () => {
    expect(parseIssues(`
dependencies:
  - service: mysql
    probe:
      command: mysqladmin ping
      tcp: mysql:3306
`)).to.deep.equal(['dependencies.0.probe: probe must define exactly one of command, http or tcp']);
  });

  it('rejects tcp ports outside the valid range', () => {
    expect(parseIssues(`
dependencies:
  - service: tileserver
    probe:
      tcp: localhost:99999
  - service: redis
    probe:
      tcp: localhost:0
  - service: mysql
    probe:
      tcp: mysql:65535
`)).to.deep.equal([
      'dependencies.0.probe.tcp: tcp port must be between 1 and 65535',
      'dependencies.1.probe.tcp: tcp port must be between 1 and 65535',
    ]);
  });

  it('reads host and port from a tcp address', () => {
    expect(parseHostPort('mysql:3306')).to.deep.equal({ host: 'mysql', port: 3306 });
  });

  it('rejects log check patterns that are not regular expressions', () => {
    expect(parseIssues(`
log_checks:
  - service: traefik
    pattern: "certificate|(acme"
    found: Traefik SSL configuration detected
    missing: SSL certificates may not be configured yet
`)).to.deep.equal(['log_checks.0.pattern: pattern must be a valid regular expression']);
  });

  it('rejects invalid yaml', () => {
    expect(() => DeployPlanLoader.parse('deploy.yml', 'dependencies: [mysql'))
      .to.throw(DeployError, 'Invalid yaml in deploy.yml:');
  });

  it('rejects a plan that is not a mapping', () => {
    expect(() => DeployPlanLoader.parse('deploy.yml', '- mysql\n- api\n'))
      .to.throw(DeployError, 'Invalid deploy plan in deploy.yml: expected a mapping at the top level');
  });

  it('loads the plan from disk', () => {
    const tmp_dir = makeTmpDir();
    try {
      const plan_file = path.join(tmp_dir, 'deploy.yml');
      fs.writeFileSync(plan_file, 'name: sig-platform\nprune_label: com.example.project=sig-platform\n');

      const plan = DeployPlanLoader.load(plan_file);

      expect(plan.name).to.eq('sig-platform');
      expect(plan.prune_label).to.eq('com.example.project=sig-platform');
    } finally {
      fs.removeSync(tmp_dir);
    }
  });

  it('fails when the plan does not exist', () => {
    expect(() => DeployPlanLoader.load('/nonexistent/deploy.yml')).to.throw(DeployError, 'Deploy plan not found: /nonexistent/deploy.yml');
  });
});
