import { expect } from 'chai';
import { validateSync } from 'class-validator';
import DeployPlanLoader from '../../src/app-config/plan';
import { dependencyFromFlags, settleOutcome, validateDependency } from '../../src/commands/wait';
import DependencyNotReadyError from '../../src/common/errors/dependency-not-ready';
import { flattenValidationErrors } from '../../src/common/utils/validation';
import { RecordingLogger } from '../utils/mocks';

describe('wait', () => {
  const plan = DeployPlanLoader.parse('deploy.yml', `
dependencies:
  - service: tileserver
    kind: soft
    attempts: 12
    report_every: 3
    probe:
      http: /health
`);

  it('defaults to a hard dependency without a probe', () => {
    const dependency = dependencyFromFlags('mysql', { soft: false });

    expect(dependency.service).to.eq('mysql');
    expect(dependency.kind).to.eq('hard');
    expect(dependency.attempts).to.be.undefined;
    expect(dependency.probe).to.be.undefined;
  });

  it('starts from the planned dependency', () => {
    const dependency = dependencyFromFlags('tileserver', { soft: false }, plan.dependencies[0]);

    expect(dependency.kind).to.eq('soft');
    expect(dependency.attempts).to.eq(12);
    expect(dependency.report_every).to.eq(3);
    expect(dependency.probe?.http).to.eq('/health');
  });

  it('lets flags override the planned dependency', () => {
    const dependency = dependencyFromFlags('tileserver', { soft: true, attempts: 4, delay: 0, tcp: 'localhost:8080' }, plan.dependencies[0]);

    expect(dependency.attempts).to.eq(4);
    expect(dependency.delay_seconds).to.eq(0);
    expect(dependency.report_every).to.eq(3);
    expect(dependency.probe?.tcp).to.eq('localhost:8080');
    expect(dependency.probe?.http).to.be.undefined;
  });

  it('produces dependencies that fail validation on malformed probes', () => {
    const dependency = dependencyFromFlags('api', { soft: false, http: 'health' });

    expect(flattenValidationErrors(validateSync(dependency))).to.deep.equal([
      { property: 'probe.http', messages: ['http must be a path starting with /'] },
    ]);
  });

  it('forces a planned soft dependency to hard', () => {
    const dependency = dependencyFromFlags('tileserver', { soft: false, hard: true }, plan.dependencies[0]);

    expect(dependency.kind).to.eq('hard');
    expect(dependency.attempts).to.eq(12);
  });

  it('checks the port range and the command of flag-built dependencies', () => {
    expect(validateDependency(dependencyFromFlags('tileserver', { soft: false, tcp: 'localhost:99999' }), {})).to.deep.equal([
      { property: 'probe.tcp', messages: ['tcp port must be between 1 and 65535'] },
    ]);
    expect(validateDependency(dependencyFromFlags('mysql', { soft: false, command: 'mysqladmin ping -p${DB_ROOT_PASSWORD}' }), {})).to.deep.equal([
      { property: 'probe.command', messages: ['Unknown variable ${DB_ROOT_PASSWORD} in "mysqladmin ping -p${DB_ROOT_PASSWORD}"'] },
    ]);
    expect(validateDependency(dependencyFromFlags('mysql', { soft: false, command: 'mysqladmin ping -p${DB_ROOT_PASSWORD}' }), { DB_ROOT_PASSWORD: 'test-secret' })).to.deep.equal([]);
  });

  describe('outcome', () => {
    const logs_command = 'docker compose -f docker-compose.yml logs tileserver';

    it('fails when a hard dependency runs out of attempts', () => {
      const logger = new RecordingLogger();
      const dependency = dependencyFromFlags('tileserver', { soft: false, hard: true }, plan.dependencies[0]);

      expect(() => settleOutcome(dependency, { ready: false, attempts: 12 }, logs_command, logger)).to.throw(
        DependencyNotReadyError,
        'tileserver did not become ready after 12 attempts.\nCheck tileserver logs: docker compose -f docker-compose.yml logs tileserver',
      );
      expect(logger.lines).to.deep.equal([]);
    });

    it('only warns when a soft dependency runs out of attempts', () => {
      const logger = new RecordingLogger();
      const dependency = dependencyFromFlags('tileserver', { soft: true });

      settleOutcome(dependency, { ready: false, attempts: 30 }, logs_command, logger);

      expect(logger.messages('warn')).to.deep.equal([
        'tileserver health check timed out',
        'Check logs: docker compose -f docker-compose.yml logs tileserver',
      ]);
    });

    it('stays quiet when the dependency became ready', () => {
      const logger = new RecordingLogger();
      const dependency = dependencyFromFlags('mysql', { soft: false });

      settleOutcome(dependency, { ready: true, attempts: 1 }, logs_command, logger);

      expect(logger.lines).to.deep.equal([]);
    });
  });
});
