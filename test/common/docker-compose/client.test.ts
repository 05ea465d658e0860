import { expect } from 'chai';
import sinon from 'sinon';
import DockerComposeClient from '../../../src/common/docker-compose/client';
import { DockerHelper } from '../../../src/common/docker/helper';
import ComposeCommandFailedError from '../../../src/common/errors/compose-command-failed';
import { composeResult } from '../../utils/mocks';

describe('docker compose client', () => {
  const files = ['docker-compose.yml', 'docker-compose.cra.yml'];

  it('uses the compose plugin when docker ships it', () => {
    const client = new DockerComposeClient('/srv/stack', files);

    expect(client.binary.flavour).to.eq('plugin');
    expect(client.describe()).to.eq('docker compose -f docker-compose.yml -f docker-compose.cra.yml');
    expect(DockerHelper.composeBinary().version).to.eq('v2.24.5');
  });

  it('renders the standalone binary without a subcommand', () => {
    const client = new DockerComposeClient('/srv/stack', files, { flavour: 'standalone', command: 'docker-compose', base_args: [] });

    expect(client.describe()).to.eq('docker-compose -f docker-compose.yml -f docker-compose.cra.yml');
    expect(client.logsCommand('mysql')).to.eq('docker-compose -f docker-compose.yml -f docker-compose.cra.yml logs mysql');
    expect(client.logsCommand()).to.eq('docker-compose -f docker-compose.yml -f docker-compose.cra.yml logs -f');
  });

  describe('with a stubbed runner', () => {
    let client: DockerComposeClient;

    beforeEach(() => {
      client = new DockerComposeClient('/srv/stack', ['docker-compose.yml']);
    });

    it('lists the running services', async () => {
      const run = sinon.stub(client, 'run').resolves(composeResult(true, 'traefik\nmysql\n\napi-laravel\n'));

      expect(await client.runningServices()).to.deep.equal(['traefik', 'mysql', 'api-laravel']);
      expect(run.firstCall.args[0]).to.deep.equal(['ps', '--services', '--filter', 'status=running']);
    });

    it('lists no running services when ps fails', async () => {
      sinon.stub(client, 'run').resolves(composeResult(false, 'traefik'));

      expect(await client.runningServices()).to.deep.equal([]);
      expect(await client.isRunning('traefik')).to.be.false;
    });

    it('checks a single service', async () => {
      sinon.stub(client, 'run').resolves(composeResult(true, 'traefik\nmysql'));

      expect(await client.isRunning('mysql')).to.be.true;
      expect(await client.isRunning('tileserver')).to.be.false;
    });

    it('runs exec without a tty', async () => {
      const run = sinon.stub(client, 'run').resolves(composeResult(true));

      await client.exec('api-laravel', ['php', 'artisan', 'config:cache']);

      expect(run.firstCall.args[0]).to.deep.equal(['exec', '-T', 'api-laravel', 'php', 'artisan', 'config:cache']);
    });

    it('returns both output streams of logs', async () => {
      sinon.stub(client, 'run').resolves(composeResult(true, 'traefik | started', 'traefik | acme: obtaining certificate'));

      expect(await client.logs('traefik')).to.eq('traefik | started\ntraefik | acme: obtaining certificate');
    });

    it('reports down and pull failures as false', async () => {
      const run = sinon.stub(client, 'run').resolves(composeResult(false));

      expect(await client.down()).to.be.false;
      expect(await client.pull()).to.be.false;
      expect(run.firstCall.args[0]).to.deep.equal(['down', '--remove-orphans']);
      expect(run.secondCall.args).to.deep.equal([['pull'], { inherit: true }]);
    });

    it('throws when up fails', async () => {
      sinon.stub(client, 'run').resolves({ ok: false, exit_code: 17, stdout: '', stderr: 'port is already allocated' });

      let error: unknown;
      try {
        await client.up();
      } catch (err) {
        error = err;
      }

      expect(error).to.be.instanceOf(ComposeCommandFailedError);
      expect(error).to.have.property('message', '`docker compose -f docker-compose.yml up -d --build` failed with exit code 17');
      expect(error).to.have.property('stderr', 'port is already allocated');
    });
  });
});
