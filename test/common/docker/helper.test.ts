import { expect } from 'chai';
import { RequiresDocker, _DockerHelper } from '../../../src/common/docker/helper';
import ComposeNotInstalledError from '../../../src/common/errors/compose-not-installed';
import DockerDaemonNotRunningError from '../../../src/common/errors/docker-daemon-not-running';
import DockerNotInstalledError from '../../../src/common/errors/docker-not-installed';

describe('docker helper', () => {
  it('requires docker to be installed', () => {
    const helper = new _DockerHelper(false);

    expect(() => helper.verifyDocker()).to.throw(DockerNotInstalledError);
    expect(() => helper.verifyDaemon()).to.throw(DockerDaemonNotRunningError);
    expect(() => helper.composeBinary()).to.throw(ComposeNotInstalledError);
  });

  it('falls back to the standalone compose binary', () => {
    const helper = new _DockerHelper(false);
    helper.docker_installed = true;
    helper.docker_info.daemon_running = true;
    helper.standalone_compose = '1.29.2';

    expect(helper.composeBinary()).to.deep.equal({ flavour: 'standalone', command: 'docker-compose', base_args: [], version: '1.29.2' });
  });

  it('prefers the compose plugin', () => {
    const helper = _DockerHelper.getTestHelper();
    helper.standalone_compose = '1.29.2';

    expect(helper.composeBinary()).to.deep.equal({ flavour: 'plugin', command: 'docker', base_args: ['compose'], version: 'v2.24.5' });
  });

  it('lets decorated methods run when docker is available', async () => {
    class Runner {
      @RequiresDocker({ compose: true })
      async run(): Promise<string> {
        return 'ran';
      }
    }

    expect(await new Runner().run()).to.eq('ran');
  });
});
