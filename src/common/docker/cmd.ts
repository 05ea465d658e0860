import execa, { Options } from 'execa';
import { DockerHelper } from './helper';

export const docker = async (args: string[], execa_opts?: Options): Promise<execa.ExecaReturnValue> => {
  DockerHelper.verifyDocker();
  return await execa('docker', args, execa_opts);
};

/**
 * Removes stopped containers, dangling images and unused networks carrying the given label.
 * Resolves false instead of throwing when docker refuses.
 */
export const pruneByLabel = async (label: string): Promise<boolean> => {
  const result = await docker(['system', 'prune', '-f', '--filter', `label=${label}`], { reject: false });
  return !result.failed;
};
