import execa from 'execa';
import ComposeCommandFailedError from '../errors/compose-command-failed';
import { ComposeBinary, DockerHelper } from '../docker/helper';

export interface ComposeResult {
  ok: boolean;
  exit_code: number;
  stdout: string;
  stderr: string;
}

export interface ComposeRunOptions {
  /** Stream the command's output to this process' terminal instead of capturing it. */
  inherit?: boolean;
}

/**
 * Runs compose commands for one project directory and an ordered list of compose files.
 */
export default class DockerComposeClient {
  readonly project_dir: string;
  readonly compose_files: string[];
  readonly binary: ComposeBinary;

  constructor(project_dir: string, compose_files: string[], binary?: ComposeBinary) {
    this.project_dir = project_dir;
    this.compose_files = compose_files;
    this.binary = binary || DockerHelper.composeBinary();
  }

  /**
   * The command prefix every compose call uses, e.g. `docker compose -f docker-compose.yml -f docker-compose.prod.yml`.
   */
  describe(): string {
    return [this.binary.command, ...this.baseArgs()].join(' ');
  }

  baseArgs(): string[] {
    const file_args = this.compose_files.flatMap((file) => ['-f', file]);
    return [...this.binary.base_args, ...file_args];
  }

  async run(args: string[], options: ComposeRunOptions = {}): Promise<ComposeResult> {
    const result = await execa(this.binary.command, [...this.baseArgs(), ...args], {
      cwd: this.project_dir,
      reject: false,
      stdio: options.inherit ? 'inherit' : 'pipe',
    });
    return {
      ok: !result.failed && result.exitCode === 0,
      exit_code: result.exitCode ?? 1,
      stdout: result.stdout || '',
      stderr: result.stderr || '',
    };
  }

  async runOrThrow(args: string[], options: ComposeRunOptions = {}): Promise<ComposeResult> {
    const result = await this.run(args, options);
    if (!result.ok) {
      throw new ComposeCommandFailedError(`${this.describe()} ${args.join(' ')}`, result.exit_code, result.stderr);
    }
    return result;
  }

  async down(): Promise<boolean> {
    return (await this.run(['down', '--remove-orphans'])).ok;
  }

  async pull(): Promise<boolean> {
    return (await this.run(['pull'], { inherit: true })).ok;
  }

  async up(): Promise<void> {
    await this.runOrThrow(['up', '-d', '--build'], { inherit: true });
  }

  async ps(): Promise<void> {
    await this.run(['ps'], { inherit: true });
  }

  /**
   * Services with at least one running container. `--services --filter status=running` is understood by
   * both the compose plugin and the standalone binary, unlike `ps --format json`.
   */
  async runningServices(): Promise<string[]> {
    const result = await this.run(['ps', '--services', '--filter', 'status=running']);
    if (!result.ok) {
      return [];
    }
    return result.stdout.split('\n').map((line) => line.trim()).filter((line) => line.length > 0);
  }

  async isRunning(service: string): Promise<boolean> {
    return (await this.runningServices()).includes(service);
  }

  async exec(service: string, command: string[]): Promise<ComposeResult> {
    return this.run(['exec', '-T', service, ...command]);
  }

  async logs(service: string): Promise<string> {
    const result = await this.run(['logs', '--no-color', service]);
    return `${result.stdout}\n${result.stderr}`;
  }

  logsCommand(service?: string): string {
    return service ? `${this.describe()} logs ${service}` : `${this.describe()} logs -f`;
  }
}
