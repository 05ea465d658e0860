import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  /** Writes the line as-is, without a level prefix. */
  plain(message?: string): void;
}

export type LineWriter = (line: string) => void;

export class ConsoleLogger implements Logger {
  private readonly write: LineWriter;

  constructor(write: LineWriter = (line) => console.log(line)) {
    this.write = write;
  }

  info(message: string): void {
    this.write(`${chalk.green('[INFO]')} ${message}`);
  }

  warn(message: string): void {
    this.write(`${chalk.yellow('[WARNING]')} ${message}`);
  }

  error(message: string): void {
    this.write(`${chalk.red('[ERROR]')} ${message}`);
  }

  debug(message: string): void {
    this.write(`${chalk.blue('[DEBUG]')} ${message}`);
  }

  plain(message = ''): void {
    this.write(message);
  }
}
