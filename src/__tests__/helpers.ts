import pino from 'pino';
import { ExecResult, FileSystemAdapter } from '../adapter';
import { Logger } from '../logger';

export interface ExecCall {
  command: string;
  args: string[];
}

export class FakeAdapter implements FileSystemAdapter {
  files: Map<string, string> = new Map();
  executables: Set<string> = new Set();
  calls: ExecCall[] = [];
  failExec = false;
  /** When set, exec never settles, like a wakatime-cli run that hangs. */
  hangExec = false;

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.executables.has(path);
  }

  async readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`ENOENT: ${path}`);
    return content;
  }

  async exec(command: string, args: string[]): Promise<ExecResult> {
    this.calls.push({ command, args });
    if (this.hangExec) return new Promise<ExecResult>(() => {});
    if (this.failExec) throw new Error('Command failed with exit code 1');
    return { stdout: '', stderr: '' };
  }

  homedir(): string {
    return '/home/dev';
  }

  join(...paths: string[]): string {
    return paths.join('/');
  }
}

// Discards output even after a test raises the level.
export function silentLogger(): Logger {
  return new Logger(pino({ level: 'silent' }, { write() {} }));
}
