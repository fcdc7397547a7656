import { execFile } from 'child_process';
import { access, readFile } from 'fs/promises';
import { homedir } from 'os';
import * as path from 'path';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/** wakatime-cli runs longer than this are killed and count as failed. */
export const EXEC_TIMEOUT_MS = 60_000;

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface FileSystemAdapter {
  exists(path: string): Promise<boolean>;
  readFile(path: string): Promise<string>;
  /** Rejects when the process cannot be spawned or exits with a non-zero status. */
  exec(command: string, args: string[]): Promise<ExecResult>;
  homedir(): string;
  join(...paths: string[]): string;
}

export function createNodeAdapter(): FileSystemAdapter {
  return {
    async exists(p) {
      try {
        await access(p);
        return true;
      } catch {
        return false;
      }
    },
    readFile(p) {
      return readFile(p, 'utf8');
    },
    async exec(command, args) {
      const { stdout, stderr } = await execFileAsync(command, args, {
        encoding: 'utf8',
        timeout: EXEC_TIMEOUT_MS,
        killSignal: 'SIGTERM',
        windowsHide: true,
      });
      return { stdout, stderr };
    },
    homedir() {
      return process.env.WAKATIME_HOME || homedir();
    },
    join(...p) {
      return path.join(...p);
    },
  };
}
