import { FileSystemAdapter } from './adapter';
import { Logger } from './logger';
import { Settings, SettingsStore } from './options';
import { Heartbeat } from './types';

export interface DispatcherOptions {
  adapter: FileSystemAdapter;
  settings: SettingsStore;
  logger: Logger;
  /** Resolves the wakatime-cli executable to spawn. */
  cliCommand: () => Promise<string>;
  /** Editor/plugin identifier for `--plugin`, '' when unknown. */
  platform: () => string;
}

/**
 * Arguments for one wakatime-cli invocation. Line and cursor are sent
 * one-based; optional flags are left out when there is nothing to say.
 */
export function buildCliArgs(heartbeat: Heartbeat, settings: Settings, platform: string, linesInFile: number): string[] {
  const args = ['--time', String(heartbeat.timestamp), '--entity', heartbeat.file];

  if (platform) {
    args.push('--plugin', platform);
  }
  if (heartbeat.is_write) {
    args.push('--write');
  }
  if (settings.metrics === true) {
    args.push('--metrics');
  }
  if (settings.apiKey !== undefined) {
    args.push('--key', settings.apiKey);
  }
  if (settings.apiUrl !== undefined) {
    args.push('--api-url', settings.apiUrl);
  }
  if (heartbeat.language !== undefined) {
    args.push('--language', heartbeat.language);
  } else {
    args.push('--guess-language');
  }
  if (settings.debug === true) {
    args.push('--verbose');
  }

  args.push('--lineno', String(heartbeat.line_number + 1));
  args.push('--cursorpos', String(heartbeat.cursor_position + 1));

  if (linesInFile > 0) {
    args.push('--lines-in-file', String(linesInFile));
  }
  return args;
}

/** Line count of a file on disk, 0 when it cannot be read. A trailing newline does not start a new line. */
export async function countLines(adapter: FileSystemAdapter, file: string): Promise<number> {
  let content: string;
  try {
    content = await adapter.readFile(file);
  } catch {
    return 0;
  }
  if (content === '') return 0;

  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.length;
}

export function redactArgs(args: string[]): string[] {
  return args.map((arg, i) => (i > 0 && args[i - 1] === '--key' ? '<redacted>' : arg));
}

export class Dispatcher {
  private readonly options: DispatcherOptions;

  constructor(options: DispatcherOptions) {
    this.options = options;
  }

  /**
   * Runs wakatime-cli for one heartbeat. Resolves to false when the process
   * could not be spawned or failed; the agent owns retries and offline queueing.
   */
  async dispatch(heartbeat: Heartbeat): Promise<boolean> {
    const { adapter, logger } = this.options;
    const settings = this.options.settings.load();
    const linesInFile = await countLines(adapter, heartbeat.file);
    const args = buildCliArgs(heartbeat, settings, this.options.platform(), linesInFile);

    let command = '';
    try {
      command = await this.options.cliCommand();
      logger.debug('Wakatime command', { command, args: redactArgs(args) });

      const { stdout, stderr } = await adapter.exec(command, args);
      if (stdout) {
        logger.debug(`WakaTime CLI stdout: ${stdout}`);
      }
      if (stderr) {
        logger.warn(`WakaTime CLI stderr: ${stderr}`);
      }
      return true;
    } catch (error) {
      logger.debug('Sending heartbeat with WakaTime CLI failed', {
        err: error instanceof Error ? error.message : String(error),
        command,
        args: redactArgs(args),
      });
      return false;
    }
  }
}
