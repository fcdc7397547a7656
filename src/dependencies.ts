import { FileSystemAdapter } from './adapter';
import { Logger } from './logger';

export const CLI_BINARY = process.platform === 'win32' ? 'wakatime-cli.exe' : 'wakatime-cli';

export class Dependencies {
  private logger: Logger;
  private adapter: FileSystemAdapter;
  private resourcesLocation: string;
  private explicitCliPath?: string;
  private cliLocation?: string = undefined;

  constructor(logger: Logger, adapter: FileSystemAdapter, explicitCliPath?: string) {
    this.logger = logger;
    this.adapter = adapter;
    this.resourcesLocation = adapter.join(adapter.homedir(), '.wakatime');
    this.explicitCliPath = explicitCliPath;
  }

  /** Path of a wakatime-cli binary that exists on disk, or '' when none was found. */
  public async getCliLocation(): Promise<string> {
    if (this.cliLocation !== undefined) return this.cliLocation;

    const candidates = [
      this.explicitCliPath,
      this.adapter.join(this.resourcesLocation, CLI_BINARY),
      `/opt/homebrew/bin/${CLI_BINARY}`,
      `/usr/local/bin/${CLI_BINARY}`,
    ];

    for (const candidate of candidates) {
      if (candidate && (await this.adapter.exists(candidate))) {
        this.cliLocation = candidate;
        this.logger.debug(`Found CLI at: ${candidate}`);
        return candidate;
      }
    }

    this.cliLocation = '';
    return this.cliLocation;
  }

  /**
   * What to spawn. An explicit path is used even when it does not exist on
   * disk, since it may be a bare name resolved through PATH.
   */
  public async getCliCommand(): Promise<string> {
    const location = await this.getCliLocation();
    return location || this.explicitCliPath || CLI_BINARY;
  }

  public async isCliInstalled(): Promise<boolean> {
    return !!(await this.getCliLocation());
  }

  public async checkCli(): Promise<void> {
    this.logger.debug('Checking WakaTime CLI...');
    if (await this.isCliInstalled()) {
      this.logger.debug('CLI found.');
    } else {
      this.logger.warn(`WakaTime CLI not found, relying on "${await this.getCliCommand()}" from PATH.`);
    }
  }
}
