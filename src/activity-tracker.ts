import { FileSystemAdapter } from './adapter';
import { CurrentFileTracker } from './current-file';
import { Dependencies } from './dependencies';
import { Dispatcher } from './dispatcher';
import { FileActivityCache } from './file-cache';
import { decideHeartbeat, heartbeatIntervalSeconds } from './heartbeat';
import { logger as defaultLogger, Logger, LogLevel } from './logger';
import { normalizePath } from './path';
import { Settings, SettingsStore } from './options';
import { ActivityEvent, Heartbeat, HeartbeatDecision, TextRange } from './types';

export interface ActivityTrackerOptions {
  adapter: FileSystemAdapter;
  dependencies: Dependencies;
  settings?: SettingsStore;
  logger?: Logger;
  /** Epoch seconds. */
  clock?: () => number;
}

const epochSeconds = () => Date.now() / 1000;

export class ActivityTracker {
  private readonly cache = new FileActivityCache();
  private readonly currentFile: CurrentFileTracker;
  private readonly settings: SettingsStore;
  private readonly dependencies: Dependencies;
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly pending: Set<Promise<void>> = new Set();
  private intervalDispatch?: { startedAt: number };
  private platform = '';

  constructor(options: ActivityTrackerOptions) {
    this.settings = options.settings ?? new SettingsStore();
    this.dependencies = options.dependencies;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? epochSeconds;
    this.currentFile = new CurrentFileTracker(this.clock());
    this.dispatcher = new Dispatcher({
      adapter: options.adapter,
      settings: this.settings,
      logger: this.logger,
      cliCommand: () => this.dependencies.getCliCommand(),
      platform: () => this.platform,
    });
  }

  public async initialize(): Promise<void> {
    await this.dependencies.checkCli();
  }

  /** Publishes a new settings snapshot and, optionally, the `--plugin` identifier. */
  public configure(settings: Settings, platform?: string): void {
    this.settings.replace(settings);
    if (platform !== undefined) {
      this.platform = platform;
    }
    this.logger.setLevel(settings.debug === true ? LogLevel.DEBUG : LogLevel.INFO);
  }

  /** Text changed in `uri`; `range` is the first content change's range, if any. */
  public handleChange(uri: string, range?: TextRange): HeartbeatDecision {
    const filePath = normalizePath(uri);
    const line = range?.start.line;
    const column = range?.start.character;

    this.cache.record(filePath, line ?? 0, column ?? 0);
    const fileSwitched = this.currentFile.noteActive(filePath);

    return this.process({ filePath, isSave: false, line, column, fileSwitched });
  }

  public handleSave(uri: string): HeartbeatDecision {
    const filePath = normalizePath(uri);
    this.logger.info(`File saved: ${filePath}`);

    const entry = this.cache.lookup(filePath);
    if (!entry) {
      this.logger.info(`No cursor position for saved file ${filePath}, probably not in the cache, ignoring it`);
      return { kind: 'suppress', reason: 'missing position' };
    }

    this.currentFile.noteActive(filePath);
    return this.process({ filePath, isSave: true, line: entry.line, column: entry.column, fileSwitched: false });
  }

  /** Waits for every heartbeat dispatch started so far. */
  public async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  public async getStatus(): Promise<string> {
    const cliLocation = await this.dependencies.getCliLocation();
    const settings = this.settings.load();

    return `WakaTime Status:
- API Key: ${settings.apiKey ? 'Configured' : 'Not configured'}
- CLI Location: ${cliLocation || 'Not found'}
- Tracked files: ${this.cache.size}
- Active file: ${this.currentFile.activeFile || 'None'}
- Last heartbeat: ${new Date(this.currentFile.lastSent() * 1000).toISOString()}`;
  }

  private process(event: ActivityEvent): HeartbeatDecision {
    const settings = this.settings.load();
    const now = this.clock();
    let decision = decideHeartbeat(event, settings, this.currentFile.lastSent(), now);

    // The clock only moves once the agent confirms, so hold back further
    // interval heartbeats while one is still running, for at most one interval.
    if (
      decision.kind === 'send' &&
      decision.updateTimestamp &&
      this.intervalDispatch !== undefined &&
      now - this.intervalDispatch.startedAt <= heartbeatIntervalSeconds(settings)
    ) {
      decision = { kind: 'suppress', reason: 'interval not elapsed' };
    }

    if (decision.kind === 'suppress') {
      if (decision.reason === 'missing position') {
        this.logger.info(`No cursor position or line number for ${event.filePath}, ignoring event`);
      } else {
        this.logger.debug(`Skipping heartbeat for ${event.filePath}, interval not reached`, {
          lastSentAt: this.currentFile.lastSent(),
        });
      }
      return decision;
    }

    this.logger.debug(`Sending heartbeat for ${event.filePath}`, {
      isWrite: event.isSave,
      fileSwitched: event.fileSwitched,
    });
    this.submit(decision.heartbeat, decision.updateTimestamp);
    return decision;
  }

  private submit(heartbeat: Heartbeat, updateTimestamp: boolean): void {
    const inFlight = updateTimestamp ? { startedAt: heartbeat.timestamp } : undefined;
    if (inFlight) {
      this.intervalDispatch = inFlight;
    }

    const task = this.dispatcher.dispatch(heartbeat).then((sent) => {
      if (!inFlight) return;
      if (this.intervalDispatch === inFlight) {
        this.intervalDispatch = undefined;
      }
      if (sent) {
        this.currentFile.markSent(heartbeat.timestamp);
      }
    });

    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }
}
