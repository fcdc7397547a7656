import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  DidChangeTextDocumentParams,
  DidSaveTextDocumentParams,
  ExecuteCommandParams,
  InitializeParams,
  InitializeResult,
  TextDocumentSyncKind,
} from 'vscode-languageserver/node';
import { ActivityTracker } from '../activity-tracker';
import { Dependencies } from '../dependencies';
import { Logger } from '../logger';
import {
  buildInitializeResult,
  firstChangeRange,
  formatPlatform,
  LanguageConnection,
  registerHandlers,
  STATUS_COMMAND,
} from '../server';
import { VERSION } from '../version';
import { FakeAdapter, silentLogger } from './helpers';

class FakeConnection implements LanguageConnection {
  initialize?: (params: InitializeParams) => InitializeResult;
  initialized?: () => void;
  didChange?: (params: DidChangeTextDocumentParams) => void;
  didSave?: (params: DidSaveTextDocumentParams) => void;
  executeCommand?: (params: ExecuteCommandParams) => Promise<string | undefined>;
  shutdown?: () => Promise<void>;

  onInitialize(handler: (params: InitializeParams) => InitializeResult) {
    this.initialize = handler;
  }
  onInitialized(handler: () => void) {
    this.initialized = handler;
  }
  onDidChangeTextDocument(handler: (params: DidChangeTextDocumentParams) => void) {
    this.didChange = handler;
  }
  onDidSaveTextDocument(handler: (params: DidSaveTextDocumentParams) => void) {
    this.didSave = handler;
  }
  onExecuteCommand(handler: (params: ExecuteCommandParams) => Promise<string | undefined>) {
    this.executeCommand = handler;
  }
  onShutdown(handler: () => Promise<void>) {
    this.shutdown = handler;
  }
}

describe('formatPlatform', () => {
  it('combines the editor and server identifiers', () => {
    expect(formatPlatform({ name: 'Zed', version: '0.150.0' })).toBe(`Zed/0.150.0 wakatime-ls/${VERSION}`);
    expect(formatPlatform({ name: 'Helix' })).toBe(`Helix wakatime-ls/${VERSION}`);
  });

  it('is empty when the client did not identify itself', () => {
    expect(formatPlatform(undefined)).toBe('');
  });
});

describe('firstChangeRange', () => {
  const textDocument = { uri: 'file:///src/a.txt', version: 2 };

  it('uses the range of the first change only', () => {
    const range = firstChangeRange({
      textDocument,
      contentChanges: [
        { range: { start: { line: 3, character: 1 }, end: { line: 3, character: 2 } }, text: 'x' },
        { range: { start: { line: 9, character: 0 }, end: { line: 9, character: 0 } }, text: 'y' },
      ],
    });
    expect(range?.start).toEqual({ line: 3, character: 1 });
  });

  it('returns undefined for full-document changes and empty change lists', () => {
    expect(firstChangeRange({ textDocument, contentChanges: [{ text: 'whole file' }] })).toBeUndefined();
    expect(firstChangeRange({ textDocument, contentChanges: [] })).toBeUndefined();
  });
});

describe('buildInitializeResult', () => {
  it('asks for incremental changes and save notifications', () => {
    const result = buildInitializeResult();
    expect(result.capabilities.textDocumentSync).toEqual({
      openClose: true,
      change: TextDocumentSyncKind.Incremental,
      save: { includeText: false },
    });
    expect(result.capabilities.executeCommandProvider).toEqual({ commands: [STATUS_COMMAND] });
  });
});

describe('registerHandlers', () => {
  const uri = 'file:///src/a.txt';
  let connection: FakeConnection;
  let tracker: ActivityTracker;
  let logger: Logger;

  beforeEach(() => {
    connection = new FakeConnection();
    logger = silentLogger();
    const adapter = new FakeAdapter();
    tracker = new ActivityTracker({
      adapter,
      logger,
      dependencies: new Dependencies(logger, adapter, '/usr/bin/wakatime-cli'),
      clock: () => 1_700_000_000,
    });
    registerHandlers(connection, tracker, logger);
  });

  it('configures the tracker from the initialize request', async () => {
    const configure = vi.spyOn(tracker, 'configure');
    const result = connection.initialize?.({
      processId: null,
      rootUri: null,
      capabilities: {},
      clientInfo: { name: 'Zed', version: '0.150.0' },
      initializationOptions: { 'api-key': 'test-key', 'heartbeat-interval': 30 },
    });

    expect(result).toEqual(buildInitializeResult());
    expect(configure).toHaveBeenCalledWith(
      { apiKey: 'test-key', heartbeatInterval: 30 },
      `Zed/0.150.0 wakatime-ls/${VERSION}`,
    );
  });

  it('forwards the first change range to the tracker', () => {
    const handleChange = vi.spyOn(tracker, 'handleChange');
    const range = { start: { line: 2, character: 5 }, end: { line: 2, character: 6 } };
    connection.didChange?.({ textDocument: { uri, version: 1 }, contentChanges: [{ range, text: 'x' }] });

    expect(handleChange).toHaveBeenCalledWith(uri, range);
  });

  it('logs a failing change instead of throwing', () => {
    vi.spyOn(tracker, 'handleChange').mockImplementation(() => {
      throw new Error('boom');
    });
    const error = vi.spyOn(logger, 'error');

    expect(() => connection.didChange?.({ textDocument: { uri, version: 1 }, contentChanges: [] })).not.toThrow();
    expect(error).toHaveBeenCalledWith('Failed to track change: Error: boom');
  });

  it('logs a failing save instead of throwing', () => {
    vi.spyOn(tracker, 'handleSave').mockImplementation(() => {
      throw new Error('boom');
    });
    const error = vi.spyOn(logger, 'error');

    expect(() => connection.didSave?.({ textDocument: { uri } })).not.toThrow();
    expect(error).toHaveBeenCalledWith('Failed to track save: Error: boom');
  });

  it('answers the status command and ignores unknown ones', async () => {
    const status = await connection.executeCommand?.({ command: STATUS_COMMAND });
    expect(status).toBe(await tracker.getStatus());
    expect(await connection.executeCommand?.({ command: 'wakatime.unknown' })).toBeUndefined();
  });

  it('flushes pending heartbeats on shutdown', async () => {
    const flush = vi.spyOn(tracker, 'flush');
    await connection.shutdown?.();
    expect(flush).toHaveBeenCalledTimes(1);
  });
});
