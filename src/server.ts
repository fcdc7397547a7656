import {
  DidChangeTextDocumentParams,
  DidSaveTextDocumentParams,
  ExecuteCommandParams,
  InitializeParams,
  InitializeResult,
  TextDocumentSyncKind,
} from 'vscode-languageserver/node';
import { ActivityTracker } from './activity-tracker';
import { Logger } from './logger';
import { parseInitializationOptions } from './options';
import { TextRange } from './types';
import { NAME, VERSION } from './version';

export const STATUS_COMMAND = 'wakatime.status';

/** The part of a `vscode-languageserver` connection this server registers on. */
export interface LanguageConnection {
  onInitialize(handler: (params: InitializeParams) => InitializeResult): unknown;
  onInitialized(handler: () => void): unknown;
  onDidChangeTextDocument(handler: (params: DidChangeTextDocumentParams) => void): unknown;
  onDidSaveTextDocument(handler: (params: DidSaveTextDocumentParams) => void): unknown;
  onExecuteCommand(handler: (params: ExecuteCommandParams) => Promise<string | undefined>): unknown;
  onShutdown(handler: () => Promise<void>): unknown;
}

/** `--plugin` value, e.g. `Zed/0.150.0 wakatime-ls/0.1.0`. Empty when the client did not say who it is. */
export function formatPlatform(clientInfo: InitializeParams['clientInfo']): string {
  if (!clientInfo) return '';
  const editor = clientInfo.version ? `${clientInfo.name}/${clientInfo.version}` : clientInfo.name;
  return `${editor} ${NAME}/${VERSION}`;
}

export function firstChangeRange(params: DidChangeTextDocumentParams): TextRange | undefined {
  const change = params.contentChanges[0];
  return change && 'range' in change ? change.range : undefined;
}

export function buildInitializeResult(): InitializeResult {
  return {
    serverInfo: { name: NAME, version: VERSION },
    capabilities: {
      textDocumentSync: {
        openClose: true,
        change: TextDocumentSyncKind.Incremental,
        save: { includeText: false },
      },
      executeCommandProvider: { commands: [STATUS_COMMAND] },
    },
  };
}

export function registerHandlers(connection: LanguageConnection, tracker: ActivityTracker, logger: Logger): void {
  connection.onInitialize((params: InitializeParams) => {
    tracker.configure(parseInitializationOptions(params.initializationOptions, logger), formatPlatform(params.clientInfo));
    return buildInitializeResult();
  });

  connection.onInitialized(() => {
    logger.info('Wakatime language server initialized');
    logger.info('Only tracking events with line and cursor position.');
  });

  connection.onDidChangeTextDocument((params) => {
    try {
      tracker.handleChange(params.textDocument.uri, firstChangeRange(params));
    } catch (error) {
      logger.error(`Failed to track change: ${error}`);
    }
  });

  connection.onDidSaveTextDocument((params) => {
    try {
      tracker.handleSave(params.textDocument.uri);
    } catch (error) {
      logger.error(`Failed to track save: ${error}`);
    }
  });

  connection.onExecuteCommand(async (params) => {
    if (params.command === STATUS_COMMAND) {
      return tracker.getStatus();
    }
    return undefined;
  });

  connection.onShutdown(() => tracker.flush());
}
