/** One qualifying editor notification, reduced to what the heartbeat gate needs. */
export interface ActivityEvent {
  readonly filePath: string;
  readonly isSave: boolean;
  readonly languageHint?: string;
  readonly line?: number;
  readonly column?: number;
  readonly fileSwitched: boolean;
}

export interface CacheEntry {
  line: number;
  column: number;
}

// Positions are zero-based, as the editor reports them.
export interface Heartbeat {
  file: string;
  timestamp: number;
  language?: string;
  is_write: boolean;
  line_number: number;
  cursor_position: number;
}

export type SuppressReason = 'missing position' | 'interval not elapsed';

export type HeartbeatDecision =
  | { kind: 'send'; heartbeat: Heartbeat; updateTimestamp: boolean }
  | { kind: 'suppress'; reason: SuppressReason };

export interface TextPosition {
  line: number;
  character: number;
}

export interface TextRange {
  start: TextPosition;
  end: TextPosition;
}
