import { DEFAULT_HEARTBEAT_INTERVAL_SECONDS, Settings } from './options';
import { ActivityEvent, HeartbeatDecision } from './types';

export function heartbeatIntervalSeconds(settings: Settings): number {
  return settings.heartbeatInterval ?? DEFAULT_HEARTBEAT_INTERVAL_SECONDS;
}

/**
 * Decides whether an activity event becomes a heartbeat.
 *
 * Saves and file switches always go through and leave the interval clock
 * alone, so a burst of them neither starves nor resets the gate for ordinary
 * edits. Everything else is sent at most once per interval, and only those
 * heartbeats ask the caller to advance `lastSentAt`.
 *
 * @param lastSentAt - epoch seconds of the last interval-gated heartbeat
 * @param now - epoch seconds
 */
export function decideHeartbeat(
  event: ActivityEvent,
  settings: Settings,
  lastSentAt: number,
  now: number,
): HeartbeatDecision {
  if (event.line === undefined || event.column === undefined) {
    return { kind: 'suppress', reason: 'missing position' };
  }

  const elapsed = now - lastSentAt;
  const shouldSend = event.isSave || event.fileSwitched || elapsed > heartbeatIntervalSeconds(settings);
  if (!shouldSend) {
    return { kind: 'suppress', reason: 'interval not elapsed' };
  }

  return {
    kind: 'send',
    heartbeat: {
      file: event.filePath,
      timestamp: now,
      language: event.languageHint,
      is_write: event.isSave,
      line_number: event.line,
      cursor_position: event.column,
    },
    updateTimestamp: !event.isSave && !event.fileSwitched,
  };
}
