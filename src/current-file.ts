export class CurrentFileTracker {
  private activeFilePath = '';
  private lastSentAt: number;

  constructor(startedAt: number) {
    this.lastSentAt = startedAt;
  }

  get activeFile(): string {
    return this.activeFilePath;
  }

  /** Records `path` as the active file. Returns true when that is a switch. */
  noteActive(path: string): boolean {
    if (path === this.activeFilePath) return false;
    this.activeFilePath = path;
    return true;
  }

  lastSent(): number {
    return this.lastSentAt;
  }

  // Only interval-gated heartbeats move this clock; it never goes backwards.
  markSent(instant: number): void {
    if (instant > this.lastSentAt) {
      this.lastSentAt = instant;
    }
  }
}
