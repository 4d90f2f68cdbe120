export const SEARCH_STATUS_MESSAGES = [
  'Searching Tesco...',
  "Searching Sainsbury's...",
  'Searching Morrisons...',
  'Searching Asda...',
  'Searching Waitrose...',
  'Searching Ocado...',
  'Analyzing nutrition data...',
  'Verifying ingredients...',
] as const;

export const STATUS_INTERVAL_MS = 1200;

export type StatusListener = (status: string) => void;

/**
 * Cycles through short status strings while a remote lookup is running.
 */
export class ProgressNarrator {
  private readonly listeners = new Set<StatusListener>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private index = 0;
  private status = '';

  constructor(
    private readonly messages: ReadonlyArray<string> = SEARCH_STATUS_MESSAGES,
    private readonly intervalMs: number = STATUS_INTERVAL_MS
  ) {}

  get currentStatus(): string {
    return this.status;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  subscribe(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private publish(status: string): void {
    this.status = status;
    for (const listener of this.listeners) {
      listener(status);
    }
  }

  private advance(): void {
    if (this.messages.length === 0) return;
    this.publish(this.messages[this.index % this.messages.length]);
    this.index += 1;
  }

  start(): void {
    this.stop();
    this.index = 0;
    this.advance();
    this.timer = setInterval(() => this.advance(), this.intervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
    this.publish('');
  }
}
