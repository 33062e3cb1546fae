export const SERVER_VERSION = '1.0.0';

/** Process-level counters reported by /status. */
export class ServerStats {
  messagesReceived = 0;
  connectionCount = 0;
  lastRequestAt: Date | null = null;
  readonly startedAt: Date;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startedAt = now();
  }

  /** Stamped for every HTTP request, whatever the route. */
  recordRequest(): void {
    this.lastRequestAt = this.now();
  }

  recordReceived(): void {
    this.messagesReceived += 1;
  }

  uptimeSeconds(): number {
    return Math.floor((this.now().getTime() - this.startedAt.getTime()) / 1000);
  }
}
