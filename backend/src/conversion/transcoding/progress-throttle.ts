// Rate limiter for progress reports. The latest reading goes out once per
// interval, which also serves as the heartbeat when FFmpeg is quiet.

export class ProgressThrottle {
  private latest = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly send: (percent: number) => void,
  ) {}

  get current(): number {
    return this.latest;
  }

  start(): void {
    if (this.timer) return;
    this.send(this.latest);
    this.timer = setInterval(() => this.send(this.latest), this.intervalMs);
    this.timer.unref();
  }

  /**
   * Record a reading. Readings lower than one already seen are dropped.
   */
  update(percent: number): void {
    const clamped = Math.max(0, Math.min(100, percent));
    if (clamped > this.latest) {
      this.latest = clamped;
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
