/**
 * Recurring timer owned by the player. `stop()` is synchronous and safe to
 * call at any time; once it returns no further tick from the old interval
 * is delivered.
 */
export class PlaybackClock {
  private handle: ReturnType<typeof setInterval> | null = null;
  private generation = 0;
  private readonly onTick: () => void;

  constructor(onTick: () => void) {
    this.onTick = onTick;
  }

  get isRunning(): boolean {
    return this.handle !== null;
  }

  start(intervalSeconds: number): void {
    this.stop();
    const generation = ++this.generation;
    this.handle = setInterval(() => {
      if (generation === this.generation) this.onTick();
    }, intervalSeconds * 1000);
  }

  stop(): void {
    if (this.handle === null) return;
    clearInterval(this.handle);
    this.handle = null;
    this.generation++;
  }
}
