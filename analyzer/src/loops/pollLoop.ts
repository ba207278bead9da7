import { Logger } from '../utils/logger';
import { describeError } from '../utils/errors';

/**
 * Re-runs a stateless task on a fixed interval. Each cycle starts only after the
 * previous one finished; a failed cycle is logged and the next one still runs.
 */
export class PollLoop {
  private isRunning = false;
  private timeoutId: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private cycles = 0;

  constructor(
    private readonly task: () => Promise<unknown>,
    private readonly intervalMs: number
  ) {}

  public start() {
    if (this.isRunning) return;
    this.isRunning = true;
    Logger.info(`[POLL] Starting poll loop (every ${this.intervalMs}ms)...`);
    this.schedule(0);
  }

  /**
   * Stops scheduling and resolves once a cycle that is already running has finished.
   */
  public async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timeoutId) clearTimeout(this.timeoutId);
    this.timeoutId = null;
    if (this.inFlight) await this.inFlight;
    Logger.info(`[POLL] Stopped after ${this.cycles} cycle(s).`);
  }

  public getCycleCount(): number {
    return this.cycles;
  }

  private schedule(delayMs: number) {
    this.timeoutId = setTimeout(() => {
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
      });
    }, delayMs);
  }

  private async tick() {
    if (!this.isRunning) return;
    this.cycles++;
    try {
      await this.task();
    } catch (err) {
      Logger.error(`[POLL] Cycle ${this.cycles} failed: ${describeError(err)}`);
    }
    if (this.isRunning) this.schedule(this.intervalMs);
  }
}
