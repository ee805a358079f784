import { createLogger, type Logger } from "./logger";

export type IdleCheckResult = "continue" | "stop";

export interface IdleMonitorOptions {
  intervalMs: number;
  check: () => Promise<IdleCheckResult>;
  onError: (error: unknown) => Promise<IdleCheckResult>;
  logger?: Logger;
}

/**
 * Runs `check` once per interval until it asks to stop or `stop()` is called.
 * Stopping never interrupts a check already in flight; that check's result is
 * discarded instead.
 */
export class IdleMonitor {
  private readonly intervalMs: number;
  private readonly check: () => Promise<IdleCheckResult>;
  private readonly onError: (error: unknown) => Promise<IdleCheckResult>;
  private readonly logger: Logger;

  private timer: NodeJS.Timeout | null = null;
  private generation = 0;
  private running = false;

  constructor(options: IdleMonitorOptions) {
    this.intervalMs = options.intervalMs;
    this.check = options.check;
    this.onError = options.onError;
    this.logger = options.logger ?? createLogger("idle");
  }

  get active(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      this.logger.debug("Idle monitor already running");
      return;
    }
    this.running = true;
    this.generation += 1;
    this.logger.info("Idle monitor started", { intervalMs: this.intervalMs });
    this.schedule(this.generation);
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.generation += 1;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.info("Idle monitor stopped");
  }

  private schedule(generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick(generation);
    }, this.intervalMs);
    this.timer.unref();
  }

  private async tick(generation: number): Promise<void> {
    if (generation !== this.generation) {
      return;
    }

    let result: IdleCheckResult;
    try {
      result = await this.check();
    } catch (error) {
      result = await this.handleError(error);
    }

    if (generation !== this.generation) {
      return;
    }
    if (result === "stop") {
      this.running = false;
      this.generation += 1;
      this.logger.info("Idle monitor finished");
      return;
    }
    this.schedule(generation);
  }

  private async handleError(error: unknown): Promise<IdleCheckResult> {
    try {
      return await this.onError(error);
    } catch (handlerError) {
      this.logger.error("Idle monitor error handler failed", { error, handlerError });
      return "stop";
    }
  }
}
