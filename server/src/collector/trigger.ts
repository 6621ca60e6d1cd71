export interface Trigger {
  readonly alive: boolean;
  start(): void;
  stop(): void;
}

export type TriggerOptions = {
  intervalMs: number;
  immediate: boolean;
};

export type TriggerFactory = (tick: () => void, options: TriggerOptions) => Trigger;

/**
 * Fires `tick` every `intervalMs`, optionally once right away.
 * A stopped trigger cannot be restarted; build a new one instead.
 */
export class IntervalTrigger implements Trigger {
  private timer: NodeJS.Timeout | null = null;
  private kickoff: NodeJS.Timeout | null = null;
  private stopped = false;
  private tick: () => void;
  private options: TriggerOptions;

  constructor(tick: () => void, options: TriggerOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`invalid trigger interval ${options.intervalMs}ms`);
    }
    this.tick = tick;
    this.options = options;
  }

  get alive() {
    return this.timer !== null && !this.stopped;
  }

  start() {
    if (this.stopped) {
      throw new Error('trigger already stopped');
    }
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    if (this.options.immediate) {
      this.kickoff = setTimeout(() => {
        this.kickoff = null;
        this.tick();
      }, 0);
    }
  }

  stop() {
    this.stopped = true;
    if (this.kickoff) {
      clearTimeout(this.kickoff);
      this.kickoff = null;
    }
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

export const intervalTriggerFactory: TriggerFactory = (tick, options) => new IntervalTrigger(tick, options);
