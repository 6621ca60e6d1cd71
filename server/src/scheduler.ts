import { PollInProgressError, RecoveryError, errorMessage } from './errors';
import type { PollOutcome, PollRunner } from './collector/executor';
import { describeStaleness, type StalenessInfo } from './collector/staleness';
import { intervalTriggerFactory, type Trigger, type TriggerFactory } from './collector/trigger';
import type { Clock, Logger } from './types';

export type SupervisorState = 'stopped' | 'running' | 'recovering';
export type HealthLevel = 'healthy' | 'degraded' | 'critical';

export type HealthStatus = {
  state: SupervisorState;
  isRunning: boolean;
  triggerAlive: boolean;
  consecutiveFailures: number;
  maxConsecutiveFailures: number;
  recoveryAttempts: number;
  skippedTicks: number;
  lastRecoveryError: string | null;
  healthStatus: HealthLevel;
};

export type SupervisorOptions = {
  executor: PollRunner;
  logger: Logger;
  pollIntervalSec: number;
  stalenessThresholdSec: number;
  maxConsecutiveFailures?: number;
  triggerFactory?: TriggerFactory;
  clock?: Clock;
};

export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;

/**
 * Drives the poll loop and rebuilds its trigger when polls keep failing.
 *
 * Only one poll runs at a time: ticks that land while a poll is in flight
 * are dropped, and a manual poll is rejected instead of queued. Recovery
 * happens inside the failing tick, before the slot is released, so the
 * old and new trigger never both deliver work.
 */
export class SelfHealingSupervisor {
  private executor: PollRunner;
  private logger: Logger;
  private triggerFactory: TriggerFactory;
  private clock: Clock;
  private intervalMs: number;
  private stalenessThresholdSec: number;
  private maxConsecutiveFailures: number;

  private state: SupervisorState = 'stopped';
  private trigger: Trigger | null = null;
  private inFlight: Promise<PollOutcome> | null = null;
  private abort: AbortController | null = null;
  private consecutiveFailures = 0;
  private recoveryAttempts = 0;
  private skippedTicks = 0;
  private lastRecoveryError: RecoveryError | null = null;

  constructor(options: SupervisorOptions) {
    this.executor = options.executor;
    this.logger = options.logger;
    this.triggerFactory = options.triggerFactory ?? intervalTriggerFactory;
    this.clock = options.clock ?? (() => new Date());
    this.intervalMs = options.pollIntervalSec * 1000;
    this.stalenessThresholdSec = options.stalenessThresholdSec;
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
    if (!Number.isInteger(this.maxConsecutiveFailures) || this.maxConsecutiveFailures < 1) {
      throw new RangeError(`maxConsecutiveFailures must be a positive integer, got ${this.maxConsecutiveFailures}`);
    }
  }

  start() {
    if (this.state === 'running') {
      this.logger.warn('poller is already running');
      return;
    }
    this.installTrigger(true);
    this.state = 'running';
    this.lastRecoveryError = null;
    this.logger.info(`poller started with interval of ${this.intervalMs / 1000}s`);
  }

  async stop() {
    if (this.state === 'stopped') {
      this.logger.warn('poller is not running');
      return;
    }
    this.state = 'stopped';
    this.discardTrigger();
    this.abort?.abort();
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.info('poller stopped');
  }

  async triggerManualPoll(): Promise<PollOutcome> {
    if (this.inFlight) {
      throw new PollInProgressError();
    }
    return this.runPoll();
  }

  getHealthStatus(): HealthStatus {
    const isRunning = this.state === 'running';
    let healthStatus: HealthLevel = 'healthy';
    if (!isRunning || this.consecutiveFailures >= this.maxConsecutiveFailures) {
      healthStatus = 'critical';
    } else if (this.consecutiveFailures > 0) {
      healthStatus = 'degraded';
    }
    return {
      state: this.state,
      isRunning,
      triggerAlive: this.trigger?.alive ?? false,
      consecutiveFailures: this.consecutiveFailures,
      maxConsecutiveFailures: this.maxConsecutiveFailures,
      recoveryAttempts: this.recoveryAttempts,
      skippedTicks: this.skippedTicks,
      lastRecoveryError: this.lastRecoveryError?.message ?? null,
      healthStatus
    };
  }

  getPollMetadata() {
    return this.executor.lastMetadata;
  }

  getStalenessInfo(): StalenessInfo {
    return describeStaleness(this.clock(), this.executor.lastMetadata.lastSuccessAt, this.stalenessThresholdSec);
  }

  private installTrigger(immediate: boolean) {
    const trigger: Trigger = this.triggerFactory(() => this.onTick(trigger), {
      intervalMs: this.intervalMs,
      immediate
    });
    this.trigger = trigger;
    trigger.start();
  }

  private discardTrigger() {
    const trigger = this.trigger;
    this.trigger = null;
    trigger?.stop();
  }

  private onTick(source: Trigger) {
    if (this.state !== 'running' || source !== this.trigger) {
      return;
    }
    if (this.inFlight) {
      this.skippedTicks += 1;
      this.logger.warn('poll still in progress, skipping tick');
      return;
    }
    // runPoll never rejects; the catch only guards a logger that throws
    this.runPoll().catch((err: unknown) => {
      this.logger.error(`scheduled poll failed: ${errorMessage(err)}`);
    });
  }

  private runPoll(): Promise<PollOutcome> {
    const abort = new AbortController();
    this.abort = abort;
    const poll = this.executor
      .executeOnce(abort.signal)
      .then((outcome) => {
        this.recordOutcome(outcome, abort.signal);
        return outcome;
      })
      .finally(() => {
        this.inFlight = null;
        this.abort = null;
      });
    this.inFlight = poll;
    return poll;
  }

  private recordOutcome(outcome: PollOutcome, signal: AbortSignal) {
    if (this.state !== 'running' || signal.aborted) {
      return;
    }
    if (!outcome.errors.length) {
      this.consecutiveFailures = 0;
      return;
    }
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.maxConsecutiveFailures) {
      this.recover();
    }
  }

  private recover() {
    this.state = 'recovering';
    this.logger.warn(
      `${this.consecutiveFailures} consecutive failed polls, rebuilding trigger (attempt ${this.recoveryAttempts + 1})`
    );
    this.discardTrigger();
    this.consecutiveFailures = 0;
    this.recoveryAttempts += 1;
    try {
      this.installTrigger(false);
    } catch (err: unknown) {
      this.discardTrigger();
      this.lastRecoveryError = new RecoveryError(`failed to rebuild poll trigger: ${errorMessage(err)}`, {
        cause: err
      });
      this.logger.error(`poller recovery failed: ${this.lastRecoveryError.message}`);
      return;
    }
    this.state = 'running';
    this.logger.info(`poller recovered after ${this.recoveryAttempts} recovery attempt(s)`);
  }
}
