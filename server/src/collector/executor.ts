import {
  ParseError,
  PersistenceError,
  SourceUnavailableError,
  StaleDataError,
  errorMessage
} from '../errors';
import type { Clock, IncidentStore, Logger, PollMetadata, PollStatus } from '../types';
import { entityLabel, filterSnapshot, parseSnapshot, type EntityFilter } from './parser';
import type { SnapshotRead, SnapshotSource } from './source';
import { IncidentTracker } from './tracker';

export type PollErrorKind =
  | 'parse'
  | 'source-unavailable'
  | 'stale-data'
  | 'no-entities'
  | 'cancelled'
  | 'persistence'
  | 'unexpected';

export type PollError = {
  kind: PollErrorKind;
  message: string;
};

export type PollOutcome = {
  status: PollStatus;
  startedAt: Date;
  finishedAt: Date;
  hostsSeen: number;
  servicesSeen: number;
  created: number;
  updated: number;
  closed: number;
  commentsProcessed: number;
  incidentsPurged: number;
  orphaned: number;
  errors: PollError[];
};

export interface PollRunner {
  readonly lastMetadata: PollMetadata;
  executeOnce(signal?: AbortSignal): Promise<PollOutcome>;
}

export type PollExecutorOptions = {
  source: SnapshotSource;
  store: IncidentStore;
  logger: Logger;
  clock?: Clock;
  filter?: EntityFilter;
  sourceTimeoutMs: number;
  stalenessThresholdSec: number;
  expectEntities?: boolean;
  pullComments?: boolean;
  retentionDays?: number;
};

const HARD_KINDS: PollErrorKind[] = ['persistence', 'unexpected'];
const DAY_MS = 24 * 60 * 60 * 1000;
const NOTHING_COMMITTED = { created: 0, updated: 0, closed: 0 };

class PollCancelledError extends Error {
  constructor() {
    super('poll cancelled');
    this.name = 'PollCancelledError';
  }
}

function copyDate(date: Date | null) {
  return date ? new Date(date.getTime()) : null;
}

function emptyMetadata(): PollMetadata {
  return {
    lastAttemptAt: null,
    lastSuccessAt: null,
    lastOutcome: null,
    recordsProcessed: 0,
    sourceModifiedAt: null
  };
}

function readWithTimeout(source: SnapshotSource, timeoutMs: number, signal?: AbortSignal) {
  const controller = new AbortController();
  return new Promise<SnapshotRead>((resolve, reject) => {
    let done = false;

    const finish = (err: Error | null, value?: SnapshotRead) => {
      if (done) {
        return;
      }
      done = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      if (err) {
        controller.abort(err);
        reject(err);
      } else if (value) {
        resolve(value);
      }
    };

    const onAbort = () => finish(new SourceUnavailableError(`read of ${source.description} aborted`));
    const timer = setTimeout(
      () => finish(new SourceUnavailableError(`read of ${source.description} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    source.read(controller.signal).then(
      (value) => finish(null, value),
      (err: unknown) => finish(err instanceof Error ? err : new SourceUnavailableError(errorMessage(err)))
    );
  });
}

function classify(err: unknown): PollError {
  if (err instanceof ParseError) {
    return { kind: 'parse', message: err.message };
  }
  if (err instanceof SourceUnavailableError) {
    return { kind: 'source-unavailable', message: err.message };
  }
  if (err instanceof PollCancelledError) {
    return { kind: 'cancelled', message: err.message };
  }
  if (err instanceof PersistenceError) {
    return { kind: 'persistence', message: err.message };
  }
  return { kind: 'unexpected', message: `error during poll: ${errorMessage(err)}` };
}

/**
 * Runs one ingestion cycle: read, parse, reconcile, persist, record metadata.
 * Never throws; every failure ends up in `PollOutcome.errors`.
 */
export class PollExecutor implements PollRunner {
  private source: SnapshotSource;
  private store: IncidentStore;
  private tracker: IncidentTracker;
  private logger: Logger;
  private clock: Clock;
  private filter: EntityFilter;
  private sourceTimeoutMs: number;
  private stalenessThresholdSec: number;
  private expectEntities: boolean;
  private pullComments: boolean;
  private retentionDays: number;
  private metadata: PollMetadata = emptyMetadata();

  constructor(options: PollExecutorOptions) {
    this.source = options.source;
    this.store = options.store;
    this.tracker = new IncidentTracker(options.store);
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.filter = options.filter ?? {};
    this.sourceTimeoutMs = options.sourceTimeoutMs;
    this.stalenessThresholdSec = options.stalenessThresholdSec;
    this.expectEntities = options.expectEntities ?? true;
    this.pullComments = options.pullComments ?? true;
    this.retentionDays = options.retentionDays ?? 0;
  }

  get lastMetadata(): PollMetadata {
    return {
      ...this.metadata,
      lastAttemptAt: copyDate(this.metadata.lastAttemptAt),
      lastSuccessAt: copyDate(this.metadata.lastSuccessAt),
      sourceModifiedAt: copyDate(this.metadata.sourceModifiedAt)
    };
  }

  async restoreMetadata() {
    const stored = await this.store.getLatestPollMetadata();
    if (stored) {
      this.metadata = stored;
    }
  }

  async executeOnce(signal?: AbortSignal): Promise<PollOutcome> {
    const outcome: PollOutcome = {
      status: 'success',
      startedAt: this.clock(),
      finishedAt: this.clock(),
      hostsSeen: 0,
      servicesSeen: 0,
      created: 0,
      updated: 0,
      closed: 0,
      commentsProcessed: 0,
      incidentsPurged: 0,
      orphaned: 0,
      errors: []
    };
    let sourceModifiedAt: Date | null = null;

    try {
      const read = await readWithTimeout(this.source, this.sourceTimeoutMs, signal);
      sourceModifiedAt = read.modifiedAt;

      const snapshot = filterSnapshot(parseSnapshot(read.content), this.filter);
      outcome.hostsSeen = snapshot.hosts.length;
      outcome.servicesSeen = snapshot.services.length;

      const dataTime = snapshot.createdAt ?? read.modifiedAt;
      if (dataTime) {
        const age = (this.clock().getTime() - dataTime.getTime()) / 1000;
        if (age > this.stalenessThresholdSec) {
          const stale = new StaleDataError(age, this.stalenessThresholdSec);
          outcome.errors.push({ kind: 'stale-data', message: stale.message });
        }
      }
      if (this.expectEntities && !snapshot.hosts.length && !snapshot.services.length) {
        outcome.errors.push({
          kind: 'no-entities',
          message: `no hosts or services found in ${this.source.description}`
        });
      }

      if (signal?.aborted) {
        throw new PollCancelledError();
      }

      const open = await this.loadOpenIncidents();
      const plan = this.tracker.reconcile(snapshot, open, this.clock());
      outcome.orphaned = plan.orphaned.length;
      if (plan.orphaned.length) {
        this.logger.warn(
          `${plan.orphaned.length} open incident(s) have no entity in the snapshot: ` +
            plan.orphaned.map((incident) => entityLabel(incident)).join(', ')
        );
      }

      try {
        const committed = await this.tracker.apply(plan);
        outcome.created = committed.created;
        outcome.updated = committed.updated;
        outcome.closed = committed.closed;
      } catch (err: unknown) {
        if (err instanceof PersistenceError) {
          outcome.created = err.committed.created;
          outcome.updated = err.committed.updated;
          outcome.closed = err.committed.closed;
        }
        throw err;
      }

      if (this.pullComments) {
        outcome.commentsProcessed = await this.tracker.attachComments(
          snapshot.comments,
          plan.closed.map((close) => close.incident)
        );
      }

      if (this.retentionDays > 0) {
        const cutoff = new Date(this.clock().getTime() - this.retentionDays * DAY_MS);
        outcome.incidentsPurged = await this.purge(cutoff);
        if (outcome.incidentsPurged > 0) {
          this.logger.info(`purged ${outcome.incidentsPurged} incident(s) closed before ${cutoff.toISOString()}`);
        }
      }
    } catch (err: unknown) {
      const error = classify(err);
      if (HARD_KINDS.includes(error.kind)) {
        this.logger.error(`poll failed: ${error.message}`);
        outcome.errors = [error];
      } else {
        outcome.errors.push(error);
      }
    }

    outcome.finishedAt = this.clock();
    outcome.status = this.statusOf(outcome);
    await this.saveMetadata(outcome, sourceModifiedAt);

    for (const error of outcome.errors) {
      if (!HARD_KINDS.includes(error.kind)) {
        this.logger.warn(`poll ${error.kind}: ${error.message}`);
      }
    }
    this.logger.info(
      `poll complete: ${outcome.hostsSeen} hosts, ${outcome.servicesSeen} services, ` +
        `${outcome.created} created, ${outcome.updated} updated, ${outcome.closed} closed`
    );
    return outcome;
  }

  private async loadOpenIncidents() {
    try {
      return await this.store.listOpenIncidents();
    } catch (err: unknown) {
      throw new PersistenceError(`failed to load open incidents: ${errorMessage(err)}`, NOTHING_COMMITTED, {
        cause: err
      });
    }
  }

  private async purge(cutoff: Date) {
    try {
      return await this.store.purgeClosedIncidents(cutoff);
    } catch (err: unknown) {
      throw new PersistenceError(`failed to purge old incidents: ${errorMessage(err)}`, NOTHING_COMMITTED, {
        cause: err
      });
    }
  }

  private statusOf(outcome: PollOutcome): PollStatus {
    if (outcome.errors.some((error) => HARD_KINDS.includes(error.kind))) {
      return 'hard-error';
    }
    return outcome.errors.length ? 'soft-error' : 'success';
  }

  private async saveMetadata(outcome: PollOutcome, sourceModifiedAt: Date | null) {
    const ingested = !outcome.errors.some(
      (error) => error.kind === 'parse' || error.kind === 'source-unavailable' || error.kind === 'cancelled'
    );
    const succeeded = ingested && outcome.status !== 'hard-error';

    const previousSuccessAt = this.metadata.lastSuccessAt;
    const next: PollMetadata = {
      lastAttemptAt: outcome.startedAt,
      lastSuccessAt: succeeded ? outcome.finishedAt : this.metadata.lastSuccessAt,
      lastOutcome: outcome.status,
      recordsProcessed: outcome.hostsSeen + outcome.servicesSeen,
      sourceModifiedAt: sourceModifiedAt ?? this.metadata.sourceModifiedAt
    };
    this.metadata = next;

    try {
      await this.store.recordPollMetadata(next);
    } catch (err: unknown) {
      const error: PollError = {
        kind: 'persistence',
        message: `failed to record poll metadata: ${errorMessage(err)}`
      };
      this.logger.error(`poll failed: ${error.message}`);
      outcome.errors = [error];
      outcome.status = 'hard-error';
      this.metadata = { ...next, lastSuccessAt: previousSuccessAt, lastOutcome: 'hard-error' };
    }
  }
}
