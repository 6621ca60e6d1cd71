export class ParseError extends Error {
  readonly line: number | null;

  constructor(message: string, line: number | null = null) {
    super(line === null ? message : `${message} (line ${line})`);
    this.name = 'ParseError';
    this.line = line;
  }
}

export class SourceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceUnavailableError';
  }
}

export class StaleDataError extends Error {
  readonly ageSeconds: number;

  constructor(ageSeconds: number, thresholdSeconds: number) {
    super(`snapshot data is stale (${Math.round(ageSeconds)}s old, threshold ${thresholdSeconds}s)`);
    this.name = 'StaleDataError';
    this.ageSeconds = ageSeconds;
  }
}

export type CommittedCounts = {
  created: number;
  updated: number;
  closed: number;
};

export class PersistenceError extends Error {
  readonly committed: CommittedCounts;

  constructor(message: string, committed: CommittedCounts, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
    this.committed = committed;
  }
}

export class RecoveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecoveryError';
  }
}

export class PollInProgressError extends Error {
  constructor() {
    super('a poll is already in progress');
    this.name = 'PollInProgressError';
  }
}

export function errorMessage(err: unknown) {
  if (err instanceof Error) {
    return err.message || err.name;
  }
  return String(err);
}
