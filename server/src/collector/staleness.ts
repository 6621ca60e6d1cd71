export type StalenessStatus = 'never-polled' | 'stale' | 'fresh';

export type StalenessInfo = {
  isStale: boolean;
  status: StalenessStatus;
  ageSeconds: number | null;
  lastSuccessfulPollTime: Date | null;
};

export function isStale(now: Date, lastSuccessfulPollTime: Date | null, thresholdSeconds: number) {
  if (!lastSuccessfulPollTime) {
    return true;
  }
  return (now.getTime() - lastSuccessfulPollTime.getTime()) / 1000 > thresholdSeconds;
}

export function describeStaleness(
  now: Date,
  lastSuccessfulPollTime: Date | null,
  thresholdSeconds: number
): StalenessInfo {
  if (!lastSuccessfulPollTime) {
    return { isStale: true, status: 'never-polled', ageSeconds: null, lastSuccessfulPollTime: null };
  }
  const stale = isStale(now, lastSuccessfulPollTime, thresholdSeconds);
  return {
    isStale: stale,
    status: stale ? 'stale' : 'fresh',
    ageSeconds: (now.getTime() - lastSuccessfulPollTime.getTime()) / 1000,
    lastSuccessfulPollTime
  };
}
