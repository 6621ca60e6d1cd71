import { describe, it, expect, beforeEach } from 'vitest';
import { PersistenceError } from '../errors';
import { parseSnapshot } from '../collector/parser';
import { IncidentTracker } from '../collector/tracker';
import type { Incident } from '../types';
import { MemoryIncidentStore } from './support/memory-store';
import { hostBlock, serviceBlock } from './support/helpers';

const T1 = new Date('2024-03-01T10:00:00.000Z');
const T2 = new Date('2024-03-01T10:05:00.000Z');
const T3 = new Date('2024-03-01T10:10:00.000Z');

async function poll(tracker: IncidentTracker, store: MemoryIncidentStore, raw: string, now: Date) {
  const plan = tracker.reconcile(parseSnapshot(raw), await store.listOpenIncidents(), now);
  const committed = await tracker.apply(plan);
  return { plan, committed };
}

function openIncidents(store: MemoryIncidentStore) {
  return store.incidents.filter((incident) => incident.endedAt === null);
}

describe('IncidentTracker', () => {
  let store: MemoryIncidentStore;
  let tracker: IncidentTracker;

  beforeEach(() => {
    store = new MemoryIncidentStore();
    tracker = new IncidentTracker(store);
  });

  it('does nothing for a healthy entity without an incident', async () => {
    const { plan, committed } = await poll(tracker, store, hostBlock('web1', 0, 'PING OK'), T1);
    expect(committed).toEqual({ created: 0, updated: 0, closed: 0 });
    expect(plan.unchanged).toEqual([]);
    expect(store.incidents).toEqual([]);
  });

  it('opens an incident when a host goes down', async () => {
    await poll(tracker, store, hostBlock('web1', 0, 'PING OK'), T1);
    const { committed } = await poll(tracker, store, hostBlock('web1', 1, 'CRITICAL - ping timeout', 1700000100), T1);

    expect(committed).toEqual({ created: 1, updated: 0, closed: 0 });
    expect(store.incidents).toEqual([
      {
        id: 1,
        incidentType: 'host',
        hostName: 'web1',
        serviceDescription: null,
        state: 'DOWN',
        startedAt: T1,
        endedAt: null,
        acknowledged: false,
        pluginOutput: 'CRITICAL - ping timeout',
        lastCheck: new Date(1700000100 * 1000)
      }
    ]);
  });

  it('closes the same incident when the host recovers', async () => {
    await poll(tracker, store, hostBlock('web1', 1, 'CRITICAL - ping timeout'), T1);
    const { committed } = await poll(tracker, store, hostBlock('web1', 0, 'PING OK', 1700000300), T2);

    expect(committed).toEqual({ created: 0, updated: 0, closed: 1 });
    expect(store.incidents).toHaveLength(1);
    expect(store.incidents[0]).toMatchObject({
      id: 1,
      state: 'UP',
      pluginOutput: 'PING OK',
      startedAt: T1,
      endedAt: T2,
      lastCheck: new Date(1700000300 * 1000)
    });
  });

  it('updates an open service incident when the problem state changes', async () => {
    await poll(tracker, store, serviceBlock('web1', 'HTTP', 2, 'Connection refused'), T1);
    const { committed } = await poll(
      tracker,
      store,
      serviceBlock('web1', 'HTTP', 1, 'HTTP WARNING: slow response', 1700000060),
      T2
    );

    expect(committed).toEqual({ created: 0, updated: 1, closed: 0 });
    expect(store.incidents).toHaveLength(1);
    expect(store.incidents[0]).toMatchObject({
      incidentType: 'service',
      serviceDescription: 'HTTP',
      state: 'WARNING',
      pluginOutput: 'HTTP WARNING: slow response',
      startedAt: T1,
      endedAt: null
    });
  });

  it('is idempotent for an unchanged snapshot', async () => {
    const raw = hostBlock('db1', 1, 'down') + serviceBlock('db1', 'MySQL', 2, 'refused');
    await poll(tracker, store, raw, T1);
    const { plan, committed } = await poll(tracker, store, raw, T2);

    expect(committed).toEqual({ created: 0, updated: 0, closed: 0 });
    expect(plan.unchanged.map((incident) => incident.serviceDescription)).toEqual([null, 'MySQL']);
    expect(store.calls.filter((call) => call === 'updateIncident')).toEqual([]);
  });

  it('opens a new incident after a closed one for the same entity', async () => {
    await poll(tracker, store, hostBlock('web1', 1, 'down'), T1);
    await poll(tracker, store, hostBlock('web1', 0, 'up'), T2);
    await poll(tracker, store, hostBlock('web1', 2, 'unreachable'), T3);

    expect(store.incidents.map((incident) => [incident.id, incident.state, incident.endedAt])).toEqual([
      [1, 'UP', T2],
      [2, 'UNREACHABLE', null]
    ]);
    expect(openIncidents(store)).toHaveLength(1);
  });

  it('treats a host and its services as independent entities', async () => {
    const raw = hostBlock('web1', 1, 'down') + serviceBlock('web1', 'HTTP', 2, 'refused');
    const { committed } = await poll(tracker, store, raw, T1);
    expect(committed.created).toBe(2);

    await poll(tracker, store, hostBlock('web1', 0, 'up') + serviceBlock('web1', 'HTTP', 2, 'refused'), T2);
    expect(openIncidents(store).map((incident) => incident.serviceDescription)).toEqual(['HTTP']);
  });

  it('leaves incidents of entities missing from the snapshot open', async () => {
    await poll(tracker, store, hostBlock('web1', 1, 'down') + hostBlock('db1', 1, 'down'), T1);
    const { plan, committed } = await poll(tracker, store, hostBlock('db1', 0, 'up'), T2);

    expect(committed).toEqual({ created: 0, updated: 0, closed: 1 });
    expect(plan.orphaned.map((incident) => incident.hostName)).toEqual(['web1']);
    expect(openIncidents(store).map((incident) => incident.hostName)).toEqual(['web1']);
  });

  it('reconciles only the newest of duplicate open incidents', () => {
    const base: Omit<Incident, 'id' | 'startedAt'> = {
      incidentType: 'host',
      hostName: 'web1',
      serviceDescription: null,
      state: 'DOWN',
      endedAt: null,
      acknowledged: false,
      pluginOutput: 'down',
      lastCheck: null
    };
    const older = { ...base, id: 1, startedAt: T1 };
    const newer = { ...base, id: 2, startedAt: T2 };

    const plan = tracker.reconcile(parseSnapshot(hostBlock('web1', 0, 'up')), [older, newer], T3);
    expect(plan.closed.map((close) => close.incident.id)).toEqual([2]);
    expect(plan.orphaned.map((incident) => incident.id)).toEqual([1]);
  });

  it('never closes before it opened', async () => {
    await poll(tracker, store, hostBlock('web1', 1, 'down'), T2);
    await poll(tracker, store, hostBlock('web1', 0, 'up'), T2);
    const [incident] = store.incidents;
    expect(incident.endedAt).not.toBeNull();
    expect(incident.endedAt && incident.endedAt.getTime() >= incident.startedAt.getTime()).toBe(true);
  });

  it('keeps committed writes and stops at the first persistence failure', async () => {
    await poll(tracker, store, hostBlock('a', 1, 'down') + hostBlock('b', 1, 'down'), T1);
    store.failNext('createIncident', new Error('connection reset'));

    const raw = hostBlock('a', 0, 'up') + hostBlock('b', 2, 'unreachable') + hostBlock('c', 1, 'down') + hostBlock('d', 1, 'down');
    const plan = tracker.reconcile(parseSnapshot(raw), await store.listOpenIncidents(), T2);

    const error = await tracker.apply(plan).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error instanceof PersistenceError ? error.committed : null).toEqual({ created: 0, updated: 1, closed: 1 });
    expect(error instanceof Error ? error.message : '').toBe('failed to open incident for c: connection reset');
    expect(store.incidents.map((incident) => incident.hostName)).toEqual(['a', 'b']);
  });

  it('attaches daemon comments to open incidents once', async () => {
    await poll(tracker, store, hostBlock('db1', 1, 'down'), T1);
    const comment = {
      commentId: 7,
      hostName: 'db1',
      serviceDescription: null,
      author: 'oncall',
      text: 'looking',
      entryTime: T1
    };
    const orphanComment = { ...comment, commentId: 9, hostName: 'web1' };

    expect(await tracker.attachComments([comment, orphanComment])).toBe(1);
    expect(await tracker.attachComments([comment])).toBe(0);
    expect(store.comments.map((item) => [item.incidentId, item.commentId])).toEqual([[1, 7]]);
  });

  it('keeps comments that arrive with the recovery of their incident', async () => {
    await poll(tracker, store, hostBlock('db1', 1, 'down'), T1);
    const { plan } = await poll(tracker, store, hostBlock('db1', 0, 'up'), T2);
    const comment = {
      commentId: 5,
      hostName: 'db1',
      serviceDescription: null,
      author: 'oncall',
      text: 'switch port replaced',
      entryTime: T2
    };

    const stored = await tracker.attachComments(
      [comment],
      plan.closed.map((close) => close.incident)
    );
    expect(stored).toBe(1);
    expect(store.comments.map((item) => [item.incidentId, item.commentId])).toEqual([[1, 5]]);
  });

  it('reports a store outage while attaching comments as a persistence failure', async () => {
    store.failNext('listOpenIncidents', new Error('connection reset'));
    const comment = {
      commentId: 5,
      hostName: 'db1',
      serviceDescription: null,
      author: 'oncall',
      text: 'looking',
      entryTime: T1
    };

    const error = await tracker.attachComments([comment]).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error instanceof Error ? error.message : '').toBe(
      'failed to load open incidents for comments: connection reset'
    );
  });
});
