import { PersistenceError, errorMessage, type CommittedCounts } from '../errors';
import type {
  Incident,
  IncidentChange,
  IncidentStore,
  NewIncident,
  ObservedComment,
  ObservedState,
  ParsedSnapshot
} from '../types';
import { entityKey, entityLabel } from './parser';

export type PlannedUpdate = {
  incident: Incident;
  change: IncidentChange;
};

export type PlannedClose = PlannedUpdate & {
  endedAt: Date;
};

export type ReconcileResult = {
  created: NewIncident[];
  updated: PlannedUpdate[];
  closed: PlannedClose[];
  unchanged: Incident[];
  orphaned: Incident[];
};

function changeFrom(observed: ObservedState): IncidentChange {
  return {
    state: observed.state,
    pluginOutput: observed.pluginOutput,
    lastCheck: observed.lastCheck
  };
}

function sameTime(a: Date | null, b: Date | null) {
  return (a?.getTime() ?? null) === (b?.getTime() ?? null);
}

function hasChanged(incident: Incident, change: IncidentChange) {
  return (
    incident.state !== change.state ||
    incident.pluginOutput !== change.pluginOutput ||
    !sameTime(incident.lastCheck, change.lastCheck)
  );
}

/**
 * Reconciles observed entity states against open incidents and writes the
 * resulting create/update/close events through the incident store.
 */
export class IncidentTracker {
  private store: IncidentStore;

  constructor(store: IncidentStore) {
    this.store = store;
  }

  reconcile(snapshot: ParsedSnapshot, openIncidents: Incident[], now: Date): ReconcileResult {
    const result: ReconcileResult = { created: [], updated: [], closed: [], unchanged: [], orphaned: [] };

    // newest open incident wins if legacy data holds more than one per entity
    const openByKey = new Map<string, Incident>();
    const sorted = [...openIncidents].sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime());
    for (const incident of sorted) {
      const key = entityKey(incident);
      if (openByKey.has(key)) {
        result.orphaned.push(incident);
      } else {
        openByKey.set(key, incident);
      }
    }

    const seen = new Set<string>();
    for (const observed of [...snapshot.hosts, ...snapshot.services]) {
      const key = entityKey(observed);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const incident = openByKey.get(key);
      const change = changeFrom(observed);

      if (!incident) {
        if (observed.isProblem) {
          result.created.push({
            incidentType: observed.kind,
            hostName: observed.hostName,
            serviceDescription: observed.serviceDescription,
            startedAt: now,
            ...change
          });
        }
        continue;
      }

      if (!observed.isProblem) {
        result.closed.push({ incident, change, endedAt: now });
      } else if (hasChanged(incident, change)) {
        result.updated.push({ incident, change });
      } else {
        result.unchanged.push(incident);
      }
    }

    for (const [key, incident] of openByKey) {
      if (!seen.has(key)) {
        result.orphaned.push(incident);
      }
    }

    return result;
  }

  async apply(plan: ReconcileResult): Promise<CommittedCounts> {
    const committed: CommittedCounts = { created: 0, updated: 0, closed: 0 };

    const write = async (label: string, op: () => Promise<unknown>) => {
      try {
        await op();
      } catch (err: unknown) {
        throw new PersistenceError(`failed to ${label}: ${errorMessage(err)}`, { ...committed }, { cause: err });
      }
    };

    for (const { incident, change, endedAt } of plan.closed) {
      await write(`close incident ${incident.id} (${entityLabel(incident)})`, () =>
        this.store.closeIncident(incident.id, change, endedAt)
      );
      committed.closed += 1;
    }
    for (const { incident, change } of plan.updated) {
      await write(`update incident ${incident.id} (${entityLabel(incident)})`, () =>
        this.store.updateIncident(incident.id, change)
      );
      committed.updated += 1;
    }
    for (const data of plan.created) {
      await write(`open incident for ${entityLabel(data)}`, () => this.store.createIncident(data));
      committed.created += 1;
    }

    return committed;
  }

  /**
   * Stores daemon comments against their entity's incident. Incidents closed
   * earlier in the same poll still receive the comments that came with the
   * recovery snapshot.
   */
  async attachComments(comments: ObservedComment[], closedThisPoll: Incident[] = []) {
    if (!comments.length) {
      return 0;
    }
    let open: Incident[];
    try {
      open = await this.store.listOpenIncidents();
    } catch (err: unknown) {
      throw new PersistenceError(
        `failed to load open incidents for comments: ${errorMessage(err)}`,
        { created: 0, updated: 0, closed: 0 },
        { cause: err }
      );
    }
    const openByKey = new Map(open.map((incident) => [entityKey(incident), incident]));
    for (const incident of closedThisPoll) {
      const key = entityKey(incident);
      if (!openByKey.has(key)) {
        openByKey.set(key, incident);
      }
    }

    let stored = 0;
    for (const comment of comments) {
      const incident = openByKey.get(entityKey(comment));
      if (!incident) {
        continue;
      }
      try {
        if (await this.store.recordComment(incident.id, comment)) {
          stored += 1;
        }
      } catch (err: unknown) {
        throw new PersistenceError(
          `failed to record comment ${comment.commentId} for ${entityLabel(comment)}: ${errorMessage(err)}`,
          { created: 0, updated: 0, closed: 0 },
          { cause: err }
        );
      }
    }
    return stored;
  }
}
