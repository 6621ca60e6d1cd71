export type Logger = {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
};

export type EntityKind = 'host' | 'service';

export type HostStateName = 'UP' | 'DOWN' | 'UNREACHABLE';
export type ServiceStateName = 'OK' | 'WARNING' | 'CRITICAL' | 'UNKNOWN';
export type StateName = HostStateName | ServiceStateName;

export type EntityRef = {
  hostName: string;
  serviceDescription: string | null;
};

export type ObservedState = EntityRef & {
  kind: EntityKind;
  stateCode: number;
  state: StateName;
  isProblem: boolean;
  pluginOutput: string;
  lastCheck: Date | null;
};

export type ObservedComment = EntityRef & {
  commentId: number;
  author: string;
  text: string;
  entryTime: Date;
};

export type ParsedSnapshot = {
  hosts: ObservedState[];
  services: ObservedState[];
  comments: ObservedComment[];
  createdAt: Date | null;
};

export type Incident = EntityRef & {
  id: number;
  incidentType: EntityKind;
  state: StateName;
  startedAt: Date;
  endedAt: Date | null;
  acknowledged: boolean;
  pluginOutput: string;
  lastCheck: Date | null;
};

export type NewIncident = Omit<Incident, 'id' | 'acknowledged' | 'endedAt'>;

export type IncidentChange = {
  state: StateName;
  pluginOutput: string;
  lastCheck: Date | null;
};

export type IncidentComment = EntityRef & {
  id: number;
  incidentId: number;
  commentId: number;
  author: string;
  text: string;
  entryTime: Date;
};

export type PollStatus = 'success' | 'soft-error' | 'hard-error';

export type PollMetadata = {
  lastAttemptAt: Date | null;
  lastSuccessAt: Date | null;
  lastOutcome: PollStatus | null;
  recordsProcessed: number;
  sourceModifiedAt: Date | null;
};

export type IncidentFilter = {
  activeOnly?: boolean;
  since?: Date;
  hostName?: string;
  serviceDescription?: string;
};

export interface IncidentStore {
  listOpenIncidents(): Promise<Incident[]>;
  createIncident(data: NewIncident): Promise<Incident>;
  updateIncident(id: number, change: IncidentChange): Promise<void>;
  closeIncident(id: number, change: IncidentChange, endedAt: Date): Promise<void>;
  recordComment(incidentId: number, comment: ObservedComment): Promise<boolean>;
  purgeClosedIncidents(olderThan: Date): Promise<number>;
  recordPollMetadata(metadata: PollMetadata): Promise<void>;
  getLatestPollMetadata(): Promise<PollMetadata | null>;
  listIncidents(filter: IncidentFilter): Promise<Incident[]>;
  getIncident(id: number): Promise<Incident | null>;
  listIncidentComments(incidentId: number): Promise<IncidentComment[]>;
  setIncidentAcknowledged(id: number, acknowledged: boolean): Promise<boolean>;
}

export type Clock = () => Date;
