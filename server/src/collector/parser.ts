import { ParseError } from '../errors';
import type {
  EntityKind,
  EntityRef,
  HostStateName,
  ObservedComment,
  ObservedState,
  ParsedSnapshot,
  ServiceStateName,
  StateName
} from '../types';

type Block = {
  type: string;
  line: number;
  fields: Map<string, string>;
};

export type EntityFilter = {
  hosts?: string[];
  services?: Array<{ hostName: string; serviceDescription: string }>;
};

const HOST_STATES: HostStateName[] = ['UP', 'DOWN', 'UNREACHABLE'];
const SERVICE_STATES: ServiceStateName[] = ['OK', 'WARNING', 'CRITICAL', 'UNKNOWN'];

const BLOCK_OPEN = /^([A-Za-z_][A-Za-z0-9_]*)\s*\{$/;

export function entityKey(ref: EntityRef) {
  return ref.serviceDescription === null ? ref.hostName : `${ref.hostName}\t${ref.serviceDescription}`;
}

export function entityLabel(ref: EntityRef) {
  return ref.serviceDescription === null ? ref.hostName : `${ref.hostName}/${ref.serviceDescription}`;
}

export function stateName(kind: EntityKind, code: number) {
  const names: readonly StateName[] = kind === 'host' ? HOST_STATES : SERVICE_STATES;
  return names[code] ?? null;
}

export function isProblemState(kind: EntityKind, code: number) {
  return code !== 0 && stateName(kind, code) !== null;
}

function splitBlocks(raw: string): Block[] {
  const blocks: Block[] = [];
  let current: Block | null = null;
  const lines = raw.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const lineNo = index + 1;
    const rawLine = lines[index];
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    if (line === '}') {
      if (!current) {
        throw new ParseError('unexpected closing brace', lineNo);
      }
      blocks.push(current);
      current = null;
      continue;
    }

    const open = BLOCK_OPEN.exec(line);
    if (open) {
      if (current) {
        throw new ParseError(`block "${open[1]}" opened inside "${current.type}"`, lineNo);
      }
      current = { type: open[1], line: lineNo, fields: new Map() };
      continue;
    }

    if (!current) {
      throw new ParseError('content outside of a block', lineNo);
    }
    const eq = rawLine.indexOf('=');
    if (eq === -1) {
      throw new ParseError('malformed line, expected key=value', lineNo);
    }
    current.fields.set(rawLine.slice(0, eq).trim(), rawLine.slice(eq + 1));
  }

  if (current) {
    throw new ParseError(`unterminated "${current.type}" block`, current.line);
  }
  return blocks;
}

function requireField(block: Block, key: string) {
  const value = block.fields.get(key);
  if (value === undefined) {
    throw new ParseError(`${block.type} block missing "${key}"`, block.line);
  }
  return value;
}

function requireName(block: Block, key: string) {
  const value = requireField(block, key).trim();
  if (!value) {
    throw new ParseError(`${block.type} block has empty "${key}"`, block.line);
  }
  return value;
}

function requireInt(block: Block, key: string) {
  const value = requireField(block, key).trim();
  if (!/^-?\d+$/.test(value)) {
    throw new ParseError(`${block.type} block has non-integer "${key}"`, block.line);
  }
  return Number(value);
}

function epochToDate(seconds: number) {
  return seconds > 0 ? new Date(seconds * 1000) : null;
}

function toObservedState(block: Block, kind: EntityKind): ObservedState {
  const hostName = requireName(block, 'host_name');
  const serviceDescription = kind === 'service' ? requireName(block, 'service_description') : null;
  const stateCode = requireInt(block, 'current_state');
  const state = stateName(kind, stateCode);
  if (state === null) {
    throw new ParseError(`${block.type} block has invalid current_state ${stateCode}`, block.line);
  }
  return {
    kind,
    hostName,
    serviceDescription,
    stateCode,
    state,
    isProblem: isProblemState(kind, stateCode),
    pluginOutput: requireField(block, 'plugin_output'),
    lastCheck: epochToDate(requireInt(block, 'last_check'))
  };
}

function toObservedComment(block: Block, kind: EntityKind): ObservedComment {
  const entryTime = epochToDate(requireInt(block, 'entry_time'));
  if (!entryTime) {
    throw new ParseError(`${block.type} block has invalid entry_time`, block.line);
  }
  return {
    commentId: requireInt(block, 'comment_id'),
    hostName: requireName(block, 'host_name'),
    serviceDescription: kind === 'service' ? requireName(block, 'service_description') : null,
    author: requireField(block, 'author'),
    text: requireField(block, 'comment_data'),
    entryTime
  };
}

/**
 * Parses the text of a daemon status file into host, service and comment records.
 * Unknown block types and unknown fields are ignored; anything structurally
 * broken (including a file truncated mid-write) throws a ParseError.
 */
export function parseSnapshot(raw: string): ParsedSnapshot {
  if (!raw.trim()) {
    throw new ParseError('snapshot is empty');
  }
  const blocks = splitBlocks(raw);
  if (!blocks.length) {
    throw new ParseError('snapshot contains no blocks');
  }

  const snapshot: ParsedSnapshot = { hosts: [], services: [], comments: [], createdAt: null };
  for (const block of blocks) {
    switch (block.type) {
      case 'info': {
        const created = block.fields.get('created');
        if (created !== undefined && /^\d+$/.test(created.trim())) {
          snapshot.createdAt = epochToDate(Number(created.trim()));
        }
        break;
      }
      case 'hoststatus':
        snapshot.hosts.push(toObservedState(block, 'host'));
        break;
      case 'servicestatus':
        snapshot.services.push(toObservedState(block, 'service'));
        break;
      case 'hostcomment':
        snapshot.comments.push(toObservedComment(block, 'host'));
        break;
      case 'servicecomment':
        snapshot.comments.push(toObservedComment(block, 'service'));
        break;
      default:
        break;
    }
  }
  return snapshot;
}

export function filterSnapshot(snapshot: ParsedSnapshot, filter: EntityFilter): ParsedSnapshot {
  const hostNames = filter.hosts?.length ? new Set(filter.hosts) : null;
  const serviceKeys = filter.services?.length
    ? new Set(filter.services.map((svc) => entityKey(svc)))
    : null;

  const hosts = hostNames ? snapshot.hosts.filter((host) => hostNames.has(host.hostName)) : snapshot.hosts;
  const services = serviceKeys
    ? snapshot.services.filter((svc) => serviceKeys.has(entityKey(svc)))
    : snapshot.services;

  const kept = new Set([...hosts, ...services].map((entity) => entityKey(entity)));
  const comments = snapshot.comments.filter((comment) => kept.has(entityKey(comment)));

  return { hosts, services, comments, createdAt: snapshot.createdAt };
}
