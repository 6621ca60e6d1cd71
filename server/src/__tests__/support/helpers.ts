import { vi } from 'vitest';
import type { Trigger, TriggerFactory, TriggerOptions } from '../../collector/trigger';
import type { SnapshotRead, SnapshotSource } from '../../collector/source';

export function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function fixedClock(iso: string) {
  let now = new Date(iso);
  const clock = () => new Date(now.getTime());
  clock.set = (next: string) => {
    now = new Date(next);
  };
  clock.advance = (seconds: number) => {
    now = new Date(now.getTime() + seconds * 1000);
  };
  return clock;
}

export function flush() {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

export class ManualTrigger implements Trigger {
  started = false;
  stopped = false;
  readonly options: TriggerOptions;
  private tick: () => void;

  constructor(tick: () => void, options: TriggerOptions) {
    this.tick = tick;
    this.options = options;
  }

  get alive() {
    return this.started && !this.stopped;
  }

  start() {
    this.started = true;
  }

  stop() {
    this.stopped = true;
  }

  fire() {
    this.tick();
  }
}

export function manualTriggers() {
  const created: ManualTrigger[] = [];
  const factory: TriggerFactory = (tick, options) => {
    const trigger = new ManualTrigger(tick, options);
    created.push(trigger);
    return trigger;
  };
  return { created, factory };
}

export class StaticSource implements SnapshotSource {
  readonly description = 'test://status.dat';
  content: string | Error;
  modifiedAt: Date | null;
  reads = 0;

  constructor(content: string | Error, modifiedAt: Date | null = null) {
    this.content = content;
    this.modifiedAt = modifiedAt;
  }

  async read(): Promise<SnapshotRead> {
    this.reads += 1;
    if (this.content instanceof Error) {
      throw this.content;
    }
    return { content: this.content, modifiedAt: this.modifiedAt };
  }
}

export function hostBlock(hostName: string, state: number, output: string, lastCheck = 1700000000) {
  return [
    'hoststatus {',
    `\thost_name=${hostName}`,
    `\tcurrent_state=${state}`,
    `\tplugin_output=${output}`,
    `\tlast_check=${lastCheck}`,
    '\t}',
    ''
  ].join('\n');
}

export function serviceBlock(
  hostName: string,
  service: string,
  state: number,
  output: string,
  lastCheck = 1700000000
) {
  return [
    'servicestatus {',
    `\thost_name=${hostName}`,
    `\tservice_description=${service}`,
    `\tcurrent_state=${state}`,
    `\tplugin_output=${output}`,
    `\tlast_check=${lastCheck}`,
    '\t}',
    ''
  ].join('\n');
}
